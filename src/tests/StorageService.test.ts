import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { StorageService } from '../services/StorageService';
import { parseCardDocuments, toCardDocument } from '../lib/cardDocument';
import { describeError } from '../lib/errors';
import { Card, ImportReport } from '../types';

const CARD: Card = {
    name: 'Fix login bug',
    description: 'Users cannot log in',
    labels: ['bug', 'bug'],
    dueDate: new Date('2023-05-01T00:00:00.000Z'),
    creatorId: 'u1',
    ownerIds: ['u1', 'u2'],
    createdAt: undefined,
    comments: [{ text: 'LGTM', authorSourceId: 'u1', authorDisplayName: 'User One', createdAt: new Date('2023-04-01T09:30:00.000Z') }],
    tasks: [{ completed: true, description: 'Checklist - Tests' }],
    position: 65535,
    sourceUrl: 'https://trello.com/c/abc123',
    attachments: { 'My_File_1.png': 'https://www.dropbox.com/s/link1' },
};

let testDir: string;
let storage: StorageService;

beforeEach(() => {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'storage-test-'));
    storage = new StorageService({ basePath: testDir, exportPath: 'trello_cards.json', reportPath: 'out/import_report.json' });
});

afterEach(() => {
    fs.removeSync(testDir);
});

describe('card documents', () => {
    it('uses the export field names', () => {
        expect(toCardDocument(CARD)).toEqual({
            name: 'Fix login bug',
            desc: 'Users cannot log in',
            labels: ['bug', 'bug'],
            due_date: '2023-05-01T00:00:00.000Z',
            id_creator: 'u1',
            id_owners: ['u1', 'u2'],
            created_at: null,
            comments: [{ text: 'LGTM', id_creator: 'u1', creator_name: 'User One', created_at: '2023-04-01T09:30:00.000Z' }],
            checklists: [{ completed: true, description: 'Checklist - Tests' }],
            position: 65535,
            url: 'https://trello.com/c/abc123',
            attachments: { 'My_File_1.png': 'https://www.dropbox.com/s/link1' },
        });
    });

    it('fills defaults for optional fields', () => {
        const [card] = parseCardDocuments([{ name: 'Bare', url: 'https://trello.com/c/bare' }]);

        expect(card).toEqual({
            name: 'Bare',
            description: '',
            labels: [],
            dueDate: undefined,
            creatorId: '',
            ownerIds: [],
            createdAt: undefined,
            comments: [],
            tasks: [],
            position: 0,
            sourceUrl: 'https://trello.com/c/bare',
            attachments: {},
        });
    });

    it('names the offending path of a malformed document', () => {
        let failure: unknown;
        try {
            parseCardDocuments([{ name: 'x', url: 'u', checklists: [{ completed: 'yes', description: 'd' }] }]);
        } catch (error) {
            failure = error;
        }

        expect(describeError(failure)).toBe('0.checklists.0.completed: Expected boolean, received string');
    });
});

describe('StorageService (file system)', () => {
    it('writes the export to the configured path and reads it back', async () => {
        await storage.saveCards([CARD]);

        expect(await fs.pathExists(path.join(testDir, 'trello_cards.json'))).toBe(true);
        expect(await storage.loadCards()).toEqual([CARD]);
    });

    it('fails with a hint when nothing was exported yet', async () => {
        await expect(storage.loadCards()).rejects.toThrow('Run the export first.');
    });

    it('writes the import report, creating missing directories', async () => {
        const report: ImportReport = {
            summary: { total: 0, succeeded: 0, failed: 0, deleted: 0 },
            finishedAt: '2024-03-01T12:00:00.000Z',
            results: [],
        };

        await storage.saveImportReport(report);

        expect(await fs.readJson(path.join(testDir, 'out', 'import_report.json'))).toEqual(report);
    });

    it('describes where the export lives', () => {
        expect(storage.describe()).toBe(`file system (${path.join(testDir, 'trello_cards.json')})`);
    });
});

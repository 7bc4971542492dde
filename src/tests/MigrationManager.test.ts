import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { MigrationManager } from '../services/MigrationManager';
import { StorageService } from '../services/StorageService';
import { loadConfig, MigratorConfig } from '../config';
import { FakeClubhouse, FakeDropbox, FakeTrello, action, rawCard } from './fakes';

let testDir: string;
let trello: FakeTrello;
let dropbox: FakeDropbox;
let clubhouse: FakeClubhouse;
let storage: StorageService;

function configFor(overrides: Record<string, string> = {}): MigratorConfig {
    return loadConfig({
        TRELLO_BOARD_ID: 'board-1',
        CLUBHOUSE_PROJECT_ID: '7',
        CLUBHOUSE_WORKFLOW_STATE_ID: '500',
        CLUBHOUSE_IMPORT_MEMBER_ID: 'importer-uuid',
        DROPBOX_ROOT: 'trello',
        LOCALE_TIMEZONE: 'UTC',
        USER_MAP_FILE: path.join(testDir, 'user_map.json'),
        ...overrides,
    });
}

function manager(config: MigratorConfig): MigrationManager {
    return new MigrationManager(config, { source: trello, sharing: dropbox, destination: clubhouse, storage });
}

beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);

    testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'migration-test-'));
    storage = new StorageService({ basePath: testDir, exportPath: 'trello_cards.json', reportPath: 'import_report.json' });
    trello = new FakeTrello();
    dropbox = new FakeDropbox();
    clubhouse = new FakeClubhouse();

    trello.cards = [rawCard({ idMembers: ['u1'] })];
    trello.actions.set('card-1', [action('createCard'), action('commentCard', { text: 'Looks good' })]);
    trello.attachments.set('card-1', [{ name: 'shot.png', url: 'https://trello.com/a/1' }]);
    trello.files.set('https://trello.com/a/1', Buffer.from('png-bytes'));
    await fs.writeJson(path.join(testDir, 'user_map.json'), { u1: 'clubhouse-u1' });
});

afterEach(() => {
    fs.removeSync(testDir);
});

describe('MigrationManager', () => {
    it('exports the board into storage', async () => {
        const result = await manager(configFor()).exportCards();

        expect(result.cards).toHaveLength(1);
        const stored = await storage.loadCards();
        expect(stored[0]).toMatchObject({ name: 'Fix login bug', creatorId: 'u1', ownerIds: ['u1'], attachments: {} });
        expect(dropbox.uploads).toEqual([]);
    });

    it('relocates attachments when image processing is on', async () => {
        await manager(configFor({ PROCESS_IMAGES: 'true' })).exportCards();

        const [card] = await storage.loadCards();
        expect(card.attachments).toEqual({ 'shot.png': 'https://www.dropbox.com/s/link1' });
        expect(dropbox.uploads.map(u => u.path)).toEqual(['/trello/list-1/card-1/0_shot.png']);
    });

    it('imports the stored export and saves the report', async () => {
        const migrator = manager(configFor());
        await migrator.exportCards();

        const report = await migrator.importCards();

        expect(report.summary).toEqual({ total: 1, succeeded: 1, failed: 0, deleted: 0 });
        expect(clubhouse.stories[0].request).toMatchObject({
            name: 'Fix login bug',
            project_id: 7,
            workflow_state_id: 500,
            requested_by_id: 'clubhouse-u1',
            owner_ids: ['clubhouse-u1'],
        });
        const saved = await fs.readJson(path.join(testDir, 'import_report.json'));
        expect(saved.summary).toEqual(report.summary);
    });

    it('replaces the stories of an earlier run', async () => {
        const migrator = manager(configFor());

        await migrator.migrate();
        const second = await migrator.migrate();

        expect(second.summary).toEqual({ total: 1, succeeded: 1, failed: 0, deleted: 1 });
        expect(clubhouse.stories.map(s => s.name)).toEqual(['Fix login bug']);
        expect(clubhouse.deleted).toEqual([100]);
    });

    it('checks the destination before importing anything', async () => {
        const migrator = manager(configFor({ CLUBHOUSE_WORKFLOW_STATE_ID: '999' }));
        await migrator.exportCards();

        await expect(migrator.importCards())
            .rejects.toThrow('Workflow state 999 does not exist in any Clubhouse workflow');
        expect(clubhouse.stories).toEqual([]);
        expect(await fs.pathExists(path.join(testDir, 'import_report.json'))).toBe(false);
    });
});

import { SupabaseClient } from '@supabase/supabase-js';
import fs from 'fs-extra';
import path from 'path';
import { MigrationState, MIGRATION_STATE_TABLE } from '../lib/supabase';
import { parseCardDocuments, toCardDocument } from '../lib/cardDocument';
import { Card, ImportReport } from '../types';

const CARDS_KEY = 'trello_cards';
const REPORT_KEY = 'import_report';

export interface StorageServiceOptions {
    supabase?: SupabaseClient | null;
    basePath?: string;
    exportPath: string;
    reportPath: string;
}

/**
 * Keeps the exported cards and the import report between runs: as rows of
 * the `migration_state` table when a Supabase client is given, as JSON files
 * at the configured paths otherwise.
 */
export class StorageService {
    private supabase: SupabaseClient | null;
    private exportPath: string;
    private reportPath: string;

    constructor(options: StorageServiceOptions) {
        this.supabase = options.supabase || null;
        const basePath = options.basePath || '.';
        this.exportPath = path.resolve(basePath, options.exportPath);
        this.reportPath = path.resolve(basePath, options.reportPath);
    }

    describe(): string {
        return this.supabase
            ? `Supabase table ${MIGRATION_STATE_TABLE}`
            : `file system (${this.exportPath})`;
    }

    // ======================
    // EXPORTED CARDS
    // ======================

    async saveCards(cards: Card[]): Promise<void> {
        const documents = cards.map(toCardDocument);
        if (this.supabase) {
            await this.writeState(this.supabase, CARDS_KEY, documents);
        } else {
            await fs.ensureDir(path.dirname(this.exportPath));
            await fs.writeJson(this.exportPath, documents, { spaces: 2 });
        }
    }

    async loadCards(): Promise<Card[]> {
        let raw: unknown;
        if (this.supabase) {
            raw = await this.readState(this.supabase, CARDS_KEY);
        } else if (await fs.pathExists(this.exportPath)) {
            raw = await fs.readJson(this.exportPath);
        } else {
            raw = null;
        }

        if (raw === null) {
            throw new Error(`No exported cards found in ${this.describe()}. Run the export first.`);
        }
        return parseCardDocuments(raw);
    }

    // ======================
    // IMPORT REPORT
    // ======================

    async saveImportReport(report: ImportReport): Promise<void> {
        if (this.supabase) {
            await this.writeState(this.supabase, REPORT_KEY, report);
        } else {
            await fs.ensureDir(path.dirname(this.reportPath));
            await fs.writeJson(this.reportPath, report, { spaces: 2 });
        }
    }

    // ======================
    // SUPABASE ROWS
    // ======================

    private async readState(supabase: SupabaseClient, key: string): Promise<unknown> {
        const { data, error } = await supabase
            .from(MIGRATION_STATE_TABLE)
            .select('value')
            .eq('key', key)
            .single();

        if (error && error.code !== 'PGRST116') throw error; // PGRST116 = not found
        return data?.value ?? null;
    }

    private async writeState(supabase: SupabaseClient, key: string, value: unknown): Promise<void> {
        const row: MigrationState = { key, value, updated_at: new Date().toISOString() };
        const { error } = await supabase
            .from(MIGRATION_STATE_TABLE)
            .upsert(row, { onConflict: 'key' });

        if (error) throw error;
    }
}

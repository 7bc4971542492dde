import { MigratorConfig } from '../config';
import { TrelloClient } from './TrelloClient';
import { DropboxClient } from './DropboxClient';
import { ClubhouseClient } from './ClubhouseClient';
import { CardNormalizer } from './CardNormalizer';
import { AttachmentRelocator } from './AttachmentRelocator';
import { CardExporter, ExportResult } from './CardExporter';
import { StoryImporter, resolveImportTarget } from './StoryImporter';
import { StorageService } from './StorageService';
import { UserMap } from './UserMap';
import { createSupabaseClient } from '../lib/supabase';
import { describeError } from '../lib/errors';
import { Card, DestinationApi, ImportReport, SharingApi, SourceApi } from '../types';

export interface MigrationClients {
    source?: SourceApi;
    sharing?: SharingApi;
    destination?: DestinationApi;
    storage?: StorageService;
}

export class MigrationManager {
    private config: MigratorConfig;
    private clients: MigrationClients;
    private storage: StorageService;

    constructor(config: MigratorConfig, clients: MigrationClients = {}) {
        this.config = config;
        this.clients = clients;
        this.storage = clients.storage || new StorageService({
            supabase: createSupabaseClient(config.supabaseUrl, config.supabaseKey),
            exportPath: config.exportPath,
            reportPath: config.reportPath,
        });
    }

    private trelloClient(): TrelloClient {
        return new TrelloClient({
            baseUrl: this.config.trelloApiUrl,
            apiKey: this.config.trelloApiKey,
            token: this.config.trelloToken,
            timeoutMs: this.config.httpTimeoutMs,
        });
    }

    private dropboxClient(): DropboxClient {
        return new DropboxClient({
            token: this.config.dropboxToken,
            timeoutMs: this.config.httpTimeoutMs,
        });
    }

    private clubhouseClient(): ClubhouseClient {
        return new ClubhouseClient({
            baseUrl: this.config.clubhouseApiUrl,
            token: this.config.clubhouseApiToken,
            timeoutMs: this.config.httpTimeoutMs,
        });
    }

    private source(): SourceApi {
        if (!this.clients.source) this.clients.source = this.trelloClient();
        return this.clients.source;
    }

    private sharing(): SharingApi {
        if (!this.clients.sharing) this.clients.sharing = this.dropboxClient();
        return this.clients.sharing;
    }

    private destination(): DestinationApi {
        if (!this.clients.destination) this.clients.destination = this.clubhouseClient();
        return this.clients.destination;
    }

    async exportCards(): Promise<ExportResult> {
        const source = this.source();
        const relocator = this.config.processImages
            ? new AttachmentRelocator(source, this.sharing(), {
                root: this.config.dropboxRoot,
                timeZone: this.config.localeTimezone,
            })
            : null;

        const exporter = new CardExporter(source, new CardNormalizer(source), relocator);
        const result = await exporter.exportBoard(this.config.trelloBoardId, this.config.trelloListIds);

        await this.storage.saveCards(result.cards);
        console.log(`✅ Exported ${result.cards.length} cards to ${this.storage.describe()}`);
        if (result.attachmentFailures.length > 0) {
            console.warn(`⚠️  ${result.attachmentFailures.length} attachments could not be relocated and were left out`);
        }
        return result;
    }

    async importCards(cards?: Card[]): Promise<ImportReport> {
        const userMap = await UserMap.load(this.config.userMapFile);
        const destination = this.destination();
        const target = await resolveImportTarget(destination, {
            projectId: this.config.clubhouseProjectId,
            workflowStateId: this.config.clubhouseWorkflowStateId,
            storyType: this.config.clubhouseStoryType,
            importMemberId: this.config.clubhouseImportMemberId,
            addCommentWithTrelloLink: this.config.addCommentWithTrelloLink,
        });

        const toImport = cards || await this.storage.loadCards();
        const importer = new StoryImporter(destination, userMap);
        const report = await importer.importCards(toImport, target);

        await this.storage.saveImportReport(report);
        return report;
    }

    async migrate(): Promise<ImportReport> {
        const exported = await this.exportCards();
        return this.importCards(exported.cards);
    }

    async checkConnections(): Promise<boolean> {
        const checks: Array<[string, () => Promise<boolean>]> = [
            ['Trello', () => this.trelloClient().validateConnection()],
            ['Clubhouse', () => this.clubhouseClient().validateConnection()],
        ];
        if (this.config.processImages) {
            checks.push(['Dropbox', () => this.dropboxClient().validateConnection()]);
        }

        let allConnected = true;
        for (const [name, check] of checks) {
            let connected = false;
            try {
                connected = await check();
            } catch (error) {
                console.error(`${name}: ${describeError(error)}`);
            }
            console.log(connected ? `✓ ${name} connection successful` : `✗ ${name} connection failed`);
            allConnected = allConnected && connected;
        }
        return allConnected;
    }
}

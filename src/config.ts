import dotenv from 'dotenv';
dotenv.config();

export type StoryType = 'feature' | 'bug' | 'chore';

export const STORY_TYPES: readonly StoryType[] = ['feature', 'bug', 'chore'];

export interface MigratorConfig {
    trelloApiUrl: string;
    trelloApiKey: string;
    trelloToken: string;
    trelloBoardId: string;
    trelloListIds: string[];
    clubhouseApiUrl: string;
    clubhouseApiToken: string;
    clubhouseProjectId: number;
    clubhouseWorkflowStateId: number;
    clubhouseStoryType: StoryType;
    clubhouseImportMemberId: string;
    addCommentWithTrelloLink: boolean;
    processImages: boolean;
    dropboxToken: string;
    dropboxRoot: string;
    localeTimezone: string;
    userMapFile: string;
    exportPath: string;
    reportPath: string;
    supabaseUrl: string;
    supabaseKey: string;
    httpTimeoutMs: number;
}

type Env = Record<string, string | undefined>;

function flag(value: string | undefined): boolean {
    return value === 'true' || value === '1';
}

function list(value: string | undefined): string[] {
    return (value || '')
        .split(',')
        .map(v => v.trim())
        .filter(v => v.length > 0);
}

function storyType(value: string | undefined): StoryType {
    const found = STORY_TYPES.find(t => t === (value || 'feature').toLowerCase());
    if (!found) {
        throw new Error(`CLUBHOUSE_STORY_TYPE must be one of ${STORY_TYPES.join(', ')} (got "${value}")`);
    }
    return found;
}

export function loadConfig(env: Env = process.env): MigratorConfig {
    return {
        trelloApiUrl: env.TRELLO_API_URL || 'https://api.trello.com/1',
        trelloApiKey: env.TRELLO_API_KEY || '',
        trelloToken: env.TRELLO_TOKEN || '',
        trelloBoardId: env.TRELLO_BOARD_ID || '',
        trelloListIds: list(env.TRELLO_LIST_IDS),
        clubhouseApiUrl: env.CLUBHOUSE_API_URL || 'https://api.clubhouse.io/api/v3',
        clubhouseApiToken: env.CLUBHOUSE_API_TOKEN || '',
        clubhouseProjectId: parseInt(env.CLUBHOUSE_PROJECT_ID || '0', 10),
        clubhouseWorkflowStateId: parseInt(env.CLUBHOUSE_WORKFLOW_STATE_ID || '0', 10),
        clubhouseStoryType: storyType(env.CLUBHOUSE_STORY_TYPE),
        clubhouseImportMemberId: env.CLUBHOUSE_IMPORT_MEMBER_ID || '',
        addCommentWithTrelloLink: flag(env.ADD_COMMENT_WITH_TRELLO_LINK),
        processImages: flag(env.PROCESS_IMAGES),
        dropboxToken: env.DROPBOX_TOKEN || '',
        dropboxRoot: env.DROPBOX_ROOT || '/trello',
        localeTimezone: env.LOCALE_TIMEZONE || 'America/Boise',
        userMapFile: env.USER_MAP_FILE || 'user_map.json',
        exportPath: env.EXPORT_PATH || 'trello_cards.json',
        reportPath: env.REPORT_PATH || 'import_report.json',
        supabaseUrl: env.SUPABASE_URL || '',
        supabaseKey: env.SUPABASE_ANON_KEY || '',
        httpTimeoutMs: parseInt(env.HTTP_TIMEOUT_MS || '60000', 10),
    };
}

export function warnOnMissingCredentials(config: MigratorConfig): void {
    if (!config.trelloApiKey || !config.clubhouseApiToken) {
        console.warn('Warning: TRELLO_API_KEY or CLUBHOUSE_API_TOKEN is missing. API calls will fail until these are set.');
    }
}

import { UserMap } from './UserMap';
import {
    Card,
    CreateComment,
    CreateLabel,
    CreateStory,
    CreateTask,
    DestinationApi,
    ImportErrorCode,
    ImportReport,
    ImportResult,
    ImportTarget,
} from '../types';
import { ClubhouseMember, ClubhouseProject, ClubhouseStorySummary, ClubhouseWorkflow } from '../lib/schemas';
import { StoryType, STORY_TYPES } from '../config';
import { describeError } from '../lib/errors';

const LINK_WIDTH = 40;
const STATUS_WIDTH = 17;

export function formatStatusLine(link: string, status: string, detail: string): string {
    return `${link.padEnd(LINK_WIDTH)} ${status.padEnd(STATUS_WIDTH)} ${detail}`;
}

export const STATUS_HEADER = formatStatusLine('Trello Card Link', 'Import Status', 'Error/Story ID');

export interface ImportTargetSettings {
    projectId: number;
    workflowStateId: number;
    storyType: StoryType;
    importMemberId: string;
    addCommentWithTrelloLink: boolean;
}

export interface StoryImporterOptions {
    output?: (line: string) => void;
    now?: () => Date;
}

/**
 * Looks up and validates everything a run needs on the Clubhouse side before
 * any card is touched. Throws on the first lookup that fails.
 */
export async function resolveImportTarget(destination: DestinationApi, settings: ImportTargetSettings): Promise<ImportTarget> {
    if (!settings.projectId) {
        throw new Error('CLUBHOUSE_PROJECT_ID is not set');
    }
    if (!settings.workflowStateId) {
        throw new Error('CLUBHOUSE_WORKFLOW_STATE_ID is not set');
    }
    if (!settings.importMemberId) {
        throw new Error('CLUBHOUSE_IMPORT_MEMBER_ID is not set');
    }
    if (!STORY_TYPES.includes(settings.storyType)) {
        throw new Error(`Unknown story type "${settings.storyType}"`);
    }

    let project: ClubhouseProject;
    try {
        project = await destination.getProject(settings.projectId);
    } catch (error) {
        throw new Error(`Clubhouse project ${settings.projectId} could not be loaded: ${describeError(error)}`);
    }

    let workflows: ClubhouseWorkflow[];
    try {
        workflows = await destination.listWorkflows();
    } catch (error) {
        throw new Error(`Clubhouse workflows could not be loaded: ${describeError(error)}`);
    }
    const state = workflows
        .flatMap(workflow => workflow.states)
        .find(s => s.id === settings.workflowStateId);
    if (!state) {
        throw new Error(`Workflow state ${settings.workflowStateId} does not exist in any Clubhouse workflow`);
    }

    let importMember: ClubhouseMember;
    try {
        importMember = await destination.getMember(settings.importMemberId);
    } catch (error) {
        throw new Error(`Clubhouse member ${settings.importMemberId} could not be loaded: ${describeError(error)}`);
    }

    return {
        project,
        workflowStateId: state.id,
        storyType: settings.storyType,
        importMember,
        addCommentWithTrelloLink: settings.addCommentWithTrelloLink,
    };
}

export class StoryImporter {
    private destination: DestinationApi;
    private userMap: UserMap;
    private output: (line: string) => void;
    private now: () => Date;
    private projectLocks = new Map<number, Promise<void>>();

    constructor(destination: DestinationApi, userMap: UserMap, options: StoryImporterOptions = {}) {
        this.destination = destination;
        this.userMap = userMap;
        this.output = options.output || (line => console.log(line));
        this.now = options.now || (() => new Date());
    }

    /**
     * Creates one story per card, in order. Runs against the same project are
     * serialized so two of them never both decide a name is free.
     */
    async importCards(cards: Card[], target: ImportTarget): Promise<ImportReport> {
        return this.withProjectLock(target.project.id, () => this.importBatch(cards, target));
    }

    private async importBatch(cards: Card[], target: ImportTarget): Promise<ImportReport> {
        this.output('Importing trello cards into Clubhouse...');
        this.output(STATUS_HEADER);

        let existing: ClubhouseStorySummary[] = [];
        try {
            existing = await this.destination.listStories(target.project.id);
        } catch (error) {
            console.error(`Could not list stories of project ${target.project.name}, duplicates will not be removed: ${describeError(error)}`);
        }

        const results: ImportResult[] = [];
        for (const card of cards) {
            const result = await this.importCard(card, target, existing);
            this.output(result.statusLine);
            results.push(result);
        }

        const succeeded = results.filter(r => r.status === 'success').length;
        const deleted = results.reduce((sum, r) => sum + r.deletedStoryIds.length, 0);
        this.output(`\nImported ${succeeded}/${results.length} cards (${results.length - succeeded} failed, ${deleted} existing stories replaced)`);

        return {
            summary: {
                total: results.length,
                succeeded,
                failed: results.length - succeeded,
                deleted,
            },
            finishedAt: this.now().toISOString(),
            results,
        };
    }

    private async importCard(card: Card, target: ImportTarget, existing: ClubhouseStorySummary[]): Promise<ImportResult> {
        const base: Pick<ImportResult, 'cardName' | 'cardUrl' | 'deletedStoryIds' | 'failedLinkedFiles'> = {
            cardName: card.name,
            cardUrl: card.sourceUrl,
            deletedStoryIds: [],
            failedLinkedFiles: [],
        };

        if (!card.name.trim()) {
            const message = 'Card has no name';
            return {
                ...base,
                status: 'failed',
                errorCode: ImportErrorCode.INVALID_CARD,
                message,
                statusLine: formatStatusLine(card.sourceUrl, 'Failed', message),
            };
        }

        base.deletedStoryIds = await this.deleteMatchingStories(existing, card);

        const linked = await this.buildLinkedFiles(card, target);
        base.failedLinkedFiles = linked.failed;

        try {
            const story = await this.destination.createStory(this.buildStory(card, target, linked.ids));
            return {
                ...base,
                status: 'success',
                storyId: story.id,
                statusLine: formatStatusLine(card.sourceUrl, 'Success', `Story ID: ${story.id}`),
            };
        } catch (error) {
            const message = describeError(error);
            console.error(`Failed to create story for "${card.name}" (${card.sourceUrl}): ${message}`);
            return {
                ...base,
                status: 'failed',
                errorCode: ImportErrorCode.DESTINATION_API_ERROR,
                message,
                statusLine: formatStatusLine(card.sourceUrl, 'Failed', message),
            };
        }
    }

    /**
     * Deletes every story in `existing` named exactly like the card and drops
     * it from the snapshot. A failed deletion is logged; creation goes ahead.
     */
    private async deleteMatchingStories(existing: ClubhouseStorySummary[], card: Card): Promise<number[]> {
        const deleted: number[] = [];

        for (const story of existing.filter(s => s.name === card.name)) {
            try {
                await this.destination.deleteStory(story.id);
                deleted.push(story.id);
                this.output(formatStatusLine(card.sourceUrl, 'Deleted Matching', `Story ID: ${story.id}`));
            } catch (error) {
                console.error(`Failed to delete story ${story.id} matching "${card.name}": ${describeError(error)}`);
            }
        }

        if (deleted.length > 0) {
            const gone = new Set(deleted);
            const remaining = existing.filter(s => !gone.has(s.id));
            existing.splice(0, existing.length, ...remaining);
        }
        return deleted;
    }

    private async buildLinkedFiles(card: Card, target: ImportTarget): Promise<{ ids: number[]; failed: string[] }> {
        const ids: number[] = [];
        const failed: string[] = [];

        for (const [name, url] of Object.entries(card.attachments)) {
            try {
                const file = await this.destination.createLinkedFile({
                    name,
                    type: 'dropbox',
                    url,
                    uploader_id: target.importMember.id,
                });
                ids.push(file.id);
            } catch (error) {
                console.error(`Failed to create linked file for card "${card.name}", Dropbox link: ${url}: ${describeError(error)}`);
                failed.push(name);
            }
        }

        return { ids, failed };
    }

    buildStory(card: Card, target: ImportTarget, linkedFileIds: number[] = []): CreateStory {
        return {
            project_id: target.project.id,
            workflow_state_id: target.workflowStateId,
            story_type: target.storyType,
            requested_by_id: this.mapRequester(card, target),
            owner_ids: this.mapOwners(card),
            follower_ids: [],
            file_ids: [],

            name: card.name,
            description: card.description,
            deadline: card.dueDate?.toISOString(),
            created_at: card.createdAt?.toISOString(),

            labels: this.buildLabels(card),
            tasks: this.buildTasks(card),
            comments: this.buildComments(card, target.addCommentWithTrelloLink),

            linked_file_ids: linkedFileIds,
        };
    }

    private mapRequester(card: Card, target: ImportTarget): string {
        const mapped = this.userMap.get(card.creatorId);
        if (mapped) return mapped;

        if (card.creatorId) {
            console.warn(`⚠️  No Clubhouse member mapped for Trello creator ${card.creatorId} of "${card.name}", using the importing member`);
        }
        return target.importMember.id;
    }

    private mapOwners(card: Card): string[] {
        const owners: string[] = [];
        for (const ownerId of card.ownerIds) {
            const mapped = this.userMap.get(ownerId);
            if (mapped) {
                owners.push(mapped);
            } else {
                console.warn(`⚠️  No Clubhouse member mapped for Trello member ${ownerId}, dropping owner of "${card.name}"`);
            }
        }
        return owners;
    }

    private buildComments(card: Card, addCommentWithTrelloLink: boolean): CreateComment[] {
        const comments: CreateComment[] = card.comments.map(comment => ({
            text: comment.text,
            author_id: this.userMap.get(comment.authorSourceId),
            created_at: comment.createdAt?.toISOString(),
        }));

        if (addCommentWithTrelloLink) {
            comments.push({
                text: `Card imported from Trello: ${card.sourceUrl}`,
                created_at: this.now().toISOString(),
            });
        }

        return comments;
    }

    private buildTasks(card: Card): CreateTask[] {
        return card.tasks.map(task => ({ complete: task.completed, description: task.description }));
    }

    private buildLabels(card: Card): CreateLabel[] {
        return card.labels.map(name => ({ name }));
    }

    private async withProjectLock<T>(projectId: number, work: () => Promise<T>): Promise<T> {
        const previous = this.projectLocks.get(projectId) || Promise.resolve();
        const run = previous.then(work);
        const settled = run.then(() => undefined, () => undefined);
        this.projectLocks.set(projectId, settled);

        try {
            return await run;
        } finally {
            if (this.projectLocks.get(projectId) === settled) {
                this.projectLocks.delete(projectId);
            }
        }
    }
}

import { Card, Comment, SourceApi, Task } from '../types';
import { TrelloAction, TrelloCard, TrelloChecklist } from '../lib/schemas';
import { parseTrelloDate } from '../lib/dates';
import { describeError } from '../lib/errors';

const CREATE_CARD = 'createCard';
const COMMENT_CARD = 'commentCard';
const COMPLETE = 'complete';

export interface Creation {
    creatorId: string;
    createdAt?: Date;
}

/**
 * Folds the action log down to the card's creation event. When the log holds
 * several `createCard` actions the last one wins; with none the creator is
 * empty and the date absent.
 */
export function findCreation(actions: TrelloAction[]): Creation {
    return actions.reduce<Creation>((found, action) => {
        if (action.type !== CREATE_CARD) return found;
        return {
            creatorId: action.memberCreator?.id || action.idMemberCreator,
            createdAt: parseTrelloDate(action.date),
        };
    }, { creatorId: '' });
}

/**
 * Comment actions in log order. Empty bodies are dropped: Trello surfaces
 * some edits as comments without text.
 */
export function collectComments(actions: TrelloAction[]): Comment[] {
    return actions.reduce<Comment[]>((comments, action) => {
        const text = action.data.text;
        if (action.type !== COMMENT_CARD || !text) return comments;
        comments.push({
            text,
            authorSourceId: action.memberCreator?.id || action.idMemberCreator,
            authorDisplayName: action.memberCreator?.fullName || '',
            createdAt: parseTrelloDate(action.date),
        });
        return comments;
    }, []);
}

export function flattenChecklists(checklists: TrelloChecklist[]): Task[] {
    return checklists.flatMap(checklist =>
        checklist.checkItems.map(item => ({
            completed: item.state === COMPLETE,
            description: `${checklist.name} - ${item.name}`,
        }))
    );
}

export function flattenLabels(card: TrelloCard): string[] {
    return card.labels.map(label => label.name);
}

export class CardNormalizer {
    private source: SourceApi;

    constructor(source: SourceApi) {
        this.source = source;
    }

    /**
     * Builds the intermediate card. Never rejects: a failed fetch of actions
     * or checklists leaves the matching fields empty.
     */
    async normalize(raw: TrelloCard, attachments: Record<string, string> = {}): Promise<Card> {
        const actions = await this.fetchOrEmpty('actions', raw, () => this.source.getActions(raw.id));
        const checklists = await this.fetchOrEmpty('checklists', raw, () => this.source.getChecklists(raw.id));
        const creation = findCreation(actions);

        return {
            name: raw.name,
            description: raw.desc,
            labels: flattenLabels(raw),
            dueDate: parseTrelloDate(raw.due),
            creatorId: creation.creatorId,
            ownerIds: [...raw.idMembers],
            createdAt: creation.createdAt,
            comments: collectComments(actions),
            tasks: flattenChecklists(checklists),
            position: raw.pos,
            sourceUrl: raw.shortUrl,
            attachments: { ...attachments },
        };
    }

    private async fetchOrEmpty<T>(what: string, card: TrelloCard, fetch: () => Promise<T[]>): Promise<T[]> {
        try {
            return await fetch();
        } catch (error) {
            console.error(`Error: querying the ${what} for "${card.name}" failed, ignoring... ${describeError(error)}`);
            return [];
        }
    }
}

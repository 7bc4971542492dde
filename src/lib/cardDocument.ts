import { Card } from '../types';
import { CardDocument, CardDocumentList } from './schemas';
import { toIsoOrNull } from './dates';

function toDate(value: string | null): Date | undefined {
    if (!value) return undefined;
    const date = new Date(value);
    return isNaN(date.getTime()) ? undefined : date;
}

export function toCardDocument(card: Card): CardDocument {
    return {
        name: card.name,
        desc: card.description,
        labels: card.labels,
        due_date: toIsoOrNull(card.dueDate),
        id_creator: card.creatorId,
        id_owners: card.ownerIds,
        created_at: toIsoOrNull(card.createdAt),
        comments: card.comments.map(comment => ({
            text: comment.text,
            id_creator: comment.authorSourceId,
            creator_name: comment.authorDisplayName,
            created_at: toIsoOrNull(comment.createdAt),
        })),
        checklists: card.tasks.map(task => ({ completed: task.completed, description: task.description })),
        position: card.position,
        url: card.sourceUrl,
        attachments: card.attachments,
    };
}

export function fromCardDocument(doc: CardDocument): Card {
    return {
        name: doc.name,
        description: doc.desc,
        labels: doc.labels,
        dueDate: toDate(doc.due_date),
        creatorId: doc.id_creator,
        ownerIds: doc.id_owners,
        createdAt: toDate(doc.created_at),
        comments: doc.comments.map(comment => ({
            text: comment.text,
            authorSourceId: comment.id_creator,
            authorDisplayName: comment.creator_name,
            createdAt: toDate(comment.created_at),
        })),
        tasks: doc.checklists,
        position: doc.position,
        sourceUrl: doc.url,
        attachments: doc.attachments,
    };
}

/**
 * Validates an exported document (as read back from disk or Supabase) and
 * turns it into cards. Throws a ZodError naming the offending path.
 */
export function parseCardDocuments(raw: unknown): Card[] {
    return CardDocumentList.parse(raw).map(fromCardDocument);
}

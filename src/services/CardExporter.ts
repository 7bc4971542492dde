import { CardNormalizer } from './CardNormalizer';
import { AttachmentRelocator } from './AttachmentRelocator';
import { Card, RelocationFailure, SourceApi } from '../types';

export interface ExportResult {
    cards: Card[];
    attachmentFailures: Array<RelocationFailure & { cardUrl: string }>;
}

/**
 * Lists the cards of a board and turns each into an intermediate card,
 * relocating its attachments first when a relocator is given.
 */
export class CardExporter {
    private source: SourceApi;
    private normalizer: CardNormalizer;
    private relocator: AttachmentRelocator | null;

    constructor(source: SourceApi, normalizer: CardNormalizer, relocator: AttachmentRelocator | null = null) {
        this.source = source;
        this.normalizer = normalizer;
        this.relocator = relocator;
    }

    async exportBoard(boardId: string, listIds: string[] = []): Promise<ExportResult> {
        if (!boardId) {
            throw new Error('TRELLO_BOARD_ID is not set');
        }

        console.log(`Exporting trello cards from board ${boardId}${listIds.length ? ` (lists: ${listIds.join(', ')})` : ''}...`);
        const rawCards = await this.source.listCards(boardId, listIds);
        console.log(`Found ${rawCards.length} cards.`);

        const result: ExportResult = { cards: [], attachmentFailures: [] };
        for (const raw of rawCards) {
            let attachments: Record<string, string> = {};
            if (this.relocator) {
                const relocation = await this.relocator.relocate(raw);
                attachments = relocation.links;
                result.attachmentFailures.push(...relocation.failures.map(f => ({ ...f, cardUrl: raw.shortUrl })));
            }

            const card = await this.normalizer.normalize(raw, attachments);
            console.log(`  ✓ ${card.name} (${card.tasks.length} tasks, ${card.comments.length} comments, ${Object.keys(card.attachments).length} attachments)`);
            result.cards.push(card);
        }

        return result;
    }
}

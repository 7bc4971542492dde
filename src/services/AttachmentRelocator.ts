import path from 'path';
import { RelocationFailure, RelocationResult, RelocationStage, ShareLink, SharingApi, SourceApi } from '../types';
import { DropboxSharedLink, TrelloAttachment, TrelloCard } from '../lib/schemas';
import { formatClientModified } from '../lib/dates';
import { describeError } from '../lib/errors';

const UNSAFE_FILE_NAME_CHARS = /[^a-zA-Z0-9_.]+/g;

export function sanitizeFileName(name: string): string {
    return name.replace(UNSAFE_FILE_NAME_CHARS, '_');
}

/**
 * `<root>/<listId>/<cardId>/<index>_<name>`: a re-run writes the same
 * attachment to the same path.
 */
export function buildStoragePath(root: string, listId: string, cardId: string, index: number, safeName: string): string {
    return path.posix.join('/', root, listId, cardId, `${index}_${safeName}`);
}

export interface AttachmentRelocatorOptions {
    root: string;
    timeZone: string;
    now?: () => Date;
}

class RelocationError extends Error {
    constructor(public readonly stage: RelocationStage, cause: unknown) {
        super(describeError(cause));
        this.name = 'RelocationError';
    }
}

function toShareLink(link: DropboxSharedLink, fallbackPath: string): ShareLink {
    const expires = link.expires ? new Date(link.expires) : undefined;
    return {
        url: link.url,
        canonicalPath: link.path_lower || fallbackPath.toLowerCase(),
        expires: expires && !isNaN(expires.getTime()) ? expires : undefined,
    };
}

export class AttachmentRelocator {
    private source: SourceApi;
    private sharing: SharingApi;
    private root: string;
    private timeZone: string;
    private now: () => Date;

    constructor(source: SourceApi, sharing: SharingApi, options: AttachmentRelocatorOptions) {
        this.source = source;
        this.sharing = sharing;
        this.root = options.root;
        this.timeZone = options.timeZone;
        this.now = options.now || (() => new Date());
    }

    /**
     * Copies every attachment of `card` to Dropbox and returns sanitized file
     * name → shareable URL. Attachments that fail at any stage are left out
     * of `links` and listed in `failures`.
     */
    async relocate(card: TrelloCard): Promise<RelocationResult> {
        const result: RelocationResult = { links: {}, failures: [] };

        let attachments: TrelloAttachment[];
        try {
            attachments = await this.source.getAttachments(card.id);
        } catch (error) {
            console.error(`Error: querying the attachments for "${card.name}" failed, ignoring... ${describeError(error)}`);
            return result;
        }

        for (const [index, attachment] of attachments.entries()) {
            const safeName = sanitizeFileName(attachment.name);
            const storagePath = buildStoragePath(this.root, card.idList, card.id, index, safeName);

            try {
                const link = await this.relocateOne(attachment, storagePath);
                // a repeated name is keyed by its stored basename so no link is lost
                const key = Object.hasOwn(result.links, safeName) ? path.posix.basename(storagePath) : safeName;
                result.links[key] = link.url;
            } catch (error) {
                const failure: RelocationFailure = {
                    attachment: attachment.name,
                    stage: error instanceof RelocationError ? error.stage : 'upload',
                    message: describeError(error),
                };
                console.error(`  ✗ ${failure.stage} failed for "${attachment.name}" on "${card.name}", skipping: ${failure.message}`);
                result.failures.push(failure);
            }
        }

        return result;
    }

    private async relocateOne(attachment: TrelloAttachment, storagePath: string): Promise<ShareLink> {
        const content = await this.source.downloadAttachment(attachment.url).catch((error: unknown) => {
            throw new RelocationError('download', error);
        });

        const uploaded = await this.sharing.upload({
            path: storagePath,
            content,
            mode: 'overwrite',
            autorename: false,
            mute: true,
            clientModified: formatClientModified(this.now(), this.timeZone),
        }).catch((error: unknown) => {
            throw new RelocationError('upload', error);
        });

        return this.resolveShareLink(uploaded.path_display).catch((error: unknown) => {
            throw new RelocationError('share', error);
        });
    }

    /**
     * Reuses the first shared link Dropbox already has for `filePath` and only
     * creates one when there is none.
     */
    async resolveShareLink(filePath: string): Promise<ShareLink> {
        let existing: DropboxSharedLink[] = [];
        try {
            existing = await this.sharing.listSharedLinks(filePath);
        } catch (error) {
            console.warn(`⚠️  Could not list shared links for ${filePath}, creating a new one: ${describeError(error)}`);
        }

        if (existing.length > 0) {
            return toShareLink(existing[0], filePath);
        }

        const created = await this.sharing.createSharedLink(filePath);
        return toShareLink(created, filePath);
    }
}

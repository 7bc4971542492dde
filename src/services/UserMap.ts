import fs from 'fs-extra';
import { UserMapDocument } from '../lib/schemas';
import { describeError } from '../lib/errors';

/**
 * Trello member id → Clubhouse member UUID. Built once before any card is
 * processed and never written to afterwards.
 */
export class UserMap {
    private readonly mapping: ReadonlyMap<string, string>;

    constructor(entries: Iterable<readonly [string, string]> = []) {
        this.mapping = new Map(entries);
    }

    static async load(filePath: string): Promise<UserMap> {
        if (!(await fs.pathExists(filePath))) {
            console.warn(`⚠️  User map ${filePath} not found, no Trello members will be mapped`);
            return new UserMap();
        }

        try {
            const document = UserMapDocument.parse(await fs.readJson(filePath));
            const map = new UserMap(Object.entries(document));
            console.log(`Loaded ${map.size} user mappings from ${filePath}`);
            return map;
        } catch (error) {
            throw new Error(`Invalid user map ${filePath}: ${describeError(error)}`);
        }
    }

    get(sourceId: string): string | undefined {
        if (!sourceId) return undefined;
        return this.mapping.get(sourceId);
    }

    get size(): number {
        return this.mapping.size;
    }
}

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { run } from '../cli';

beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
});

describe('run', () => {
    it('reports an invalid configuration as a fatal error', async () => {
        const code = await run(['export'], { CLUBHOUSE_STORY_TYPE: 'epic' });

        expect(code).toBe(1);
        expect(console.error).toHaveBeenCalledWith(
            'Error: CLUBHOUSE_STORY_TYPE must be one of feature, bug, chore (got "epic")',
        );
    });

    it('reports missing credentials when a command needs them', async () => {
        const code = await run(['export'], { TRELLO_BOARD_ID: 'board-1' });

        expect(code).toBe(1);
        expect(console.error).toHaveBeenCalledWith(
            'Error: Trello configuration missing. Set TRELLO_API_KEY and TRELLO_TOKEN in .env.',
        );
    });

    it('prints the usage without a command', async () => {
        expect(await run([], { EXPORT_PATH: 'out/cards.json' })).toBe(0);
        expect(console.log).toHaveBeenCalledWith(expect.stringContaining('Export the Trello board to out/cards.json'));
    });

    it('fails on an unknown command', async () => {
        expect(await run(['bogus'], {})).toBe(1);
    });
});

import * as path from 'path';

/**
 * Carries each timestamp up to every ancestor directory, stopping at `root`,
 * so each directory holds the latest timestamp found anywhere beneath it.
 */
export function rollUpStamps(stamps: ReadonlyMap<string, number>, root: string): Map<string, number> {
    const top = path.resolve(root);
    const result = new Map<string, number>();

    for (const [entryPath, stamp] of stamps) {
        let current = entryPath;

        while (true) {
            const existing = result.get(current);
            // Ancestors of `current` already hold at least `existing`
            if (existing !== undefined && existing >= stamp) {
                break;
            }
            result.set(current, stamp);

            const parent = path.dirname(current);
            if (current === top || parent === current) {
                break;
            }
            current = parent;
        }
    }

    return result;
}

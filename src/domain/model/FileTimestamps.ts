import type { Stats } from 'fs';

export type TimestampKind = 'created' | 'accessed' | 'modified';

export const TIMESTAMP_KINDS: readonly TimestampKind[] = ['created', 'accessed', 'modified'];

/** Seconds since the epoch, fractional. */
export type FileTimestamps = Record<TimestampKind, number>;

export type TimestampSource = Pick<Stats, 'birthtimeMs' | 'ctimeMs' | 'atimeMs' | 'mtimeMs'>;

export function toTimestamps(stats: TimestampSource): FileTimestamps {
    // birthtimeMs is 0 where the platform or filesystem cannot report it;
    // the inode change time is the closest stand-in there.
    const createdMs = stats.birthtimeMs > 0 ? stats.birthtimeMs : stats.ctimeMs;

    return {
        created: createdMs / 1000,
        accessed: stats.atimeMs / 1000,
        modified: stats.mtimeMs / 1000
    };
}

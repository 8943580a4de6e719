import type { TimestampKind } from '../domain/model/FileTimestamps.js';
import type { Inspector } from './Inspector.js';
import { rollUpStamps } from './StampRollup.js';

export interface StampedPath {
    path: string;
    timestamp: number;
}

export interface ReportedError {
    path: string;
    code: string | null;
    message: string;
}

export interface InspectionReport extends Record<TimestampKind, StampedPath[]> {
    root: string;
    start: number;
    end: number;
    errors: ReportedError[];
}

export interface ReportOptions {
    rollup: boolean;
}

export function buildReport(inspector: Inspector, options: ReportOptions): InspectionReport {
    const listFor = (kind: TimestampKind): StampedPath[] => {
        const stamps = inspector.stamps(kind);
        return sortStamped(options.rollup ? rollUpStamps(stamps, inspector.root) : stamps);
    };

    const errors = Array.from(inspector.errors.values())
        .map(error => ({ path: error.path, code: error.code, message: error.message }))
        .sort((a, b) => compareText(a.path, b.path));

    return {
        root: inspector.root,
        start: inspector.window.start,
        end: inspector.window.end,
        created: listFor('created'),
        accessed: listFor('accessed'),
        modified: listFor('modified'),
        errors
    };
}

function sortStamped(stamps: ReadonlyMap<string, number>): StampedPath[] {
    return Array.from(stamps, ([path, timestamp]) => ({ path, timestamp }))
        .sort((a, b) => a.timestamp - b.timestamp || compareText(a.path, b.path));
}

function compareText(a: string, b: string): number {
    return a < b ? -1 : a > b ? 1 : 0;
}

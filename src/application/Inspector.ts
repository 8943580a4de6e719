import * as fs from 'fs/promises';
import type { Stats } from 'fs';
import * as path from 'path';
import { contains, createTimeWindow, type TimeWindow, type TimeWindowInput } from '../domain/model/TimeWindow.js';
import { TIMESTAMP_KINDS, toTimestamps, type FileTimestamps, type TimestampKind } from '../domain/model/FileTimestamps.js';
import { InspectorStateError, PathMetadataError } from '../domain/model/InspectionError.js';
import { TreeWalker } from '../infrastructure/filesystem/TreeWalker.js';
import logger from '../infrastructure/logger/index.js';

export type ErrorReporter = (path: string, error: PathMetadataError) => void;
export type MatchReporter = (path: string, stats: Stats) => void;

export interface InspectorOptions extends TimeWindowInput {
    root: string;
    reportErrors?: ErrorReporter;
    reportMatches?: MatchReporter;
    ignorePatterns?: string[];
    includeDirectories?: boolean;
    signal?: AbortSignal;
}

export type InspectorState = 'pending' | 'scanning' | 'complete' | 'failed';

/**
 * Finds the files under a directory whose creation, access or modification
 * time falls within a time window.
 *
 * An Inspector runs once: construct it, await `inspect()`, then read
 * `created`, `accessed`, `modified` and `errors`.
 */
export class Inspector {
    readonly root: string;
    readonly window: TimeWindow;

    private readonly sets: Record<TimestampKind, Set<string>> = {
        created: new Set(),
        accessed: new Set(),
        modified: new Set()
    };
    private readonly matched = new Map<string, FileTimestamps>();
    private readonly failures = new Map<string, PathMetadataError>();
    private readonly walker: TreeWalker;
    private readonly reportErrors: ErrorReporter | undefined;
    private readonly reportMatches: MatchReporter | undefined;
    private readonly includeDirectories: boolean;
    private readonly signal: AbortSignal | undefined;
    private currentState: InspectorState = 'pending';

    constructor(options: InspectorOptions) {
        this.root = path.resolve(options.root);
        this.window = createTimeWindow(options);
        this.reportErrors = options.reportErrors;
        this.reportMatches = options.reportMatches;
        this.includeDirectories = options.includeDirectories ?? false;
        this.signal = options.signal;
        this.walker = new TreeWalker({
            ignorePatterns: options.ignorePatterns,
            includeDirectories: this.includeDirectories,
            signal: options.signal
        });
    }

    get created(): ReadonlySet<string> {
        return this.sets.created;
    }

    get accessed(): ReadonlySet<string> {
        return this.sets.accessed;
    }

    get modified(): ReadonlySet<string> {
        return this.sets.modified;
    }

    get errors(): ReadonlyMap<string, PathMetadataError> {
        return this.failures;
    }

    /** Timestamps of every path that landed in at least one set. */
    get timestamps(): ReadonlyMap<string, FileTimestamps> {
        return this.matched;
    }

    get state(): InspectorState {
        return this.currentState;
    }

    stamps(kind: TimestampKind): Map<string, number> {
        const result = new Map<string, number>();
        for (const entryPath of this.sets[kind]) {
            const stamps = this.matched.get(entryPath);
            if (stamps) {
                result.set(entryPath, stamps[kind]);
            }
        }
        return result;
    }

    async inspect(): Promise<void> {
        if (this.currentState !== 'pending') {
            throw new InspectorStateError(`Inspector for ${this.root} has already run (state: ${this.currentState})`);
        }
        this.currentState = 'scanning';

        logger.debug(`Inspecting ${this.root} for ${new Date(this.window.start * 1000).toISOString()} .. ${new Date(this.window.end * 1000).toISOString()}`);

        try {
            await this.walker.walk(this.root, {
                visit: (entryPath) => this.check(entryPath),
                fail: (entryPath, error) => this.recordError(entryPath, error)
            });
        } catch (error) {
            this.currentState = 'failed';
            throw error;
        }

        this.currentState = 'complete';
        logger.debug(`Inspection complete: ${this.sets.created.size} created, ${this.sets.accessed.size} accessed, ` +
            `${this.sets.modified.size} modified, ${this.failures.size} errors`);
    }

    private async check(entryPath: string): Promise<void> {
        this.signal?.throwIfAborted();

        let stats: Stats;
        try {
            // Follows symlinks, so a dangling link surfaces here
            stats = await fs.stat(entryPath);
        } catch (error) {
            this.recordError(entryPath, error);
            return;
        }

        // Nothing lands in the sets once the scan has been cancelled
        this.signal?.throwIfAborted();

        if (!this.isCandidate(stats)) {
            return;
        }

        const stamps = toTimestamps(stats);
        let matched = false;

        for (const kind of TIMESTAMP_KINDS) {
            if (contains(this.window, stamps[kind])) {
                this.sets[kind].add(entryPath);
                matched = true;
            }
        }

        if (!matched) {
            return;
        }

        this.matched.set(entryPath, stamps);

        if (this.reportMatches) {
            try {
                this.reportMatches(entryPath, stats);
            } catch (error) {
                logger.error(`Error in match reporter for ${entryPath}`, error);
            }
        }
    }

    private isCandidate(stats: Stats): boolean {
        if (stats.isFile()) {
            return true;
        }
        // A symlinked directory is classified here but never descended
        return this.includeDirectories && stats.isDirectory();
    }

    private recordError(entryPath: string, error: unknown): void {
        const failure = error instanceof PathMetadataError ? error : new PathMetadataError(entryPath, error);
        this.failures.set(entryPath, failure);
        logger.debug(failure.message);

        if (this.reportErrors) {
            try {
                this.reportErrors(entryPath, failure);
            } catch (handlerError) {
                logger.error(`Error in error reporter for ${entryPath}`, handlerError);
            }
        }
    }
}

import * as fs from 'fs/promises';
import type { Dirent } from 'fs';
import * as path from 'path';
import micromatch from 'micromatch';
import { ScanInitiationError, errorCode } from '../../domain/model/InspectionError.js';
import logger from '../logger/index.js';

export interface WalkVisitor {
    visit(entryPath: string): Promise<void>;
    fail(entryPath: string, error: unknown): void;
}

export interface TreeWalkerOptions {
    ignorePatterns?: string[];
    includeDirectories?: boolean;
    signal?: AbortSignal;
}

/**
 * Concurrent recursive directory walk.
 *
 * Every entry of a directory is handed to the visitor at once and all
 * subdirectories are listed in parallel. Symlinks are visited but never
 * descended, so link cycles cannot trap the walk. With `includeDirectories`
 * a directory is visited only once it has been listed.
 */
export class TreeWalker {
    private options: Required<Omit<TreeWalkerOptions, 'signal'>>;
    private signal: AbortSignal | undefined;

    constructor(options: TreeWalkerOptions = {}) {
        this.options = {
            ignorePatterns: options.ignorePatterns ?? [],
            includeDirectories: options.includeDirectories ?? false
        };
        this.signal = options.signal;
    }

    async walk(root: string, visitor: WalkVisitor): Promise<void> {
        const entries = await this.readRoot(root);

        const tasks: Promise<void>[] = [];
        if (this.options.includeDirectories) {
            tasks.push(visitor.visit(root));
        }
        tasks.push(this.scanEntries(root, root, entries, visitor));

        await Promise.all(tasks);
    }

    shouldIgnore(root: string, entryPath: string): boolean {
        if (this.options.ignorePatterns.length === 0) {
            return false;
        }
        // Patterns without a slash match the entry's name at any depth
        return micromatch.isMatch(path.relative(root, entryPath), this.options.ignorePatterns, {
            dot: true,
            matchBase: true
        });
    }

    private async readRoot(root: string): Promise<Dirent[]> {
        this.signal?.throwIfAborted();

        try {
            return await fs.readdir(root, { withFileTypes: true });
        } catch (error) {
            switch (errorCode(error)) {
                case 'ENOENT':
                    throw new ScanInitiationError(root, `Directory not found: ${root}`, { cause: error });
                case 'ENOTDIR':
                    throw new ScanInitiationError(root, `Not a directory: ${root}`, { cause: error });
                case 'EACCES':
                case 'EPERM':
                    throw new ScanInitiationError(root, `Permission denied: ${root}`, { cause: error });
                default:
                    throw new ScanInitiationError(root, `Cannot read directory: ${root}`, { cause: error });
            }
        }
    }

    private async scanDirectory(root: string, dirPath: string, visitor: WalkVisitor): Promise<void> {
        this.signal?.throwIfAborted();

        let entries: Dirent[];
        try {
            entries = await fs.readdir(dirPath, { withFileTypes: true });
        } catch (error) {
            logger.debug(`Failed to scan directory: ${dirPath}`, error);
            visitor.fail(dirPath, error);
            return;
        }

        const tasks: Promise<void>[] = [];
        if (this.options.includeDirectories) {
            tasks.push(visitor.visit(dirPath));
        }
        tasks.push(this.scanEntries(root, dirPath, entries, visitor));

        await Promise.all(tasks);
    }

    private async scanEntries(
        root: string,
        dirPath: string,
        entries: Dirent[],
        visitor: WalkVisitor
    ): Promise<void> {
        const tasks: Promise<void>[] = [];

        for (const entry of entries) {
            const fullPath = path.join(dirPath, entry.name);

            if (this.shouldIgnore(root, fullPath)) {
                continue;
            }

            if (entry.isDirectory()) {
                tasks.push(this.scanDirectory(root, fullPath, visitor));
            } else if (entry.isFile() || entry.isSymbolicLink()) {
                tasks.push(visitor.visit(fullPath));
            }
            // Other (socket, fifo, device): ignore
        }

        await Promise.all(tasks);
    }
}

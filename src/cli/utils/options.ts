import { z } from 'zod';
import type { StampscanConfig } from '../../domain/model/Config.js';

export interface ScanOptions {
    start?: number;
    end?: number;
    window?: number;
    ignorePatterns: string[];
    includeDirectories: boolean;
    rollup: boolean;
    showErrors: boolean;
    json: boolean;
}

export class InvalidOptionsError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidOptionsError';
    }
}

/**
 * Accepts unix seconds (fractional allowed) or anything `Date.parse` reads,
 * such as an ISO 8601 date. Returns seconds since the epoch.
 */
export function parseTime(value: string): number | null {
    const trimmed = value.trim();
    if (/^-?\d+(\.\d+)?$/.test(trimmed)) {
        return Number(trimmed);
    }
    const ms = Date.parse(trimmed);
    return Number.isNaN(ms) ? null : ms / 1000;
}

function timeArgument(flag: string) {
    return z.string().transform((value, ctx) => {
        const seconds = parseTime(value);
        if (seconds === null) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid ${flag} time: ${value}` });
            return z.NEVER;
        }
        return seconds;
    });
}

const secondsArgument = z.string().transform((value, ctx) => {
    const trimmed = value.trim();
    if (!/^\d+(\.\d+)?$/.test(trimmed)) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Invalid --window: ${value} (expected a non-negative number of seconds)`
        });
        return z.NEVER;
    }
    return Number(trimmed);
});

const rawScanOptionsSchema = z.object({
    end: timeArgument('--end').optional(),
    start: timeArgument('--start').optional(),
    window: secondsArgument.optional(),
    ignore: z.array(z.string()).optional(),
    includeDirs: z.boolean().optional(),
    rollup: z.boolean().optional(),
    errors: z.boolean().optional(),
    json: z.boolean().optional()
}).refine(
    o => o.window !== undefined || (o.start !== undefined && o.end !== undefined),
    { message: '--window is required unless both --start and --end are given' }
);

/**
 * Validates raw commander options and layers them over the config file.
 * With neither bound given, the window ends at `now`.
 */
export function parseScanOptions(raw: unknown, config: StampscanConfig, now: number): ScanOptions {
    const parsed = rawScanOptionsSchema.safeParse(raw);
    if (!parsed.success) {
        throw new InvalidOptionsError(parsed.error.issues.map(i => i.message).join('; '));
    }

    const options = parsed.data;
    const end = options.start === undefined && options.end === undefined ? now : options.end;

    return {
        start: options.start,
        end,
        window: options.window,
        ignorePatterns: [...config.scan.ignorePatterns, ...(options.ignore ?? [])],
        includeDirectories: options.includeDirs ?? config.scan.includeDirectories,
        rollup: options.rollup ?? false,
        showErrors: options.errors ?? config.output.showErrors,
        json: options.json ?? config.output.json
    };
}

import type { InspectionReport, StampedPath } from '../../application/InspectionReport.js';
import type { StampscanConfig } from '../../domain/model/Config.js';

export interface ReportFormatOptions {
    json: boolean;
    showErrors: boolean;
}

export function formatTimestamp(seconds: number): string {
    const date = new Date(seconds * 1000);
    return Number.isNaN(date.getTime()) ? String(seconds) : date.toISOString();
}

export function formatReport(report: InspectionReport, options: ReportFormatOptions): string {
    if (options.json) {
        const withTime = (entries: StampedPath[]) =>
            entries.map(e => ({ path: e.path, timestamp: e.timestamp, time: formatTimestamp(e.timestamp) }));

        return JSON.stringify({
            root: report.root,
            window: {
                start: report.start,
                end: report.end,
                startTime: formatTimestamp(report.start),
                endTime: formatTimestamp(report.end)
            },
            created: withTime(report.created),
            accessed: withTime(report.accessed),
            modified: withTime(report.modified),
            errors: report.errors
        }, null, 2);
    }

    const lines: string[] = [];
    lines.push(`Root: ${report.root}`);
    lines.push(`Window: ${formatTimestamp(report.start)} .. ${formatTimestamp(report.end)}`);
    lines.push('');

    const sections: Array<[string, StampedPath[]]> = [
        ['Created', report.created],
        ['Accessed', report.accessed],
        ['Modified', report.modified]
    ];

    for (const [title, entries] of sections) {
        lines.push(`${title} (${entries.length}):`);
        if (entries.length === 0) {
            lines.push('  (none)');
        }
        for (const entry of entries) {
            lines.push(`  ${formatTimestamp(entry.timestamp)}  ${entry.path}`);
        }
        lines.push('');
    }

    if (options.showErrors) {
        lines.push(`Errors (${report.errors.length}):`);
        if (report.errors.length === 0) {
            lines.push('  (none)');
        }
        for (const error of report.errors) {
            lines.push(`  ${error.message}`);
        }
    }

    return lines.join('\n').trimEnd();
}

export function formatConfig(configPath: string, config: StampscanConfig): string {
    return [`Config file: ${configPath}`, JSON.stringify(config, null, 4)].join('\n');
}

export function formatError(message: string): string {
    return `Error: ${message}`;
}

export function formatSuccess(message: string): string {
    return message;
}

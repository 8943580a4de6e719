import { Command } from 'commander';
import { Inspector } from '../../application/Inspector.js';
import { buildReport } from '../../application/InspectionReport.js';
import { loadConfig } from '../../domain/model/Config.js';
import { InvalidWindowError, ScanInitiationError } from '../../domain/model/InspectionError.js';
import { InvalidOptionsError, parseScanOptions } from '../utils/options.js';
import { formatError, formatReport } from '../utils/output.js';

export const scanCommand = new Command('scan')
    .description('List files created, accessed or modified within a time window')
    .argument('<directory>', 'Directory to scan')
    .option('-e, --end <time>', 'End of the window (unix seconds or ISO 8601 date, default: now)')
    .option('-s, --start <time>', 'Start of the window (unix seconds or ISO 8601 date)')
    .option('-w, --window <seconds>', 'Length of the window in seconds')
    .option('-i, --ignore <pattern...>', 'Glob patterns to skip, relative to the directory')
    .option('-d, --include-dirs', 'Also classify directories')
    .option('-r, --rollup', 'Show the latest matching timestamp for every ancestor directory')
    .option('--errors', 'List paths whose metadata could not be read')
    .option('-j, --json', 'Output as JSON')
    .action(async (directory: string, rawOptions: unknown) => {
        try {
            const options = parseScanOptions(rawOptions, loadConfig(), Date.now() / 1000);

            const inspector = new Inspector({
                root: directory,
                start: options.start,
                end: options.end,
                window: options.window,
                ignorePatterns: options.ignorePatterns,
                includeDirectories: options.includeDirectories
            });
            await inspector.inspect();

            const report = buildReport(inspector, { rollup: options.rollup });
            console.log(formatReport(report, { json: options.json, showErrors: options.showErrors }));
        } catch (error) {
            if (
                error instanceof InvalidOptionsError ||
                error instanceof InvalidWindowError ||
                error instanceof ScanInitiationError
            ) {
                console.error(formatError(error.message));
                process.exit(1);
            }
            throw error;
        }
    });

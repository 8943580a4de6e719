#!/usr/bin/env node

import { Command } from 'commander';
import { scanCommand, configCommand } from './commands/index.js';
import { formatError } from './utils/output.js';

// Global error handler - show clean error message without stack trace
process.on('uncaughtException', (error) => {
    console.error(formatError(error.message));
    process.exit(1);
});

process.on('unhandledRejection', (reason) => {
    const message = reason instanceof Error ? reason.message : String(reason);
    console.error(formatError(message));
    process.exit(1);
});

const program = new Command();

program
    .name('stampscan')
    .description('Find files created, accessed or modified within a time window')
    .version('0.1.0');

program.addCommand(scanCommand);
program.addCommand(configCommand);

program.parseAsync().catch((error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);
    console.error(formatError(message));
    process.exit(1);
});

import log from 'loglevel';

const LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'silent'] as const;

type LevelName = typeof LEVELS[number];

function parseLevel(value: string | undefined): LevelName {
    const level = LEVELS.find(l => l === value?.toLowerCase());
    return level ?? 'info';
}

// Set default log level based on environment
log.setLevel(parseLevel(process.env['STAMPSCAN_LOG_LEVEL']));

export const logger = {
    debug: (message: string, ...args: unknown[]) => log.debug(`[DEBUG] ${message}`, ...args),
    info: (message: string, ...args: unknown[]) => log.info(`[INFO] ${message}`, ...args),
    warn: (message: string, ...args: unknown[]) => log.warn(`[WARN] ${message}`, ...args),
    error: (message: string, ...args: unknown[]) => log.error(`[ERROR] ${message}`, ...args),
    setLevel: (level: log.LogLevelDesc) => log.setLevel(level)
};

export default logger;

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { z } from 'zod';
import logger from '../../infrastructure/logger/index.js';

export interface StampscanConfig {
    scan: {
        ignorePatterns: string[];
        includeDirectories: boolean;
    };
    output: {
        json: boolean;
        showErrors: boolean;
    };
}

export const DEFAULT_CONFIG: StampscanConfig = {
    scan: {
        ignorePatterns: [],
        includeDirectories: false
    },
    output: {
        json: false,
        showErrors: false
    }
};

const userConfigSchema = z.object({
    scan: z.object({
        ignorePatterns: z.array(z.string()).optional(),
        includeDirectories: z.boolean().optional()
    }).optional(),
    output: z.object({
        json: z.boolean().optional(),
        showErrors: z.boolean().optional()
    }).optional()
});

type UserConfig = z.infer<typeof userConfigSchema>;

export function getStampscanDir(): string {
    return process.env['STAMPSCAN_HOME'] || path.join(os.homedir(), '.stampscan');
}

export function getConfigPath(): string {
    return path.join(getStampscanDir(), 'config.json');
}

export function ensureStampscanDir(): void {
    const dir = getStampscanDir();
    if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
    }
}

export function loadConfig(): StampscanConfig {
    const configPath = getConfigPath();

    if (!fs.existsSync(configPath)) {
        return DEFAULT_CONFIG;
    }

    let raw: unknown;
    try {
        raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
    } catch (error) {
        logger.warn(`Ignoring unreadable config file: ${configPath}`, error);
        return DEFAULT_CONFIG;
    }

    const parsed = userConfigSchema.safeParse(raw);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
        logger.warn(`Ignoring invalid config file: ${configPath} (${issues})`);
        return DEFAULT_CONFIG;
    }

    return mergeConfig(DEFAULT_CONFIG, parsed.data);
}

export function saveConfig(config: StampscanConfig): void {
    ensureStampscanDir();
    fs.writeFileSync(getConfigPath(), JSON.stringify(config, null, 4), 'utf-8');
}

function mergeConfig(base: StampscanConfig, override: UserConfig): StampscanConfig {
    return {
        scan: {
            ...base.scan,
            ...override.scan
        },
        output: {
            ...base.output,
            ...override.output
        }
    };
}

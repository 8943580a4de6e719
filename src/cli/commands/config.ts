import * as fs from 'fs';
import { Command } from 'commander';
import { DEFAULT_CONFIG, getConfigPath, loadConfig, saveConfig } from '../../domain/model/Config.js';
import { formatConfig, formatSuccess } from '../utils/output.js';

export const configCommand = new Command('config')
    .description('Show the effective configuration')
    .option('--init', 'Write the default configuration if no config file exists')
    .action((options: { init?: boolean }) => {
        const configPath = getConfigPath();

        if (options.init) {
            if (fs.existsSync(configPath)) {
                console.log(`Config file already exists: ${configPath}`);
            } else {
                saveConfig(DEFAULT_CONFIG);
                console.log(formatSuccess(`Wrote default config: ${configPath}`));
            }
        }

        console.log(formatConfig(configPath, loadConfig()));
    });

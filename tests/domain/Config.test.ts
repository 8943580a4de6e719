import fs from 'fs';
import os from 'os';
import path from 'path';
import { DEFAULT_CONFIG, getConfigPath, loadConfig, saveConfig } from '../../src/domain/model/Config.js';
import logger from '../../src/infrastructure/logger/index.js';

describe('config', () => {
    let home: string;

    beforeEach(() => {
        home = fs.mkdtempSync(path.join(os.tmpdir(), 'stampscan-config-'));
        process.env['STAMPSCAN_HOME'] = path.join(home, 'nested');
        logger.setLevel('silent');
    });

    afterEach(() => {
        delete process.env['STAMPSCAN_HOME'];
        logger.setLevel('info');
        fs.rmSync(home, { recursive: true, force: true });
    });

    it('resolves the config path under STAMPSCAN_HOME', () => {
        expect(getConfigPath()).toBe(path.join(home, 'nested', 'config.json'));
    });

    it('returns defaults when no file exists', () => {
        expect(loadConfig()).toEqual(DEFAULT_CONFIG);
    });

    it('merges a partial file over the defaults', () => {
        fs.mkdirSync(path.join(home, 'nested'));
        fs.writeFileSync(getConfigPath(), JSON.stringify({ scan: { includeDirectories: true } }));

        expect(loadConfig()).toEqual({
            scan: { ignorePatterns: [], includeDirectories: true },
            output: { json: false, showErrors: false }
        });
    });

    it('falls back to defaults for malformed JSON', () => {
        fs.mkdirSync(path.join(home, 'nested'));
        fs.writeFileSync(getConfigPath(), '{ not json');

        expect(loadConfig()).toEqual(DEFAULT_CONFIG);
    });

    it('falls back to defaults when the file does not match the schema', () => {
        fs.mkdirSync(path.join(home, 'nested'));
        fs.writeFileSync(getConfigPath(), JSON.stringify({ scan: { ignorePatterns: 'node_modules' } }));

        expect(loadConfig()).toEqual(DEFAULT_CONFIG);
    });

    it('saves the config and creates the directory', () => {
        const config = {
            scan: { ignorePatterns: ['.git'], includeDirectories: false },
            output: { json: true, showErrors: true }
        };
        saveConfig(config);

        expect(fs.readFileSync(getConfigPath(), 'utf-8')).toBe(JSON.stringify(config, null, 4));
        expect(loadConfig()).toEqual(config);
    });
});

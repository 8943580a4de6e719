import { DEFAULT_CONFIG, type StampscanConfig } from '../../src/domain/model/Config.js';
import { InvalidOptionsError, parseScanOptions, parseTime } from '../../src/cli/utils/options.js';

describe('parseTime', () => {
    it('reads unix seconds', () => {
        expect(parseTime('1600000000')).toBe(1600000000);
        expect(parseTime(' 1600000000.5 ')).toBe(1600000000.5);
    });

    it('reads ISO 8601 dates', () => {
        expect(parseTime('2020-09-13T12:26:40Z')).toBe(1600000000);
    });

    it('returns null for anything else', () => {
        expect(parseTime('yesterday-ish')).toBeNull();
        expect(parseTime('')).toBeNull();
    });
});

describe('parseScanOptions', () => {
    const NOW = 1700000000;

    it('ends the window now when no bound is given', () => {
        expect(parseScanOptions({ window: '600' }, DEFAULT_CONFIG, NOW)).toEqual({
            start: undefined,
            end: NOW,
            window: 600,
            ignorePatterns: [],
            includeDirectories: false,
            rollup: false,
            showErrors: false,
            json: false
        });
    });

    it('keeps an explicit start without inventing an end', () => {
        const options = parseScanOptions({ start: '1600000000', window: '60' }, DEFAULT_CONFIG, NOW);

        expect(options.start).toBe(1600000000);
        expect(options.end).toBeUndefined();
    });

    it('accepts both bounds without a window', () => {
        const options = parseScanOptions(
            { start: '2020-09-13T12:26:40Z', end: '1600000600' },
            DEFAULT_CONFIG,
            NOW
        );

        expect(options.start).toBe(1600000000);
        expect(options.end).toBe(1600000600);
        expect(options.window).toBeUndefined();
    });

    it('requires a window unless both bounds are given', () => {
        expect(() => parseScanOptions({ end: '1600000000' }, DEFAULT_CONFIG, NOW))
            .toThrow(new InvalidOptionsError('--window is required unless both --start and --end are given'));
    });

    it('rejects a malformed time', () => {
        expect(() => parseScanOptions({ end: 'soon', window: '10' }, DEFAULT_CONFIG, NOW))
            .toThrow(/Invalid --end time: soon/);
    });

    it('rejects a negative window', () => {
        expect(() => parseScanOptions({ window: '-5' }, DEFAULT_CONFIG, NOW))
            .toThrow(/Invalid --window: -5 \(expected a non-negative number of seconds\)/);
    });

    it('layers flags over the config file', () => {
        const config: StampscanConfig = {
            scan: { ignorePatterns: ['node_modules'], includeDirectories: true },
            output: { json: true, showErrors: true }
        };

        const options = parseScanOptions(
            { window: '10', ignore: ['*.log'], json: false, rollup: true },
            config,
            NOW
        );

        expect(options.ignorePatterns).toEqual(['node_modules', '*.log']);
        expect(options.includeDirectories).toBe(true);
        expect(options.showErrors).toBe(true);
        expect(options.json).toBe(false);
        expect(options.rollup).toBe(true);
    });
});

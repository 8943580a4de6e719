import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { Inspector } from '../../src/application/Inspector.js';
import { buildReport } from '../../src/application/InspectionReport.js';

const FIXED = 1600000000;

describe('buildReport', () => {
    let tempDir: string;
    let a: string;
    let b: string;
    let sub: string;

    beforeEach(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'stampscan-report-'));
        sub = path.join(tempDir, 'sub');
        a = path.join(tempDir, 'a.txt');
        b = path.join(sub, 'b.txt');
        await fs.mkdir(sub);
        await fs.writeFile(a, 'a');
        await fs.writeFile(b, 'b');
        await fs.writeFile(path.join(tempDir, 'old.txt'), 'old');
        await fs.utimes(a, FIXED + 100, FIXED + 100);
        await fs.utimes(b, FIXED + 200, FIXED + 200);
        await fs.utimes(path.join(tempDir, 'old.txt'), FIXED - 5000, FIXED - 5000);
    });

    afterEach(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('lists matches sorted by timestamp', async () => {
        const inspector = new Inspector({ root: tempDir, start: FIXED, end: FIXED + 600 });
        await inspector.inspect();

        const report = buildReport(inspector, { rollup: false });

        expect(report.root).toBe(tempDir);
        expect(report.start).toBe(FIXED);
        expect(report.end).toBe(FIXED + 600);
        expect(report.modified).toEqual([
            { path: a, timestamp: FIXED + 100 },
            { path: b, timestamp: FIXED + 200 }
        ]);
        expect(report.accessed).toEqual(report.modified);
        expect(report.created).toEqual([]);
        expect(report.errors).toEqual([]);
    });

    it('rolls timestamps up to ancestor directories', async () => {
        const inspector = new Inspector({ root: tempDir, start: FIXED, end: FIXED + 600 });
        await inspector.inspect();

        const report = buildReport(inspector, { rollup: true });

        expect(report.modified).toEqual([
            { path: a, timestamp: FIXED + 100 },
            { path: tempDir, timestamp: FIXED + 200 },
            { path: sub, timestamp: FIXED + 200 },
            { path: b, timestamp: FIXED + 200 }
        ]);
    });

    it('lists unreadable paths', async () => {
        const link = path.join(tempDir, 'dangling');
        await fs.symlink(path.join(tempDir, 'missing.txt'), link);
        const inspector = new Inspector({ root: tempDir, start: FIXED, end: FIXED + 600 });
        await inspector.inspect();

        expect(buildReport(inspector, { rollup: false }).errors).toEqual([
            { path: link, code: 'ENOENT', message: `Cannot read metadata: ${link} (ENOENT)` }
        ]);
    });
});

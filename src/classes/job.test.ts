import { describe, it, expect } from 'vitest';
import { DEFAULT_EXPORT_PATTERN, JobClass } from './job.js';
import { type JobConfig } from '../types/job.js';

const jobPath = '/mock/jobs/kitchen/sheetpack.json';

function makeConfig(): JobConfig {
    return {
        sheetpack_version: '1.0',
        name: 'kitchen',
        created: '2026-01-05T09:00:00.000Z',
        sheet: { width: 50, height: 50 },
        items: [
            { width: 3, height: 30, quantity: 3, label: 'slat' },
            { width: 10, height: 12 },
        ],
        strategy: 'densest-of-largest',
        max_sheets: 4,
    };
}

describe('JobClass', () => {
    it('creates a new job in memory', () => {
        const job = JobClass.create(jobPath, 'shelves', { width: 20, height: 10 }, [{ width: 2, height: 3 }]);

        expect(job.name).toBe('shelves');
        expect(job.path).toBe(jobPath);
        expect(job.sheet).toEqual({ width: 20, height: 10 });
        expect(job.toJSON().sheetpack_version).toBe('1.0');
        expect(job.toJSON().created).toBeDefined();
    });

    it('initializes from JSON data without mutation', () => {
        const config = makeConfig();
        const job = JobClass.fromJSON(jobPath, config);

        config.items[0].quantity = 99;
        expect(job.items[0].quantity).toBe(3);

        job.items[0].quantity = 50;
        expect(job.items[0].quantity).toBe(3);
    });

    it('expands quantities into a flat size list', () => {
        const job = JobClass.fromJSON(jobPath, makeConfig());
        expect(job.expandItems()).toEqual([[3, 30], [3, 30], [3, 30], [10, 12]]);
    });

    it('carries allocation settings', () => {
        const job = JobClass.fromJSON(jobPath, makeConfig());
        expect(job.allocationOptions()).toEqual({ strategy: 'densest-of-largest', maxSheets: 4 });
    });

    it('falls back to the default export pattern', () => {
        const job = JobClass.fromJSON(jobPath, makeConfig());
        expect(job.exportPattern).toBe(DEFAULT_EXPORT_PATTERN);

        const custom = JobClass.fromJSON(jobPath, { ...makeConfig(), export_pattern: '{name}-{sheet}.png' });
        expect(custom.exportPattern).toBe('{name}-{sheet}.png');
    });

    it('summarizes itself for job info', () => {
        const job = JobClass.fromJSON(jobPath, makeConfig());
        expect(job.info()).toEqual({
            path: jobPath,
            name: 'kitchen',
            sheetpack_version: '1.0',
            created: '2026-01-05T09:00:00.000Z',
            sheet: { width: 50, height: 50 },
            item_lines: 2,
            item_count: 4,
            strategy: 'densest-of-largest',
            max_sheets: 4,
            export_pattern: DEFAULT_EXPORT_PATTERN,
        });
    });
});

import * as fs from 'fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import { type JobConfig } from '../types/job.js';
import * as errors from '../errors.js';

const positiveInt = z.number().int().positive();

/**
 * Structural schema of a sheetpack.json file.
 */
const jobSchema = z.object({
    sheetpack_version: z.string(),
    name: z.string(),
    created: z.string().optional(),
    sheet: z.object({ width: positiveInt, height: positiveInt }),
    items: z.array(z.object({
        width: positiveInt,
        height: positiveInt,
        quantity: positiveInt.optional(),
        label: z.string().optional(),
    })),
    strategy: z.enum(['first-feasible', 'densest-of-largest']).optional(),
    max_sheets: z.number().int().nonnegative().optional(),
    export_pattern: z.string().optional(),
}) satisfies z.ZodType<JobConfig>;

function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
    return e instanceof Error && 'code' in e;
}

/**
 * Loads a job configuration from a JSON file.
 *
 * @param filePath - Absolute path to the sheetpack.json file
 * @returns The parsed JobConfig data
 */
export async function loadJobFile(filePath: string): Promise<JobConfig> {
    let fileContent: string;
    try {
        fileContent = await fs.readFile(filePath, 'utf8');
    } catch (e: unknown) {
        if (isErrnoException(e) && e.code === 'ENOENT') {
            throw errors.toError(errors.jobFileNotFound(filePath));
        }
        throw e;
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(fileContent);
    } catch (e: unknown) {
        throw new Error(`Invalid JSON in job file: ${filePath}. ${e instanceof Error ? e.message : ''}`);
    }

    const result = jobSchema.safeParse(parsed);
    if (!result.success) {
        throw new Error(`File ${filePath} does not match the required Job format.`);
    }
    return result.data;
}

/**
 * Saves a job configuration to a JSON file.
 * Automatically adds or preserves the creation timestamp.
 *
 * @param filePath - Absolute path to the sheetpack.json file
 * @param job - The JobConfig data to save
 */
export async function saveJobFile(filePath: string, job: JobConfig): Promise<void> {
    const dataToSave = { ...job };
    if (!dataToSave.created) {
        dataToSave.created = new Date().toISOString();
    }

    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, JSON.stringify(dataToSave, null, 2), 'utf8');
}

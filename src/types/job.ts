/**
 * Core types for the sheetpack.json job file.
 *
 * A job describes one stock sheet size and the list of rectangles to cut from it,
 * plus optional search settings.
 */

import { type UsageStrategy } from './search.js';

/**
 * One line of the job's item list.
 */
export interface JobItem {
    width: number;
    height: number;
    /** Number of identical copies (default 1) */
    quantity?: number;
    /** Free-text label for the caller's own bookkeeping */
    label?: string;
}

/**
 * The complete structure of the sheetpack.json file.
 */
export interface JobConfig {
    /** Schema version, e.g., "1.0" */
    sheetpack_version: string;
    /** Display name of the job, also used for export filenames */
    name: string;
    /** ISO 8601 creation timestamp */
    created?: string;

    /** Stock sheet dimensions */
    sheet: { width: number; height: number };
    items: JobItem[];

    strategy?: UsageStrategy;
    /** Upper bound on the number of sheets an allocation may use */
    max_sheets?: number;
    /** Filename pattern for PNG exports, e.g. "{name}_sheet_{sheet:02}.png" */
    export_pattern?: string;
}

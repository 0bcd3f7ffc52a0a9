import { type JobConfig, type JobItem } from '../types/job.js';
import { type Size } from '../types/rectangle.js';
import { type AllocationOptions } from '../types/search.js';

export const DEFAULT_EXPORT_PATTERN = '{name}_sheet_{sheet:02}.png';

/**
 * Stateful wrapper for a loaded sheetpack.json job.
 */
export class JobClass {
    /** The raw JSON-serializable config data */
    private _data: JobConfig;

    /** The absolute path to the sheetpack.json file */
    private _path: string;

    /**
     * Internal constructor. Use static create() or fromJSON().
     */
    private constructor(filePath: string, data: JobConfig) {
        this._path = filePath;
        this._data = structuredClone(data);
    }

    get path(): string {
        return this._path;
    }

    get name(): string {
        return this._data.name;
    }

    get sheet(): { width: number; height: number } {
        return { ...this._data.sheet };
    }

    get items(): JobItem[] {
        return this._data.items.map((item) => ({ ...item }));
    }

    get exportPattern(): string {
        return this._data.export_pattern ?? DEFAULT_EXPORT_PATTERN;
    }

    /**
     * Expands item quantities into the flat multiset the search works on.
     */
    expandItems(): Size[] {
        const sizes: Size[] = [];
        for (const item of this._data.items) {
            const quantity = item.quantity ?? 1;
            for (let i = 0; i < quantity; i++) {
                sizes.push([item.width, item.height]);
            }
        }
        return sizes;
    }

    /**
     * Allocation settings carried by the job file.
     */
    allocationOptions(): AllocationOptions {
        return {
            strategy: this._data.strategy,
            maxSheets: this._data.max_sheets,
        };
    }

    /**
     * Returns a summary of the job for the `job info` tool.
     */
    info() {
        return {
            path: this._path,
            name: this._data.name,
            sheetpack_version: this._data.sheetpack_version,
            created: this._data.created,
            sheet: this.sheet,
            item_lines: this._data.items.length,
            item_count: this.expandItems().length,
            strategy: this._data.strategy ?? 'first-feasible',
            max_sheets: this._data.max_sheets,
            export_pattern: this.exportPattern,
        };
    }

    toJSON(): JobConfig {
        return structuredClone(this._data);
    }

    /**
     * Creates a new job in memory.
     * @param filePath The absolute path where the sheetpack.json will be saved.
     */
    static create(filePath: string, name: string, sheet: { width: number; height: number }, items: JobItem[]): JobClass {
        return new JobClass(filePath, {
            sheetpack_version: '1.0',
            name,
            created: new Date().toISOString(),
            sheet,
            items,
        });
    }

    static fromJSON(filePath: string, data: JobConfig): JobClass {
        return new JobClass(filePath, data);
    }
}

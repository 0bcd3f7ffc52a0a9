import { type PackingResult, type Sheet } from '../types/rectangle.js';

/**
 * Append-only sequence of sheets produced by an allocation run.
 * Sheets, their packing and its size and position lists are frozen on append.
 */
export class SheetCollection {
    private readonly _sheets: Sheet[] = [];

    constructor(
        public readonly width: number,
        public readonly height: number,
    ) {}

    get sheets(): readonly Sheet[] {
        return [...this._sheets];
    }

    get length(): number {
        return this._sheets.length;
    }

    /** Total number of items placed across all sheets. */
    get placedCount(): number {
        return this._sheets.reduce((sum, s) => sum + s.packing.sizes.length, 0);
    }

    /**
     * Appends a new sheet holding `packing` and returns it.
     */
    append(packing: PackingResult): Sheet {
        const sheet: Sheet = Object.freeze({
            index: this._sheets.length,
            width: this.width,
            height: this.height,
            packing: Object.freeze({
                sizes: Object.freeze([...packing.sizes]),
                positions: Object.freeze([...packing.positions]),
                density: packing.density,
            }),
        });
        this._sheets.push(sheet);
        return sheet;
    }
}

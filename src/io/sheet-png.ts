import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { PNG } from 'pngjs';
import { type Sheet } from '../types/rectangle.js';

type RGBA = [number, number, number, number];

const SHEET_COLOR: RGBA = [230, 230, 230, 255];
const ITEM_COLOR: RGBA = [255, 255, 255, 255];
const OUTLINE_COLOR: RGBA = [0, 0, 0, 255];

function fillRect(png: PNG, x0: number, y0: number, w: number, h: number, color: RGBA): void {
    for (let y = Math.max(0, y0); y < Math.min(png.height, y0 + h); y++) {
        for (let x = Math.max(0, x0); x < Math.min(png.width, x0 + w); x++) {
            const idx = (y * png.width + x) * 4;
            png.data[idx] = color[0];
            png.data[idx + 1] = color[1];
            png.data[idx + 2] = color[2];
            png.data[idx + 3] = color[3];
        }
    }
}

/**
 * Renders a sheet as an RGBA image: a light-gray sheet with each placed item drawn
 * as a white rectangle with a 1px black outline.
 *
 * Sheet coordinates have their origin at the bottom-left, so rows are flipped:
 * an item at y = 0 touches the bottom edge of the image.
 *
 * @param scale Pixels per sheet unit (positive integer).
 */
export function renderSheet(sheet: Sheet, scale: number = 1): PNG {
    if (!Number.isInteger(scale) || scale < 1) {
        throw new Error(`Invalid argument: scale must be a positive integer, got ${String(scale)}.`);
    }

    const png = new PNG({ width: sheet.width * scale, height: sheet.height * scale });
    fillRect(png, 0, 0, png.width, png.height, SHEET_COLOR);

    const { sizes, positions } = sheet.packing;
    sizes.forEach(([w, h], i) => {
        const [x, y] = positions[i];
        const px = x * scale;
        const pw = w * scale;
        const ph = h * scale;
        const py = png.height - (y * scale + ph);

        fillRect(png, px, py, pw, ph, OUTLINE_COLOR);
        if (pw > 2 && ph > 2) {
            fillRect(png, px + 1, py + 1, pw - 2, ph - 2, ITEM_COLOR);
        }
    });

    return png;
}

/**
 * Renders a sheet and writes it as a PNG file, creating parent directories as needed.
 */
export async function saveSheetPng(filePath: string, sheet: Sheet, scale: number = 1): Promise<void> {
    const png = renderSheet(sheet, scale);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, PNG.sync.write(png));
}

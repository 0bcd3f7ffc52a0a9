import { z } from 'zod';
import { type McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { findRotations } from '../algorithms/rotations.js';
import { findSortedAreas } from '../algorithms/subsets.js';
import { findOptimalPacking } from '../algorithms/single-bin.js';
import { findMaxUsage } from '../algorithms/max-usage.js';
import { multiSheetPacking } from '../algorithms/multi-sheet.js';
import { type AllocationResult, type Size } from '../types/rectangle.js';
import * as errors from '../errors.js';

const itemSchema = z.object({
    width: z.number().int().describe('Item width'),
    height: z.number().int().describe('Item height'),
    quantity: z.number().int().optional().describe('Number of identical copies (default 1)'),
});

/**
 * Zod input schema for the `pack` tool.
 */
export const packInputSchema = {
    action: z.enum(['rotations', 'subsets', 'optimal', 'max_usage', 'allocate']).describe(
        'Search to run: rotations (distinct rotation sets), subsets (area-ranked subsets), '
        + 'optimal (densest packing of all items on one sheet), max_usage (best-covering subset on one sheet), '
        + 'allocate (spread items over as many sheets as needed)'
    ),
    items: z.array(itemSchema).describe('Rectangles to pack'),
    width: z.number().int().optional().describe('Sheet width (required by every action except rotations)'),
    height: z.number().int().optional().describe('Sheet height (required by every action except rotations)'),
    threshold: z.number().nullable().optional().describe(
        'For subsets/max_usage: minimum fraction of the sheet area to cover, in (0, 1]. null disables. Default 0.9.'
    ),
    strategy: z.enum(['first-feasible', 'densest-of-largest']).optional().describe(
        'For max_usage/allocate: how to choose among feasible subsets (default first-feasible)'
    ),
    max_sheets: z.number().int().optional().describe('For allocate: maximum number of sheets to fill'),
};

const packArgsSchema = z.object(packInputSchema);
export type PackToolArgs = z.infer<typeof packArgsSchema>;

/**
 * Registers the `pack` tool on the MCP server.
 */
export function registerPackTool(server: McpServer): void {
    server.registerTool(
        'pack',
        {
            title: 'Pack',
            description: 'Search rotation and subset assignments to pack rectangles onto fixed-size sheets. '
                + 'Actions: rotations, subsets, optimal, max_usage, allocate.',
            inputSchema: packInputSchema,
        },
        (args) => handlePackTool(args),
    );
}

/**
 * Dispatches a `pack` tool call. Exported for direct use by tests.
 */
export function handlePackTool(args: PackToolArgs) {
    const sizes: Size[] = [];
    for (const item of args.items) {
        const quantity = item.quantity ?? 1;
        if (quantity < 1) {
            return errors.invalidArgument(`item quantity must be at least 1, got ${String(quantity)}.`);
        }
        for (let i = 0; i < quantity; i++) {
            sizes.push([item.width, item.height]);
        }
    }

    if (args.action === 'rotations') {
        return guarded(() => handleRotations(sizes));
    }

    if (args.width === undefined || args.height === undefined) {
        return errors.invalidArgument(`pack ${args.action} requires "width" and "height".`);
    }
    const { width, height } = args;

    switch (args.action) {
        case 'subsets':
            return guarded(() => handleSubsets(sizes, width, height, args.threshold));
        case 'optimal':
            return guarded(() => handleOptimal(sizes, width, height));
        case 'max_usage':
            return guarded(() => handleMaxUsage(sizes, width, height, args));
        case 'allocate':
            return guarded(() => handleAllocate(sizes, width, height, args));
        default:
            return errors.invalidArgument(`Unknown pack action: ${String(args.action)}`);
    }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function textResult(data: unknown) {
    return {
        content: [{
            type: 'text' as const,
            text: JSON.stringify(data),
        }],
    };
}

/**
 * Runs a handler, turning thrown input errors into a domain error response.
 */
function guarded<T>(fn: () => T): T | errors.DomainErrorResponse {
    try {
        return fn();
    } catch (e: unknown) {
        return errors.domainError(e instanceof Error ? e.message : String(e));
    }
}

/**
 * JSON view of an allocation, shared with the `job` tool.
 */
export function allocationSummary(result: AllocationResult) {
    return {
        status: result.status,
        sheet_count: result.sheets.length,
        placed_count: result.sheets.reduce((n, s) => n + s.packing.sizes.length, 0),
        sheets: result.sheets.map((s) => ({
            index: s.index,
            sizes: s.packing.sizes,
            positions: s.packing.positions,
            density: s.packing.density,
        })),
        unplaced: result.unplaced,
    };
}

// ---------------------------------------------------------------------------
// Action handlers
// ---------------------------------------------------------------------------

function handleRotations(sizes: Size[]) {
    const rotations = findRotations(sizes);
    return textResult({ count: rotations.length, rotations });
}

function handleSubsets(sizes: Size[], width: number, height: number, threshold: number | null | undefined) {
    const subsets = findSortedAreas(sizes, width * height, threshold === undefined ? 0.9 : threshold);
    return textResult({ count: subsets.length, subsets });
}

function handleOptimal(sizes: Size[], width: number, height: number) {
    const best = findOptimalPacking(sizes, width, height);
    if (best === null) {
        return errors.noFeasiblePacking(width, height);
    }
    return textResult(best);
}

function handleMaxUsage(sizes: Size[], width: number, height: number, args: PackToolArgs) {
    const best = findMaxUsage(sizes, width, height, { threshold: args.threshold, strategy: args.strategy });
    if (best === null) {
        return errors.noFeasiblePacking(width, height);
    }
    return textResult(best);
}

function handleAllocate(sizes: Size[], width: number, height: number, args: PackToolArgs) {
    const result = multiSheetPacking(sizes, width, height, {
        strategy: args.strategy,
        maxSheets: args.max_sheets,
    });
    return textResult(allocationSummary(result));
}

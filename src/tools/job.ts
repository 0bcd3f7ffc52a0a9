import { z } from 'zod';
import { type McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import * as path from 'node:path';
import { JobClass } from '../classes/job.js';
import { getWorkspace } from '../classes/workspace.js';
import { loadJobFile, saveJobFile } from '../io/job-io.js';
import { saveSheetPng } from '../io/sheet-png.js';
import { multiSheetPacking } from '../algorithms/multi-sheet.js';
import { resolveExportPattern } from '../algorithms/export-pattern.js';
import { allocationSummary } from './pack.js';
import * as errors from '../errors.js';

/**
 * Zod input schema for the `job` tool.
 *
 * Uses a flat shape with an `action` enum discriminator.
 * - `init`: path, name, width, height, items required
 * - `open`: path required (sheetpack.json file path)
 * - `info`, `run`: no additional args
 * - `export`: optional output_dir and scale
 */
export const jobInputSchema = {
    action: z.enum(['init', 'open', 'info', 'run', 'export']).describe(
        'Action to perform: init (write a new job file), open (load a job file), info (show the open job), '
        + 'run (allocate the job\'s items across sheets), export (write PNG previews of the last run)'
    ),
    path: z.string().optional().describe('For init/open: path to the sheetpack.json file'),
    name: z.string().optional().describe('For init: job name (defaults to the file\'s directory name)'),
    width: z.number().int().optional().describe('For init: sheet width'),
    height: z.number().int().optional().describe('For init: sheet height'),
    items: z.array(z.object({
        width: z.number().int(),
        height: z.number().int(),
        quantity: z.number().int().optional(),
        label: z.string().optional(),
    })).optional().describe('For init: rectangles to cut'),
    output_dir: z.string().optional().describe('For export: target directory (defaults to the job file\'s directory)'),
    scale: z.number().int().optional().describe('For export: pixels per sheet unit (default 4)'),
};

const jobArgsSchema = z.object(jobInputSchema);
export type JobToolArgs = z.infer<typeof jobArgsSchema>;

/**
 * Registers the `job` tool on the MCP server.
 */
export function registerJobTool(server: McpServer): void {
    server.registerTool(
        'job',
        {
            title: 'Job',
            description: 'Manage sheetpack.json job files, run allocations, and export sheet previews. '
                + 'Actions: init, open, info, run, export.',
            inputSchema: jobInputSchema,
        },
        (args) => handleJobTool(args),
    );
}

/**
 * Dispatches a `job` tool call. Exported for direct use by tests.
 */
export async function handleJobTool(args: JobToolArgs) {
    const workspace = getWorkspace();

    switch (args.action) {
        case 'init':
            return handleInit(workspace, args);
        case 'open':
            return handleOpen(workspace, args.path);
        case 'info':
            return handleInfo(workspace);
        case 'run':
            return handleRun(workspace);
        case 'export':
            return handleExport(workspace, args.output_dir, args.scale);
        default:
            return errors.invalidArgument(`Unknown job action: ${String(args.action)}`);
    }
}

type Workspace = ReturnType<typeof getWorkspace>;

// ---------------------------------------------------------------------------
// Action handlers
// ---------------------------------------------------------------------------

async function handleInit(workspace: Workspace, args: JobToolArgs) {
    if (!args.path) {
        return errors.invalidArgument('job init requires a "path" (sheetpack.json file).');
    }
    if (args.width === undefined || args.height === undefined || args.width < 1 || args.height < 1) {
        return errors.invalidArgument('job init requires positive "width" and "height".');
    }
    if (!args.items || args.items.length === 0) {
        return errors.invalidArgument('job init requires a non-empty "items" array.');
    }
    if (args.items.some((item) => item.width < 1 || item.height < 1 || (item.quantity ?? 1) < 1)) {
        return errors.invalidArgument('job init items need positive "width", "height" and "quantity".');
    }

    const filePath = path.resolve(args.path);
    const name = args.name ?? path.basename(path.dirname(filePath));
    const job = JobClass.create(filePath, name, { width: args.width, height: args.height }, args.items);

    try {
        await saveJobFile(filePath, job.toJSON());
    } catch {
        return errors.cannotWritePath(filePath);
    }
    workspace.setJob(job);

    return {
        content: [{
            type: 'text' as const,
            text: JSON.stringify({ message: `Job '${name}' initialized.`, path: filePath }),
        }],
    };
}

async function handleOpen(workspace: Workspace, filePath: string | undefined) {
    if (!filePath) {
        return errors.invalidArgument('job open requires a "path" to sheetpack.json.');
    }

    const resolvedPath = path.resolve(filePath);

    let data;
    try {
        data = await loadJobFile(resolvedPath);
    } catch (e: unknown) {
        return errors.domainError(e instanceof Error ? e.message : String(e));
    }

    const job = JobClass.fromJSON(resolvedPath, data);
    workspace.setJob(job);

    return {
        content: [{
            type: 'text' as const,
            text: JSON.stringify({
                message: `Job '${job.name}' opened.`,
                path: resolvedPath,
                items: job.expandItems().length,
            }),
        }],
    };
}

function handleInfo(workspace: Workspace) {
    if (!workspace.job) {
        return errors.noJobLoaded();
    }

    return {
        content: [{
            type: 'text' as const,
            text: JSON.stringify({ ...workspace.job.info(), has_run: workspace.lastRun !== null }),
        }],
    };
}

function handleRun(workspace: Workspace) {
    if (!workspace.job) {
        return errors.noJobLoaded();
    }
    const job = workspace.job;
    const { width, height } = job.sheet;

    let result;
    try {
        result = multiSheetPacking(job.expandItems(), width, height, job.allocationOptions());
    } catch (e: unknown) {
        return errors.domainError(e instanceof Error ? e.message : String(e));
    }
    workspace.lastRun = result;

    return {
        content: [{
            type: 'text' as const,
            text: JSON.stringify(allocationSummary(result)),
        }],
    };
}

async function handleExport(workspace: Workspace, outputDir: string | undefined, scale: number | undefined) {
    if (!workspace.job) {
        return errors.noJobLoaded();
    }
    const run = workspace.lastRun;
    if (!run) {
        return errors.noRunResult();
    }
    const effectiveScale = scale ?? 4;
    if (effectiveScale < 1) {
        return errors.invalidArgument(`scale must be a positive integer, got ${String(effectiveScale)}.`);
    }

    const job = workspace.job;
    const dir = outputDir !== undefined ? path.resolve(outputDir) : path.dirname(job.path);
    const files: string[] = [];

    for (const sheet of run.sheets) {
        const fileName = resolveExportPattern(job.exportPattern, {
            name: job.name,
            sheet: sheet.index + 1,
            width: sheet.width,
            height: sheet.height,
        });
        const filePath = path.join(dir, fileName);
        try {
            await saveSheetPng(filePath, sheet, effectiveScale);
        } catch {
            return errors.cannotWritePath(filePath);
        }
        files.push(filePath);
    }

    return {
        content: [{
            type: 'text' as const,
            text: JSON.stringify({
                message: `Exported ${String(files.length)} sheet(s).`,
                files,
                unplaced: run.unplaced.length,
            }),
        }],
    };
}

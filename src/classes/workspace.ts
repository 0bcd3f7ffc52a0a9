import { type AllocationResult } from '../types/rectangle.js';
import { type JobClass } from './job.js';

/**
 * In-memory session singleton.
 * Holds the open job and the result of its last allocation run.
 * Not persisted to disk; lives for the duration of the server session.
 */
export class WorkspaceClass {
    private static _instance: WorkspaceClass | null = null;

    /** The open job, or null if no job is loaded. */
    public job: JobClass | null = null;

    /** Result of the last `job run`, or null if the open job has not been run. */
    public lastRun: AllocationResult | null = null;

    private constructor() {
        // Singleton: use WorkspaceClass.instance()
    }

    /**
     * Returns the singleton WorkspaceClass instance.
     */
    static instance(): WorkspaceClass {
        if (WorkspaceClass._instance === null) {
            WorkspaceClass._instance = new WorkspaceClass();
        }
        return WorkspaceClass._instance;
    }

    /**
     * Resets the singleton for testing. Clears all state.
     */
    static reset(): void {
        WorkspaceClass._instance = null;
    }

    /**
     * Sets the open job. Any previous run result belongs to the old job and is discarded.
     */
    setJob(job: JobClass): void {
        this.job = job;
        this.lastRun = null;
    }
}

/**
 * Module-level accessor used by tool handlers.
 */
export function getWorkspace(): WorkspaceClass {
    return WorkspaceClass.instance();
}

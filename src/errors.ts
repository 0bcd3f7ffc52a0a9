/**
 * Shared Error Factory for sheetpack domain errors.
 *
 * All functions are pure and return the structured MCP error response shape directly,
 * allowing tool handlers to do:
 *   return errors.noJobLoaded();
 * Library code throws `new Error(errors.x(...).content[0].text)` instead.
 */

/**
 * The standard MCP error response shape for domain errors.
 * Tool handlers return this object. The LLM reads the text and can self-correct.
 */
export type DomainErrorResponse = {
    isError: true;
    content: Array<{ type: 'text'; text: string }>;
};

/**
 * Base helper to construct a DomainErrorResponse from a message string.
 */
export function domainError(message: string): DomainErrorResponse {
    return {
        isError: true,
        content: [{ type: 'text', text: message }],
    };
}

export function invalidArgument(message: string): DomainErrorResponse {
    return domainError(`Invalid argument: ${message}`);
}

/**
 * Convenience for library code: the message of a DomainErrorResponse, as an Error.
 */
export function toError(response: DomainErrorResponse): Error {
    return new Error(response.content[0].text);
}

// ----------------------------------------------------------------------------
// search input
// ----------------------------------------------------------------------------

export function invalidSize(index: number, value: unknown): DomainErrorResponse {
    return invalidArgument(`size ${String(index)} must be a [width, height] pair of positive integers, got ${JSON.stringify(value)}.`);
}

export function invalidBin(width: number, height: number): DomainErrorResponse {
    return invalidArgument(`sheet dimensions must be positive integers, got ${String(width)}×${String(height)}.`);
}

export function invalidThreshold(threshold: number): DomainErrorResponse {
    return invalidArgument(`threshold must be in (0, 1], got ${String(threshold)}.`);
}

export function invalidCount(count: number): DomainErrorResponse {
    return invalidArgument(`count must be a non-negative integer, got ${String(count)}.`);
}

export function invalidArea(area: number): DomainErrorResponse {
    return invalidArgument(`area must be a positive number, got ${String(area)}.`);
}

// ----------------------------------------------------------------------------
// search outcome
// ----------------------------------------------------------------------------

export function noFeasiblePacking(width: number, height: number): DomainErrorResponse {
    return domainError(`No feasible packing found within ${String(width)}×${String(height)}.`);
}

export function unmatchedPlacement(size: readonly number[]): DomainErrorResponse {
    return domainError(`Placed size ${JSON.stringify(size)} has no matching item in the pool.`);
}

// ----------------------------------------------------------------------------
// job
// ----------------------------------------------------------------------------

export function noJobLoaded(): DomainErrorResponse {
    return domainError('No job loaded. Call job open first.');
}

export function jobFileNotFound(path: string): DomainErrorResponse {
    return domainError(`Job file not found: ${path}`);
}

export function noRunResult(): DomainErrorResponse {
    return domainError('No allocation result to export. Call job run first.');
}

// ----------------------------------------------------------------------------
// export
// ----------------------------------------------------------------------------

export function cannotWritePath(path: string): DomainErrorResponse {
    return domainError(`Cannot write to path: ${path}`);
}

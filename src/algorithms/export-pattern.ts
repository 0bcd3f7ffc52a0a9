const SEPARATORS = '_-.';

/**
 * Resolves an export filename pattern such as `"{name}_sheet_{sheet:02}.png"`.
 *
 * `{token}` is replaced by its value; `{token:0N}` zero-pads numeric values to N digits.
 * A token with no value (undefined or empty) is dropped together with one adjacent
 * separator (`_`, `-`, `.`): the preceding one if present, otherwise a following
 * `_` or `-`. A following `.` is kept so the file extension survives.
 *
 * @param pattern The export pattern string.
 * @param variables Token values by name.
 * @returns The resolved filename.
 */
export function resolveExportPattern(
    pattern: string,
    variables: Record<string, string | number | undefined>
): string {
    const tokenRegex = /{([^:}]+)(?::([^}]+))?}/g;

    // Split into literal text and resolved token values; null marks an empty token.
    const parts: Array<string | null> = [];
    let last = 0;
    for (const match of pattern.matchAll(tokenRegex)) {
        const start = match.index ?? 0;
        parts.push(pattern.slice(last, start));
        last = start + match[0].length;

        const value = variables[match[1]];
        if (value === undefined || value === '') {
            parts.push(null);
            continue;
        }

        let text = String(value);
        const padding = match[2];
        if (padding !== undefined && /^0[0-9]+$/.test(padding)) {
            text = text.padStart(parseInt(padding, 10), '0');
        }
        parts.push(text);
    }
    parts.push(pattern.slice(last));

    let result = '';
    for (let i = 0; i < parts.length; i++) {
        const part = parts[i];
        if (part !== null) {
            result += part;
            continue;
        }
        if (result.length > 0 && SEPARATORS.includes(result[result.length - 1])) {
            result = result.slice(0, -1);
            continue;
        }
        // No leading separator: consume a trailing '_' or '-' from the next literal.
        const next = parts[i + 1];
        if (typeof next === 'string' && next.length > 0 && (next[0] === '_' || next[0] === '-')) {
            parts[i + 1] = next.slice(1);
        }
    }

    return result;
}

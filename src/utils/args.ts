import { ValidationError } from './ErrorHandler.js';

/**
 * Value of a `--name=value` flag, if present
 */
export function getOption(args: string[], name: string): string | undefined {
    const prefix = `--${name}=`;
    const arg = args.find(a => a.startsWith(prefix));
    return arg === undefined ? undefined : arg.slice(prefix.length);
}

/**
 * First argument that is not a flag
 */
export function getPositional(args: string[]): string | undefined {
    return args.find(a => !a.startsWith('--'));
}

/**
 * Parse the positional count argument of the download tools
 */
export function parseCount(args: string[], usage: string): number {
    const raw = getPositional(args);
    if (raw === undefined) {
        throw new ValidationError(`Missing count argument. Usage: ${usage}`);
    }

    const count = Number(raw);
    if (!/^\d+$/.test(raw) || !Number.isSafeInteger(count)) {
        throw new ValidationError(`Count must be a non-negative integer, got "${raw}". Usage: ${usage}`);
    }
    return count;
}

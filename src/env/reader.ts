import type { Logger } from '../types';
import { DEFAULT_LOGGER } from '../constants';

/**
 * Build the variable mapping from `KEY=VALUE` strings
 *
 * The first `=` separates key and value, so values may contain `=`.
 * Entries without `=` are ignored. When a key repeats, the later entry wins.
 *
 * @example
 * ```typescript
 * parseEnv(['A=1', 'B=x=y', 'junk', 'A=2']);
 * // Map { 'A' => '2', 'B' => 'x=y' }
 * ```
 *
 * @param pairs - Entries in `KEY=VALUE` form
 * @param logger - Receives a silly-level message for each overridden key
 * @returns Mapping from variable name to value
 */
export function parseEnv(pairs: Iterable<string>, logger: Logger = DEFAULT_LOGGER): Map<string, string> {
    const variables = new Map<string, string>();

    for (const pair of pairs) {
        const separator = pair.indexOf('=');
        if (separator === -1) {
            continue;
        }

        const key = pair.slice(0, separator);
        if (variables.has(key)) {
            logger.silly(`Environment variable ${key} is set more than once; using the last value`);
        }
        variables.set(key, pair.slice(separator + 1));
    }

    return variables;
}

/**
 * List an environment object as `KEY=VALUE` strings
 *
 * This is the usual source of pairs for `unmarshal`. Variables whose value is
 * `undefined` are left out.
 *
 * @param env - Environment to list, `process.env` by default
 * @returns One `KEY=VALUE` entry per set variable
 */
export function environ(env: Record<string, string | undefined> = process.env): string[] {
    const pairs: string[] = [];
    for (const [key, value] of Object.entries(env)) {
        if (value !== undefined) {
            pairs.push(`${key}=${value}`);
        }
    }
    return pairs;
}

const UPPER = /\p{Lu}/u;
const LOWER = /\p{Ll}/u;
const LETTER = /\p{L}/u;
const DIGIT = /\p{Nd}/u;

const isUpper = (char: string | undefined): boolean => char !== undefined && UPPER.test(char);
const isLower = (char: string | undefined): boolean => char !== undefined && LOWER.test(char);
const isLetter = (char: string | undefined): boolean => char !== undefined && LETTER.test(char);
const isDigit = (char: string | undefined): boolean => char !== undefined && DIGIT.test(char);

/**
 * Whether an underscore belongs between `prev` and `cur`.
 */
function isBoundary(prev: string | undefined, cur: string, next: string | undefined): boolean {
    if (prev === undefined) {
        return false;
    }
    // Acronym followed by a word: JSONString -> JSON_STRING
    if (isUpper(cur) && isLower(next)) {
        return true;
    }
    if (isLower(prev) && isUpper(cur)) {
        return true;
    }
    return (isLetter(prev) && isDigit(cur)) || (isDigit(prev) && isLetter(cur));
}

/**
 * Convert a field identifier to its SCREAMING_SNAKE_CASE variable name
 *
 * Examples:
 *   fooBar -> FOO_BAR
 *   JSONString -> JSON_STRING
 *   fooJSON -> FOO_JSON
 *   JSON1String -> JSON_1_STRING
 *   ttlSeconds -> TTL_SECONDS
 *
 * Already-converted names are returned unchanged.
 *
 * @param identifier - The field identifier to convert
 * @returns The derived environment variable name
 */
export function toScreamingSnakeCase(identifier: string): string {
    if (!identifier) {
        return '';
    }

    const chars = Array.from(identifier);
    let result = '';

    chars.forEach((cur, i) => {
        const prev = chars[i - 1];
        const next = chars[i + 1];
        const separate = cur === '_' || isBoundary(prev, cur, next);

        if (separate && result !== '' && !result.endsWith('_')) {
            result += '_';
        }
        if (cur !== '_') {
            result += cur.toUpperCase();
        }
    });

    return result;
}

/**
 * Alias of {@link toScreamingSnakeCase} under the name used throughout the walker.
 */
export const deriveName = toScreamingSnakeCase;

/**
 * Generate the variable name of a field that carries no explicit name
 *
 * Examples:
 *   ('', 'signingKey') -> 'SIGNING_KEY'
 *   ('AUTH_', 'maxAge') -> 'AUTH_MAX_AGE'
 *
 * @param prefix - Accumulated prefix, already ending in `_` when non-empty
 * @param identifier - The field identifier
 * @returns Full environment variable name
 */
export function generateEnvVarName(prefix: string, identifier: string): string {
    return `${prefix}${toScreamingSnakeCase(identifier)}`;
}

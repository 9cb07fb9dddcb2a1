/**
 * Type guard to check if a value is a plain object (not array, null, or other types).
 *
 * @param value - The value to check
 * @returns True if the value is a plain object
 */
export const isPlainObject = (value: unknown): value is Record<string, unknown> => {
    // Check if it's an object, not null, and not an array.
    return value !== null && typeof value === 'object' && !Array.isArray(value);
};

/**
 * Normalizes a thrown value to an Error instance.
 *
 * @param thrown - Whatever was caught
 * @returns `thrown` itself when it is an Error, otherwise an Error carrying its string form
 */
export const toError = (thrown: unknown): Error => {
    return thrown instanceof Error ? thrown : new Error(String(thrown));
};

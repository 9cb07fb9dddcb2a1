import type { Logger } from './types';

/** The program name used in log and error messages */
export const PROGRAM_NAME = 'envshape';

/** Explicit tag name that excludes a field from unmarshalling */
export const SKIP_TAG = '-';

/** Escape accepted inside `default=` values, standing for a single space */
export const SPACE_ESCAPE = '\\s';

/** Prefix of field identifiers that are never bound */
export const UNEXPORTED_PREFIX = '_';

/**
 * Default logger implementation using console methods.
 * Provides basic logging functionality when no custom logger is specified.
 * The verbose and silly methods are no-ops to avoid excessive output.
 */
export const DEFAULT_LOGGER: Logger = {
    // eslint-disable-next-line no-console
    debug: console.debug,
    // eslint-disable-next-line no-console
    info: console.info,
    // eslint-disable-next-line no-console
    warn: console.warn,
    // eslint-disable-next-line no-console
    error: console.error,

    verbose: () => { },

    silly: () => { },
}

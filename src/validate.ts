import { z } from 'zod';
import { PROGRAM_NAME } from './constants';
import { OptionsValidationError } from './env/errors';
import type { Logger, UnmarshalOptions } from './types';

const LOGGER_METHODS = ['debug', 'info', 'warn', 'error', 'verbose', 'silly'] as const;

const isLogger = (value: unknown): value is Logger =>
    typeof value === 'object'
    && value !== null
    && LOGGER_METHODS.every(method => method in value && typeof Reflect.get(value, method) === 'function');

/**
 * Schema for the options accepted by the unmarshal entry points.
 */
export const UnmarshalOptionsSchema = z.object({
    prefix: z.string()
        .refine(prefix => !prefix.includes('='), { message: 'Prefix must not contain "="' })
        .optional(),
    logger: z.custom<Logger>(isLogger, { message: 'Logger must implement debug, info, warn, error, verbose and silly' })
        .optional(),
    env: z.record(z.string().optional()).optional(),
});

/**
 * Validates entry point options.
 *
 * @param options - Options as received from the caller
 * @returns The same options, typed
 * @throws OptionsValidationError if any option is invalid
 */
export const validateOptions = <T extends UnmarshalOptions>(options: T): T => {
    const result = UnmarshalOptionsSchema.safeParse(options);

    if (!result.success) {
        throw new OptionsValidationError(`Invalid ${PROGRAM_NAME} options`, result.error);
    }

    return options;
}

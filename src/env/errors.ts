import type { z } from 'zod';

/**
 * Error thrown when a raw value cannot be converted to the field's type
 */
export class ValueParseError extends Error {
    constructor(
        message: string,
        public readonly value: string,
        public readonly expectedType: string
    ) {
        super(message);
        this.name = 'ValueParseError';
        Object.setPrototypeOf(this, ValueParseError.prototype);
    }
}

/**
 * Error thrown when a field's declared type has no conversion, no custom
 * unmarshaler and is not a record
 */
export class UnsupportedTypeError extends Error {
    constructor(public readonly typeName: string) {
        super(`unsupported field type ${typeName}`);
        this.name = 'UnsupportedTypeError';
        Object.setPrototypeOf(this, UnsupportedTypeError.prototype);
    }
}

/**
 * Error thrown when a required field has neither a value nor a default
 */
export class MissingValueError extends Error {
    constructor() {
        super('required value is not set');
        this.name = 'MissingValueError';
        Object.setPrototypeOf(this, MissingValueError.prototype);
    }
}

/**
 * Error thrown when a JSON value does not match its schema
 */
export class JsonValidationError extends Error {
    constructor(
        message: string,
        public readonly zodError: z.ZodError
    ) {
        super(message);
        this.name = 'JsonValidationError';
        Object.setPrototypeOf(this, JsonValidationError.prototype);
    }
}

/**
 * Wraps any failure to populate a single field, naming the field path and
 * the environment variable it maps to.
 *
 * @example
 * ```typescript
 * try {
 *   unmarshal(environ(), settings, Settings);
 * } catch (error) {
 *   if (error instanceof FieldParseError) {
 *     console.error(error.field, error.envVar, error.cause);
 *   }
 * }
 * ```
 */
export class FieldParseError extends Error {
    declare readonly cause: Error;

    constructor(
        cause: Error,
        public readonly field: string,
        public readonly envVar: string
    ) {
        super(
            `failed to unmarshal environment variable "${envVar}" into field "${field}": ${cause.message}`,
            { cause }
        );
        this.name = 'FieldParseError';
        Object.setPrototypeOf(this, FieldParseError.prototype);
    }
}

/**
 * Error thrown when the target is not an object or the schema is not a record
 */
export class InvalidTargetError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidTargetError';
        Object.setPrototypeOf(this, InvalidTargetError.prototype);
    }
}

/**
 * Error thrown when options passed to an entry point fail validation
 */
export class OptionsValidationError extends Error {
    constructor(
        message: string,
        public readonly zodError: z.ZodError
    ) {
        super(message);
        this.name = 'OptionsValidationError';
        Object.setPrototypeOf(this, OptionsValidationError.prototype);
    }

    /**
     * Returns the message followed by one line per validation issue.
     */
    public getDetailedMessage(): string {
        const issues = this.zodError.issues
            .map(issue => {
                const path = issue.path.join('.');
                return `  - ${path || 'root'}: ${issue.message}`;
            })
            .join('\n');

        return `${this.message}\n\nValidation errors:\n${issues}`;
    }
}

/**
 * Logger interface for envshape's internal logging.
 * Compatible with popular logging libraries like Winston, Bunyan, etc.
 */
export interface Logger {
    /** Debug-level logging for detailed troubleshooting information */
    debug: (message: string, ...args: unknown[]) => void;
    /** Info-level logging for general information */
    info: (message: string, ...args: unknown[]) => void;
    /** Warning-level logging for non-critical issues */
    warn: (message: string, ...args: unknown[]) => void;
    /** Error-level logging for critical problems */
    error: (message: string, ...args: unknown[]) => void;
    /** Verbose-level logging for extensive detail */
    verbose: (message: string, ...args: unknown[]) => void;
    /** Silly-level logging for maximum detail */
    silly: (message: string, ...args: unknown[]) => void;
}

/**
 * Options accepted by `unmarshal` and `unmarshalWithPrefix`.
 */
export interface UnmarshalOptions {
    /** Prepended to every derived (non-explicit) top-level variable name */
    prefix?: string;
    /** Logger instance for tracing field resolution */
    logger?: Logger;
}

/**
 * Options accepted by `load`.
 */
export interface LoadOptions extends UnmarshalOptions {
    /** Environment to read from. Defaults to `process.env`. */
    env?: Record<string, string | undefined>;
}

/**
 * Directives parsed from a field's `env` tag.
 */
export interface TagDirectives {
    /** Overrides the derived variable name. `-` skips the field. */
    explicitName?: string;
    /** Used when the variable is absent */
    defaultValue?: string;
    /** Fail when the variable is absent and there is no default */
    required: boolean;
}

/**
 * Per-field resolution state threaded through the walker.
 */
export interface ResolvedBinding {
    /** Dotted path of the field, e.g. `auth.signingKey` */
    fieldPath: string;
    /** Environment variable the field maps to, e.g. `AUTH_SIGNING_KEY` */
    envVarName: string;
    /** Raw value from the environment or the default, if any */
    rawValue?: string;
}

/**
 * Static description of a leaf field binding, as listed by `describeBindings`.
 */
export interface BindingDescription {
    fieldPath: string;
    envVarName: string;
    /** Declared type of the field, e.g. `uint16` or `*bool` */
    typeName: string;
    required: boolean;
    defaultValue?: string;
}

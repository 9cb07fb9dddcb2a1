import type { LoadOptions, UnmarshalOptions } from '../types';
import { DEFAULT_LOGGER } from '../constants';
import { type InferShape, RecordType, type Shape } from '../schema/descriptors';
import { isPlainObject } from '../util/objects';
import { validateOptions } from '../validate';
import { InvalidTargetError } from './errors';
import { environ, parseEnv } from './reader';
import { walkRecord } from './walker';

/**
 * Populate `target` from `KEY=VALUE` strings
 *
 * This is the main entry point. `target` is mutated in place: every exported
 * field of `schema` is resolved to a variable name, looked up in `pairs` and
 * converted. Fields without a value (and without a default) keep whatever
 * `target` already holds.
 *
 * Throws InvalidTargetError if `target` is not an object or `schema` is not a
 * record schema; nothing is processed in that case.
 * Throws FieldParseError for the first field that cannot be populated.
 *
 * @example
 * ```typescript
 * const Settings = t.record({
 *   url: t.string(),
 *   auth: t.record({ signingKey: t.string(), ttlSeconds: t.uint() }),
 * });
 *
 * const settings = Settings.zero();
 * unmarshal(['URL=https://example.com', 'AUTH_TTL_SECONDS=60'], settings, Settings);
 * // settings.auth.ttlSeconds === 60
 * ```
 *
 * @param pairs - Entries in `KEY=VALUE` form, typically `environ()`
 * @param target - Object receiving the values
 * @param schema - Record schema describing `target`
 * @param options - Derived-name prefix and logger
 * @returns `target`
 */
export function unmarshal<S extends Shape>(
    pairs: Iterable<string>,
    target: InferShape<S>,
    schema: RecordType<S>,
    options: UnmarshalOptions = {}
): InferShape<S> {
    const out: unknown = target;
    if (!isPlainObject(out)) {
        throw new InvalidTargetError('target must be a non-null object');
    }
    if (!(schema instanceof RecordType)) {
        throw new InvalidTargetError('schema must be a record schema built with t.record()');
    }

    const { prefix = '', logger = DEFAULT_LOGGER } = validateOptions(options);
    const variables = parseEnv(pairs, logger);

    logger.verbose(`Unmarshalling ${variables.size} environment variables into ${schema.typeName}`);
    walkRecord(out, schema, { variables, logger }, '', prefix);

    return target;
}

/**
 * Same as {@link unmarshal}, with `prefix` prepended to every derived
 * top-level variable name. Explicit tag names are used as they are.
 *
 * @example
 * ```typescript
 * unmarshalWithPrefix(['APP_PORT=8080'], settings, Settings, 'APP_');
 * ```
 */
export function unmarshalWithPrefix<S extends Shape>(
    pairs: Iterable<string>,
    target: InferShape<S>,
    schema: RecordType<S>,
    prefix: string,
    options: Omit<UnmarshalOptions, 'prefix'> = {}
): InferShape<S> {
    return unmarshal(pairs, target, schema, { ...options, prefix });
}

/**
 * Create a record from the environment
 *
 * Starts from the schema's zero value and populates it from `options.env`,
 * or from `process.env` when no environment is given.
 *
 * @param schema - Record schema
 * @param options - Environment, derived-name prefix and logger
 * @returns The populated record
 */
export function load<S extends Shape>(schema: RecordType<S>, options: LoadOptions = {}): InferShape<S> {
    const { env = process.env, ...unmarshalOptions } = validateOptions(options);
    return unmarshal(environ(env), schema.zero(), schema, unmarshalOptions);
}

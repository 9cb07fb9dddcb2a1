import type { Logger, ResolvedBinding, TagDirectives } from '../types';
import { type FieldDescriptor, RecordType, type Shape } from '../schema/descriptors';
import { isPlainObject, toError } from '../util/objects';
import { FieldParseError, MissingValueError } from './errors';
import { generateEnvVarName } from './naming';
import { coerceValue } from './parser';
import { isSkipped, parseTag } from './tag';
import { dispatchUnmarshal, findUnmarshalerType } from './unmarshaler';

/**
 * State shared by every level of one walk.
 */
export interface WalkContext {
    /** Variable mapping, read-only for the whole walk */
    variables: ReadonlyMap<string, string>;
    logger: Logger;
}

/**
 * Populate the fields of `target` described by `schema`
 *
 * Fields are processed in declaration order. For each exported field:
 *
 * 1. A tag name of `-` skips the field.
 * 2. The variable name is the tag's explicit name, or the derived name
 *    appended to `envVarPrefix`.
 * 3. Nested records are walked with `<fieldPath>.` and `<envVarName>_` as
 *    prefixes, whether or not anything is set under that prefix.
 * 4. Other fields take the variable's value, or the tag's default. Without
 *    either, a `required` field fails and any other field is left untouched.
 * 5. Fields with an unmarshaler behind any pointer levels hand the value to it;
 *    every other field has it coerced to its declared type.
 *
 * The first failure aborts the walk. It is thrown as a {@link FieldParseError}
 * and is not wrapped again by enclosing records.
 *
 * @param target - Object receiving the values, mutated in place
 * @param schema - Record schema describing `target`
 * @param context - Variable mapping and logger
 * @param fieldPathPrefix - Dotted path of the enclosing record, ending in `.` when non-empty
 * @param envVarPrefix - Variable name prefix, ending in `_` when non-empty
 */
export function walkRecord<S extends Shape>(
    target: Record<string, unknown>,
    schema: RecordType<S>,
    context: WalkContext,
    fieldPathPrefix = '',
    envVarPrefix = ''
): void {
    for (const field of schema.fields()) {
        if (!field.exported) {
            context.logger.silly(`Skipping unexported field ${fieldPathPrefix}${field.identifier}`);
            continue;
        }

        processField(target, field, context, fieldPathPrefix, envVarPrefix);
    }
}

function processField(
    target: Record<string, unknown>,
    field: FieldDescriptor,
    context: WalkContext,
    fieldPathPrefix: string,
    envVarPrefix: string
): void {
    const { logger } = context;
    const directives = parseTag(field.tag);
    const fieldPath = `${fieldPathPrefix}${field.identifier}`;

    if (isSkipped(directives)) {
        logger.verbose(`Skipping field ${fieldPath}: tagged "-"`);
        return;
    }

    const envVarName = directives.explicitName ?? generateEnvVarName(envVarPrefix, field.identifier);

    if (field.type instanceof RecordType) {
        if (directives.required || directives.defaultValue !== undefined) {
            logger.warn(`Ignoring required/default directives on record field ${fieldPath}`);
        }
        const nested = materializeRecord(target, field.identifier, field.type);
        walkRecord(nested, field.type, context, `${fieldPath}.`, `${envVarName}_`);
        return;
    }

    const binding = resolveBinding(fieldPath, envVarName, directives, context);
    if (binding.rawValue === undefined) {
        if (directives.required) {
            throw new FieldParseError(new MissingValueError(), fieldPath, envVarName);
        }
        logger.verbose(`No value for ${fieldPath} (${envVarName}); leaving it unset`);
        return;
    }

    const unmarshalerType = findUnmarshalerType(field.type);
    try {
        target[field.identifier] = unmarshalerType
            ? dispatchUnmarshal(target[field.identifier], unmarshalerType, binding.rawValue)
            : coerceValue(binding.rawValue, field.type);
    } catch (error) {
        throw new FieldParseError(toError(error), fieldPath, envVarName);
    }

    logger.verbose(`Set ${fieldPath} from ${envVarName}`);
}

/**
 * Look up the field's variable, falling back to the tag's default.
 */
function resolveBinding(
    fieldPath: string,
    envVarName: string,
    directives: TagDirectives,
    context: WalkContext
): ResolvedBinding {
    const rawValue = context.variables.get(envVarName);
    if (rawValue !== undefined) {
        return { fieldPath, envVarName, rawValue };
    }

    if (directives.defaultValue !== undefined) {
        context.logger.silly(`Using default value for ${fieldPath} (${envVarName})`);
        return { fieldPath, envVarName, rawValue: directives.defaultValue };
    }

    return { fieldPath, envVarName };
}

/**
 * Returns the nested record object held by `target[key]`, creating it from the
 * schema's zero value when it is missing.
 */
function materializeRecord<S extends Shape>(
    target: Record<string, unknown>,
    key: string,
    schema: RecordType<S>
): Record<string, unknown> {
    const current = target[key];
    if (isPlainObject(current)) {
        return current;
    }

    const created = schema.zeroEntries();
    target[key] = created;
    return created;
}

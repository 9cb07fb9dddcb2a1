import type { BindingDescription } from '../types';
import { RecordType, type Shape } from '../schema/descriptors';
import { generateEnvVarName } from './naming';
import { isSkipped, parseTag } from './tag';

/**
 * List the variable bindings a record schema produces
 *
 * Applies the same naming rules as `unmarshal` without reading any
 * environment, so a configuration surface can be documented or checked.
 * Nested records are listed through their leaf fields. Skipped (`-`) and
 * unexported fields are left out.
 *
 * Example:
 *   schema = t.record({ url: t.string(), auth: t.record({ maxAge: t.uint() }).env('AUTH') })
 *   describeBindings(schema) => [
 *     { fieldPath: 'url', envVarName: 'URL', typeName: 'string', required: false },
 *     { fieldPath: 'auth.maxAge', envVarName: 'AUTH_MAX_AGE', typeName: 'uint', required: false },
 *   ]
 *
 * @param schema - Record schema
 * @param prefix - Prepended to derived top-level names, as with `unmarshalWithPrefix`
 * @returns One description per leaf field, in declaration order
 */
export function describeBindings<S extends Shape>(schema: RecordType<S>, prefix = ''): BindingDescription[] {
    return collectBindings(schema, '', prefix);
}

function collectBindings<S extends Shape>(
    schema: RecordType<S>,
    fieldPathPrefix: string,
    envVarPrefix: string
): BindingDescription[] {
    const bindings: BindingDescription[] = [];

    for (const field of schema.fields()) {
        const directives = parseTag(field.tag);
        if (!field.exported || isSkipped(directives)) {
            continue;
        }

        const fieldPath = `${fieldPathPrefix}${field.identifier}`;
        const envVarName = directives.explicitName ?? generateEnvVarName(envVarPrefix, field.identifier);

        if (field.type instanceof RecordType) {
            bindings.push(...collectBindings(field.type, `${fieldPath}.`, `${envVarName}_`));
            continue;
        }

        const binding: BindingDescription = {
            fieldPath,
            envVarName,
            typeName: field.type.typeName,
            required: directives.required,
        };
        if (directives.defaultValue !== undefined) {
            binding.defaultValue = directives.defaultValue;
        }
        bindings.push(binding);
    }

    return bindings;
}

import { type EnvType, UnmarshalerType, unwrapPointers } from '../schema/descriptors';

/**
 * Capability of types that convert a raw environment value themselves.
 * Throwing from `unmarshalEnv` reports a conversion failure for the field.
 *
 * @example
 * ```typescript
 * class IdList implements EnvUnmarshaler {
 *   ids: string[] = [];
 *   unmarshalEnv(value: string): void {
 *     this.ids = value.split(',');
 *   }
 * }
 *
 * const Settings = t.record({ validIds: t.unmarshaler(() => new IdList()) });
 * ```
 */
export interface EnvUnmarshaler {
    unmarshalEnv(value: string): void;
}

/**
 * Type guard for values implementing {@link EnvUnmarshaler}.
 */
export function isEnvUnmarshaler(value: unknown): value is EnvUnmarshaler {
    return typeof value === 'object'
        && value !== null
        && 'unmarshalEnv' in value
        && typeof value.unmarshalEnv === 'function';
}

/**
 * Returns the unmarshaler type behind any number of pointer levels, or
 * `undefined` when the field has no unmarshal capability.
 */
export function findUnmarshalerType(type: EnvType<unknown>): UnmarshalerType<EnvUnmarshaler> | undefined {
    const inner = unwrapPointers(type);
    return inner instanceof UnmarshalerType ? inner : undefined;
}

/**
 * Run the field's unmarshaler on `value`
 *
 * The instance the field already holds is reused when it implements the
 * capability. Otherwise a fresh instance is created, standing in for every
 * pointer level between the field and the unmarshaler. The returned instance
 * is what the field must hold afterwards.
 *
 * @param current - Current value of the field
 * @param type - Unmarshaler type found behind the field's pointers
 * @param value - Raw value to convert
 * @returns The instance that consumed `value`
 */
export function dispatchUnmarshal(
    current: unknown,
    type: UnmarshalerType<EnvUnmarshaler>,
    value: string
): EnvUnmarshaler {
    const target = isEnvUnmarshaler(current) ? current : type.create();
    target.unmarshalEnv(value);
    return target;
}

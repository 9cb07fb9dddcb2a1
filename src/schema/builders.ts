import type { z } from 'zod';
import type { EnvUnmarshaler } from '../env/unmarshaler';
import { JsonValue } from '../env/json';
import {
    ArrayType,
    type EnvType,
    MapType,
    OpaqueType,
    PointerType,
    PrimitiveType,
    RecordType,
    type Shape,
    UnmarshalerType,
} from './descriptors';

export interface RecordOptions {
    /** Name reported for the record in error messages and binding listings */
    name?: string;
}

/**
 * Builders for runtime type descriptions.
 *
 * @example
 * ```typescript
 * const Settings = t.record({
 *   url: t.string(),
 *   deleteUser: t.pointer(t.bool()),
 *   name: t.string().env(',required default=John\\sDoe'),
 *   auth: t.record({
 *     signingKey: t.string(),
 *     ttlSeconds: t.uint().env('JWT_TTL'),
 *   }).env('AUTH'),
 * });
 * ```
 */
export const t = {
    string: () => new PrimitiveType('string'),
    bool: () => new PrimitiveType('bool'),
    int: () => new PrimitiveType('int'),
    int8: () => new PrimitiveType('int8'),
    int16: () => new PrimitiveType('int16'),
    int32: () => new PrimitiveType('int32'),
    int64: () => new PrimitiveType('int64'),
    uint: () => new PrimitiveType('uint'),
    uint8: () => new PrimitiveType('uint8'),
    uint16: () => new PrimitiveType('uint16'),
    uint32: () => new PrimitiveType('uint32'),
    uint64: () => new PrimitiveType('uint64'),
    float32: () => new PrimitiveType('float32'),
    float64: () => new PrimitiveType('float64'),

    /** UTF-8 bytes of the raw value */
    bytes: () => new ArrayType(new PrimitiveType('uint8')),
    /** Unicode code points of the raw value */
    runes: () => new ArrayType(new PrimitiveType('int32')),

    array: <E extends EnvType<unknown>>(element: E) => new ArrayType(element),
    map: <V extends EnvType<unknown>>(value: V) => new MapType(value),
    opaque: <T>(typeName: string) => new OpaqueType<T>(typeName),
    pointer: <I extends EnvType<unknown>>(inner: I) => new PointerType(inner),

    record: <S extends Shape>(shape: S, options: RecordOptions = {}) => new RecordType(shape, options.name),

    unmarshaler: <U extends EnvUnmarshaler>(create: () => U, typeName?: string) =>
        new UnmarshalerType(create, typeName),

    /** A {@link JsonValue} validated against `schema` */
    json: <T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>) =>
        new UnmarshalerType(() => new JsonValue(schema), 'json'),
};

import yn from 'yn';
import {
    ArrayType,
    type EnvType,
    PointerType,
    type PrimitiveKind,
    PrimitiveType,
    type PrimitiveValues,
} from '../schema/descriptors';
import { UnsupportedTypeError, ValueParseError } from './errors';

type IntegerKind = Exclude<PrimitiveKind, 'string' | 'bool' | 'float32' | 'float64'>;

interface IntegerBounds {
    readonly min: bigint;
    readonly max: bigint;
}

const SAFE_MIN = BigInt(Number.MIN_SAFE_INTEGER);
const SAFE_MAX = BigInt(Number.MAX_SAFE_INTEGER);

const INTEGER_BOUNDS: { readonly [K in IntegerKind]: IntegerBounds } = {
    int: { min: SAFE_MIN, max: SAFE_MAX },
    int8: { min: -(2n ** 7n), max: 2n ** 7n - 1n },
    int16: { min: -(2n ** 15n), max: 2n ** 15n - 1n },
    int32: { min: -(2n ** 31n), max: 2n ** 31n - 1n },
    int64: { min: -(2n ** 63n), max: 2n ** 63n - 1n },
    uint: { min: 0n, max: SAFE_MAX },
    uint8: { min: 0n, max: 2n ** 8n - 1n },
    uint16: { min: 0n, max: 2n ** 16n - 1n },
    uint32: { min: 0n, max: 2n ** 32n - 1n },
    uint64: { min: 0n, max: 2n ** 64n - 1n },
};

const SIGNED_INTEGER = /^[+-]?\d+$/;
const UNSIGNED_INTEGER = /^\d+$/;
const DECIMAL_FLOAT = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const INFINITY = /^[+-]?inf(inity)?$/i;
const NOT_A_NUMBER = /^nan$/i;

/**
 * Parse boolean from various string formats
 *
 * Uses the 'yn' library, which accepts (case-insensitive, surrounding
 * whitespace trimmed):
 * - true/false
 * - t/f
 * - yes/no
 * - y/n
 * - 1/0
 * - on/off
 *
 * Numeric kinds do not trim: `" 42"` fails as an integer.
 *
 * @param value - String value to parse
 * @returns Boolean value
 * @throws ValueParseError if value cannot be parsed as boolean, including the empty string
 */
export function parseBoolean(value: string): boolean {
    const result = yn(value);

    if (result === undefined) {
        throw new ValueParseError(
            `Cannot parse "${value}" as boolean. Expected: true/false, t/f, yes/no, y/n, 1/0 or on/off`,
            value,
            'bool'
        );
    }

    return result;
}

/**
 * Parse a base-10 integer and check it fits the declared width
 *
 * A leading `+` or `-` is accepted for signed kinds only. Values outside the
 * width's range are rejected, never truncated.
 *
 * @param value - String value to parse
 * @param kind - Declared integer kind
 * @returns The integer as a bigint
 * @throws ValueParseError on bad syntax or an out-of-range value
 */
export function parseInteger(value: string, kind: IntegerKind): bigint {
    const { min, max } = INTEGER_BOUNDS[kind];
    const pattern = min < 0n ? SIGNED_INTEGER : UNSIGNED_INTEGER;

    if (!pattern.test(value)) {
        throw new ValueParseError(`Cannot parse "${value}" as ${kind}`, value, kind);
    }

    const parsed = BigInt(value);
    if (parsed < min || parsed > max) {
        throw new ValueParseError(`Value "${value}" is out of range for ${kind}`, value, kind);
    }

    return parsed;
}

/**
 * Parse a floating-point number for the declared width
 *
 * Supports:
 * - Integers and decimals: 42, -10, 3.14, .5
 * - Scientific notation: 1e6, 1.5e3, 2e-3
 * - Inf, +Inf, -Infinity and NaN (case-insensitive)
 *
 * Finite input that overflows the width is rejected. `float32` results are
 * rounded to single precision.
 *
 * @param value - String value to parse
 * @param kind - `float32` or `float64`
 * @returns Number value
 * @throws ValueParseError if value cannot be parsed or overflows
 */
export function parseFloatValue(value: string, kind: 'float32' | 'float64'): number {
    if (NOT_A_NUMBER.test(value)) {
        return NaN;
    }
    if (INFINITY.test(value)) {
        return value.startsWith('-') ? -Infinity : Infinity;
    }
    if (!DECIMAL_FLOAT.test(value)) {
        throw new ValueParseError(`Cannot parse "${value}" as ${kind}`, value, kind);
    }

    const parsed = kind === 'float32' ? Math.fround(Number(value)) : Number(value);
    if (!Number.isFinite(parsed)) {
        throw new ValueParseError(`Value "${value}" is out of range for ${kind}`, value, kind);
    }

    return parsed;
}

const toNumber = (kind: IntegerKind) => (value: string): number => Number(parseInteger(value, kind));

/**
 * Conversion function for every primitive kind. Built once, never mutated.
 */
export const COERCERS: { readonly [K in PrimitiveKind]: (value: string) => PrimitiveValues[K] } = Object.freeze({
    string: (value: string) => value,
    bool: parseBoolean,
    int: toNumber('int'),
    int8: toNumber('int8'),
    int16: toNumber('int16'),
    int32: toNumber('int32'),
    int64: (value: string) => parseInteger(value, 'int64'),
    uint: toNumber('uint'),
    uint8: toNumber('uint8'),
    uint16: toNumber('uint16'),
    uint32: toNumber('uint32'),
    uint64: (value: string) => parseInteger(value, 'uint64'),
    float32: (value: string) => parseFloatValue(value, 'float32'),
    float64: (value: string) => parseFloatValue(value, 'float64'),
});

/**
 * Decompose a string into its UTF-8 bytes
 */
export function toBytes(value: string): number[] {
    return Array.from(Buffer.from(value, 'utf8'));
}

/**
 * Decompose a string into its Unicode code points
 */
export function toCodePoints(value: string): number[] {
    const points: number[] = [];
    for (const char of value) {
        const point = char.codePointAt(0);
        if (point !== undefined) {
            points.push(point);
        }
    }
    return points;
}

const SEQUENCE_DECOMPOSERS: Partial<Record<PrimitiveKind, (value: string) => number[]>> = Object.freeze({
    uint8: toBytes,
    int32: toCodePoints,
});

/**
 * Convert a raw value to the value a field of `type` holds
 *
 * Primitive kinds go through {@link COERCERS}. Byte (`[]uint8`) and code
 * point (`[]int32`) sequences are decomposed from the whole raw value. One
 * pointer level is unwrapped; the returned value is assigned to the field
 * directly.
 *
 * @param value - Raw string value
 * @param type - Declared type of the field
 * @returns Converted value
 * @throws UnsupportedTypeError if the (unwrapped) type has no conversion
 * @throws ValueParseError if the value does not parse
 */
export function coerceValue(value: string, type: EnvType<unknown>): unknown {
    const target: EnvType<unknown> = type instanceof PointerType ? type.inner : type;

    if (target instanceof PrimitiveType) {
        const kind: PrimitiveKind = target.kind;
        return COERCERS[kind](value);
    }

    if (target instanceof ArrayType && target.element instanceof PrimitiveType) {
        const elementKind: PrimitiveKind = target.element.kind;
        const decompose = SEQUENCE_DECOMPOSERS[elementKind];
        if (decompose) {
            return decompose(value);
        }
    }

    throw new UnsupportedTypeError(target.typeName);
}

import type { EnvUnmarshaler } from '../env/unmarshaler';
import { UNEXPORTED_PREFIX } from '../constants';

/**
 * Primitive kinds the value coercer knows how to produce.
 */
export type PrimitiveKind =
    | 'string'
    | 'bool'
    | 'int'
    | 'int8'
    | 'int16'
    | 'int32'
    | 'int64'
    | 'uint'
    | 'uint8'
    | 'uint16'
    | 'uint32'
    | 'uint64'
    | 'float32'
    | 'float64';

/**
 * Runtime value carried by each primitive kind. The 64-bit integer widths
 * exceed the safe-integer range and are carried as `bigint`.
 */
export interface PrimitiveValues {
    string: string;
    bool: boolean;
    int: number;
    int8: number;
    int16: number;
    int32: number;
    int64: bigint;
    uint: number;
    uint8: number;
    uint16: number;
    uint32: number;
    uint64: bigint;
    float32: number;
    float64: number;
}

const PRIMITIVE_ZEROS: { readonly [K in PrimitiveKind]: PrimitiveValues[K] } = {
    string: '',
    bool: false,
    int: 0,
    int8: 0,
    int16: 0,
    int32: 0,
    int64: 0n,
    uint: 0,
    uint8: 0,
    uint16: 0,
    uint32: 0,
    uint64: 0n,
    float32: 0,
    float64: 0,
};

/**
 * Base of every runtime type description. `T` is the value a field of this
 * type holds once unmarshalled.
 */
export abstract class EnvType<T> {
    declare readonly _value: T;

    /** Declared type name, used in error messages and binding listings */
    abstract readonly typeName: string;

    /** Value a field of this type holds before anything is assigned */
    abstract zero(): T;

    /**
     * Attaches an `env` tag to this type, e.g. `'AUTH'`, `',required'` or
     * `',default=John\\sDoe'`.
     */
    env(tag: string): TaggedField<T> {
        return new TaggedField(this, tag);
    }
}

/**
 * A type paired with the raw text of its `env` tag.
 */
export class TaggedField<T> {
    constructor(
        public readonly type: EnvType<T>,
        public readonly tag: string
    ) { }
}

export type ShapeEntry = EnvType<unknown> | TaggedField<unknown>;

export type Shape = { readonly [identifier: string]: ShapeEntry };

export type FieldValue<F> = F extends TaggedField<infer T>
    ? T
    : F extends EnvType<infer T>
        ? T
        : never;

export type InferShape<S extends Shape> = {
    -readonly [K in keyof S]: FieldValue<S[K]>;
};

/**
 * Static type of the values described by `T`.
 *
 * @example
 * ```typescript
 * const Settings = t.record({ url: t.string(), port: t.uint16() });
 * type Settings = Infer<typeof Settings>; // { url: string; port: number }
 * ```
 */
export type Infer<T extends EnvType<unknown>> = T['_value'];

/**
 * The per-field view the walker operates on.
 */
export interface FieldDescriptor {
    readonly identifier: string;
    readonly type: EnvType<unknown>;
    /** Raw tag text, empty when the field is untagged */
    readonly tag: string;
    readonly exported: boolean;
}

export class PrimitiveType<K extends PrimitiveKind> extends EnvType<PrimitiveValues[K]> {
    readonly typeName: string;

    constructor(public readonly kind: K) {
        super();
        this.typeName = kind;
    }

    zero(): PrimitiveValues[K] {
        return PRIMITIVE_ZEROS[this.kind];
    }
}

/**
 * Sequence type. Only byte (`uint8`) and code point (`int32`) elements can be
 * populated; the raw value is decomposed rather than split.
 */
export class ArrayType<E extends EnvType<unknown>> extends EnvType<Array<Infer<E>>> {
    readonly typeName: string;

    constructor(public readonly element: E) {
        super();
        this.typeName = `[]${element.typeName}`;
    }

    zero(): Array<Infer<E>> {
        return [];
    }
}

export class MapType<V extends EnvType<unknown>> extends EnvType<Record<string, Infer<V>>> {
    readonly typeName: string;

    constructor(public readonly value: V) {
        super();
        this.typeName = `map[string]${value.typeName}`;
    }

    zero(): Record<string, Infer<V>> {
        return {};
    }
}

/**
 * A field of a type envshape cannot populate (a callback, a socket, a
 * channel). Declaring it lets the record carry the field; it must be tagged
 * `-` or left unset.
 */
export class OpaqueType<T> extends EnvType<T | undefined> {
    constructor(public readonly typeName: string) {
        super();
    }

    zero(): T | undefined {
        return undefined;
    }
}

/**
 * Optional indirection. The field holds `undefined` until a value is resolved.
 */
export class PointerType<I extends EnvType<unknown>> extends EnvType<Infer<I> | undefined> {
    readonly typeName: string;

    constructor(public readonly inner: I) {
        super();
        this.typeName = `*${inner.typeName}`;
    }

    zero(): Infer<I> | undefined {
        return undefined;
    }
}

/**
 * Type whose instances convert raw values themselves through
 * `EnvUnmarshaler.unmarshalEnv`.
 */
export class UnmarshalerType<U extends EnvUnmarshaler> extends EnvType<U> {
    constructor(
        public readonly create: () => U,
        public readonly typeName: string = 'unmarshaler'
    ) {
        super();
    }

    zero(): U {
        return this.create();
    }
}

export class RecordType<S extends Shape> extends EnvType<InferShape<S>> {
    readonly typeName: string;

    constructor(public readonly shape: S, name?: string) {
        super();
        this.typeName = name ?? 'record';
    }

    /** Fields in declaration order */
    fields(): FieldDescriptor[] {
        return Object.entries(this.shape).map(([identifier, entry]) => ({
            identifier,
            type: entry instanceof TaggedField ? entry.type : entry,
            tag: entry instanceof TaggedField ? entry.tag : '',
            exported: !identifier.startsWith(UNEXPORTED_PREFIX),
        }));
    }

    /** Zero value of every field, keyed by identifier */
    zeroEntries(): Record<string, unknown> {
        const out: Record<string, unknown> = {};
        for (const field of this.fields()) {
            out[field.identifier] = field.type.zero();
        }
        return out;
    }

    zero(): InferShape<S> {
        // Built field by field from the same shape InferShape<S> maps over.
        return this.zeroEntries() as InferShape<S>;
    }
}

/**
 * Removes every pointer level from `type`.
 */
export function unwrapPointers(type: EnvType<unknown>): EnvType<unknown> {
    let current = type;
    while (current instanceof PointerType) {
        current = current.inner;
    }
    return current;
}

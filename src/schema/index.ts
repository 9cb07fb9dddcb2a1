export { t } from './builders';
export type { RecordOptions } from './builders';

export {
    ArrayType,
    EnvType,
    MapType,
    OpaqueType,
    PointerType,
    PrimitiveType,
    RecordType,
    TaggedField,
    UnmarshalerType,
    unwrapPointers
} from './descriptors';

export type {
    FieldDescriptor,
    FieldValue,
    Infer,
    InferShape,
    PrimitiveKind,
    PrimitiveValues,
    Shape,
    ShapeEntry
} from './descriptors';

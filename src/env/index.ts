// Core functions
export {
    toScreamingSnakeCase,
    deriveName,
    generateEnvVarName
} from './naming';

export {
    parseTag,
    isSkipped
} from './tag';

export {
    COERCERS,
    coerceValue,
    parseBoolean,
    parseInteger,
    parseFloatValue,
    toBytes,
    toCodePoints
} from './parser';

export {
    isEnvUnmarshaler,
    findUnmarshalerType,
    dispatchUnmarshal
} from './unmarshaler';

export {
    parseEnv,
    environ
} from './reader';

export {
    walkRecord
} from './walker';

export {
    describeBindings
} from './describe';

export {
    JsonValue
} from './json';

// High-level API
export {
    unmarshal,
    unmarshalWithPrefix,
    load
} from './resolver';

// Errors
export {
    FieldParseError,
    InvalidTargetError,
    JsonValidationError,
    MissingValueError,
    OptionsValidationError,
    UnsupportedTypeError,
    ValueParseError
} from './errors';

// Types
export type {
    EnvUnmarshaler
} from './unmarshaler';

export type {
    WalkContext
} from './walker';

export * from './types';
export * from './env';
export * from './schema';
export { DEFAULT_LOGGER, SKIP_TAG } from './constants';
export { UnmarshalOptionsSchema, validateOptions } from './validate';

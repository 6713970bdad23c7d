export type { RawMessage, SourceManifest, FetchOptions, FetchResult, MessageSource } from './types.js';
export { defineSource } from './factory.js';
export { rawMessageSchema, validateRawMessage, validateRawMessages } from './schema.js';
export type { ValidatedRawMessage, ValidateRawMessagesOptions } from './schema.js';

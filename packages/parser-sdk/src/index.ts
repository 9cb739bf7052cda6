export type { RawJobRecord, JobRecord, ParserManifest, ParseResult, Parser } from './types.js';
export { jobRecordSchema, validateJobRecords, normalizeWhitespace } from './schema.js';
export type { ValidateJobRecordsOptions } from './schema.js';
export { defineParser } from './factory.js';

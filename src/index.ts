export { run } from './cli';
export type { CliIO } from './cli';
export { handleVersionHelp, parseConfig } from './config/joinConfig';
export * from './errors';
export { fieldAt, joinKey, parseColumnList, pickFields, placeholder, spliceFields } from './join/fields';
export { prefixHeader } from './join/header';
export { loadLookupTable, prepareLookup } from './join/lookupLoader';
export { joinLine, joinStream } from './join/streamJoiner';
export { createTsvParser, parseTsv, parseTsvStream } from './parsers/tsvParser';
export type { JoinConfig } from './types/config';
export type { JoinedLine, JoinKey, JoinStats, LookupResult, LookupTable, Row, RowCallback } from './types/tsv';

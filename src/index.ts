// Entry point for the long-cursor library
export { BaseLongCursor } from './cursor/baseCursor';
export { IndexedLongCursor } from './cursor/indexedCursor';
export { LinkedLongCursor } from './cursor/linkedCursor';
export * from './cursor/cursors';
export * from './cursor/traversal';
export * from './types';
export * from './errors';
export { INT64_MAX, INT64_MIN, isInt64, assertInt64 } from './util/int64';
export type { Logger, LogLevel, LogContext } from './cursor/logger';
export { getLogger, setLogLevel } from './cursor/logger';

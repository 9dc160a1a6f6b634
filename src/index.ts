// src/index.ts

export * from './constants/constants.js';
export * from './types/dbc-types.js';
export * from './errors.js';
export * from './entry.js';
export * from './parser/entry-parser.js';
export * from './codec/signal-codec.js';
export * from './records/signal-record.js';
export * from './records/frame-record.js';
export * from './library.js';
export * from './spn-view.js';
export { logger, Logger } from './logger.js';
export type { LogField, WatchCallback } from './logger.js';
export { toHex } from './utils/utils.js';

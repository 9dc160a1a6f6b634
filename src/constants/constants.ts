// src/constants/constants.ts

/**
 * Kinds of facts the tokenizer can extract from a single DBC line
 */
export enum EntryKind {
  VERSION = 'Version',
  BUS_CONFIGURATION = 'BusConfiguration',
  FRAME_DEFINITION = 'FrameDefinition',
  FRAME_DESCRIPTION = 'FrameDescription',
  FRAME_ATTRIBUTE = 'FrameAttribute',
  SIGNAL_DEFINITION = 'SignalDefinition',
  SIGNAL_DESCRIPTION = 'SignalDescription',
  SIGNAL_ATTRIBUTE = 'SignalAttribute',
  SIGNAL_VALUE_TABLE = 'SignalValueTable',
  UNKNOWN = 'Unknown',
}

/** Classic CAN payload size; decode reads at most this many bytes */
export const MAX_PAYLOAD_BYTES = 8;

/** Width of the word a payload is packed into */
export const PAYLOAD_WORD_BITS = 64;

/** Largest arbitration ID a frame may carry (unsigned 32-bit) */
export const MAX_FRAME_ID = 0xffffffff;

/** Well-known signal attribute keys */
export const SIGNAL_ATTRIBUTE_KEYS = {
  LONG_NAME: 'SystemSignalLongSymbol',
  SPN: 'SPN',
} as const;

/** Encodings a DBC file can be read with; all are single-byte safe for Latin-1 text */
export const DBC_ENCODINGS = ['latin1', 'ascii', 'utf8'] as const;

export type DbcEncoding = (typeof DBC_ENCODINGS)[number];

export const DEFAULT_ENCODING: DbcEncoding = 'latin1';

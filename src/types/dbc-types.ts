// src/types/dbc-types.ts

import { EntryKind } from '../constants/constants.js';
import type { DbcEncoding } from '../constants/constants.js';

// !=============================================================================
// ! Entries: facts extracted from one DBC line
// !=============================================================================

/** `VERSION "<version>"` */
export interface VersionEntry {
  kind: EntryKind.VERSION;
  version: string;
}

/** `BS_: <speed>` */
export interface BusConfigurationEntry {
  kind: EntryKind.BUS_CONFIGURATION;
  speed: number;
}

/** `BO_ <id> <name> : <length> <sender>` */
export interface FrameDefinitionEntry {
  kind: EntryKind.FRAME_DEFINITION;
  id: number;
  name: string;
  length: number;
  sender: string;
}

/** `CM_ BO_ <id> "<text>";` */
export interface FrameDescriptionEntry {
  kind: EntryKind.FRAME_DESCRIPTION;
  id: number;
  text: string;
}

/** `BA_ "<key>" BO_ <id> <value>;` */
export interface FrameAttributeEntry {
  kind: EntryKind.FRAME_ATTRIBUTE;
  id: number;
  key: string;
  value: string;
}

/** `SG_ <name> : <start>|<length>@<endian><sign> (<scale>,<offset>) [<min>|<max>] "<unit>" <receivers>` */
export interface SignalDefinitionEntry {
  kind: EntryKind.SIGNAL_DEFINITION;
  name: string;
  startBit: number;
  bitLength: number;
  littleEndian: boolean;
  signed: boolean;
  scale: number;
  offset: number;
  min: number;
  max: number;
  unit: string;
  receivers: string;
  /** Raw multiplex marker (`M` or `m<n>`); recorded only */
  multiplexer?: string;
}

/** `CM_ SG_ <id> <signal> "<text>";` */
export interface SignalDescriptionEntry {
  kind: EntryKind.SIGNAL_DESCRIPTION;
  id: number;
  signalName: string;
  text: string;
}

/** `BA_ "<key>" SG_ <id> <signal> <value>;` */
export interface SignalAttributeEntry {
  kind: EntryKind.SIGNAL_ATTRIBUTE;
  id: number;
  signalName: string;
  key: string;
  value: string;
}

/** `VAL_ <id> <signal> <n> "<label>" ... ;` */
export interface SignalValueTableEntry {
  kind: EntryKind.SIGNAL_VALUE_TABLE;
  id: number;
  signalName: string;
  values: Map<number, string>;
}

export interface UnknownEntry {
  kind: EntryKind.UNKNOWN;
  rawText: string;
}

export type Entry =
  | VersionEntry
  | BusConfigurationEntry
  | FrameDefinitionEntry
  | FrameDescriptionEntry
  | FrameAttributeEntry
  | SignalDefinitionEntry
  | SignalDescriptionEntry
  | SignalAttributeEntry
  | SignalValueTableEntry
  | UnknownEntry;

/** Entries that carry a frame-level field */
export type FrameEntry = FrameDefinitionEntry | FrameDescriptionEntry | FrameAttributeEntry;

/** Entries that end up inside a signal record */
export type SignalEntry =
  | SignalDefinitionEntry
  | SignalDescriptionEntry
  | SignalAttributeEntry
  | SignalValueTableEntry;

/** Entries the library knows how to merge */
export type MergeableEntry = FrameEntry | SignalEntry;

/** Turns a single source line into an entry; `null` when the line is not understood */
export type EntryTokenizer = (line: string) => Entry | null;

// !=============================================================================
// ! Signal layout and codec types
// !=============================================================================

/** Bit position, width, byte order and physical scaling of a signal */
export interface SignalLayout {
  startBit: number;
  bitLength: number;
  littleEndian: boolean;
  /** Recorded but not applied by decode */
  signed: boolean;
  scale: number;
  offset: number;
  min: number;
  max: number;
  unit: string;
  receivers: string;
}

/** Physical values keyed by signal name */
export type SignalValues = Map<string, number> | Record<string, number>;

/** Decoder bound to one signal's layout */
export type SignalDecoder = (bytes: Uint8Array | readonly number[]) => number | null;

/** A frame as it comes off the bus, independent of transport */
export interface CanFrame {
  id: number;
  data: Uint8Array | readonly number[];
}

// !=============================================================================
// ! Library options
// !=============================================================================

export interface DbcLibraryOptions {
  /** Text encoding used for files; defaults to latin1 */
  encoding?: DbcEncoding;
  logLevel?: LogLevel;
  /** Replaces the built-in regex tokenizer */
  tokenizer?: EntryTokenizer;
}

// !=============================================================================
// ! Logging
// !=============================================================================

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

/** Контекст для логирования */
export interface LogContext {
  frameId?: number;
  signal?: string;
  entryKind?: string;
  line?: number;
  path?: string;
  logger?: string;
  [key: string]: string | number | boolean | undefined;
}

/** Интерфейс для экземпляра логгера */
export interface LoggerInstance {
  trace(...args: unknown[]): void;
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  group(): void;
  groupEnd(): void;
  setLevel(lvl: LogLevel | 'none'): void;
  pause(): void;
  resume(): void;
}

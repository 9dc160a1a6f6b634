// src/library.ts

import { open, readFile } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';
import { Mutex } from 'async-mutex';

import { DEFAULT_ENCODING, type DbcEncoding } from './constants/constants.js';
import { explicitFrameId, isMergeableEntry } from './entry.js';
import {
  DbcError,
  DbcIoError,
  DbcMissingContextError,
  DbcUnsupportedEntryError,
} from './errors.js';
import { logger } from './logger.js';
import { parseEntry } from './parser/entry-parser.js';
import { FrameRecord } from './records/frame-record.js';
import type { SignalRecord } from './records/signal-record.js';
import type {
  CanFrame,
  DbcLibraryOptions,
  Entry,
  EntryTokenizer,
  LoggerInstance,
} from './types/dbc-types.js';
import { toHex, toUint8Array } from './utils/utils.js';

const log: LoggerInstance = logger.createLogger('DbcLibrary');

/** Outcome of feeding a single source line */
type LineOutcome = 'added' | 'untokenized' | 'rejected' | 'empty';

/** Counters for one text/file/stream load */
export interface LoadReport {
  lines: number;
  added: number;
  untokenized: number;
  rejected: number;
}

function emptyReport(): LoadReport {
  return { lines: 0, added: 0, untokenized: 0, rejected: 0 };
}

/**
 * In-memory CAN database: frames keyed by arbitration ID, each owning its signals.
 *
 * Built one entry at a time. `SG_` lines carry no frame ID, so the library remembers
 * the last frame an entry touched and attaches anonymous signals to it. Nothing is
 * ever removed; later entries only overwrite fields of existing records.
 */
class DbcLibrary {
  private _frames: Map<number, FrameRecord>;
  private _lastFrameId: number | null = null;
  private encoding: DbcEncoding;
  private tokenizer: EntryTokenizer;
  private _loadMutex: Mutex = new Mutex();

  constructor(frames: Map<number, FrameRecord> = new Map(), options: DbcLibraryOptions = {}) {
    this._frames = frames;
    this.encoding = options.encoding ?? DEFAULT_ENCODING;
    this.tokenizer = options.tokenizer ?? parseEntry;
    if (options.logLevel) {
      log.setLevel(options.logLevel);
    }
  }

  /**
   * Builds a library from DBC source text.
   *
   * Lines the tokenizer does not understand and entries the model rejects are
   * skipped; this never fails on content.
   */
  static fromText(source: string, options: DbcLibraryOptions = {}): DbcLibrary {
    const lib = new DbcLibrary(new Map(), options);
    const report = lib.mergeText(source);
    log.debug(
      `Loaded ${lib.size} frames: ${report.added} entries, ${report.untokenized} unparsed lines, ${report.rejected} rejected entries`
    );
    return lib;
  }

  /**
   * Reads a DBC file, decodes it with the configured single-byte encoding
   * (latin1 unless overridden) and builds a library from it.
   * @throws DbcIoError when the file cannot be opened or read
   */
  static async fromFile(path: string, options: DbcLibraryOptions = {}): Promise<DbcLibrary> {
    const encoding = options.encoding ?? DEFAULT_ENCODING;
    let source: string;
    try {
      const contents = await readFile(path);
      source = contents.toString(encoding);
    } catch (err: unknown) {
      log.error('Failed to read DBC file', err, { path });
      throw new DbcIoError(path, err);
    }
    return DbcLibrary.fromText(source, options);
  }

  /**
   * Adds one entry to the library.
   *
   * The target frame is the entry's own ID, or for `SG_` lines the last frame
   * touched. A missing frame is created from the entry; an existing one is merged.
   *
   * @throws DbcMissingContextError for a signal definition before any frame
   * @throws DbcUnsupportedEntryError for VERSION, BS_ and unknown entries
   */
  addEntry(entry: Entry): void {
    if (!isMergeableEntry(entry)) {
      throw new DbcUnsupportedEntryError(entry.kind);
    }

    let id = explicitFrameId(entry);
    if (id === undefined) {
      // SG_ без ID: по грамматике всегда идёт после BO_
      if (this._lastFrameId === null) {
        throw new DbcMissingContextError();
      }
      id = this._lastFrameId;
    }

    const existing = this._frames.get(id);
    if (existing) {
      existing.mergeEntry(entry);
    } else {
      this._frames.set(id, FrameRecord.fromEntry(id, entry));
    }

    this._lastFrameId = id;
  }

  /**
   * Feeds DBC source text into this library, line by line.
   * @returns counters of what happened to the lines
   */
  mergeText(source: string): LoadReport {
    const report = emptyReport();
    source.split(/\r?\n/).forEach((line, index) => {
      this.record(report, this.ingestLine(line, index + 1));
    });
    return report;
  }

  /**
   * Merges a line stream into this library. Concurrent loads into the same library
   * run one after another, so lines of two sources never interleave. The last-frame
   * context still carries over from whatever was loaded before.
   *
   * The stream should already be decoding text (`setEncoding`); raw byte streams
   * are read as UTF-8.
   */
  async loadStream(input: Readable, label: string = '<stream>'): Promise<LoadReport> {
    const release = await this._loadMutex.acquire();
    try {
      const lines = createInterface({ input, crlfDelay: Infinity });
      return await this.ingestLines(lines, label);
    } finally {
      release();
    }
  }

  /**
   * Streams a DBC file into this library using the configured encoding.
   * @throws DbcIoError when the file cannot be opened or read
   */
  async loadFile(path: string): Promise<LoadReport> {
    const release = await this._loadMutex.acquire();
    try {
      let handle: FileHandle;
      try {
        handle = await open(path, 'r');
      } catch (err: unknown) {
        log.error('Failed to open DBC file', err, { path });
        throw new DbcIoError(path, err);
      }
      try {
        return await this.ingestLines(handle.readLines({ encoding: this.encoding, autoClose: false }), path);
      } finally {
        await handle.close();
      }
    } finally {
      release();
    }
  }

  private async ingestLines(lines: AsyncIterable<string>, label: string): Promise<LoadReport> {
    const report = emptyReport();
    let lineNo = 0;
    // ошибки токенизатора не являются ошибками ввода-вывода
    let ingestFailure: { error: unknown } | null = null;
    try {
      for await (const line of lines) {
        lineNo += 1;
        try {
          this.record(report, this.ingestLine(line, lineNo));
        } catch (err: unknown) {
          ingestFailure = { error: err };
          break;
        }
      }
    } catch (err: unknown) {
      log.error('Failed while reading DBC source', err, { path: label, line: lineNo });
      throw new DbcIoError(label, err);
    }
    if (ingestFailure) throw ingestFailure.error;
    log.debug(`Merged ${report.added} entries from ${label}`, { path: label });
    return report;
  }

  private record(report: LoadReport, outcome: LineOutcome): void {
    if (outcome === 'empty') return;
    report.lines += 1;
    if (outcome === 'added') report.added += 1;
    else if (outcome === 'untokenized') report.untokenized += 1;
    else report.rejected += 1;
  }

  private ingestLine(line: string, lineNo: number): LineOutcome {
    if (line.length === 0) return 'empty';

    const entry = this.tokenizer(line);
    if (!entry) {
      log.trace('Skipping unparsed line', { line: lineNo });
      return 'untokenized';
    }

    try {
      this.addEntry(entry);
      return 'added';
    } catch (err: unknown) {
      if (!(err instanceof DbcError)) throw err;
      log.debug(`Skipping entry: ${err.message}`, { line: lineNo, entryKind: entry.kind });
      return 'rejected';
    }
  }

  /** Frame with the given arbitration ID */
  getFrame(id: number): FrameRecord | undefined {
    return this._frames.get(id);
  }

  /**
   * First signal with this name in the library's iteration order.
   * Names repeated across frames are ambiguous; do not rely on which one wins.
   */
  getSignal(name: string): SignalRecord | undefined {
    for (const frame of this._frames.values()) {
      const signal = frame.getSignal(name);
      if (signal) return signal;
    }
    return undefined;
  }

  get frameIds(): number[] {
    return [...this._frames.keys()];
  }

  get frames(): FrameRecord[] {
    return [...this._frames.values()];
  }

  /** Number of frames */
  get size(): number {
    return this._frames.size;
  }

  isEmpty(): boolean {
    return this._frames.size === 0;
  }

  /** ID of the most recently created or updated frame */
  get lastFrameId(): number | null {
    return this._lastFrameId;
  }

  /**
   * Decodes a bus frame against the library.
   * @returns physical value per signal, or null for an unknown ID or an empty payload
   */
  decodeCanFrame(frame: CanFrame): Map<string, number> | null {
    const record = this._frames.get(frame.id);
    if (!record) {
      log.trace(`No definition for frame, payload ${toHex(toUint8Array(frame.data))}`, {
        frameId: frame.id,
      });
      return null;
    }
    return record.decode(frame.data);
  }
}

export { DbcLibrary };

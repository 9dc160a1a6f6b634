// src/records/frame-record.ts

import { EntryKind, MAX_PAYLOAD_BYTES } from '../constants/constants.js';
import { encodeSignal } from '../codec/signal-codec.js';
import { isMergeableEntry, isSignalEntry, signalNameOf } from '../entry.js';
import { DbcMissingSignalDataError, DbcUnsupportedEntryError } from '../errors.js';
import type { Entry, SignalEntry, SignalValues } from '../types/dbc-types.js';
import { lookupValue, orInto, toUint8Array } from '../utils/utils.js';
import { SignalRecord } from './signal-record.js';

export interface FrameRecordInit {
  name?: string;
  length?: number;
  sender?: string;
  description?: string | null;
  attributes?: Map<string, string>;
  signals?: Map<string, SignalRecord>;
}

/**
 * Everything known about one arbitration ID: the BO_ line, its comment and
 * attributes, and the signals packed into its payload.
 */
export class FrameRecord {
  readonly id: number;
  private _name: string;
  private _length: number;
  private _sender: string;
  private _description: string | null;
  private _attributes: Map<string, string>;
  private _signals: Map<string, SignalRecord>;

  constructor(id: number, init: FrameRecordInit = {}) {
    this.id = id;
    this._name = init.name ?? '';
    this._length = init.length ?? 0;
    this._sender = init.sender ?? '';
    this._description = init.description ?? null;
    this._attributes = init.attributes ?? new Map();
    this._signals = init.signals ?? new Map();
  }

  /**
   * Creates the record for `id` from the first entry that references it.
   * Fields the entry does not carry start out empty.
   * @throws DbcUnsupportedEntryError for entries outside the frame/signal model
   */
  static fromEntry(id: number, entry: Entry): FrameRecord {
    if (!isMergeableEntry(entry)) {
      throw new DbcUnsupportedEntryError(entry.kind);
    }
    const frame = new FrameRecord(id);
    frame.mergeEntry(entry);
    return frame;
  }

  /**
   * Folds an entry into this frame. Frame entries overwrite the fields they carry;
   * signal entries are routed to the signal of the same name, creating it if needed.
   * The ID never changes.
   */
  mergeEntry(entry: Entry): void {
    if (isSignalEntry(entry)) {
      this.mergeSignalEntry(entry);
      return;
    }
    switch (entry.kind) {
      case EntryKind.FRAME_DEFINITION:
        this._name = entry.name;
        this._length = entry.length;
        this._sender = entry.sender;
        return;
      case EntryKind.FRAME_DESCRIPTION:
        this._description = entry.text;
        return;
      case EntryKind.FRAME_ATTRIBUTE:
        this._attributes.set(entry.key, entry.value);
        return;
      default:
        throw new DbcUnsupportedEntryError(entry.kind);
    }
  }

  private mergeSignalEntry(entry: SignalEntry): void {
    const name = signalNameOf(entry);
    const existing = this._signals.get(name);
    if (existing) {
      existing.mergeEntry(entry);
    } else {
      this._signals.set(name, SignalRecord.fromEntry(entry));
    }
  }

  get name(): string {
    return this._name;
  }

  /** Payload length in bytes as declared by the BO_ line */
  get length(): number {
    return this._length;
  }

  get sender(): string {
    return this._sender;
  }

  get description(): string | null {
    return this._description;
  }

  getAttribute(key: string): string | undefined {
    return this._attributes.get(key);
  }

  get attributes(): ReadonlyMap<string, string> {
    return this._attributes;
  }

  getSignal(name: string): SignalRecord | undefined {
    return this._signals.get(name);
  }

  get signals(): SignalRecord[] {
    return [...this._signals.values()];
  }

  get signalNames(): string[] {
    return [...this._signals.keys()];
  }

  get signalCount(): number {
    return this._signals.size;
  }

  /**
   * Packs physical values for every signal of the frame into one payload.
   * Each signal contributes 8 bytes which are OR-ed together, so bit ranges
   * must not overlap.
   * @param values - physical value per signal name
   * @returns 8-byte payload
   * @throws DbcMissingSignalDataError when a signal of the frame has no value
   * @throws DbcOverflowError when a value does not fit its signal
   * @throws DbcIncompleteSignalError when a signal has no SG_ definition
   */
  encode(values: SignalValues): Uint8Array {
    const result = new Uint8Array(MAX_PAYLOAD_BYTES);
    for (const [name, signal] of this._signals) {
      const value = lookupValue(values, name);
      if (value === undefined) {
        throw new DbcMissingSignalDataError(name);
      }
      orInto(result, encodeSignal(signal.requireLayout(), value));
    }
    return result;
  }

  /**
   * Decodes every defined signal of the frame. Signals without a layout are skipped.
   * @returns physical value per signal name, or null for an empty payload
   */
  decode(bytes: Uint8Array | readonly number[]): Map<string, number> | null {
    const payload = toUint8Array(bytes);
    if (payload.length === 0) return null;

    const out = new Map<string, number>();
    for (const [name, signal] of this._signals) {
      if (!signal.isComplete()) continue;
      const value = signal.decode(payload);
      if (value !== null) out.set(name, value);
    }
    return out;
  }
}

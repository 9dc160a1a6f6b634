// src/records/signal-record.ts

import { EntryKind, SIGNAL_ATTRIBUTE_KEYS } from '../constants/constants.js';
import { decodeSignal, encodeSignal } from '../codec/signal-codec.js';
import { isSignalEntry, signalNameOf } from '../entry.js';
import { DbcIncompleteSignalError, DbcUnsupportedEntryError } from '../errors.js';
import type {
  Entry,
  SignalDecoder,
  SignalDefinitionEntry,
  SignalLayout,
} from '../types/dbc-types.js';

function layoutFromDefinition(entry: SignalDefinitionEntry): SignalLayout {
  return {
    startBit: entry.startBit,
    bitLength: entry.bitLength,
    littleEndian: entry.littleEndian,
    signed: entry.signed,
    scale: entry.scale,
    offset: entry.offset,
    min: entry.min,
    max: entry.max,
    unit: entry.unit,
    receivers: entry.receivers,
  };
}

export interface SignalRecordInit {
  layout?: SignalLayout | null;
  description?: string | null;
  attributes?: Map<string, string>;
  valueTable?: Map<number, string> | null;
  multiplexer?: string | null;
}

/**
 * Everything known about one named signal of a frame.
 *
 * A record can exist before its `SG_` line has been seen (a comment or attribute
 * came first); such a record has no layout and refuses codec operations.
 */
export class SignalRecord {
  readonly name: string;
  private _layout: SignalLayout | null;
  private _description: string | null;
  private _attributes: Map<string, string>;
  private _valueTable: Map<number, string> | null;
  private _multiplexer: string | null;

  constructor(name: string, init: SignalRecordInit = {}) {
    this.name = name;
    this._layout = init.layout ?? null;
    this._description = init.description ?? null;
    this._attributes = init.attributes ?? new Map();
    this._valueTable = init.valueTable ?? null;
    this._multiplexer = init.multiplexer ?? null;
  }

  /**
   * Builds a record from the first entry that mentions the signal.
   * @throws DbcUnsupportedEntryError for entries that do not describe a signal
   */
  static fromEntry(entry: Entry): SignalRecord {
    if (!isSignalEntry(entry)) {
      throw new DbcUnsupportedEntryError(entry.kind);
    }
    const record = new SignalRecord(signalNameOf(entry));
    record.mergeEntry(entry);
    return record;
  }

  /**
   * Folds a later entry into this record. Fields the entry carries overwrite the
   * current ones; everything else stays as it was.
   * @throws DbcUnsupportedEntryError for entries that do not describe a signal
   */
  mergeEntry(entry: Entry): void {
    switch (entry.kind) {
      case EntryKind.SIGNAL_DEFINITION:
        this._layout = layoutFromDefinition(entry);
        this._multiplexer = entry.multiplexer ?? null;
        return;
      case EntryKind.SIGNAL_DESCRIPTION:
        this._description = entry.text;
        return;
      case EntryKind.SIGNAL_ATTRIBUTE:
        this._attributes.set(entry.key, entry.value);
        return;
      case EntryKind.SIGNAL_VALUE_TABLE:
        this._valueTable = new Map(entry.values);
        return;
      default:
        throw new DbcUnsupportedEntryError(entry.kind);
    }
  }

  get layout(): Readonly<SignalLayout> | null {
    return this._layout;
  }

  /**
   * @throws DbcIncompleteSignalError when no SG_ definition has been merged
   */
  requireLayout(): Readonly<SignalLayout> {
    if (!this._layout) {
      throw new DbcIncompleteSignalError(this.name);
    }
    return this._layout;
  }

  isComplete(): boolean {
    return this._layout !== null;
  }

  get description(): string | null {
    return this._description;
  }

  get multiplexer(): string | null {
    return this._multiplexer;
  }

  getAttribute(key: string): string | undefined {
    return this._attributes.get(key);
  }

  get attributes(): ReadonlyMap<string, string> {
    return this._attributes;
  }

  get valueTable(): ReadonlyMap<number, string> | null {
    return this._valueTable;
  }

  /** Label of a raw value from the VAL_ table, if one exists */
  describeValue(raw: number): string | undefined {
    return this._valueTable?.get(raw);
  }

  /** Long symbol attribute when present, otherwise the short name */
  get longName(): string {
    return this._attributes.get(SIGNAL_ATTRIBUTE_KEYS.LONG_NAME) ?? this.name;
  }

  decode(bytes: Uint8Array | readonly number[]): number | null {
    return decodeSignal(this.requireLayout(), bytes);
  }

  /**
   * Returns a decoder bound to the current layout.
   * Later merges into this record do not affect an already returned decoder.
   */
  decoder(): SignalDecoder {
    const layout = { ...this.requireLayout() };
    return bytes => decodeSignal(layout, bytes);
  }

  encode(value: number): Uint8Array {
    return encodeSignal(this.requireLayout(), value);
  }
}

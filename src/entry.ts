// src/entry.ts

import { EntryKind } from './constants/constants.js';
import type { Entry, FrameEntry, MergeableEntry, SignalEntry } from './types/dbc-types.js';

export function isFrameEntry(entry: Entry): entry is FrameEntry {
  return (
    entry.kind === EntryKind.FRAME_DEFINITION ||
    entry.kind === EntryKind.FRAME_DESCRIPTION ||
    entry.kind === EntryKind.FRAME_ATTRIBUTE
  );
}

export function isSignalEntry(entry: Entry): entry is SignalEntry {
  return (
    entry.kind === EntryKind.SIGNAL_DEFINITION ||
    entry.kind === EntryKind.SIGNAL_DESCRIPTION ||
    entry.kind === EntryKind.SIGNAL_ATTRIBUTE ||
    entry.kind === EntryKind.SIGNAL_VALUE_TABLE
  );
}

export function isMergeableEntry(entry: Entry): entry is MergeableEntry {
  return isFrameEntry(entry) || isSignalEntry(entry);
}

/**
 * Name of the signal a signal entry refers to
 */
export function signalNameOf(entry: SignalEntry): string {
  return entry.kind === EntryKind.SIGNAL_DEFINITION ? entry.name : entry.signalName;
}

/**
 * Frame ID written on the entry itself. SG_ lines carry none and return undefined.
 */
export function explicitFrameId(entry: MergeableEntry): number | undefined {
  return entry.kind === EntryKind.SIGNAL_DEFINITION ? undefined : entry.id;
}

/**
 * Deep copy; value tables get their own Map
 */
export function cloneEntry<T extends Entry>(entry: T): T {
  return structuredClone(entry);
}

/**
 * Structural equality of two entries, including value tables
 */
export function entriesEqual(a: Entry, b: Entry): boolean {
  return deepEqual(a, b);
}

function deepEqual(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) return true;
  if (a instanceof Map && b instanceof Map) {
    if (a.size !== b.size) return false;
    for (const [key, value] of a) {
      if (!b.has(key) || !deepEqual(value, b.get(key))) return false;
    }
    return true;
  }
  if (typeof a !== 'object' || typeof b !== 'object' || a === null || b === null) return false;
  if (a instanceof Map || b instanceof Map) return false;

  const keysA = Object.keys(a).filter(k => Reflect.get(a, k) !== undefined);
  const keysB = Object.keys(b).filter(k => Reflect.get(b, k) !== undefined);
  if (keysA.length !== keysB.length) return false;
  return keysA.every(key => deepEqual(Reflect.get(a, key), Reflect.get(b, key)));
}

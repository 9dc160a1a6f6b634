// src/spn-view.ts

import { SIGNAL_ATTRIBUTE_KEYS } from './constants/constants.js';
import type { DbcLibrary } from './library.js';
import { logger } from './logger.js';
import type { SignalRecord } from './records/signal-record.js';
import type { LoggerInstance } from './types/dbc-types.js';

const log: LoggerInstance = logger.createLogger('SpnView');

/** Where a suspect parameter number lives */
export interface SpnLocation {
  spn: number;
  frameId: number;
  signal: SignalRecord;
}

export interface SpnViewOptions {
  /** Signal attribute that holds the number; defaults to SPN */
  attributeKey?: string;
}

function parseSpn(value: string): number | null {
  const text = value.trim();
  if (!/^\d+$/.test(text)) return null;
  const spn = Number(text);
  return Number.isSafeInteger(spn) ? spn : null;
}

/**
 * Read-only J1939 index over a library: signals keyed by the integer value of
 * their SPN attribute.
 *
 * Built once; later merges into the library are not reflected. Signals whose
 * attribute is missing or not an integer are left out. When two signals carry
 * the same number, the first one in library order is kept.
 */
export class SpnView {
  private readonly bySpn = new Map<number, SpnLocation>();
  private readonly byFrame = new Map<number, Map<string, number>>();
  readonly attributeKey: string;

  constructor(library: DbcLibrary, options: SpnViewOptions = {}) {
    this.attributeKey = options.attributeKey ?? SIGNAL_ATTRIBUTE_KEYS.SPN;

    for (const frame of library.frames) {
      for (const signal of frame.signals) {
        const raw = signal.getAttribute(this.attributeKey);
        if (raw === undefined) continue;

        const spn = parseSpn(raw);
        if (spn === null) {
          log.debug(`Ignoring non-numeric ${this.attributeKey} "${raw}"`, {
            frameId: frame.id,
            signal: signal.name,
          });
          continue;
        }

        let signals = this.byFrame.get(frame.id);
        if (!signals) {
          signals = new Map();
          this.byFrame.set(frame.id, signals);
        }
        signals.set(signal.name, spn);

        if (this.bySpn.has(spn)) {
          log.debug(`Duplicate ${this.attributeKey} ${spn}, keeping first`, {
            frameId: frame.id,
            signal: signal.name,
          });
          continue;
        }
        this.bySpn.set(spn, { spn, frameId: frame.id, signal });
      }
    }
  }

  getBySpn(spn: number): SpnLocation | undefined {
    return this.bySpn.get(spn);
  }

  /** Number assigned to a signal of a frame */
  getSpn(frameId: number, signalName: string): number | undefined {
    return this.byFrame.get(frameId)?.get(signalName);
  }

  /**
   * Decodes a single parameter from a payload.
   * @returns the physical value, undefined for an unknown number, null for an empty payload
   * @throws DbcIncompleteSignalError when the signal has no SG_ definition
   */
  decode(spn: number, bytes: Uint8Array | readonly number[]): number | null | undefined {
    const location = this.bySpn.get(spn);
    if (!location) return undefined;
    return location.signal.decode(bytes);
  }

  get spns(): number[] {
    return [...this.bySpn.keys()];
  }

  /** Number of distinct SPNs */
  get size(): number {
    return this.bySpn.size;
  }
}

// src/errors.ts

/**
 * Base class for all DBC errors
 */
export class DbcError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DbcError';
  }
}

/**
 * A signal definition arrived before any frame it could belong to
 */
export class DbcMissingContextError extends DbcError {
  constructor(message: string = 'Tried to add SignalDefinition without a preceding frame') {
    super(message);
    this.name = 'DbcMissingContextError';
  }
}

/**
 * Entry kind that has no place in the frame/signal model (VERSION, BS_, ...)
 */
export class DbcUnsupportedEntryError extends DbcError {
  kind: string;

  constructor(kind: string) {
    super(`Unsupported entry: ${kind}`);
    this.name = 'DbcUnsupportedEntryError';
    this.kind = kind;
  }
}

/**
 * Frame encode was asked for without a value for one of the frame's signals
 */
export class DbcMissingSignalDataError extends DbcError {
  signal: string;

  constructor(signal: string) {
    super(`Missing signal data: ${signal}`);
    this.name = 'DbcMissingSignalDataError';
    this.signal = signal;
  }
}

/**
 * Raw value is too large for the signal's bit width
 */
export class DbcOverflowError extends DbcError {
  raw: number;
  bitLength: number;

  constructor(raw: number, bitLength: number) {
    super(`Signal value ${raw} does not fit into ${bitLength} bits`);
    this.name = 'DbcOverflowError';
    this.raw = raw;
    this.bitLength = bitLength;
  }
}

/**
 * Codec operation on a signal that has a description or attributes but no SG_ definition
 */
export class DbcIncompleteSignalError extends DbcError {
  signal: string;

  constructor(signal: string) {
    super(`Signal ${signal} has no bit layout`);
    this.name = 'DbcIncompleteSignalError';
    this.signal = signal;
  }
}

/**
 * Opening, reading or decoding a DBC source failed
 */
export class DbcIoError extends DbcError {
  path: string;
  code: string | undefined;

  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to read DBC source ${path}: ${reason}`);
    this.name = 'DbcIoError';
    this.path = path;
    this.code = errorCode(cause);
    this.cause = cause;
  }
}

function errorCode(cause: unknown): string | undefined {
  if (typeof cause === 'object' && cause !== null && 'code' in cause) {
    const { code } = cause;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

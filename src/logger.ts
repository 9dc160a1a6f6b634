// src/logger.ts

import type { LogContext, LoggerInstance, LogLevel } from './types/dbc-types.js';

type LogField = 'timestamp' | 'level' | 'logger' | 'frameId' | 'signal' | 'entryKind' | 'line';

type WatchCallback = (data: { level: LogLevel; args: unknown[]; context: LogContext }) => void;

const VALID_FIELDS: LogField[] = [
  'timestamp',
  'level',
  'logger',
  'frameId',
  'signal',
  'entryKind',
  'line',
];

class Logger {
  private LEVELS: LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

  private currentLevel: LogLevel = 'info';
  private enabled: boolean = true;
  private useColors: boolean = true;

  private COLORS: Record<LogLevel | 'reset', string> = {
    trace: '\x1b[1;35m',
    debug: '\x1b[1;36m',
    info: '\x1b[1;32m',
    warn: '\x1b[1;33m',
    error: '\x1b[1;31m',
    reset: '\x1b[0m',
  };

  private groupLevel: number = 0;
  private globalContext: LogContext = {};
  private categoryLevels: Record<string, LogLevel | 'none'> = {};
  private logCounts: Record<LogLevel, number> = { trace: 0, debug: 0, info: 0, warn: 0, error: 0 };
  private logStats: {
    byFrameId: Record<number, number>;
    byEntryKind: Record<string, number>;
  } = { byFrameId: {}, byEntryKind: {} };
  private logFormat: LogField[] = ['timestamp', 'level', 'logger', 'frameId', 'signal'];
  private customFormatters: Partial<Record<LogField, (value: unknown) => string>> = {};
  private mutedFrames: Set<number> = new Set();
  private watchCallback: WatchCallback | null = null;

  private getIndent(): string {
    return '  '.repeat(this.groupLevel);
  }

  private getTimestamp(): string {
    return new Date().toISOString().slice(11, 19);
  }

  /**
   * Formats a log message according to the specified level and context.
   * @param level - Log level (trace, debug, info, warn, error)
   * @param args - Arguments to be logged
   * @param context - Context object with additional information
   * @returns Formatted log message parts
   */
  private format(level: LogLevel, args: unknown[], context: LogContext = {}): string[] {
    const color: string = this.useColors ? this.COLORS[level] : '';
    const reset: string = this.useColors ? this.COLORS.reset : '';
    const merged: LogContext = { ...this.globalContext, ...context };

    const headerParts: string[] = [];
    if (this.logFormat.includes('timestamp')) headerParts.push(`[${this.getTimestamp()}]`);
    if (this.logFormat.includes('level')) headerParts.push(`[${level.toUpperCase()}]`);

    if (this.logFormat.includes('logger') && merged.logger) {
      const formatter = this.customFormatters.logger ?? (v => `[${String(v)}]`);
      headerParts.push(formatter(merged.logger));
    }
    if (this.logFormat.includes('frameId') && merged.frameId != null) {
      const formatter =
        this.customFormatters.frameId ?? (v => `[ID:0x${Number(v).toString(16).toUpperCase()}]`);
      headerParts.push(formatter(merged.frameId));
    }
    if (this.logFormat.includes('signal') && merged.signal != null) {
      const formatter = this.customFormatters.signal ?? (v => `[SG:${String(v)}]`);
      headerParts.push(formatter(merged.signal));
    }
    if (this.logFormat.includes('entryKind') && merged.entryKind != null) {
      const formatter = this.customFormatters.entryKind ?? (v => `[${String(v)}]`);
      headerParts.push(formatter(merged.entryKind));
    }
    if (this.logFormat.includes('line') && merged.line != null) {
      const formatter = this.customFormatters.line ?? (v => `[L:${String(v)}]`);
      headerParts.push(formatter(merged.line));
    }

    const formattedArgs: string[] = args.map(arg => {
      if (arg instanceof Error) {
        return `${arg.message}\n${arg.stack || ''}`.trim();
      }
      return String(arg);
    });

    return [`${color}${headerParts.join('')}`, this.getIndent(), ...formattedArgs, reset];
  }

  /**
   * Determines whether a log message should be logged based on level, category and mutes.
   * @param level - Log level
   * @param context - Context object with additional information
   * @returns Whether the log message should be logged
   */
  private shouldLog(level: LogLevel, context: LogContext = {}): boolean {
    if (!this.enabled) return false;
    if (context.frameId != null && this.mutedFrames.has(context.frameId)) return false;
    const category = context.logger;
    if (category !== undefined && category in this.categoryLevels) {
      const categoryLevel = this.categoryLevels[category];
      if (categoryLevel === undefined || categoryLevel === 'none') return false;
      return this.LEVELS.indexOf(level) >= this.LEVELS.indexOf(categoryLevel);
    }
    return this.LEVELS.indexOf(level) >= this.LEVELS.indexOf(this.currentLevel);
  }

  private output(level: LogLevel, args: unknown[], context: LogContext): void {
    if (!this.shouldLog(level, context)) return;

    this.logCounts[level] += 1;
    if (context.frameId != null)
      this.logStats.byFrameId[context.frameId] = (this.logStats.byFrameId[context.frameId] ?? 0) + 1;
    if (context.entryKind != null)
      this.logStats.byEntryKind[context.entryKind] =
        (this.logStats.byEntryKind[context.entryKind] ?? 0) + 1;

    if (this.watchCallback) {
      this.watchCallback({ level, args, context });
    }

    const formatted: string[] = this.format(level, args, context);
    // trace → debug: console.trace печатает стек
    const sink = level === 'trace' ? 'debug' : level;
    if (this.useColors) {
      const head = formatted[0] ?? '';
      const indent = formatted[1] ?? '';
      console[sink](head + indent, ...formatted.slice(2));
    } else {
      console[sink](...formatted.filter(part => part !== ''));
    }
  }

  /**
   * Splits the arguments into the main arguments and the context object.
   * @param args - Arguments to be logged
   * @returns { args, context }
   */
  private splitArgsAndContext(args: unknown[]): { args: unknown[]; context: LogContext } {
    if (args.length > 1) {
      const lastArg = args[args.length - 1];
      if (isLogContext(lastArg)) {
        return { args: args.slice(0, -1), context: lastArg };
      }
    }
    return { args, context: {} };
  }

  trace(...args: unknown[]): void {
    const { args: newArgs, context } = this.splitArgsAndContext(args);
    this.output('trace', newArgs, context);
  }

  debug(...args: unknown[]): void {
    const { args: newArgs, context } = this.splitArgsAndContext(args);
    this.output('debug', newArgs, context);
  }

  info(...args: unknown[]): void {
    const { args: newArgs, context } = this.splitArgsAndContext(args);
    this.output('info', newArgs, context);
  }

  warn(...args: unknown[]): void {
    const { args: newArgs, context } = this.splitArgsAndContext(args);
    this.output('warn', newArgs, context);
  }

  error(...args: unknown[]): void {
    const { args: newArgs, context } = this.splitArgsAndContext(args);
    this.output('error', newArgs, context);
  }

  group(): void {
    this.groupLevel++;
  }

  groupEnd(): void {
    if (this.groupLevel > 0) this.groupLevel--;
  }

  setLevel(level: LogLevel): void {
    if (this.LEVELS.includes(level)) {
      this.currentLevel = level;
    } else {
      throw new Error(`Unknown log level: ${level}`);
    }
  }

  setLevelFor(category: string, level: LogLevel | 'none'): void {
    if (level !== 'none' && !this.LEVELS.includes(level))
      throw new Error(`Unknown log level: ${level}`);
    this.categoryLevels[category] = level;
  }

  pauseCategory(category: string): void {
    this.categoryLevels[category] = 'none';
  }

  resumeCategory(category: string): void {
    delete this.categoryLevels[category];
  }

  enable(): void {
    this.enabled = true;
  }

  disable(): void {
    this.enabled = false;
  }

  getLevel(): LogLevel {
    return this.currentLevel;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  disableColors(): void {
    this.useColors = false;
  }

  setGlobalContext(ctx: LogContext): void {
    this.globalContext = { ...ctx };
  }

  addGlobalContext(ctx: LogContext): void {
    this.globalContext = { ...this.globalContext, ...ctx };
  }

  setLogFormat(fields: LogField[]): void {
    if (!Array.isArray(fields) || !fields.every(f => VALID_FIELDS.includes(f))) {
      throw new Error(`Invalid log format. Valid fields: ${VALID_FIELDS.join(', ')}`);
    }
    this.logFormat = fields;
  }

  setCustomFormatter(field: LogField, formatter: (value: unknown) => string): void {
    if (field === 'timestamp' || field === 'level' || !VALID_FIELDS.includes(field)) {
      throw new Error(`Invalid formatter field: ${field}`);
    }
    this.customFormatters[field] = formatter;
  }

  /** Silences every message tagged with the given frame ID */
  mute(frameId: number): void {
    this.mutedFrames.add(frameId);
  }

  unmute(frameId: number): void {
    this.mutedFrames.delete(frameId);
  }

  watch(callback: WatchCallback): void {
    this.watchCallback = callback;
  }

  clearWatch(): void {
    this.watchCallback = null;
  }

  getCounts(): Readonly<Record<LogLevel, number>> {
    return { ...this.logCounts };
  }

  summary(): void {
    console.log('\x1b[1;36m=== Logger Summary ===\x1b[0m');
    console.log(`Trace Messages: ${this.logCounts.trace}`);
    console.log(`Debug Messages: ${this.logCounts.debug}`);
    console.log(`Info Messages: ${this.logCounts.info}`);
    console.log(`Warn Messages: ${this.logCounts.warn}`);
    console.log(`Error Messages: ${this.logCounts.error}`);
    console.log(
      `Total Messages: ${Object.values(this.logCounts).reduce((sum, count) => sum + count, 0)}`
    );
    console.log(`By Frame ID: ${JSON.stringify(this.logStats.byFrameId, null, 2)}`);
    console.log(`By Entry Kind: ${JSON.stringify(this.logStats.byEntryKind, null, 2)}`);
    console.log(`Current Level: ${this.currentLevel}`);
    console.log(
      `Categories: ${Object.keys(this.categoryLevels).length ? JSON.stringify(this.categoryLevels, null, 2) : 'None'}`
    );
    console.log('\x1b[1;36m=====================\x1b[0m');
  }

  /**
   * Creates a logger instance with category.
   * @param name - Logger name
   * @returns Logger instance
   */
  createLogger(name: string): LoggerInstance {
    if (!name) throw new Error('Logger name required');
    const emit = (level: LogLevel, args: unknown[]): void => {
      const { args: newArgs, context } = this.splitArgsAndContext(args);
      this.output(level, newArgs, { ...context, logger: name });
    };
    return {
      trace: (...args: unknown[]) => emit('trace', args),
      debug: (...args: unknown[]) => emit('debug', args),
      info: (...args: unknown[]) => emit('info', args),
      warn: (...args: unknown[]) => emit('warn', args),
      error: (...args: unknown[]) => emit('error', args),
      group: () => this.group(),
      groupEnd: () => this.groupEnd(),
      setLevel: (lvl: LogLevel | 'none') => this.setLevelFor(name, lvl),
      pause: () => this.pauseCategory(name),
      resume: () => this.resumeCategory(name),
    };
  }
}

function isLogContext(value: unknown): value is LogContext {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  if (value instanceof Error) return false;
  return Object.values(value).every(
    v => v === undefined || typeof v === 'string' || typeof v === 'number' || typeof v === 'boolean'
  );
}

/** Shared logger used by the library; quiet unless a caller raises the level */
export const logger = new Logger();
logger.setLevel('error');

export { Logger };
export type { LogField, WatchCallback };

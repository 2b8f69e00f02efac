// src/logger.ts

import { Console } from 'node:console';
import type { LogContext, LogField, LoggerInstance, LogLevel } from './types/ut803-types.js';

type WatchCallback = (data: { level: LogLevel; args: unknown[]; context: LogContext }) => void;

const VALID_FIELDS: LogField[] = [
  'timestamp',
  'level',
  'logger',
  'port',
  'kind',
  'kindCode',
  'position',
  'elapsed',
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
  private categoryLevels: Record<string, LogLevel | 'none'> = {};
  private logCounts: Record<LogLevel, number> = { trace: 0, debug: 0, info: 0, warn: 0, error: 0 };
  private logFormat: LogField[] = ['timestamp', 'level', 'logger'];
  private mutedKindCodes: Set<number> = new Set();
  private watchCallback: WatchCallback | null = null;
  private logRateLimit: number = 0;
  private lastLogTime: number = 0;

  // stdout may carry measurement data, so everything goes to stderr
  private sink: Console = new Console({ stdout: process.stderr, stderr: process.stderr });

  private getIndent(): string {
    return '  '.repeat(this.groupLevel);
  }

  private getTimestamp(): string {
    return new Date().toISOString().slice(11, 19);
  }

  /**
   * Formats a log line for the given level and context.
   * @returns Header followed by the message parts
   */
  private format(level: LogLevel, args: unknown[], context: LogContext = {}): string[] {
    const color: string = this.useColors ? this.COLORS[level] : '';
    const reset: string = this.useColors ? this.COLORS.reset : '';

    const headerParts: string[] = [];
    for (const name of this.logFormat) {
      switch (name) {
        case 'timestamp':
          headerParts.push(`[${this.getTimestamp()}]`);
          break;
        case 'level':
          headerParts.push(`[${level.toUpperCase()}]`);
          break;
        case 'logger':
          if (context.logger) headerParts.push(`[${context.logger}]`);
          break;
        case 'position':
          if (context.position != null) headerParts.push(`[P:${context.position}]`);
          break;
        case 'elapsed':
          if (context.elapsed != null) headerParts.push(`[T:${context.elapsed.toFixed(1)}s]`);
          break;
        default: {
          const value = context[name];
          if (value != null) headerParts.push(`[${name}:${value}]`);
        }
      }
    }

    const formattedArgs: string[] = args.map(arg => {
      if (arg instanceof Error) {
        return `${arg.message}\n${arg.stack || ''}`.trim();
      }
      return String(arg);
    });

    const contextToPrint: LogContext = { ...context };
    for (const name of this.logFormat) delete contextToPrint[name];
    if (Object.keys(contextToPrint).length > 0) {
      formattedArgs.push(JSON.stringify(contextToPrint));
    }

    return [
      `${color}${headerParts.join('')}`,
      this.getIndent(),
      ...formattedArgs,
      reset,
    ].filter(part => part !== '');
  }

  private shouldLog(level: LogLevel, context: LogContext = {}): boolean {
    if (!this.enabled) return false;
    if (context.kindCode != null && this.mutedKindCodes.has(context.kindCode)) return false;
    const category = context.logger;
    if (category) {
      const categoryLevel = this.categoryLevels[category];
      if (categoryLevel === 'none') return false;
      if (categoryLevel) return this.LEVELS.indexOf(level) >= this.LEVELS.indexOf(categoryLevel);
    }
    return this.LEVELS.indexOf(level) >= this.LEVELS.indexOf(this.currentLevel);
  }

  private output(level: LogLevel, args: unknown[], context: LogContext, immediate = false): void {
    if (!this.shouldLog(level, context)) return;

    this.logCounts[level] += 1;

    this.watchCallback?.({ level, args, context });

    const now = Date.now();
    if (!immediate && this.logRateLimit > 0 && now - this.lastLogTime < this.logRateLimit) return;
    this.lastLogTime = now;

    // Console#trace would append a stack trace
    const method = level === 'trace' ? 'debug' : level;
    this.sink[method](...this.format(level, args, context));
  }

  /**
   * Splits a trailing plain object off the arguments and treats it as context.
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

  private log(level: LogLevel, args: unknown[], extra: LogContext = {}): void {
    const { args: newArgs, context } = this.splitArgsAndContext(args);
    this.output(level, newArgs, { ...context, ...extra }, level === 'warn' || level === 'error');
  }

  trace(...args: unknown[]): void {
    this.log('trace', args);
  }

  debug(...args: unknown[]): void {
    this.log('debug', args);
  }

  info(...args: unknown[]): void {
    this.log('info', args);
  }

  warn(...args: unknown[]): void {
    this.log('warn', args);
  }

  error(...args: unknown[]): void {
    this.log('error', args);
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

  isEnabled(): boolean {
    return this.enabled;
  }

  disableColors(): void {
    this.useColors = false;
  }

  setRateLimit(ms: number): void {
    if (typeof ms !== 'number' || ms < 0)
      throw new Error('Rate limit must be a non-negative number');
    this.logRateLimit = ms;
  }

  setLogFormat(fields: LogField[]): void {
    if (!Array.isArray(fields) || !fields.every(f => VALID_FIELDS.includes(f))) {
      throw new Error(`Invalid log format. Valid fields: ${VALID_FIELDS.join(', ')}`);
    }
    this.logFormat = fields;
  }

  setOutput(sink: Console): void {
    this.sink = sink;
  }

  /** Drops messages whose context carries one of the given kind codes */
  mute(kindCode: number): void {
    this.mutedKindCodes.add(kindCode);
  }

  unmute(kindCode: number): void {
    this.mutedKindCodes.delete(kindCode);
  }

  watch(callback: WatchCallback): void {
    this.watchCallback = callback;
  }

  clearWatch(): void {
    this.watchCallback = null;
  }

  getCounts(): Record<LogLevel, number> {
    return { ...this.logCounts };
  }

  /**
   * Creates a logger bound to a category.
   * @param name - Category name, printed in the [logger] header field
   */
  createLogger(name: string): LoggerInstance {
    if (!name) throw new Error('Logger name required');
    return {
      trace: (...args: unknown[]) => this.log('trace', args, { logger: name }),
      debug: (...args: unknown[]) => this.log('debug', args, { logger: name }),
      info: (...args: unknown[]) => this.log('info', args, { logger: name }),
      warn: (...args: unknown[]) => this.log('warn', args, { logger: name }),
      error: (...args: unknown[]) => this.log('error', args, { logger: name }),
      group: () => this.group(),
      groupEnd: () => this.groupEnd(),
      setLevel: (lvl: LogLevel) => this.setLevelFor(name, lvl),
      pause: () => this.pauseCategory(name),
      resume: () => this.resumeCategory(name),
    };
  }
}

function isLogContext(value: unknown): value is LogContext {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  if (value instanceof Error) return false;
  return Object.values(value).every(
    v => v === undefined || ['string', 'number', 'boolean'].includes(typeof v)
  );
}

/** Process-wide logger shared by every module */
export const rootLogger = new Logger();

export default Logger;

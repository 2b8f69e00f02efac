// src/types/ut803-types.ts

import type { FrameDecodeError } from '../errors.js';

// !=============================================================================
// ! Frame and reading types
// !=============================================================================

/** Measurement mode reported by the meter's kind nibble */
export enum MeasurementKind {
  Diode = 'diode',
  Frequency = 'frequency',
  Resistance = 'resistance',
  Temperature = 'temperature',
  Continuity = 'continuity',
  Capacitance = 'capacitance',
  Current = 'current',
  Voltage = 'voltage',
  HFE = 'hFE',
  Unknown = 'unknown',
}

/** The three raw status nibbles at frame positions 6..8 */
export type FlagNibbles = readonly [number, number, number];

/** Status flags decoded from the flag nibbles */
export interface StatusFlags {
  overload: boolean;
  /** Reading is negative */
  negative: boolean;
  /** Set by the meter when the temperature is shown in °C */
  notFahrenheit: boolean;
  minHold: boolean;
  maxHold: boolean;
  hold: boolean;
  autorange: boolean;
  ac: boolean;
  dc: boolean;
}

/** One decoded measurement */
export interface Reading {
  readonly value: number;
  readonly unit: string;
  readonly kind: MeasurementKind;
  /** Raw kind nibble; distinguishes the A / uA / mA current ranges */
  readonly kindCode: number;
  readonly flags: Readonly<StatusFlags>;
}

/** Unit and exponent correction for a kind code */
export interface ResolvedUnit {
  unit: string;
  exponentOffset: number;
}

export type DecodeResult = { ok: true; reading: Reading } | { ok: false; error: FrameDecodeError };

// !=============================================================================
// ! Logger types
// !=============================================================================

/** Log levels */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

/** Logging context */
export interface LogContext {
  port?: string;
  kind?: string;
  kindCode?: number;
  position?: number;
  elapsed?: number;
  logger?: string;
  [key: string]: string | number | boolean | undefined;
}

export type LogField = keyof LogContext | 'timestamp' | 'level' | 'logger';

/** Named logger returned by Logger.createLogger */
export interface LoggerInstance {
  trace(...args: unknown[]): void;
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  group(): void;
  groupEnd(): void;
  setLevel(lvl: LogLevel): void;
  pause(): void;
  resume(): void;
}

// !=============================================================================
// ! Transport types
// !=============================================================================

/** Source of newline-terminated records */
export interface LineSource {
  readonly isOpen: boolean;
  open(): Promise<void>;
  /**
   * Resolves with the next record, delimiter included, or null when nothing
   * arrived within the timeout or the signal was aborted.
   */
  readLine(timeoutMs?: number, signal?: AbortSignal): Promise<string | null>;
  close(): Promise<void>;
}

/** Options for the Node.js serial transport */
export interface SerialTransportOptions {
  baudRate?: number;
  dataBits?: 5 | 6 | 7 | 8;
  stopBits?: 1 | 1.5 | 2;
  parity?: 'none' | 'even' | 'mark' | 'odd' | 'space';
  xon?: boolean;
  xoff?: boolean;
  rtscts?: boolean;
  readTimeout?: number;
  maxQueuedLines?: number;
}

export interface SerialPortSummary {
  path: string;
  manufacturer?: string;
  serialNumber?: string;
  vendorId?: string;
  productId?: string;
}

// !=============================================================================
// ! Session and recorder types
// !=============================================================================

/** Mutable state of one recording session, in seconds */
export interface SessionState {
  currentKind: MeasurementKind | null;
  initialTime: number;
  lastTime: number;
}

export type SampleDecision =
  | { accepted: false }
  | { accepted: true; elapsed: number; newRun: boolean };

export interface RecorderOptions {
  /** Seconds to sleep after each written sample */
  delaySeconds?: number;
  /** Duplicate suppression window in seconds */
  debounceSeconds?: number;
  /** Timeout for a single line read in ms */
  readTimeout?: number;
  /** Emit the live status line */
  monitor?: boolean;
  /** Clock in seconds; defaults to wall-clock time */
  clock?: () => number;
}

// !=============================================================================
// ! Diagnostics types
// !=============================================================================

export type RejectReason = 'length' | 'digit' | 'kind';

export interface DiagnosticsOptions {
  /** Reject rate in percent above which a warning is logged */
  rejectRateThreshold?: number;
  /** Minimum lines before the reject rate is evaluated */
  minSampleSize?: number;
  loggerName?: string;
}

export interface DiagnosticsStats {
  uptimeSeconds: number;
  linesRead: number;
  framesDecoded: number;
  rejected: Record<RejectReason, number>;
  duplicatesSuppressed: number;
  samplesWritten: number;
  readingsByKind: Record<string, number>;
  rejectRate: number | null;
  lastError: string | null;
  lastErrors: string[];
}

// !=============================================================================
// ! CLI configuration
// !=============================================================================

export interface RecorderConfig {
  port: string;
  output: string;
  delaySeconds: number;
  debounceSeconds: number;
  readTimeout: number;
  monitor: boolean;
  logLevel: LogLevel;
}

export type CliCommand =
  | { command: 'record'; config: RecorderConfig }
  | { command: 'list'; logLevel: LogLevel }
  | { command: 'help' };

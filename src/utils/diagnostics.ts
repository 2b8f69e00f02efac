// src/utils/diagnostics.ts

import { rootLogger } from '../logger.js';
import { FrameLengthError, InvalidDigitError, UnknownMeasurementKindError } from '../errors.js';
import type { FrameDecodeError } from '../errors.js';
import type {
  DiagnosticsOptions,
  DiagnosticsStats,
  LoggerInstance,
  Reading,
  RejectReason,
} from '../types/ut803-types.js';

const MAX_LAST_ERRORS = 10;

/**
 * Collects counters for one recording session: how many lines arrived, how
 * many decoded, why the rest were rejected, and what was written.
 */
class Diagnostics {
  private rejectRateThreshold: number;
  private minSampleSize: number;
  private logger: LoggerInstance;
  private startTime: number = Date.now();
  private linesRead: number = 0;
  private framesDecoded: number = 0;
  private rejected: Record<RejectReason, number> = { length: 0, digit: 0, kind: 0 };
  private duplicatesSuppressed: number = 0;
  private samplesWritten: number = 0;
  private readingsByKind: Record<string, number> = {};
  private lastErrorMessage: string | null = null;
  private lastErrors: string[] = [];
  private warned: boolean = false;

  constructor(options: DiagnosticsOptions = {}) {
    this.rejectRateThreshold = options.rejectRateThreshold ?? 20; // % of lines
    this.minSampleSize = options.minSampleSize ?? 50;
    this.logger = rootLogger.createLogger(options.loggerName || 'Diagnostics');
  }

  /**
   * Resets all counters and restarts the uptime clock.
   */
  reset(): void {
    this.startTime = Date.now();
    this.linesRead = 0;
    this.framesDecoded = 0;
    this.rejected = { length: 0, digit: 0, kind: 0 };
    this.duplicatesSuppressed = 0;
    this.samplesWritten = 0;
    this.readingsByKind = {};
    this.lastErrorMessage = null;
    this.lastErrors = [];
    this.warned = false;
  }

  recordLine(length: number): void {
    this.linesRead++;
    this.logger.trace(`Line received: ${length} chars`);
  }

  recordDecoded(reading: Reading): void {
    this.framesDecoded++;
    this.readingsByKind[reading.kind] = (this.readingsByKind[reading.kind] ?? 0) + 1;
  }

  /**
   * Records a rejected frame and the decode error that caused it.
   */
  recordRejected(error: FrameDecodeError): void {
    const reason = rejectReasonOf(error);
    this.rejected[reason]++;
    this.lastErrorMessage = error.message;
    this.lastErrors.push(error.message);
    if (this.lastErrors.length > MAX_LAST_ERRORS) this.lastErrors.shift();

    this.logger.debug(`Frame rejected: ${error.message}`, {
      reason,
      position: error instanceof InvalidDigitError ? error.position : undefined,
      kindCode: error instanceof UnknownMeasurementKindError ? error.code : undefined,
    });

    this.checkRejectRate();
  }

  recordDuplicate(): void {
    this.duplicatesSuppressed++;
  }

  recordWritten(): void {
    this.samplesWritten++;
  }

  /** Share of read lines that were rejected, in percent */
  get rejectRate(): number | null {
    if (this.linesRead === 0) return null;
    return (this.totalRejected / this.linesRead) * 100;
  }

  get totalRejected(): number {
    return this.rejected.length + this.rejected.digit + this.rejected.kind;
  }

  get uptimeSeconds(): number {
    return Math.floor((Date.now() - this.startTime) / 1000);
  }

  private checkRejectRate(): void {
    const rate = this.rejectRate;
    if (this.warned || rate == null || this.linesRead < this.minSampleSize) return;
    if (rate <= this.rejectRateThreshold) return;
    this.warned = true;
    this.logger.warn('High frame reject rate, check the cable and line settings', {
      rejectRate: rate.toFixed(1),
      linesRead: this.linesRead,
      lastError: this.lastErrorMessage ?? undefined,
    });
  }

  getStats(): DiagnosticsStats {
    return {
      uptimeSeconds: this.uptimeSeconds,
      linesRead: this.linesRead,
      framesDecoded: this.framesDecoded,
      rejected: { ...this.rejected },
      duplicatesSuppressed: this.duplicatesSuppressed,
      samplesWritten: this.samplesWritten,
      readingsByKind: { ...this.readingsByKind },
      rejectRate: this.rejectRate,
      lastError: this.lastErrorMessage,
      lastErrors: [...this.lastErrors],
    };
  }

  /**
   * Logs the session counters at info level.
   */
  printStats(): void {
    const stats = this.getStats();
    this.logger.info('=== Session Diagnostics ===');
    this.logger.info(`Uptime: ${stats.uptimeSeconds}s`);
    this.logger.info(`Lines read: ${stats.linesRead}`);
    this.logger.info(`Frames decoded: ${stats.framesDecoded}`);
    this.logger.info(
      `Rejected: length=${stats.rejected.length}, digit=${stats.rejected.digit}, kind=${stats.rejected.kind}`
    );
    this.logger.info(`Duplicates suppressed: ${stats.duplicatesSuppressed}`);
    this.logger.info(`Samples written: ${stats.samplesWritten}`);
    this.logger.info(`Readings by kind: ${JSON.stringify(stats.readingsByKind)}`);
    this.logger.info(
      `Reject rate: ${stats.rejectRate == null ? 'N/A' : `${stats.rejectRate.toFixed(2)}%`}`
    );
  }
}

export function rejectReasonOf(error: FrameDecodeError): RejectReason {
  if (error instanceof FrameLengthError) return 'length';
  if (error instanceof UnknownMeasurementKindError) return 'kind';
  return 'digit';
}

export default Diagnostics;

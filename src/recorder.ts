// src/recorder.ts

import { setTimeout as sleep } from 'node:timers/promises';
import type { Writable } from 'node:stream';
import { rootLogger } from './logger.js';
import { FRAME, DEFAULT_DEBOUNCE_SECONDS, SERIAL_DEFAULTS } from './constants/constants.js';
import { FrameLengthError } from './errors.js';
import { FrameDecoder } from './framers/frame-decoder.js';
import { acceptSample, createSessionState } from './session/session-state.js';
import { TsvWriter } from './session/tsv-writer.js';
import Diagnostics from './utils/diagnostics.js';
import { formatMonitorLine } from './utils/format.js';
import type { LineSource, RecorderOptions, SessionState } from './types/ut803-types.js';

const logger = rootLogger.createLogger('Recorder');

/**
 * Streaming loop: reads records from a line source, decodes them, drops the
 * meter's duplicate transmissions and writes the rest as tab-separated lines.
 *
 * Malformed frames are skipped. An I/O error from the source or the output
 * ends the loop; the source and the output are released either way.
 */
class Recorder {
  private readonly decoder = new FrameDecoder();
  private readonly state: SessionState = createSessionState();
  private readonly options: Required<Omit<RecorderOptions, 'clock'>>;
  private readonly clock: () => number;
  private stopped: boolean = false;
  private readonly abort = new AbortController();
  private running: boolean = false;

  readonly diagnostics: Diagnostics;

  /**
   * @param source - Open line source
   * @param writer - Output writer
   * @param monitorStream - Destination of the live status line
   */
  constructor(
    private readonly source: LineSource,
    private readonly writer: TsvWriter,
    private readonly monitorStream: Writable | null = null,
    options: RecorderOptions = {},
    diagnostics: Diagnostics = new Diagnostics()
  ) {
    this.options = {
      delaySeconds: options.delaySeconds ?? 0,
      debounceSeconds: options.debounceSeconds ?? DEFAULT_DEBOUNCE_SECONDS,
      readTimeout: options.readTimeout ?? SERIAL_DEFAULTS.READ_TIMEOUT_MS,
      monitor: options.monitor ?? false,
    };
    this.clock = options.clock ?? (() => Date.now() / 1000);
    this.diagnostics = diagnostics;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Session state, exposed for inspection */
  get session(): Readonly<SessionState> {
    return this.state;
  }

  /**
   * Ends the loop. A pending read or delay is cut short.
   */
  stop(): void {
    if (this.stopped) return;
    this.stopped = true;
    logger.debug('Stop requested');
    this.abort.abort();
  }

  /**
   * Runs until stop() is called or an I/O error occurs, then closes the
   * output and the source.
   */
  async run(): Promise<void> {
    if (this.running) throw new Error('Recorder is already running');
    this.running = true;
    let failure: unknown = null;

    try {
      while (!this.stopped) {
        await this.step();
      }
    } catch (err: unknown) {
      failure = err;
      logger.error('Recording stopped by I/O error', err instanceof Error ? err.message : err);
    } finally {
      this.running = false;
      if (this.options.monitor) this.monitorStream?.write('\n');
      const closeErrors = await this.release();
      if (failure === null && closeErrors[0] !== undefined) failure = closeErrors[0];
    }

    if (failure !== null) throw failure;
  }

  /**
   * Handles a single record. Exposed so a caller can drive the loop itself.
   */
  async step(): Promise<void> {
    const line = await this.source.readLine(this.options.readTimeout, this.abort.signal);
    if (line === null) return;
    this.diagnostics.recordLine(line.length);

    if (line.length !== FRAME.LENGTH) {
      this.diagnostics.recordRejected(new FrameLengthError(line.length, FRAME.LENGTH));
      return;
    }

    const result = this.decoder.decode(line);
    if (!result.ok) {
      this.diagnostics.recordRejected(result.error);
      return;
    }
    const reading = result.reading;
    this.diagnostics.recordDecoded(reading);

    const decision = acceptSample(this.state, reading, this.clock(), this.options.debounceSeconds);
    if (!decision.accepted) {
      this.diagnostics.recordDuplicate();
      return;
    }

    if (decision.newRun) {
      logger.info(`Measuring ${reading.kind} in ${reading.unit || '(no unit)'}`, {
        kind: reading.kind,
        kindCode: reading.kindCode,
      });
      await this.writer.writeHeader(reading);
    }
    await this.writer.writeSample(decision.elapsed, reading);
    this.diagnostics.recordWritten();

    if (this.options.monitor) {
      this.monitorStream?.write(formatMonitorLine(reading));
    }
    if (this.options.delaySeconds > 0 && !this.stopped) {
      await this.delay(this.options.delaySeconds * 1000);
    }
  }

  private async delay(ms: number): Promise<void> {
    try {
      await sleep(ms, undefined, { signal: this.abort.signal });
    } catch (err: unknown) {
      if (err instanceof Error && err.name === 'AbortError') return;
      throw err;
    }
  }

  private async release(): Promise<unknown[]> {
    const errors: unknown[] = [];
    try {
      await this.writer.close();
    } catch (err: unknown) {
      logger.error('Failed to close output', err instanceof Error ? err.message : err);
      errors.push(err);
    }
    try {
      await this.source.close();
    } catch (err: unknown) {
      logger.error('Failed to close serial port', err instanceof Error ? err.message : err);
      errors.push(err);
    }
    return errors;
  }
}

export default Recorder;

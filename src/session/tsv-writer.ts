// src/session/tsv-writer.ts

import { createWriteStream } from 'node:fs';
import { once } from 'node:events';
import type { Writable } from 'node:stream';
import { finished } from 'node:stream/promises';
import { OutputWriteError } from '../errors.js';
import type { Reading } from '../types/ut803-types.js';
import { activeFlagNames, formatElapsed, formatFloat } from '../utils/format.js';

/**
 * Header block that opens a run of one measurement kind.
 */
export function formatHeader(reading: Reading): string {
  const flags = activeFlagNames(reading.flags).join(', ');
  return `# initial flags: ${flags}\n#time(s)\t${reading.kind}(${reading.unit})\toverload\n`;
}

/**
 * `<elapsed>\t<value>\t<overload>` data line.
 */
export function formatDataLine(elapsed: number, reading: Reading): string {
  return `${formatElapsed(elapsed)}\t${formatFloat(reading.value)}\t${reading.flags.overload ? '1' : '0'}\n`;
}

/**
 * Append-only tab-separated writer over a Node.js writable stream.
 */
export class TsvWriter {
  private headersWritten: number = 0;
  private failure: Error | null = null;

  /**
   * @param stream - Destination stream
   * @param ownsStream - End the stream on close (false for stdout)
   */
  constructor(
    private readonly stream: Writable,
    private readonly ownsStream: boolean = true
  ) {
    this.stream.on('error', this.onError);
  }

  private readonly onError = (err: Error): void => {
    this.failure = err;
  };

  /** Error raised by the stream since it was opened, if any */
  public get error(): Error | null {
    return this.failure;
  }

  public async writeHeader(reading: Reading): Promise<void> {
    const separator = this.headersWritten > 0 ? '\n' : '';
    this.headersWritten++;
    await this.write(separator + formatHeader(reading));
  }

  public async writeSample(elapsed: number, reading: Reading): Promise<void> {
    await this.write(formatDataLine(elapsed, reading));
  }

  /**
   * Writes a chunk and waits until the stream has accepted it, which doubles
   * as the per-line flush.
   */
  private write(chunk: string): Promise<void> {
    if (this.failure) {
      return Promise.reject(new OutputWriteError(this.failure.message));
    }
    return new Promise<void>((resolve, reject) => {
      this.stream.write(chunk, (err?: Error | null) => {
        if (err) {
          this.failure = err;
          reject(new OutputWriteError(err.message));
          return;
        }
        resolve();
      });
    });
  }

  /**
   * Ends an owned stream and waits for it to finish; a borrowed stream is left open.
   */
  public async close(): Promise<void> {
    if (!this.ownsStream || this.stream.writableEnded || this.stream.destroyed) return;
    this.stream.end();
    try {
      await finished(this.stream);
    } catch (err: unknown) {
      throw new OutputWriteError(err instanceof Error ? err.message : String(err));
    }
  }
}

/**
 * Creates the output file and waits until it is open.
 * @throws OutputWriteError when the file cannot be created
 */
export async function openFileOutput(path: string): Promise<Writable> {
  const stream = createWriteStream(path);
  try {
    await once(stream, 'open');
  } catch (err: unknown) {
    throw new OutputWriteError(
      `Cannot open ${path}: ${err instanceof Error ? err.message : String(err)}`
    );
  }
  return stream;
}

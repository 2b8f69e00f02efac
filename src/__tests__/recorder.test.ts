import { beforeAll, describe, it, expect } from 'vitest';
import { Writable } from 'node:stream';
import Recorder from '../recorder.js';
import { TsvWriter } from '../session/tsv-writer.js';
import { rootLogger } from '../logger.js';
import { OutputWriteError, SerialReadError } from '../errors.js';
import type { LineSource } from '../types/ut803-types.js';

/** Replays a fixed list of records, then reports the end of input */
class FakeLineSource implements LineSource {
  isOpen = true;
  closed = false;

  constructor(
    private readonly lines: string[],
    private readonly onDrained: () => void,
    private readonly failWhenDrained = false
  ) {}

  async open(): Promise<void> {
    this.isOpen = true;
  }

  async readLine(): Promise<string | null> {
    const line = this.lines.shift();
    if (line !== undefined) return line;
    if (this.failWhenDrained) throw new SerialReadError('Port closed');
    this.onDrained();
    return null;
  }

  async close(): Promise<void> {
    this.closed = true;
    this.isOpen = false;
  }
}

/** Replays a fixed list of records, then waits until the read is aborted */
class BlockingLineSource implements LineSource {
  isOpen = true;
  closed = false;

  constructor(private readonly lines: string[]) {}

  async open(): Promise<void> {
    this.isOpen = true;
  }

  readLine(_timeoutMs?: number, signal?: AbortSignal): Promise<string | null> {
    const line = this.lines.shift();
    if (line !== undefined) return Promise.resolve(line);
    return new Promise(resolve => {
      if (signal?.aborted) {
        resolve(null);
        return;
      }
      signal?.addEventListener('abort', () => resolve(null), { once: true });
    });
  }

  async close(): Promise<void> {
    this.closed = true;
    this.isOpen = false;
  }
}

function collector(): { stream: Writable; text: () => string } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    },
  });
  return { stream, text: () => chunks.join('') };
}

function fakeClock(times: number[]): () => number {
  return () => times.shift() ?? 0;
}

describe('Recorder', () => {
  beforeAll(() => {
    rootLogger.disable();
  });

  it('writes decoded samples and skips duplicates and bad frames', async () => {
    const output = collector();
    let recorder: Recorder | null = null;
    const source = new FakeLineSource(
      [
        '41234;000\r\n',
        '41234;000\r\n',
        'garbage\r\n',
        '012347000\r\n',
        '31234;000\r\n',
        '050006000\r\n',
      ],
      () => recorder?.stop()
    );
    recorder = new Recorder(source, new TsvWriter(output.stream), null, {
      clock: fakeClock([10, 10.01, 10.5, 11]),
    });

    await recorder.run();

    expect(output.text()).toBe(
      '# initial flags: \n#time(s)\tvoltage(V)\toverload\n' +
        '0.0\t123.4\t0\n' +
        '0.5\t1234.0\t0\n' +
        '\n# initial flags: \n#time(s)\tcapacitance(F)\toverload\n' +
        '0.0\t5e-09\t0\n'
    );
    expect(source.closed).toBe(true);
    expect(output.stream.writableFinished).toBe(true);

    const stats = recorder.diagnostics.getStats();
    expect(stats.linesRead).toBe(6);
    expect(stats.framesDecoded).toBe(4);
    expect(stats.rejected).toEqual({ length: 1, digit: 0, kind: 1 });
    expect(stats.duplicatesSuppressed).toBe(1);
    expect(stats.samplesWritten).toBe(3);
    expect(recorder.isRunning).toBe(false);
  });

  it('writes the monitor line after each sample', async () => {
    const output = collector();
    const monitor = collector();
    let recorder: Recorder | null = null;
    const source = new FakeLineSource(['41234;00:\r\n'], () => recorder?.stop());
    recorder = new Recorder(source, new TsvWriter(output.stream), monitor.stream, {
      monitor: true,
      clock: fakeClock([1]),
    });

    await recorder.run();

    expect(monitor.text()).toBe('\r\x1b[0Kvoltage: 123.40 V, flags: autorange dc\n');
  });

  it('ignores read timeouts', async () => {
    const output = collector();
    const recorder = new Recorder(
      new FakeLineSource([], () => undefined),
      new TsvWriter(output.stream)
    );
    await recorder.step();
    expect(recorder.diagnostics.getStats().linesRead).toBe(0);
    expect(recorder.session.currentKind).toBeNull();
  });

  it('stops on a read error and still releases both ends', async () => {
    const output = collector();
    const source = new FakeLineSource(['41234;000\r\n'], () => undefined, true);
    const recorder = new Recorder(source, new TsvWriter(output.stream), null, {
      clock: fakeClock([5]),
    });

    await expect(recorder.run()).rejects.toThrow(SerialReadError);
    expect(output.text()).toBe('# initial flags: \n#time(s)\tvoltage(V)\toverload\n0.0\t123.4\t0\n');
    expect(output.stream.writableFinished).toBe(true);
    expect(source.closed).toBe(true);
  });

  it('stops on an output error', async () => {
    const failing = new Writable({
      write(_chunk, _encoding, callback) {
        callback(new Error('disk full'));
      },
    });
    const source = new FakeLineSource(['41234;000\r\n'], () => undefined);
    const recorder = new Recorder(source, new TsvWriter(failing), null, {
      clock: fakeClock([5]),
    });

    await expect(recorder.run()).rejects.toThrow(OutputWriteError);
    expect(source.closed).toBe(true);
  });

  it('refuses to run twice at once', async () => {
    const output = collector();
    let recorder: Recorder | null = null;
    const source = new FakeLineSource([], () => recorder?.stop());
    recorder = new Recorder(source, new TsvWriter(output.stream));
    const first = recorder.run();
    await expect(recorder.run()).rejects.toThrow('Recorder is already running');
    await first;
  });

  it('cuts a running delay short on stop', async () => {
    const output = collector();
    const source = new FakeLineSource(['41234;000\r\n'], () => undefined);
    const recorder = new Recorder(source, new TsvWriter(output.stream), null, {
      delaySeconds: 3,
      clock: fakeClock([5]),
    });

    const started = Date.now();
    setTimeout(() => recorder.stop(), 50);
    await recorder.run();

    expect(Date.now() - started).toBeLessThan(1000);
    expect(output.text()).toBe('# initial flags: \n#time(s)\tvoltage(V)\toverload\n0.0\t123.4\t0\n');
    expect(output.stream.writableFinished).toBe(true);
    expect(source.closed).toBe(true);
  });

  it('cuts a pending read short on stop', async () => {
    const output = collector();
    const source = new BlockingLineSource(['41234;000\r\n']);
    const recorder = new Recorder(source, new TsvWriter(output.stream), null, {
      readTimeout: 60000,
      clock: fakeClock([5]),
    });

    const run = recorder.run();
    setTimeout(() => recorder.stop(), 50);
    await run;

    expect(recorder.diagnostics.getStats().samplesWritten).toBe(1);
    expect(source.closed).toBe(true);
  });
});

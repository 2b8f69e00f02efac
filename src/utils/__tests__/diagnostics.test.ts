import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { Console } from 'node:console';
import { PassThrough } from 'node:stream';
import Diagnostics, { rejectReasonOf } from '../diagnostics.js';
import { rootLogger } from '../../logger.js';
import { FrameDecoder } from '../../framers/frame-decoder.js';
import {
  FrameLengthError,
  InvalidDigitError,
  UnknownMeasurementKindError,
} from '../../errors.js';
import type { LogLevel } from '../../types/ut803-types.js';

const decoder = new FrameDecoder();

describe('rejectReasonOf', () => {
  it('maps each decode error to a reason', () => {
    expect(rejectReasonOf(new FrameLengthError(3, 11))).toBe('length');
    expect(rejectReasonOf(new InvalidDigitError(2, 'x'))).toBe('digit');
    expect(rejectReasonOf(new UnknownMeasurementKindError(7))).toBe('kind');
  });
});

describe('Diagnostics', () => {
  const warnings: string[] = [];

  beforeEach(() => {
    warnings.length = 0;
    rootLogger.setOutput(new Console({ stdout: new PassThrough(), stderr: new PassThrough() }));
    rootLogger.watch(({ level, args }: { level: LogLevel; args: unknown[] }) => {
      if (level === 'warn') warnings.push(String(args[0]));
    });
  });

  afterEach(() => {
    rootLogger.clearWatch();
  });

  it('starts empty', () => {
    const diagnostics = new Diagnostics();
    const stats = diagnostics.getStats();
    expect(stats.linesRead).toBe(0);
    expect(stats.rejectRate).toBeNull();
    expect(stats.lastError).toBeNull();
  });

  it('counts lines, decoded frames and rejects', () => {
    const diagnostics = new Diagnostics();
    diagnostics.recordLine(11);
    diagnostics.recordDecoded(decoder.parseFrame('41234;000\r\n'));
    diagnostics.recordLine(11);
    diagnostics.recordDecoded(decoder.parseFrame('41234;000\r\n'));
    diagnostics.recordDuplicate();
    diagnostics.recordLine(11);
    diagnostics.recordDecoded(decoder.parseFrame('050006000\r\n'));
    diagnostics.recordWritten();
    diagnostics.recordLine(3);
    diagnostics.recordRejected(new FrameLengthError(3, 11));

    const stats = diagnostics.getStats();
    expect(stats.linesRead).toBe(4);
    expect(stats.framesDecoded).toBe(3);
    expect(stats.rejected).toEqual({ length: 1, digit: 0, kind: 0 });
    expect(stats.duplicatesSuppressed).toBe(1);
    expect(stats.samplesWritten).toBe(1);
    expect(stats.readingsByKind).toEqual({ voltage: 2, capacitance: 1 });
    expect(stats.rejectRate).toBe(25);
    expect(stats.lastError).toBe('Invalid frame length: received 3, expected 11');
  });

  it('keeps only the last ten error messages', () => {
    const diagnostics = new Diagnostics();
    for (let code = 0; code < 12; code++) {
      diagnostics.recordLine(11);
      diagnostics.recordRejected(new UnknownMeasurementKindError(code));
    }
    const { lastErrors } = diagnostics.getStats();
    expect(lastErrors).toHaveLength(10);
    expect(lastErrors[0]).toBe('Unknown measurement kind code: 2');
    expect(lastErrors[9]).toBe('Unknown measurement kind code: 11');
  });

  it('warns once when the reject rate exceeds the threshold', () => {
    const diagnostics = new Diagnostics({ rejectRateThreshold: 10, minSampleSize: 2 });
    diagnostics.recordLine(3);
    diagnostics.recordRejected(new FrameLengthError(3, 11));
    expect(warnings).toEqual([]);

    diagnostics.recordLine(3);
    diagnostics.recordRejected(new FrameLengthError(3, 11));
    diagnostics.recordLine(3);
    diagnostics.recordRejected(new FrameLengthError(3, 11));
    expect(warnings).toEqual(['High frame reject rate, check the cable and line settings']);
  });

  it('resets all counters', () => {
    const diagnostics = new Diagnostics();
    diagnostics.recordLine(11);
    diagnostics.recordRejected(new InvalidDigitError(0, 'A'));
    diagnostics.reset();
    const stats = diagnostics.getStats();
    expect(stats.linesRead).toBe(0);
    expect(stats.rejected).toEqual({ length: 0, digit: 0, kind: 0 });
    expect(stats.lastErrors).toEqual([]);
  });
});

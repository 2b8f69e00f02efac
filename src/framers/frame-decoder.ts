// src/framers/frame-decoder.ts

import {
  FLAG_BITS,
  FRAME,
  KIND_CODES,
  NIBBLE_BASE,
  NIBBLE_MAX,
  UNIT_VOLT,
  VOLTAGE_RANGE_BIT,
  VOLTAGE_RANGE_SHIFT,
} from '../constants/constants.js';
import {
  FrameDecodeError,
  FrameLengthError,
  InvalidDigitError,
  UnknownMeasurementKindError,
} from '../errors.js';
import type {
  DecodeResult,
  FlagNibbles,
  MeasurementKind,
  Reading,
  StatusFlags,
} from '../types/ut803-types.js';
import { resolveUnit } from './unit-resolver.js';

const DECIMAL_ZERO = 0x30;
const DECIMAL_NINE = 0x39;

/**
 * Decodes the meter's "hex" character: code point minus '0', so the valid
 * characters are 0123456789:;<=>? for 0..15.
 * @param frame - Frame text
 * @param position - Index of the character to decode
 * @throws InvalidDigitError for any other character
 */
export function decodeNibble(frame: string, position: number): number {
  const nibble = frame.charCodeAt(position) - NIBBLE_BASE;
  if (Number.isInteger(nibble) && nibble >= 0 && nibble <= NIBBLE_MAX) {
    return nibble;
  }
  throw new InvalidDigitError(position, frame.charAt(position));
}

/**
 * Parses the four decimal digits at positions 1..4 as an unsigned integer.
 */
export function decodeBaseMagnitude(frame: string): number {
  let magnitude = 0;
  for (let position = FRAME.DIGITS_START; position < FRAME.DIGITS_END; position++) {
    const code = frame.charCodeAt(position);
    if (!(code >= DECIMAL_ZERO && code <= DECIMAL_NINE)) {
      throw new InvalidDigitError(position, frame.charAt(position));
    }
    magnitude = magnitude * 10 + (code - DECIMAL_ZERO);
  }
  return magnitude;
}

export function decodeKind(kindCode: number): MeasurementKind {
  const kind = KIND_CODES.get(kindCode);
  if (kind === undefined) {
    throw new UnknownMeasurementKindError(kindCode);
  }
  return kind;
}

export function decodeFlags(flags: FlagNibbles): StatusFlags {
  const [f0, f1, f2] = flags;
  return {
    overload: (f0 & FLAG_BITS.OVERLOAD) !== 0,
    negative: (f0 & FLAG_BITS.NEGATIVE) !== 0,
    notFahrenheit: (f0 & FLAG_BITS.NOT_FAHRENHEIT) !== 0,
    minHold: (f1 & FLAG_BITS.MIN_HOLD) !== 0,
    maxHold: (f1 & FLAG_BITS.MAX_HOLD) !== 0,
    hold: (f1 & FLAG_BITS.HOLD) !== 0,
    autorange: (f2 & FLAG_BITS.AUTORANGE) !== 0,
    ac: (f2 & FLAG_BITS.AC) !== 0,
    dc: (f2 & FLAG_BITS.DC) !== 0,
  };
}

/**
 * Final decimal exponent. Voltage frames (diode mode included, it shares the
 * "V" unit) with bit 2 of the selector set are shifted down two decades.
 */
export function computeExponent(selector: number, unit: string, exponentOffset: number): number {
  let exponent = selector;
  if (unit === UNIT_VOLT && (exponent & VOLTAGE_RANGE_BIT) !== 0) {
    exponent -= VOLTAGE_RANGE_SHIFT;
  }
  return exponent + exponentOffset;
}

/**
 * base * 10^exponent. Negative exponents divide by an exact power of ten so
 * the result is the double nearest to the decimal reading.
 */
export function scaleMagnitude(base: number, exponent: number): number {
  return exponent >= 0 ? base * 10 ** exponent : base / 10 ** -exponent;
}

/**
 * Parser for the 11-character UT803 record:
 *
 * | pos  | content                          |
 * |------|----------------------------------|
 * | 0    | exponent selector nibble         |
 * | 1..4 | base magnitude, decimal          |
 * | 5    | measurement kind nibble          |
 * | 6..8 | status flag nibbles              |
 * | 9,10 | CR LF                            |
 */
export class FrameDecoder {
  /**
   * Decodes a frame, throwing a FrameDecodeError subclass for malformed input.
   */
  public parseFrame(frame: string): Reading {
    if (frame.length !== FRAME.LENGTH) {
      throw new FrameLengthError(frame.length, FRAME.LENGTH);
    }

    const selector = decodeNibble(frame, FRAME.EXPONENT_POS);
    const base = decodeBaseMagnitude(frame);
    const kindCode = decodeNibble(frame, FRAME.KIND_POS);
    const flagNibbles: FlagNibbles = [
      decodeNibble(frame, FRAME.FLAGS_START),
      decodeNibble(frame, FRAME.FLAGS_START + 1),
      decodeNibble(frame, FRAME.FLAGS_START + 2),
    ];
    const kind = decodeKind(kindCode);
    const flags = decodeFlags(flagNibbles);

    const { unit, exponentOffset } = resolveUnit(kindCode, flagNibbles);
    const exponent = computeExponent(selector, unit, exponentOffset);
    const magnitude = scaleMagnitude(base, exponent);

    return Object.freeze({
      value: flags.negative ? -magnitude : magnitude,
      unit,
      kind,
      kindCode,
      flags: Object.freeze(flags),
    });
  }

  /**
   * Decodes a frame into a result object instead of throwing.
   */
  public decode(frame: string): DecodeResult {
    try {
      return { ok: true, reading: this.parseFrame(frame) };
    } catch (err: unknown) {
      if (err instanceof FrameDecodeError) {
        return { ok: false, error: err };
      }
      throw err;
    }
  }
}

const defaultDecoder = new FrameDecoder();

export function decodeFrame(frame: string): DecodeResult {
  return defaultDecoder.decode(frame);
}

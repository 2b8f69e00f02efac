// src/constants/constants.ts

import { MeasurementKind } from '../types/ut803-types.js';
import type { StatusFlags } from '../types/ut803-types.js';

/**
 * Frame layout of the UT803 serial record
 */
export const FRAME = {
  LENGTH: 11,
  EXPONENT_POS: 0,
  DIGITS_START: 1,
  DIGITS_END: 5,
  KIND_POS: 5,
  FLAGS_START: 6,
  FLAGS_END: 9,
} as const;

/** Nibble characters are '0' + n, i.e. 0123456789:;<=>? */
export const NIBBLE_BASE = 0x30;
export const NIBBLE_MAX = 15;

/**
 * Raw kind nibble -> measurement kind. Codes missing here are not produced by the meter.
 */
export const KIND_CODES: ReadonlyMap<number, MeasurementKind> = new Map([
  [1, MeasurementKind.Diode],
  [2, MeasurementKind.Frequency],
  [3, MeasurementKind.Resistance],
  [4, MeasurementKind.Temperature],
  [5, MeasurementKind.Continuity],
  [6, MeasurementKind.Capacitance],
  [9, MeasurementKind.Current],
  [11, MeasurementKind.Voltage],
  [13, MeasurementKind.Current],
  [14, MeasurementKind.HFE],
  [15, MeasurementKind.Current],
]);

export const TEMPERATURE_KIND_CODE = 4;

/**
 * Fixed units by raw kind code. Current keeps one entry per sub-range.
 */
export const STATIC_UNITS: ReadonlyMap<number, string> = new Map([
  [1, 'V'],
  [2, 'Hz'],
  [3, 'Ohm'],
  [5, 'Ohm'],
  [6, 'F'],
  [9, 'A'],
  [11, 'V'],
  [13, 'uA'],
  [14, ''],
  [15, 'mA'],
]);

export const UNIT_CELSIUS = '°C';
export const UNIT_FAHRENHEIT = '°F';
export const UNIT_VOLT = 'V';
export const UNIT_UNKNOWN = '???';

/**
 * Decimal exponent offset that scales the four displayed digits to the base unit
 */
export const EXPONENT_OFFSETS: Readonly<Record<string, number>> = {
  V: -3,
  Ohm: -1,
  A: -2,
  mA: -2,
  uA: -1,
  F: -3 - 9, // base magnitude is in pF
};

/**
 * Flag bit masks, per nibble
 */
export const FLAG_BITS = {
  OVERLOAD: 0x1,
  NEGATIVE: 0x4,
  NOT_FAHRENHEIT: 0x8,
  MIN_HOLD: 0x2,
  MAX_HOLD: 0x4,
  HOLD: 0x8,
  AUTORANGE: 0x2,
  AC: 0x4,
  DC: 0x8,
} as const;

/** Voltage frames with this exponent bit set carry a two-decade shift */
export const VOLTAGE_RANGE_BIT = 0x4;
export const VOLTAGE_RANGE_SHIFT = 2;

/**
 * Names used for flags in the output header and the monitor line
 */
export const FLAG_LABELS: Readonly<Record<keyof StatusFlags, string>> = {
  overload: 'overload',
  negative: 'sign',
  notFahrenheit: 'not_fahrenheit',
  minHold: 'min',
  maxHold: 'max',
  hold: 'hold',
  autorange: 'autorange',
  ac: 'ac',
  dc: 'dc',
};

export const FLAG_ORDER: ReadonlyArray<keyof StatusFlags> = [
  'overload',
  'negative',
  'notFahrenheit',
  'minHold',
  'maxHold',
  'hold',
  'autorange',
  'ac',
  'dc',
];

/**
 * Serial line discipline of the meter's RS-232 / USB adapter
 */
export const SERIAL_DEFAULTS = {
  BAUD_RATE: 19200,
  DATA_BITS: 7,
  STOP_BITS: 1,
  PARITY: 'odd',
  XON: true,
  XOFF: true,
  RTSCTS: false,
  DELIMITER: '\n',
  READ_TIMEOUT_MS: 2000,
  MAX_QUEUED_LINES: 1024,
} as const;

/** The meter emits every sample twice; repeats closer than this are dropped */
export const DEFAULT_DEBOUNCE_SECONDS = 0.05;

/** lastTime after a kind change, so the first sample is always accepted */
export const SESSION_RESET_LAST_TIME = -10;

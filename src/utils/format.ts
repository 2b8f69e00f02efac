// src/utils/format.ts

import { FLAG_LABELS, FLAG_ORDER } from '../constants/constants.js';
import type { Reading, StatusFlags } from '../types/ut803-types.js';

interface PrefixStep {
  /** Exclusive upper bound of |value| for this prefix */
  below: number;
  prefix: string;
  multiplier?: number;
  divisor?: number;
}

// Sub-unit prefixes switch one decade early so the scaled number stays >= 0.1
const PREFIX_STEPS: PrefixStep[] = [
  { below: 1e-10, prefix: 'p', multiplier: 1e12 },
  { below: 1e-7, prefix: 'n', multiplier: 1e9 },
  { below: 1e-4, prefix: 'u', multiplier: 1e6 },
  { below: 1e-1, prefix: 'm', multiplier: 1e3 },
  { below: 1e3, prefix: '' },
  { below: 1e6, prefix: 'k', divisor: 1e3 },
];
const MEGA: PrefixStep = { below: Infinity, prefix: 'M', divisor: 1e6 };

/**
 * Scales a value to an SI prefix for display.
 * @returns Scaled value and the prefixed unit; zero is returned unchanged
 */
export function prettyValueFormat(value: number, unit: string = ''): [number, string] {
  if (value === 0) return [value, unit];
  const magnitude = Math.abs(value);
  const step = PREFIX_STEPS.find(s => magnitude < s.below) ?? MEGA;
  if (step.multiplier !== undefined) return [value * step.multiplier, step.prefix + unit];
  if (step.divisor !== undefined) return [value / step.divisor, step.prefix + unit];
  return [value, unit];
}

/**
 * Labels of the flags that are set, in frame order.
 */
export function activeFlagNames(flags: Readonly<StatusFlags>): string[] {
  return FLAG_ORDER.filter(key => flags[key]).map(key => FLAG_LABELS[key]);
}

/**
 * Single status line, redrawn in place with carriage return and erase-line.
 */
export function formatMonitorLine(reading: Reading): string {
  const [scaled, prefixedUnit] = prettyValueFormat(reading.value, reading.unit);
  return `\r\x1b[0K${reading.kind}: ${scaled.toFixed(2)} ${prefixedUnit}, flags: ${activeFlagNames(reading.flags).join(' ')}`;
}

/**
 * Elapsed seconds with one decimal, as written in the time column.
 */
export function formatElapsed(seconds: number): string {
  return seconds.toFixed(1);
}

/**
 * Shortest round-trip decimal, always with a fractional part or an exponent:
 * `1234.0`, `123.4`, `5e-09`, `1.5e+16`. Scientific notation is used below
 * 1e-4 and from 1e16 on, with at least two exponent digits.
 */
export function formatFloat(value: number): string {
  if (Number.isNaN(value)) return 'nan';
  if (!Number.isFinite(value)) return value > 0 ? 'inf' : '-inf';
  if (value === 0) return Object.is(value, -0) ? '-0.0' : '0.0';

  const sign = value < 0 ? '-' : '';
  const [mantissa = '0', exp = '0'] = Math.abs(value).toExponential().split('e');
  const digits = mantissa.replace('.', '');
  const exponent = Number(exp);

  if (exponent < -4 || exponent >= 16) {
    const fraction = digits.length > 1 ? `.${digits.slice(1)}` : '';
    const expDigits = String(Math.abs(exponent)).padStart(2, '0');
    return `${sign}${digits.charAt(0)}${fraction}e${exponent < 0 ? '-' : '+'}${expDigits}`;
  }
  if (exponent < 0) {
    return `${sign}0.${'0'.repeat(-exponent - 1)}${digits}`;
  }
  const intLength = exponent + 1;
  if (digits.length <= intLength) {
    return `${sign}${digits.padEnd(intLength, '0')}.0`;
  }
  return `${sign}${digits.slice(0, intLength)}.${digits.slice(intLength)}`;
}

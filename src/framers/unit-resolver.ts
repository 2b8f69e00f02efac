// src/framers/unit-resolver.ts

import {
  EXPONENT_OFFSETS,
  FLAG_BITS,
  STATIC_UNITS,
  TEMPERATURE_KIND_CODE,
  UNIT_CELSIUS,
  UNIT_FAHRENHEIT,
  UNIT_UNKNOWN,
} from '../constants/constants.js';
import type { FlagNibbles, ResolvedUnit } from '../types/ut803-types.js';

/**
 * Display unit for a raw kind code. Temperature depends on the
 * not-fahrenheit bit; codes without an entry fall back to "???".
 */
export function getUnit(kindCode: number, flags: FlagNibbles): string {
  const unit = STATIC_UNITS.get(kindCode);
  if (unit !== undefined) return unit;
  if (kindCode === TEMPERATURE_KIND_CODE) {
    return flags[0] & FLAG_BITS.NOT_FAHRENHEIT ? UNIT_CELSIUS : UNIT_FAHRENHEIT;
  }
  return UNIT_UNKNOWN;
}

/**
 * Decimal exponent offset for a unit, 0 for units without one.
 */
export function getExponentOffsetForUnit(unit: string): number {
  return Object.hasOwn(EXPONENT_OFFSETS, unit) ? (EXPONENT_OFFSETS[unit] ?? 0) : 0;
}

export function resolveUnit(kindCode: number, flags: FlagNibbles): ResolvedUnit {
  const unit = getUnit(kindCode, flags);
  return { unit, exponentOffset: getExponentOffsetForUnit(unit) };
}

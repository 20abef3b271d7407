/**
 * Numeric and time helpers shared by the grading components
 */

import { differenceInMilliseconds, isValid, parseISO } from 'date-fns';

const MS_PER_HOUR = 60 * 60 * 1000;

/**
 * Clamp a value into [min, max]
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Cubic ease from 0 at x=0 to 1 at x=1, flat at both ends
 */
export function smoothstep(x: number): number {
  const t = clamp(x, 0, 1);
  return t * t * (3 - 2 * t);
}

/**
 * Saturating curve in (-1, 1); |x| much larger than scale approaches ±1
 */
export function saturate(x: number, scale: number): number {
  return Math.tanh(x / scale);
}

/**
 * Convert feed values such as 8.5, "8.5%", "$1,200" to numbers.
 * Empty, "N/A" and non-finite values become null.
 */
export function toNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== 'string') return null;

  const cleaned = value.replace(/[%$,]/g, '').trim();
  if (cleaned === '' || cleaned.toUpperCase() === 'N/A') return null;

  const parsed = Number(cleaned);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Accepts Date objects or ISO-8601 strings; anything unparseable becomes null
 */
export function toDate(value: unknown): Date | null {
  if (value instanceof Date) {
    return isValid(value) ? value : null;
  }
  if (typeof value !== 'string' || value.trim() === '') return null;

  const parsed = parseISO(value.trim());
  return isValid(parsed) ? parsed : null;
}

/**
 * Signed hours from `from` to `to`
 */
export function hoursBetween(from: Date, to: Date): number {
  return differenceInMilliseconds(to, from) / MS_PER_HOUR;
}

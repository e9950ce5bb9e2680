/**
 * Scalar value helpers
 *
 * Inbound JSON scalars become tagged values once, at the edge; every later
 * stage reads them through these helpers instead of coercing ad hoc.
 */

import type { RawScalar, ScalarValue } from '../core/types.js';

export const NULL_VALUE: ScalarValue = Object.freeze({ kind: 'null' });

export function toScalar(raw: RawScalar | undefined): ScalarValue {
  if (raw === null || raw === undefined) return NULL_VALUE;
  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? { kind: 'number', value: raw } : NULL_VALUE;
  }
  if (typeof raw === 'boolean') return { kind: 'bool', value: raw };
  return { kind: 'text', value: raw };
}

/** Null, or text that is empty once trimmed. */
export function isMissing(value: ScalarValue): boolean {
  if (value.kind === 'null') return true;
  return value.kind === 'text' && value.value.trim() === '';
}

const DECIMAL_TEXT = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/i;

/**
 * Numeric reading of a present value: numbers as-is, text in decimal or
 * exponent notation. Booleans and hex/binary/octal literals are not numeric.
 */
export function asNumber(value: ScalarValue): number | undefined {
  if (value.kind === 'number') return value.value;
  if (value.kind === 'text') {
    const trimmed = value.value.trim();
    if (!DECIMAL_TEXT.test(trimmed)) return undefined;
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

export function asBoolean(value: ScalarValue): boolean | undefined {
  if (value.kind === 'bool') return value.value;
  if (value.kind === 'text') {
    const lowered = value.value.trim().toLowerCase();
    if (lowered === 'true') return true;
    if (lowered === 'false') return false;
  }
  return undefined;
}

/** Stable key for equality checks; distinguishes kinds, so 1 and "1" differ. */
export function valueKey(value: ScalarValue): string {
  switch (value.kind) {
    case 'null':
      return 'n:';
    case 'number':
      return `d:${value.value}`;
    case 'bool':
      return `b:${value.value ? 1 : 0}`;
    case 'text':
      return `t:${JSON.stringify(value.value)}`;
  }
}

export function toRaw(value: ScalarValue): RawScalar {
  return value.kind === 'null' ? null : value.value;
}

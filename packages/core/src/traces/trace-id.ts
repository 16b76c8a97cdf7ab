/**
 * Trace ID codec
 * Converts between the high/low pair and its hex form
 */

import type { TraceId } from './types.js';

const UINT64_MAX = (1n << 64n) - 1n;
const HEX_PATTERN = /^[0-9a-fA-F]{1,32}$/;

/**
 * Format a trace id as lowercase hex.
 * 16 chars when the high half is zero, 32 otherwise.
 */
export function formatTraceId(traceId: TraceId): string {
  const low = traceId.low.toString(16).padStart(16, '0');
  if (traceId.high === 0n) {
    return low;
  }
  return traceId.high.toString(16).padStart(16, '0') + low;
}

/**
 * Parse a hex trace id of 1 to 32 characters.
 */
export function parseTraceId(hex: string): TraceId {
  const value = hex.trim();
  if (!HEX_PATTERN.test(value)) {
    throw new Error(`Invalid trace id: "${hex}". Expected 1 to 32 hex characters`);
  }

  if (value.length <= 16) {
    return { high: 0n, low: BigInt(`0x${value}`) };
  }

  const split = value.length - 16;
  return {
    high: BigInt(`0x${value.slice(0, split)}`),
    low: BigInt(`0x${value.slice(split)}`),
  };
}

/**
 * Grouping key for a trace id. Two ids share a key iff both halves match.
 */
export function traceIdKey(traceId: TraceId): string {
  return `${traceId.high.toString(16)}:${traceId.low.toString(16)}`;
}

/**
 * Whether both halves fit in an unsigned 64-bit integer.
 */
export function isValidTraceId(traceId: TraceId): boolean {
  return (
    traceId.high >= 0n &&
    traceId.high <= UINT64_MAX &&
    traceId.low >= 0n &&
    traceId.low <= UINT64_MAX
  );
}

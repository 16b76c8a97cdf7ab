/**
 * Trace summaries for listings
 */

import type { Trace, TraceId } from './types.js';

/**
 * One-line view of an assembled trace.
 */
export interface TraceSummary {
  traceId: TraceId;

  /** Service of the earliest span */
  rootService: string;

  /** Operation of the earliest span */
  rootOperation: string;

  spanCount: number;
  serviceCount: number;
  startTime: Date;

  /** From the earliest span start to the latest span end, in microseconds */
  duration: number;
}

/**
 * Summarize a trace. Returns null for a trace without spans.
 */
export function summarizeTrace(trace: Trace): TraceSummary | null {
  if (trace.spans.length === 0) {
    return null;
  }

  let root = trace.spans[0];
  let endUs = 0;
  for (const span of trace.spans) {
    if (span.startTime.getTime() < root.startTime.getTime()) {
      root = span;
    }
    endUs = Math.max(endUs, span.startTime.getTime() * 1000 + span.duration);
  }

  const services = new Map<string, string>();
  for (const mapping of trace.processMap) {
    services.set(mapping.processId, mapping.process.serviceName);
  }

  const startUs = root.startTime.getTime() * 1000;

  return {
    traceId: root.traceId,
    rootService: services.get(root.processId) ?? 'unknown',
    rootOperation: root.operationName,
    spanCount: trace.spans.length,
    serviceCount: new Set(services.values()).size,
    startTime: root.startTime,
    duration: endUs - startUs,
  };
}

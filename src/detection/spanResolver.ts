/**
 * Span Resolver
 * Merges pattern and model candidates into one ordered, non-overlapping set.
 */
import type { Span, SpanSource } from '../types/index.js';
import { typeRank } from './piiTypes.js';

const SOURCE_RANK: Record<SpanSource, number> = { PATTERN: 0, MODEL: 1 };

/**
 * Order: start ascending, longer first, PATTERN before MODEL, then type priority.
 */
export function compareCandidates(a: Span, b: Span): number {
  if (a.start !== b.start) return a.start - b.start;

  const lengthA = a.end - a.start;
  const lengthB = b.end - b.start;
  if (lengthA !== lengthB) return lengthB - lengthA;

  const sourceDiff = SOURCE_RANK[a.source] - SOURCE_RANK[b.source];
  if (sourceDiff !== 0) return sourceDiff;

  return typeRank(a.type) - typeRank(b.type);
}

/**
 * Greedy sweep: a candidate is accepted only if it does not overlap any
 * accepted span. Losing spans are dropped whole, never truncated.
 */
export function resolveSpans(candidates: readonly Span[]): Span[] {
  if (candidates.length === 0) return [];

  const sorted = [...candidates].sort(compareCandidates);
  const accepted: Span[] = [];
  // Accepted spans are disjoint and sorted, so only the last end matters.
  let lastEnd = -1;

  for (const span of sorted) {
    if (span.start < lastEnd) continue;
    accepted.push(span);
    lastEnd = span.end;
  }

  return accepted;
}

export function isNonOverlapping(spans: readonly Span[]): boolean {
  for (let i = 1; i < spans.length; i++) {
    const prev = spans[i - 1];
    const curr = spans[i];
    if (prev && curr && prev.end > curr.start) return false;
  }
  return true;
}

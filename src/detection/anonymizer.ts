/**
 * Anonymizer
 * Structure-preserving masking: letters and digits inside a span become the
 * mask character, separators keep their place.
 */
import type { PiiCounts, Span } from '../types/index.js';
import { detectPatterns, type PatternOptions } from './validatorRegistry.js';
import { resolveSpans } from './spanResolver.js';

export const DEFAULT_MASK_CHAR = 'x';

const ALPHANUMERIC = /[\p{L}\p{N}]/u;

export interface AnonymizeOptions {
  maskChar?: string;
}

export interface AnonymizationResult {
  anonymizedText: string;
  piiCounts: PiiCounts;
  hasPii: boolean;
}

/**
 * Mask a single value, keeping every non-alphanumeric character.
 */
export function maskValue(value: string, maskChar: string = DEFAULT_MASK_CHAR): string {
  let out = '';
  for (const ch of value) {
    // One mask per UTF-16 unit keeps offsets of astral characters intact.
    out += ALPHANUMERIC.test(ch) ? maskChar.repeat(ch.length) : ch;
  }
  return out;
}

/**
 * Render the anonymized text for a resolved (sorted, non-overlapping) span
 * set and count spans per type.
 */
export function anonymize(
  text: string,
  spans: readonly Span[],
  options: AnonymizeOptions = {},
): AnonymizationResult {
  const maskChar = options.maskChar ?? DEFAULT_MASK_CHAR;
  const piiCounts: PiiCounts = {};
  const parts: string[] = [];
  let cursor = 0;

  for (const span of spans) {
    parts.push(text.slice(cursor, span.start));
    parts.push(maskValue(text.slice(span.start, span.end), maskChar));
    cursor = span.end;
    piiCounts[span.type] = (piiCounts[span.type] ?? 0) + 1;
  }
  parts.push(text.slice(cursor));

  return {
    anonymizedText: parts.join(''),
    piiCounts,
    hasPii: spans.length > 0,
  };
}

/**
 * Pattern-only redaction, used to scrub log details.
 */
export function redactText(text: string, options: PatternOptions & AnonymizeOptions = {}): string {
  const spans = resolveSpans(detectPatterns(text, options));
  if (spans.length === 0) return text;
  return anonymize(text, spans, options).anonymizedText;
}

/**
 * Validator Registry
 * Deterministic pattern matchers for Brazilian PII, each match format- or
 * checksum-validated before it becomes a span.
 */
import type { PiiType, Span } from '../types/index.js';
import { isValidCnpj, isValidCpf, luhnCheck } from './checksums.js';
import { defaultPhoneValidator, type PhoneValidator } from './phoneValidator.js';
import { typeRank } from './piiTypes.js';

export type PatternType = Exclude<PiiType, 'PERSON_NAME' | 'LOCATION'>;

interface PatternDef {
  type: PatternType;
  patterns: RegExp[];
  validate?: (match: string) => boolean;
}

const PATTERN_DEFS: PatternDef[] = [
  { type: 'CPF', patterns: [/\b\d{3}\.?\d{3}\.?\d{3}-?\d{2}\b/g], validate: isValidCpf },
  { type: 'CNPJ', patterns: [/\b\d{2}\.?\d{3}\.?\d{3}\/?\d{4}-?\d{2}\b/g], validate: isValidCnpj },
  { type: 'CREDIT_CARD', patterns: [/\b(?:\d{4}[-\s]?){3}\d{4}\b/g], validate: luhnCheck },
  // SEI: 00000.000000/0000-00
  { type: 'SEI_PROCESS', patterns: [/\b\d{5}\.?\d{6}\/?\d{4}-?\d{2}\b/g] },
  { type: 'RG', patterns: [/\b\d{1,2}\.?\d{3}\.?\d{3}-?[\dxX]\b/g] },
  { type: 'CEP', patterns: [/\b\d{2}\.?\d{3}-?\d{3}\b/g] },
  { type: 'EMAIL', patterns: [/\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g] },
  {
    type: 'DATE_BIRTH',
    patterns: [/\b(?:0?[1-9]|[12]\d|3[01])[/-](?:0?[1-9]|1[0-2])[/-](?:19|20)\d{2}\b/g],
  },
];

// Candidate shapes only; validity is decided by the phone validator.
const PHONE_CANDIDATE_PATTERNS: RegExp[] = [
  // (61) 3333-4444, (11) 98765-4321
  /(?:\+55\s?)?\(\d{2}\)\s?(?:9\d{4}|[2-5]\d{3})[-\s]?\d{4}\b/g,
  // 11 98765-4321
  /(?:\+55\s?)?\b\d{2}\s(?:9\d{4}|[2-5]\d{3})[-\s]?\d{4}\b/g,
  // 11987654321, 6133334444
  /(?:\+55\s?)?\b\d{2}(?:9\d{8}|[2-5]\d{7})\b/g,
];

export interface PatternOptions {
  enabledTypes?: readonly PiiType[];
  phoneRegion?: string;
  phoneValidator?: PhoneValidator;
  /** Called once per text when the phone validator throws; phone candidates are then dropped. */
  onValidatorError?: (err: unknown) => void;
}

export interface PatternScan {
  spans: Span[];
  /** CPF-shaped candidates that failed the check digits and overlap no accepted span. */
  invalidCpfCount: number;
}

/**
 * Scan text for pattern-detectable PII. Never throws; unmatched or
 * malformed text yields no spans.
 */
export function detectPatterns(text: string, options: PatternOptions = {}): Span[] {
  return scanPatterns(text, options).spans;
}

/**
 * Like detectPatterns, also tallying checksum-rejected CPF candidates.
 */
export function scanPatterns(text: string, options: PatternOptions = {}): PatternScan {
  if (typeof text !== 'string' || text.length === 0) return { spans: [], invalidCpfCount: 0 };

  const enabled = new Set<PiiType>(options.enabledTypes ?? PATTERN_DEFS.map(d => d.type).concat('PHONE'));
  const candidates: Span[] = [];
  const rejectedCpfs: Span[] = [];

  for (const def of PATTERN_DEFS) {
    if (!enabled.has(def.type)) continue;
    for (const pattern of def.patterns) {
      for (const match of text.matchAll(new RegExp(pattern.source, pattern.flags))) {
        if (match.index === undefined) continue;
        const value = match[0];
        const span = patternSpan(def.type, match.index, value);
        if (def.validate && !def.validate(value)) {
          if (def.type === 'CPF') rejectedCpfs.push(span);
          continue;
        }
        candidates.push(span);
      }
    }
  }

  if (enabled.has('PHONE')) {
    candidates.push(...detectPhones(text, options));
  }

  const spans = keepLongestPerStart(candidates);
  const invalidCpfCount = rejectedCpfs.filter(r => !spans.some(s => s.start < r.end && r.start < s.end)).length;
  return { spans, invalidCpfCount };
}

function detectPhones(text: string, options: PatternOptions): Span[] {
  const validator = options.phoneValidator ?? defaultPhoneValidator;
  const region = options.phoneRegion ?? 'BR';
  const spans: Span[] = [];
  const seen = new Set<string>();

  for (const pattern of PHONE_CANDIDATE_PATTERNS) {
    for (const match of text.matchAll(new RegExp(pattern.source, pattern.flags))) {
      if (match.index === undefined) continue;
      const value = match[0];
      const key = `${match.index}:${value.length}`;
      if (seen.has(key)) continue;
      seen.add(key);

      try {
        if (!validator.validate(value, region).valid) continue;
      } catch (err) {
        options.onValidatorError?.(err);
        return [];
      }
      spans.push(patternSpan('PHONE', match.index, value));
    }
  }

  return spans;
}

function patternSpan(type: PiiType, start: number, value: string): Span {
  return { start, end: start + value.length, type, source: 'PATTERN', text: value };
}

/**
 * At each start offset keep the longest candidate; equal lengths fall back
 * to type priority.
 */
function keepLongestPerStart(candidates: Span[]): Span[] {
  const best = new Map<number, Span>();
  for (const span of candidates) {
    const current = best.get(span.start);
    if (!current || isPreferred(span, current)) {
      best.set(span.start, span);
    }
  }
  return [...best.values()].sort((a, b) => a.start - b.start);
}

function isPreferred(a: Span, b: Span): boolean {
  const lenA = a.end - a.start;
  const lenB = b.end - b.start;
  if (lenA !== lenB) return lenA > lenB;
  return typeRank(a.type) < typeRank(b.type);
}

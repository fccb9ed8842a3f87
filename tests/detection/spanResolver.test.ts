/**
 * Tests for span conflict resolution
 */
import { describe, it, expect } from 'vitest';
import { resolveSpans, isNonOverlapping, compareCandidates } from '../../src/detection/spanResolver.js';
import { PII_TYPES, type PiiType, type Span, type SpanSource } from '../../src/types/index.js';

function span(start: number, end: number, type: PiiType, source: SpanSource = 'PATTERN'): Span {
  return { start, end, type, source, text: 'x'.repeat(end - start) };
}

describe('resolveSpans', () => {
  it('should return an empty list for no candidates', () => {
    expect(resolveSpans([])).toEqual([]);
  });

  it('should keep disjoint spans and sort them by start', () => {
    const a = span(20, 25, 'EMAIL');
    const b = span(0, 5, 'CPF');
    expect(resolveSpans([a, b])).toEqual([b, a]);
  });

  it('should keep adjacent spans', () => {
    const a = span(0, 5, 'CPF');
    const b = span(5, 10, 'EMAIL');
    expect(resolveSpans([b, a])).toEqual([a, b]);
  });

  it('should drop a span that starts inside an accepted one', () => {
    const name = span(0, 10, 'PERSON_NAME', 'MODEL');
    const cpf = span(5, 15, 'CPF');
    expect(resolveSpans([cpf, name])).toEqual([name]);
  });

  it('should prefer the longer span at the same start', () => {
    const cpf = span(0, 14, 'CPF');
    const rg = span(0, 10, 'RG');
    expect(resolveSpans([rg, cpf])).toEqual([cpf]);
  });

  it('should prefer PATTERN over MODEL at identical offsets', () => {
    const location = span(4, 18, 'LOCATION', 'MODEL');
    const cep = span(4, 18, 'CEP', 'PATTERN');
    expect(resolveSpans([location, cep])).toEqual([cep]);
  });

  it('should fall back to type priority when source and offsets tie', () => {
    const phone = span(0, 11, 'PHONE');
    const cpf = span(0, 11, 'CPF');
    expect(resolveSpans([phone, cpf])).toEqual([cpf]);
  });

  it('should return accepted spans unchanged, never truncated', () => {
    const name = span(0, 10, 'PERSON_NAME', 'MODEL');
    const email = span(8, 30, 'EMAIL');
    const [only] = resolveSpans([email, name]);
    expect(only).toBe(name);
  });

  it('should produce a sorted, non-overlapping subset for arbitrary input', () => {
    let state = 99;
    const next = (max: number): number => {
      state = (state * 16807) % 2147483647;
      return state % max;
    };

    for (let round = 0; round < 100; round++) {
      const candidates: Span[] = [];
      const count = 1 + next(12);
      for (let i = 0; i < count; i++) {
        const start = next(50);
        const type = PII_TYPES[next(PII_TYPES.length)] ?? 'CPF';
        candidates.push(span(start, start + 1 + next(10), type, next(2) === 0 ? 'PATTERN' : 'MODEL'));
      }

      const resolved = resolveSpans(candidates);
      expect(isNonOverlapping(resolved)).toBe(true);
      expect(resolved.length).toBeGreaterThan(0);
      for (const accepted of resolved) {
        expect(candidates).toContain(accepted);
      }
      const starts = resolved.map(s => s.start);
      expect(starts).toEqual([...starts].sort((a, b) => a - b));
    }
  });
});

describe('compareCandidates', () => {
  it('should order by start before anything else', () => {
    expect(compareCandidates(span(1, 2, 'CPF'), span(0, 20, 'LOCATION', 'MODEL'))).toBeGreaterThan(0);
  });
});

describe('isNonOverlapping', () => {
  it('should detect overlaps', () => {
    expect(isNonOverlapping([span(0, 5, 'CPF'), span(4, 8, 'RG')])).toBe(false);
    expect(isNonOverlapping([span(0, 5, 'CPF'), span(5, 8, 'RG')])).toBe(true);
  });
});

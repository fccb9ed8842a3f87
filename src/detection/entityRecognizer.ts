/**
 * Entity Recognizer Adapter
 * Maps an external recognizer's (start, end, label) output onto MODEL spans.
 * No linguistic analysis happens here.
 */
import { z } from 'zod';
import type { PiiType, Span } from '../types/index.js';
import { auditWarn } from '../audit/auditLogger.js';
import { DetectorError } from '../core/errors.js';

export interface RecognizedEntity {
  start: number;
  end: number;
  label: string;
}

/**
 * Capability interface for any entity recognizer (NER model, service,
 * dictionary). Offsets are zero-based with an exclusive end, into exactly
 * the text passed in. Must be deterministic for identical input.
 */
export interface EntityRecognizer {
  readonly name: string;
  recognize(text: string): RecognizedEntity[] | Promise<RecognizedEntity[]>;
}

export type ModelPiiType = Extract<PiiType, 'PERSON_NAME' | 'LOCATION'>;

export const DEFAULT_LABEL_MAP: Readonly<Record<string, ModelPiiType>> = {
  PER: 'PERSON_NAME',
  PERSON: 'PERSON_NAME',
  PERSON_NAME: 'PERSON_NAME',
  LOC: 'LOCATION',
  LOCATION: 'LOCATION',
  GPE: 'LOCATION',
};

export interface EntityOptions {
  labelMap?: Readonly<Record<string, ModelPiiType>>;
  /** Person spans with fewer whitespace-separated words are dropped. */
  minPersonNameWords?: number;
}

export interface EntityDetection {
  spans: Span[];
  /** Entities dropped for contract violations (bad offsets). */
  rejected: number;
}

/** Shape check only; offsets are checked against the text separately. */
const RecognizedEntitySchema = z.object({
  start: z.number(),
  end: z.number(),
  label: z.string(),
});

export function isValidOffsetPair(start: unknown, end: unknown, textLength: number): boolean {
  return (
    typeof start === 'number' &&
    typeof end === 'number' &&
    Number.isInteger(start) &&
    Number.isInteger(end) &&
    start >= 0 &&
    start < end &&
    end <= textLength
  );
}

/**
 * Translate recognizer output into MODEL spans. Unknown labels are
 * dropped; malformed entries and invalid offsets are dropped, logged and
 * counted in `rejected`. A throwing or rejecting recognizer, or a
 * non-array result, surfaces as DetectorError.
 */
export async function detectEntities(
  text: string,
  recognizer: EntityRecognizer,
  options: EntityOptions = {},
): Promise<EntityDetection> {
  if (text.length === 0) return { spans: [], rejected: 0 };

  let output: unknown;
  try {
    output = await recognizer.recognize(text);
  } catch (err) {
    throw new DetectorError('entity-recognizer', `${recognizer.name} failed: ${err instanceof Error ? err.message : String(err)}`, err);
  }
  if (!Array.isArray(output)) {
    throw new DetectorError('entity-recognizer', `${recognizer.name} returned a non-array result`);
  }
  const entries: readonly unknown[] = output;

  const labelMap = options.labelMap ?? DEFAULT_LABEL_MAP;
  const minWords = options.minPersonNameWords ?? 1;
  const spans: Span[] = [];
  let rejected = 0;

  for (const [index, entry] of entries.entries()) {
    const parsed = RecognizedEntitySchema.safeParse(entry);
    if (!parsed.success) {
      rejected++;
      auditWarn('detector_contract_violation', {
        details: {
          detector: recognizer.name,
          index,
          error: parsed.error.issues.map(i => `${i.path.join('.') || '(entry)'}: ${i.message}`).join('; '),
        },
      });
      continue;
    }
    const entity = parsed.data;
    const type = Object.hasOwn(labelMap, entity.label) ? labelMap[entity.label] : undefined;
    if (!type) continue;

    if (!isValidOffsetPair(entity.start, entity.end, text.length)) {
      rejected++;
      auditWarn('detector_contract_violation', {
        details: {
          detector: recognizer.name,
          label: entity.label,
          start: entity.start,
          end: entity.end,
          textLength: text.length,
        },
      });
      continue;
    }

    const { start, end } = entity;
    const value = text.slice(start, end);
    if (type === 'PERSON_NAME' && countWords(value) < minWords) continue;

    spans.push({ start, end, type, source: 'MODEL', text: value });
  }

  return { spans, rejected };
}

function countWords(value: string): number {
  return value.split(/\s+/).filter(w => w.length > 0).length;
}

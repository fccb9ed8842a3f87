/**
 * Dictionary Recognizer
 * Model-free EntityRecognizer: person names from common first-name/surname
 * lists, locations from street-keyword phrases. Emits PER and LOC labels.
 */
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { EntityRecognizer, RecognizedEntity } from './entityRecognizer.js';

const DEFAULT_LEXICON_PATH = fileURLToPath(new URL('../../data/names.json', import.meta.url));

export const LexiconSchema = z.object({
  firstNames: z.array(z.string().min(1)),
  surnames: z.array(z.string().min(1)),
  streetKeywords: z.array(z.string().min(1)).default([]),
});
export type Lexicon = z.infer<typeof LexiconSchema>;

const PARTICLE = '(?:da|de|do|das|dos|e)';
const CAPITALISED = '\\p{Lu}\\p{Ll}+';
// Two or more capitalised words, optionally joined by lowercase particles.
const NAME_RUN = new RegExp(`${CAPITALISED}(?:\\s+(?:${PARTICLE}\\s+)?${CAPITALISED})+`, 'gu');
const WORD = new RegExp(CAPITALISED, 'gu');

export function normalizeWord(word: string): string {
  return word.normalize('NFD').replace(/\p{M}/gu, '').toLowerCase();
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export class DictionaryRecognizer implements EntityRecognizer {
  readonly name = 'dictionary';
  private readonly names: Set<string>;
  private readonly addressPattern: RegExp | null;

  constructor(lexicon: Lexicon) {
    this.names = new Set([...lexicon.firstNames, ...lexicon.surnames].map(normalizeWord));
    this.addressPattern = lexicon.streetKeywords.length > 0
      ? new RegExp(
        `(?<![\\p{L}\\p{N}])(?:${lexicon.streetKeywords.map(escapeRegExp).join('|')})\\s+` +
        `(?:${PARTICLE}\\s+)?\\p{Lu}\\p{Ll}*(?:\\s+(?:${PARTICLE}\\s+)?(?:\\p{Lu}\\p{Ll}*|\\d+))*`,
        'gu',
      )
      : null;
  }

  /**
   * Load a lexicon JSON file (defaults to the bundled data/names.json).
   */
  static fromFile(path: string = DEFAULT_LEXICON_PATH): DictionaryRecognizer {
    const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
    return new DictionaryRecognizer(LexiconSchema.parse(raw));
  }

  recognize(text: string): RecognizedEntity[] {
    return [...this.findPersons(text), ...this.findAddresses(text)];
  }

  private findPersons(text: string): RecognizedEntity[] {
    const entities: RecognizedEntity[] = [];

    for (const run of text.matchAll(NAME_RUN)) {
      if (run.index === undefined) continue;
      const words = [...run[0].matchAll(WORD)];

      // Leading capitalised words that are not names ("Contato", "Senhor") are trimmed.
      const firstKnown = words.findIndex(w => this.names.has(normalizeWord(w[0])));
      if (firstKnown === -1 || words.length - firstKnown < 2) continue;

      const first = words[firstKnown];
      if (!first || first.index === undefined) continue;
      entities.push({
        start: run.index + first.index,
        end: run.index + run[0].length,
        label: 'PER',
      });
    }

    return entities;
  }

  private findAddresses(text: string): RecognizedEntity[] {
    if (!this.addressPattern) return [];
    const entities: RecognizedEntity[] = [];
    for (const match of text.matchAll(this.addressPattern)) {
      if (match.index === undefined) continue;
      entities.push({ start: match.index, end: match.index + match[0].length, label: 'LOC' });
    }
    return entities;
  }
}

/**
 * Recognizer used when no model is configured.
 */
export class NullRecognizer implements EntityRecognizer {
  readonly name = 'none';

  recognize(): RecognizedEntity[] {
    return [];
  }
}

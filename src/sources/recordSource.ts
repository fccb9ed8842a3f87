/**
 * Record Source
 * Streams (recordId, text) pairs from plain-text or JSON-lines files.
 */
import { createReadStream, existsSync, statSync } from 'node:fs';
import { createInterface } from 'node:readline';
import { extname } from 'node:path';
import { z } from 'zod';
import type { SourceRecord } from '../types/index.js';
import { InputFileError } from '../core/errors.js';
import { auditWarn } from '../audit/auditLogger.js';

export const ALLOWED_EXTENSIONS = new Set(['.txt', '.jsonl']);

const JsonlRecordSchema = z.object({
  id: z.union([z.string().min(1), z.number().int()]),
  text: z.string(),
});

/**
 * Check that the input exists, has an allowed extension and fits the size limit.
 */
export function validateInputFile(path: string, maxBytes: number): void {
  if (!existsSync(path)) {
    throw new InputFileError(path, `Input file not found: ${path}`);
  }

  const ext = extname(path).toLowerCase();
  if (!ext) {
    throw new InputFileError(path, 'Input file has no extension');
  }
  if (!ALLOWED_EXTENSIONS.has(ext)) {
    throw new InputFileError(path, `Extension '${ext}' not allowed. Allowed: ${[...ALLOWED_EXTENSIONS].join(', ')}`);
  }

  const size = statSync(path).size;
  if (size > maxBytes) {
    const mb = (n: number) => (n / (1024 * 1024)).toFixed(2);
    throw new InputFileError(path, `Input file too large: ${mb(size)}MB (max ${mb(maxBytes)}MB)`);
  }
}

/**
 * Yield records from a .txt (one record per non-empty line, id = line
 * number) or .jsonl ({ "id", "text" } per line) file. Malformed JSONL
 * lines are logged and skipped.
 */
export async function* readRecords(path: string): AsyncGenerator<SourceRecord> {
  const jsonl = extname(path).toLowerCase() === '.jsonl';
  const lines = createInterface({ input: createReadStream(path, { encoding: 'utf-8' }), crlfDelay: Infinity });
  let lineNumber = 0;

  for await (const line of lines) {
    lineNumber++;
    if (line.trim() === '') continue;

    if (!jsonl) {
      yield { recordId: String(lineNumber), text: line };
      continue;
    }

    const record = parseJsonlLine(line);
    if (!record) {
      auditWarn('malformed_record_skipped', { details: { path, line: lineNumber } });
      continue;
    }
    yield record;
  }
}

export function parseJsonlLine(line: string): SourceRecord | null {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return null;
  }
  const parsed = JsonlRecordSchema.safeParse(raw);
  if (!parsed.success) return null;
  return { recordId: String(parsed.data.id), text: parsed.data.text };
}

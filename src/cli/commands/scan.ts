/**
 * CLI: piiscan scan <file>
 * Scan a record file, write anonymized records and print the risk report.
 */
import { createWriteStream, type WriteStream } from 'node:fs';
import { once } from 'node:events';
import { basename } from 'node:path';
import { randomUUID } from 'node:crypto';
import type { ProcessReport, ScannerConfig } from '../../types/index.js';
import { PiiScanner } from '../../core/scanner.js';
import { processBatch } from '../../core/batchRunner.js';
import { readRecords, validateInputFile } from '../../sources/recordSource.js';
import { printReport } from '../../report/textReport.js';
import { renderReportPdf } from '../../report/pdfReport.js';
import { auditError, auditInfo, auditWarn } from '../../audit/auditLogger.js';
import { OutputFileError } from '../../core/errors.js';

export interface ScanArgs {
  file?: string;
  out?: string;
  pdf?: string;
  json: boolean;
  processId?: string;
}

export function parseScanArgs(args: string[]): ScanArgs {
  const flag = (name: string): string | undefined => {
    const idx = args.indexOf(name);
    return idx !== -1 ? args[idx + 1] : undefined;
  };
  const valued = new Set(['--out', '--pdf', '--process-id', '--config']);
  const positional = args.filter((a, i) => !a.startsWith('--') && !valued.has(args[i - 1] ?? ''));

  return {
    file: positional[0],
    out: flag('--out'),
    pdf: flag('--pdf'),
    json: args.includes('--json'),
    processId: flag('--process-id'),
  };
}

/**
 * Open the anonymized-records file, failing before any record is scanned
 * when the path cannot be created.
 */
async function openOutput(path: string): Promise<WriteStream> {
  const out = createWriteStream(path, { encoding: 'utf-8', mode: 0o600 });
  try {
    await once(out, 'open');
  } catch (err) {
    throw new OutputFileError(path, err);
  }
  return out;
}

/** Resolves once the line is flushed. */
function writeLine(out: WriteStream, path: string, line: string): Promise<void> {
  return new Promise((resolve, reject) => {
    out.write(line, err => (err ? reject(new OutputFileError(path, err)) : resolve()));
  });
}

function closeOutput(out: WriteStream): Promise<void> {
  if (out.destroyed) return Promise.resolve();
  return new Promise(resolve => out.end(resolve));
}

export async function scanCommand(config: ScannerConfig, args: ScanArgs): Promise<ProcessReport> {
  if (!args.file) {
    console.error('Usage: piiscan scan <file.txt|file.jsonl> [--out anonymized.jsonl] [--json] [--pdf report.pdf]');
    process.exit(1);
  }

  validateInputFile(args.file, config.batch.maxInputBytes);

  const processId = args.processId ?? randomUUID();
  const scanner = PiiScanner.fromConfig(config);
  const outPath = args.out;
  const out = outPath ? await openOutput(outPath) : undefined;

  const controller = new AbortController();
  const onSigint = () => {
    auditWarn('scan_interrupted', { processId });
    controller.abort();
  };
  process.once('SIGINT', onSigint);
  out?.on('error', err => {
    auditError('output_write_failed', { processId, details: { error: err.message } });
    controller.abort();
  });

  auditInfo('scan_started', { processId, details: { file: basename(args.file) } });
  const startedAt = performance.now();

  try {
    const outcome = await processBatch(readRecords(args.file), scanner, {
      processId,
      concurrency: config.batch.concurrency,
      highVolumeThreshold: config.risk.highVolumeThreshold,
      signal: controller.signal,
      onRecord: out && outPath
        ? result => writeLine(out, outPath, JSON.stringify(result) + '\n')
        : undefined,
    });

    const report = outcome.aggregator.finalize({
      processingTimeSeconds: (performance.now() - startedAt) / 1000,
      incomplete: outcome.incomplete,
    });

    auditInfo('scan_finished', {
      processId,
      details: { records: report.totalRecords, riskLevel: report.riskLevel, incomplete: report.incomplete },
    });

    if (args.json) {
      console.log(JSON.stringify({ generatedAt: new Date().toISOString(), file: basename(args.file), report }, null, 2));
    } else {
      printReport(report);
    }

    if (args.pdf) {
      await renderReportPdf(report, args.pdf);
      auditInfo('report_pdf_written', { processId, details: { path: args.pdf } });
      if (!args.json) console.log(`  PDF report: ${args.pdf}\n`);
    }

    return report;
  } finally {
    process.off('SIGINT', onSigint);
    if (out) await closeOutput(out);
  }
}

/**
 * Console rendering of a finalized ProcessReport.
 */
import { RISK_LEVELS, type ProcessReport, type RecordTypeCount, type RiskLevel } from '../types/index.js';

const RESET = '\x1b[0m';

const RISK_COLORS: Record<RiskLevel, string> = {
  CRITICO: '\x1b[91m',
  ALTO: '\x1b[33m',
  MEDIO: '\x1b[93m',
  BAIXO: '\x1b[32m',
  MINIMO: '\x1b[90m',
};

const RULE = '  ─────────────────────────────────────────';

export function colorRisk(level: RiskLevel): string {
  return `${RISK_COLORS[level]}${level}${RESET}`;
}

/**
 * `#3 (2x), #7 (1x), ... +4` for the first `limit` records of a type.
 */
export function summarizeRecords(entries: readonly RecordTypeCount[], limit = 5): string {
  const shown = entries.slice(0, limit).map(e => `#${e.recordId} (${e.count}x)`);
  const rest = entries.length - shown.length;
  if (rest > 0) shown.push(`... +${rest}`);
  return shown.join(', ');
}

export function invalidCpfAlert(count: number): string {
  return `${count} CPF-shaped value(s) failed check-digit validation and were left unmasked`;
}

/**
 * Multi-line console report. `color: false` strips ANSI codes.
 */
export function formatReport(report: ProcessReport, opts: { color?: boolean } = {}): string {
  const lines: string[] = [];
  const risk = opts.color === false ? report.riskLevel : colorRisk(report.riskLevel);

  lines.push('');
  lines.push(`  PII Scan Report (${report.processId})`);
  lines.push(RULE);
  lines.push(`  Risk level: ${risk}${report.incomplete ? ' (incomplete batch)' : ''}`);
  lines.push(`  ${report.riskDescription}`);
  lines.push('');
  lines.push(`  ${'Records analysed'.padEnd(28)} ${report.totalRecords}`);
  lines.push(`  ${'Records with PII'.padEnd(28)} ${report.recordsWithPii}`);
  lines.push(`  ${'Records without PII'.padEnd(28)} ${report.recordsWithoutPii}`);
  lines.push(`  ${'Partially processed'.padEnd(28)} ${report.partialRecords}`);
  lines.push(`  ${'PII rate'.padEnd(28)} ${report.piiRatePercentage.toFixed(2)}%`);
  lines.push(`  ${'Processing time'.padEnd(28)} ${report.processingTimeSeconds.toFixed(2)}s`);

  lines.push('');
  lines.push('  Detections by type');
  lines.push(RULE);
  if (report.piiBreakdown.length === 0) {
    lines.push('  (none)');
  }
  for (const entry of report.piiBreakdown) {
    lines.push(`  ${entry.type.padEnd(12)} ${String(entry.count).padStart(6)}  ${entry.percentage.toFixed(2).padStart(6)}%  ${entry.description}`);
  }

  if (report.piiBreakdown.length > 0) {
    lines.push('');
    lines.push('  Records by type');
    lines.push(RULE);
    for (const entry of report.piiBreakdown) {
      lines.push(`  ${entry.type.padEnd(12)} ${summarizeRecords(report.recordsByType[entry.type] ?? [])}`);
    }
  }

  lines.push('');
  lines.push('  Records by risk');
  lines.push(RULE);
  for (const level of [...RISK_LEVELS].reverse()) {
    const label = opts.color === false ? level : colorRisk(level);
    lines.push(`  ${label} ${report.recordsByRisk[level]}`);
  }

  if (report.invalidCpfCount > 0) {
    lines.push('');
    lines.push('  Quality alerts');
    lines.push(RULE);
    lines.push(`  ! ${invalidCpfAlert(report.invalidCpfCount)}`);
  }

  lines.push('');
  lines.push('  Recommendations');
  lines.push(RULE);
  for (const rec of report.recommendations) {
    lines.push(`  - ${rec}`);
  }
  lines.push('');

  return lines.join('\n');
}

export function printReport(report: ProcessReport): void {
  console.log(formatReport(report, { color: process.stdout.isTTY === true }));
}

/**
 * CLI: piiscan audit
 * View the audit log.
 */
import { readFileSync, existsSync } from 'node:fs';
import { z } from 'zod';
import type { ScannerConfig, AuditEntry } from '../../types/index.js';
import { resolvePath } from '../../core/config.js';

export async function auditViewCommand(config: ScannerConfig, tail: number = 50): Promise<void> {
  const logPath = resolvePath(config.audit.logPath);

  if (!existsSync(logPath)) {
    console.log('No audit log found yet.');
    return;
  }

  const lines = readFileSync(logPath, 'utf-8').trim().split('\n');
  const entries = lines.slice(-Math.max(1, tail));

  console.log(`\n  Audit Log (last ${entries.length} entries)\n`);
  console.log('  ─────────────────────────────────────────\n');

  for (const line of entries) {
    const entry = parseEntry(line);
    if (!entry) continue;
    const severityColor = entry.severity === 'CRITICAL' ? '\x1b[91m'
      : entry.severity === 'ERROR' ? '\x1b[31m'
      : entry.severity === 'WARN' ? '\x1b[33m'
      : '\x1b[90m';
    const time = entry.timestamp.slice(11, 19);
    const scope = entry.recordId ? ` [record ${entry.recordId}]` : '';
    console.log(`  ${time} ${severityColor}${entry.severity.padEnd(8)}\x1b[0m ${entry.event}${scope}`);
  }

  console.log(`\n  Total entries: ${lines.length}`);
  console.log(`  Log path: ${logPath}\n`);
}

const AuditLineSchema = z.object({
  timestamp: z.string(),
  severity: z.enum(['INFO', 'WARN', 'ERROR', 'CRITICAL']),
  event: z.string(),
  recordId: z.string().optional(),
});

function parseEntry(line: string): AuditEntry | null {
  try {
    const parsed = AuditLineSchema.safeParse(JSON.parse(line));
    return parsed.success ? parsed.data : null;
  } catch {
    // skip malformed lines
    return null;
  }
}

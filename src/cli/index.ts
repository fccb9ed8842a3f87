#!/usr/bin/env node
/**
 * piiscan CLI
 * Main entry point for all commands.
 */
import { loadConfig, ensurePiiscanDir } from '../core/config.js';
import { initAuditLog } from '../audit/auditLogger.js';
import { scanCommand, parseScanArgs } from './commands/scan.js';
import { auditViewCommand } from './commands/auditView.js';

const USAGE = `
piiscan: PII detection, anonymization and LGPD risk reports

Usage:
  piiscan scan <file>               Scan a .txt (one record per line) or .jsonl file
      --out <path>                  Write anonymized records as JSON lines
      --json                        Print the report as JSON
      --pdf <path>                  Also render the report as PDF
      --process-id <id>             Use a fixed process id (default: random UUID)
  piiscan audit [--tail N]          View the audit log

Options:
  --config <path>   Config file (default: ~/.piiscan/piiscan.json)
  --help, -h        Show this help
  --version         Show version
`.trim();

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  if (args.includes('--help') || args.includes('-h') || args.length === 0) {
    console.log(USAGE);
    process.exit(0);
  }

  if (args.includes('--version')) {
    console.log('piiscan v1.0.0');
    process.exit(0);
  }

  const configFlag = args.indexOf('--config');
  const configPath = configFlag !== -1 ? args[configFlag + 1] : undefined;

  try {
    ensurePiiscanDir();
    const config = loadConfig(configPath);
    initAuditLog(config.audit.logPath);

    const command = args[0];

    switch (command) {
      case 'scan': {
        const report = await scanCommand(config, parseScanArgs(args.slice(1)));
        if (report.incomplete) process.exitCode = 2;
        break;
      }

      case 'audit': {
        const tailFlag = args.indexOf('--tail');
        const tail = tailFlag !== -1 ? parseInt(args[tailFlag + 1] ?? '50', 10) : 50;
        await auditViewCommand(config, Number.isNaN(tail) ? 50 : tail);
        break;
      }

      default:
        console.error(`Unknown command: ${command}`);
        console.log(USAGE);
        process.exit(1);
    }
  } catch (err) {
    console.error(`Fatal error: ${err instanceof Error ? err.message : err}`);
    process.exit(1);
  }
}

void main();

/**
 * Tests for the audit logger
 * JSONL output, severity helpers, PII scrubbing of details
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { readFileSync, mkdtempSync, rmSync, existsSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

vi.mock('../../src/core/config.js', () => ({
  resolvePath: vi.fn((p: string) => p),
}));

import {
  audit,
  auditInfo,
  auditWarn,
  auditError,
  auditCritical,
  initAuditLog,
  getAuditLogPath,
} from '../../src/audit/auditLogger.js';

describe('auditLogger', () => {
  let tmpDir: string;
  let logFile: string;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), 'piiscan-audit-test-'));
    logFile = join(tmpDir, 'logs', 'audit.jsonl');
    initAuditLog(logFile);
  });

  afterEach(() => {
    if (existsSync(tmpDir)) {
      rmSync(tmpDir, { recursive: true, force: true });
    }
  });

  function readLogEntries(): Array<Record<string, unknown>> {
    if (!existsSync(logFile)) return [];
    return readFileSync(logFile, 'utf-8')
      .trim()
      .split('\n')
      .filter(Boolean)
      .map(line => JSON.parse(line));
  }

  function detailsOf(entry: Record<string, unknown> | undefined): Record<string, unknown> {
    const details = entry?.['details'];
    return typeof details === 'object' && details !== null ? { ...details } : {};
  }

  // ── Basic logging ───────────────────────────────────────────

  describe('basic logging', () => {
    it('should create the log directory on init', () => {
      expect(existsSync(join(tmpDir, 'logs'))).toBe(true);
      expect(getAuditLogPath()).toBe(logFile);
    });

    it('should write one JSONL entry per call', () => {
      audit('INFO', 'event_1');
      audit('WARN', 'event_2');
      const entries = readLogEntries();
      expect(entries.map(e => e['event'])).toEqual(['event_1', 'event_2']);
    });

    it('should include an ISO timestamp', () => {
      audit('INFO', 'timestamp_test');
      expect(readLogEntries()[0]?.['timestamp']).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}/);
    });

    it('should include processId and recordId when provided', () => {
      audit('INFO', 'record_test', { processId: 'proc-1', recordId: '42' });
      const [entry] = readLogEntries();
      expect(entry?.['processId']).toBe('proc-1');
      expect(entry?.['recordId']).toBe('42');
    });

    it('should omit undefined optional fields', () => {
      audit('INFO', 'minimal_test');
      const [entry] = readLogEntries();
      expect(entry).toBeDefined();
      expect(Object.keys(entry ?? {}).sort()).toEqual(['event', 'severity', 'timestamp']);
    });
  });

  // ── Severity levels ─────────────────────────────────────────

  describe('severity levels', () => {
    it('should tag each helper with its severity', () => {
      const stderrSpy = vi.spyOn(process.stderr, 'write').mockReturnValue(true);
      auditInfo('a');
      auditWarn('b');
      auditError('c');
      auditCritical('d');
      stderrSpy.mockRestore();

      expect(readLogEntries().map(e => e['severity'])).toEqual(['INFO', 'WARN', 'ERROR', 'CRITICAL']);
    });

    it('should echo CRITICAL events to stderr', () => {
      const stderrSpy = vi.spyOn(process.stderr, 'write').mockReturnValue(true);
      auditCritical('input_rejected');
      expect(stderrSpy).toHaveBeenCalledWith(expect.stringContaining('[CRITICAL AUDIT] input_rejected'));
      stderrSpy.mockRestore();
    });

    it('should fall back to stderr when the log cannot be written', () => {
      const stderrSpy = vi.spyOn(process.stderr, 'write').mockReturnValue(true);
      rmSync(tmpDir, { recursive: true, force: true });
      auditInfo('fallback_test');
      expect(stderrSpy).toHaveBeenCalledWith(expect.stringContaining('[AUDIT-FALLBACK]'));
      stderrSpy.mockRestore();
    });
  });

  // ── PII scrubbing ──────────────────────────────────────────

  describe('PII scrubbing', () => {
    it('should mask CPF values inside string details', () => {
      audit('WARN', 'pii_test', { details: { note: 'CPF 123.456.789-09 invalid' } });
      expect(detailsOf(readLogEntries()[0])['note']).toBe('CPF xxx.xxx.xxx-xx invalid');
    });

    it('should mask email addresses inside string details', () => {
      audit('WARN', 'pii_test', { details: { sender: 'ana@example.com' } });
      expect(detailsOf(readLogEntries()[0])['sender']).toBe('xxx@xxxxxxx.xxx');
    });

    it('should not modify non-string values', () => {
      audit('INFO', 'counts', { details: { count: 42, active: true } });
      expect(detailsOf(readLogEntries()[0])).toEqual({ count: 42, active: true });
    });
  });
});

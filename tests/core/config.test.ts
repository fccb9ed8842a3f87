/**
 * Tests for config loading and env overrides
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { homedir, tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadConfig, resolvePath, resolveSetting } from '../../src/core/config.js';
import { ConfigError } from '../../src/core/errors.js';

describe('config', () => {
  let tmpDir: string;
  let configFile: string;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), 'piiscan-config-test-'));
    configFile = join(tmpDir, 'piiscan.json');
    delete process.env['PIISCAN_AUDIT_LOG'];
    delete process.env['PIISCAN_HIGH_VOLUME_THRESHOLD'];
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
    delete process.env['PIISCAN_AUDIT_LOG'];
    delete process.env['PIISCAN_HIGH_VOLUME_THRESHOLD'];
  });

  function writeConfig(value: unknown): void {
    writeFileSync(configFile, JSON.stringify(value));
  }

  // ── Defaults and overrides ──────────────────────────────────

  it('should fill defaults for an empty file', () => {
    writeConfig({});
    const config = loadConfig(configFile);

    expect(config.detection.phoneRegion).toBe('BR');
    expect(config.detection.maskChar).toBe('x');
    expect(config.detection.enabledTypes).toHaveLength(11);
    expect(config.recognizer.kind).toBe('dictionary');
    expect(config.risk.highVolumeThreshold).toBe(10);
    expect(config.batch.concurrency).toBe(4);
    expect(config.audit.logPath).toBe('~/.piiscan/audit.jsonl');
  });

  it('should read values from the file', () => {
    writeConfig({ risk: { highVolumeThreshold: 5 }, detection: { maskChar: '#', enabledTypes: ['CPF', 'EMAIL'] } });
    const config = loadConfig(configFile);

    expect(config.risk.highVolumeThreshold).toBe(5);
    expect(config.detection.maskChar).toBe('#');
    expect(config.detection.enabledTypes).toEqual(['CPF', 'EMAIL']);
  });

  it('should let env vars override file values', () => {
    writeConfig({ risk: { highVolumeThreshold: 5 } });
    process.env['PIISCAN_AUDIT_LOG'] = '/var/log/piiscan.jsonl';
    process.env['PIISCAN_HIGH_VOLUME_THRESHOLD'] = '25';

    const config = loadConfig(configFile);

    expect(config.audit.logPath).toBe('/var/log/piiscan.jsonl');
    expect(config.risk.highVolumeThreshold).toBe(25);
  });

  // ── Errors ──────────────────────────────────────────────────

  it('should reject a non-integer threshold from env', () => {
    writeConfig({});
    process.env['PIISCAN_HIGH_VOLUME_THRESHOLD'] = 'many';
    expect(() => loadConfig(configFile)).toThrow(ConfigError);
    expect(() => loadConfig(configFile)).toThrow(
      'PIISCAN_HIGH_VOLUME_THRESHOLD must be a non-negative integer, got "many"',
    );
  });

  it('should reject invalid JSON', () => {
    writeFileSync(configFile, '{ not json');
    expect(() => loadConfig(configFile)).toThrow(ConfigError);
  });

  it('should reject values that fail the schema', () => {
    writeConfig({ batch: { concurrency: 0 } });
    expect(() => loadConfig(configFile)).toThrow(/Invalid config .*batch\.concurrency/);
  });

  it('should reject unknown PII types', () => {
    writeConfig({ detection: { enabledTypes: ['SSN'] } });
    expect(() => loadConfig(configFile)).toThrow(ConfigError);
  });

  it('should reject a missing explicit config path', () => {
    expect(() => loadConfig(join(tmpDir, 'missing.json'))).toThrow(`Config file not found: ${join(tmpDir, 'missing.json')}`);
  });
});

describe('resolvePath', () => {
  it('should expand a leading tilde', () => {
    expect(resolvePath('~/.piiscan/audit.jsonl')).toBe(join(homedir(), '.piiscan/audit.jsonl'));
  });

  it('should leave other paths unchanged', () => {
    expect(resolvePath('/tmp/audit.jsonl')).toBe('/tmp/audit.jsonl');
  });
});

describe('resolveSetting', () => {
  afterEach(() => {
    delete process.env['PIISCAN_TEST_SETTING'];
  });

  it('should prefer a non-empty env var', () => {
    process.env['PIISCAN_TEST_SETTING'] = 'from-env';
    expect(resolveSetting('from-file', 'PIISCAN_TEST_SETTING')).toBe('from-env');
  });

  it('should ignore an empty env var', () => {
    process.env['PIISCAN_TEST_SETTING'] = '';
    expect(resolveSetting('from-file', 'PIISCAN_TEST_SETTING')).toBe('from-file');
  });
});

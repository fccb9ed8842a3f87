import { readFileSync, existsSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';
import { homedir } from 'node:os';
import { ScannerConfigSchema, type ScannerConfig } from '../types/index.js';
import { ConfigError } from './errors.js';

const PIISCAN_DIR = join(homedir(), '.piiscan');
const CONFIG_PATH = join(PIISCAN_DIR, 'piiscan.json');

export function ensurePiiscanDir(): void {
  if (!existsSync(PIISCAN_DIR)) {
    mkdirSync(PIISCAN_DIR, { recursive: true, mode: 0o700 });
  }
}

/**
 * Resolve a value that may come from config or an env var.
 * Pattern: if `envKey` is set in process.env it wins, otherwise `value` is used.
 */
export function resolveSetting(value: string, envKey: string): string {
  const fromEnv = process.env[envKey];
  return fromEnv !== undefined && fromEnv !== '' ? fromEnv : value;
}

/**
 * Load and validate the scanner config.
 * Falls back to defaults if no config file exists.
 */
export function loadConfig(overridePath?: string): ScannerConfig {
  const configPath = overridePath ?? CONFIG_PATH;
  let raw: unknown = {};

  if (existsSync(configPath)) {
    try {
      const content = readFileSync(configPath, 'utf-8');
      raw = JSON.parse(content);
    } catch (err) {
      throw new ConfigError(`Failed to parse config at ${configPath}: ${err}`);
    }
  } else if (overridePath) {
    throw new ConfigError(`Config file not found: ${overridePath}`);
  }

  const parsed = ScannerConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid config at ${configPath}: ${issues}`);
  }
  const config = parsed.data;

  // Env overrides
  config.audit.logPath = resolveSetting(config.audit.logPath, config.audit.logPathEnv);

  const threshold = resolveSetting(String(config.risk.highVolumeThreshold), config.risk.highVolumeThresholdEnv);
  const parsedThreshold = Number(threshold);
  if (!Number.isInteger(parsedThreshold) || parsedThreshold < 0) {
    throw new ConfigError(`${config.risk.highVolumeThresholdEnv} must be a non-negative integer, got "${threshold}"`);
  }
  config.risk.highVolumeThreshold = parsedThreshold;

  return config;
}

/**
 * Resolve tilde-prefixed paths to absolute.
 */
export function resolvePath(p: string): string {
  if (p.startsWith('~/')) {
    return join(homedir(), p.slice(2));
  }
  return p;
}

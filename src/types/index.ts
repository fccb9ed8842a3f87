import { z } from 'zod';

// ── PII Types ────────────────────────────────────────────────

export const PII_TYPES = [
  'CPF',
  'CNPJ',
  'RG',
  'EMAIL',
  'PHONE',
  'CEP',
  'CREDIT_CARD',
  'SEI_PROCESS',
  'PERSON_NAME',
  'LOCATION',
  'DATE_BIRTH',
] as const;

export type PiiType = (typeof PII_TYPES)[number];

export const PiiTypeSchema = z.enum(PII_TYPES);

export type SpanSource = 'PATTERN' | 'MODEL';

export interface Span {
  start: number;
  end: number;
  type: PiiType;
  source: SpanSource;
  text: string;
}

export type PiiCounts = Partial<Record<PiiType, number>>;

// ── Risk ─────────────────────────────────────────────────────

export const RISK_LEVELS = ['MINIMO', 'BAIXO', 'MEDIO', 'ALTO', 'CRITICO'] as const;

export type RiskLevel = (typeof RISK_LEVELS)[number];

// ── Records ──────────────────────────────────────────────────

export type DetectorName = 'entity-recognizer' | 'phone-validator';

export interface SourceRecord {
  recordId: string;
  text: string;
}

export interface RecordResult {
  readonly recordId: string;
  readonly originalLength: number;
  readonly anonymizedText: string;
  readonly piiCounts: Readonly<PiiCounts>;
  readonly hasPii: boolean;
  readonly riskLevel: RiskLevel;
  readonly status: 'complete' | 'partial';
  readonly failedDetectors: readonly DetectorName[];
  /** CPF-shaped numbers that failed the check digits; counted, never masked. */
  readonly invalidCpfCount: number;
}

// ── Reports ──────────────────────────────────────────────────

export interface PiiBreakdownEntry {
  type: PiiType;
  description: string;
  count: number;
  percentage: number;
}

export interface RecordTypeCount {
  recordId: string;
  count: number;
}

export interface ProcessReport {
  readonly processId: string;
  readonly totalRecords: number;
  readonly recordsWithPii: number;
  readonly recordsWithoutPii: number;
  readonly partialRecords: number;
  readonly totalPiiDetected: number;
  readonly piiRatePercentage: number;
  readonly piiBreakdown: readonly PiiBreakdownEntry[];
  readonly recordsByRisk: Readonly<Record<RiskLevel, number>>;
  /** Records carrying each type, ordered by record id. */
  readonly recordsByType: Readonly<Partial<Record<PiiType, readonly RecordTypeCount[]>>>;
  readonly invalidCpfCount: number;
  readonly riskLevel: RiskLevel;
  readonly riskDescription: string;
  readonly recommendations: readonly string[];
  readonly highVolumeThreshold: number;
  readonly processingTimeSeconds: number;
  readonly recordsPerSecond: number;
  readonly incomplete: boolean;
}

// ── Scanner Config ───────────────────────────────────────────

export const DetectionConfigSchema = z.object({
  phoneRegion: z.string().length(2).default('BR'),
  enabledTypes: z.array(PiiTypeSchema).default([...PII_TYPES]),
  maskChar: z.string().length(1).default('x'),
});
export type DetectionConfig = z.infer<typeof DetectionConfigSchema>;

export const RecognizerConfigSchema = z.object({
  kind: z.enum(['none', 'dictionary']).default('dictionary'),
  dictionaryPath: z.string().optional(),
  timeoutMs: z.number().int().positive().default(5000),
  minPersonNameWords: z.number().int().positive().default(1),
});
export type RecognizerConfig = z.infer<typeof RecognizerConfigSchema>;

export const RiskConfigSchema = z.object({
  highVolumeThreshold: z.number().int().nonnegative().default(10),
  highVolumeThresholdEnv: z.string().default('PIISCAN_HIGH_VOLUME_THRESHOLD'),
});
export type RiskConfig = z.infer<typeof RiskConfigSchema>;

export const BatchConfigSchema = z.object({
  concurrency: z.number().int().positive().default(4),
  maxInputBytes: z.number().int().positive().default(50 * 1024 * 1024), // 50MB
});
export type BatchConfig = z.infer<typeof BatchConfigSchema>;

export const AuditConfigSchema = z.object({
  logPath: z.string().default('~/.piiscan/audit.jsonl'),
  logPathEnv: z.string().default('PIISCAN_AUDIT_LOG'),
});
export type AuditConfig = z.infer<typeof AuditConfigSchema>;

export const ScannerConfigSchema = z.object({
  name: z.string().default('PII Scanner'),
  version: z.string().default('1.0.0'),
  detection: DetectionConfigSchema.default(() => ({
    phoneRegion: 'BR',
    enabledTypes: [...PII_TYPES],
    maskChar: 'x',
  })),
  recognizer: RecognizerConfigSchema.default(() => ({
    kind: 'dictionary' as const,
    timeoutMs: 5000,
    minPersonNameWords: 1,
  })),
  risk: RiskConfigSchema.default(() => ({
    highVolumeThreshold: 10,
    highVolumeThresholdEnv: 'PIISCAN_HIGH_VOLUME_THRESHOLD',
  })),
  batch: BatchConfigSchema.default(() => ({
    concurrency: 4,
    maxInputBytes: 50 * 1024 * 1024,
  })),
  audit: AuditConfigSchema.default(() => ({
    logPath: '~/.piiscan/audit.jsonl',
    logPathEnv: 'PIISCAN_AUDIT_LOG',
  })),
});
export type ScannerConfig = z.infer<typeof ScannerConfigSchema>;

// ── Audit Types ──────────────────────────────────────────────

export type AuditSeverity = 'INFO' | 'WARN' | 'ERROR' | 'CRITICAL';

export interface AuditEntry {
  timestamp: string;
  severity: AuditSeverity;
  event: string;
  processId?: string;
  recordId?: string;
  details?: Record<string, unknown>;
}

/**
 * Report Aggregator
 * Commutative fold of RecordResults into one ProcessReport. Partial
 * aggregates from independent workers combine with merge().
 */
import {
  PII_TYPES,
  RISK_LEVELS,
  type PiiBreakdownEntry,
  type PiiCounts,
  type PiiType,
  type ProcessReport,
  type RecordResult,
  type RecordTypeCount,
  type RiskLevel,
} from '../types/index.js';
import { describePiiType, typeRank } from '../detection/piiTypes.js';
import { ReportFinalizedError } from '../core/errors.js';
import {
  DEFAULT_HIGH_VOLUME_THRESHOLD,
  classifyRisk,
  describeRisk,
  recommendationsFor,
} from './riskClassifier.js';

export interface AggregateSnapshot {
  totalRecords: number;
  recordsWithPii: number;
  partialRecords: number;
  piiCounts: Record<PiiType, number>;
  recordsByRisk: Record<RiskLevel, number>;
  recordsByType: Partial<Record<PiiType, RecordTypeCount[]>>;
  invalidCpfCount: number;
}

export interface FinalizeOptions {
  /** Elapsed time measured by the caller; the aggregator does no timing. */
  processingTimeSeconds: number;
  /** Set when only a deliberately truncated subset of records was folded. */
  incomplete?: boolean;
}

function zeroPiiCounts(): Record<PiiType, number> {
  return {
    CPF: 0,
    CNPJ: 0,
    RG: 0,
    EMAIL: 0,
    PHONE: 0,
    CEP: 0,
    CREDIT_CARD: 0,
    SEI_PROCESS: 0,
    PERSON_NAME: 0,
    LOCATION: 0,
    DATE_BIRTH: 0,
  };
}

function zeroRiskCounts(): Record<RiskLevel, number> {
  return { MINIMO: 0, BAIXO: 0, MEDIO: 0, ALTO: 0, CRITICO: 0 };
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function percentage(part: number, whole: number): number {
  return whole > 0 ? round2((part / whole) * 100) : 0;
}

function compareRecordIds(a: RecordTypeCount, b: RecordTypeCount): number {
  return a.recordId.localeCompare(b.recordId, 'en', { numeric: true }) || a.count - b.count;
}

export class ReportAggregator {
  readonly processId: string;
  private readonly highVolumeThreshold: number;
  private totalRecords = 0;
  private recordsWithPii = 0;
  private partialRecords = 0;
  private readonly piiCounts = zeroPiiCounts();
  private readonly recordsByRisk = zeroRiskCounts();
  private readonly recordsByType: Partial<Record<PiiType, RecordTypeCount[]>> = {};
  private invalidCpfCount = 0;
  private finalized = false;

  constructor(processId: string, options: { highVolumeThreshold?: number } = {}) {
    this.processId = processId;
    this.highVolumeThreshold = options.highVolumeThreshold ?? DEFAULT_HIGH_VOLUME_THRESHOLD;
  }

  add(result: RecordResult): void {
    this.assertOpen();
    this.totalRecords++;
    if (result.hasPii) this.recordsWithPii++;
    if (result.status === 'partial') this.partialRecords++;
    this.recordsByRisk[result.riskLevel]++;
    this.invalidCpfCount += result.invalidCpfCount;
    for (const type of PII_TYPES) {
      const count = result.piiCounts[type] ?? 0;
      if (count === 0) continue;
      this.piiCounts[type] += count;
      this.recordsFor(type).push({ recordId: result.recordId, count });
    }
  }

  merge(other: ReportAggregator | AggregateSnapshot): void {
    this.assertOpen();
    const snap = other instanceof ReportAggregator ? other.snapshot() : other;
    this.totalRecords += snap.totalRecords;
    this.recordsWithPii += snap.recordsWithPii;
    this.partialRecords += snap.partialRecords;
    for (const type of PII_TYPES) this.piiCounts[type] += snap.piiCounts[type];
    for (const level of RISK_LEVELS) this.recordsByRisk[level] += snap.recordsByRisk[level];
    this.invalidCpfCount += snap.invalidCpfCount;
    for (const type of PII_TYPES) {
      const entries = snap.recordsByType[type];
      if (entries) this.recordsFor(type).push(...entries.map(e => ({ ...e })));
    }
  }

  snapshot(): AggregateSnapshot {
    return {
      totalRecords: this.totalRecords,
      recordsWithPii: this.recordsWithPii,
      partialRecords: this.partialRecords,
      piiCounts: { ...this.piiCounts },
      recordsByRisk: { ...this.recordsByRisk },
      recordsByType: this.copyRecordsByType(),
      invalidCpfCount: this.invalidCpfCount,
    };
  }

  get isFinalized(): boolean {
    return this.finalized;
  }

  /**
   * Compute breakdown, risk and derived statistics. Callable once.
   */
  finalize(options: FinalizeOptions): ProcessReport {
    this.assertOpen();
    this.finalized = true;

    const counts: PiiCounts = {};
    for (const type of PII_TYPES) {
      if (this.piiCounts[type] > 0) counts[type] = this.piiCounts[type];
    }
    const totalPiiDetected = Object.values(counts).reduce((sum, c) => sum + (c ?? 0), 0);
    const riskLevel = classifyRisk(counts, { highVolumeThreshold: this.highVolumeThreshold });
    const seconds = options.processingTimeSeconds;

    return Object.freeze({
      processId: this.processId,
      totalRecords: this.totalRecords,
      recordsWithPii: this.recordsWithPii,
      recordsWithoutPii: this.totalRecords - this.recordsWithPii,
      partialRecords: this.partialRecords,
      totalPiiDetected,
      piiRatePercentage: percentage(this.recordsWithPii, this.totalRecords),
      piiBreakdown: Object.freeze(buildBreakdown(counts, totalPiiDetected)),
      recordsByRisk: Object.freeze({ ...this.recordsByRisk }),
      recordsByType: Object.freeze(this.copyRecordsByType()),
      invalidCpfCount: this.invalidCpfCount,
      riskLevel,
      riskDescription: describeRisk(riskLevel),
      recommendations: Object.freeze(recommendationsFor(riskLevel, counts)),
      highVolumeThreshold: this.highVolumeThreshold,
      processingTimeSeconds: round2(seconds),
      recordsPerSecond: seconds > 0 ? round2(this.totalRecords / seconds) : 0,
      incomplete: options.incomplete ?? false,
    });
  }

  private recordsFor(type: PiiType): RecordTypeCount[] {
    const existing = this.recordsByType[type];
    if (existing) return existing;
    const created: RecordTypeCount[] = [];
    this.recordsByType[type] = created;
    return created;
  }

  /** Deep copy with each list in record-id order, independent of fold order. */
  private copyRecordsByType(): Partial<Record<PiiType, RecordTypeCount[]>> {
    const copy: Partial<Record<PiiType, RecordTypeCount[]>> = {};
    for (const type of PII_TYPES) {
      const entries = this.recordsByType[type];
      if (entries) copy[type] = entries.map(e => ({ ...e })).sort(compareRecordIds);
    }
    return copy;
  }

  private assertOpen(): void {
    if (this.finalized) throw new ReportFinalizedError(this.processId);
  }
}

/**
 * Count descending, type priority on ties, percentage of all detections.
 */
export function buildBreakdown(counts: Readonly<PiiCounts>, total: number): PiiBreakdownEntry[] {
  const entries: PiiBreakdownEntry[] = [];
  for (const type of PII_TYPES) {
    const count = counts[type] ?? 0;
    if (count === 0) continue;
    entries.push({
      type,
      description: describePiiType(type),
      count,
      percentage: percentage(count, total),
    });
  }
  return entries.sort((a, b) => b.count - a.count || typeRank(a.type) - typeRank(b.type));
}

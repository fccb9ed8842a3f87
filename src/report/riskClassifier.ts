/**
 * Risk Classifier
 * Rule-priority mapping from PII counts to a risk level. First matching rule
 * wins, evaluated from CRITICO down to MINIMO.
 */
import { RISK_LEVELS, type PiiCounts, type PiiType, type RiskLevel } from '../types/index.js';
import { typesWithSeverity } from '../detection/piiTypes.js';

export const DEFAULT_HIGH_VOLUME_THRESHOLD = 10;

const CRITICAL_TYPES = typesWithSeverity(5); // CPF, CREDIT_CARD, RG
const CONTACT_TYPES = typesWithSeverity(3); // PHONE, EMAIL
const PERSONAL_TYPES = typesWithSeverity(2); // PERSON_NAME, LOCATION

export interface RiskOptions {
  /** EMAIL or PHONE counts strictly above this promote the scope to ALTO. */
  highVolumeThreshold?: number;
}

function countOf(counts: Readonly<PiiCounts>, type: PiiType): number {
  return counts[type] ?? 0;
}

export function classifyRisk(counts: Readonly<PiiCounts>, options: RiskOptions = {}): RiskLevel {
  const threshold = options.highVolumeThreshold ?? DEFAULT_HIGH_VOLUME_THRESHOLD;

  if (CRITICAL_TYPES.some(t => countOf(counts, t) > 0)) return 'CRITICO';
  if (CONTACT_TYPES.some(t => countOf(counts, t) > threshold)) return 'ALTO';
  if (PERSONAL_TYPES.some(t => countOf(counts, t) > 0)) return 'MEDIO';
  if (Object.values(counts).some(c => (c ?? 0) > 0)) return 'BAIXO';
  return 'MINIMO';
}

export function compareRisk(a: RiskLevel, b: RiskLevel): number {
  return RISK_LEVELS.indexOf(a) - RISK_LEVELS.indexOf(b);
}

export function maxRisk(...levels: RiskLevel[]): RiskLevel {
  return levels.reduce<RiskLevel>((max, level) => (compareRisk(level, max) > 0 ? level : max), 'MINIMO');
}

// ── Guidance ─────────────────────────────────────────────────

const RISK_DESCRIPTIONS: Record<RiskLevel, string> = {
  CRITICO: 'Highly sensitive data detected (CPF, RG, card numbers). Maximum protection required.',
  ALTO: 'High volume of contact data detected. Special attention required.',
  MEDIO: 'Identifiable personal data detected. Adequate protection recommended.',
  BAIXO: 'Few sensitive items detected. Manageable risk.',
  MINIMO: 'No significant personal data detected.',
};

export function describeRisk(level: RiskLevel): string {
  return RISK_DESCRIPTIONS[level];
}

/**
 * Handling recommendations for a scope, based on its level and the types present.
 */
export function recommendationsFor(level: RiskLevel, counts: Readonly<PiiCounts>): string[] {
  const recommendations: string[] = [];
  const has = (type: PiiType) => countOf(counts, type) > 0;

  if (level === 'CRITICO' || level === 'ALTO') {
    recommendations.push('Apply additional encryption to stored data');
    recommendations.push('Restrict access to authorized users only');
    recommendations.push('Keep an audit trail of every access');
  }

  if (has('CPF') || has('RG')) {
    recommendations.push('Identity documents detected: consider pseudonymization');
  }

  if (has('EMAIL') || has('PHONE')) {
    recommendations.push('Contact data detected: obtain explicit consent before use');
  }

  if (has('CREDIT_CARD')) {
    recommendations.push('URGENT: payment card data detected, verify PCI-DSS compliance');
  }

  if (recommendations.length === 0) {
    recommendations.push('Maintain standard information security practices');
  }

  return recommendations;
}

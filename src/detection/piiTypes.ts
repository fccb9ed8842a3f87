/**
 * PII type catalog
 * Descriptions, severity weights and the fixed tie-break order shared by the
 * registry, the resolver and the report breakdown.
 */
import type { PiiType } from '../types/index.js';

export interface PiiTypeInfo {
  description: string;
  /** 5 = identity documents and cards, 3 = contact data, 2 = personal context, 1 = other. */
  severity: 1 | 2 | 3 | 5;
}

export const PII_TYPE_INFO: Readonly<Record<PiiType, PiiTypeInfo>> = {
  CPF: { description: 'Cadastro de Pessoa Física (individual taxpayer ID)', severity: 5 },
  CNPJ: { description: 'Cadastro Nacional da Pessoa Jurídica (company registry ID)', severity: 1 },
  RG: { description: 'Registro Geral (identity card number)', severity: 5 },
  EMAIL: { description: 'Email address', severity: 3 },
  PHONE: { description: 'Phone number', severity: 3 },
  CEP: { description: 'Código de Endereçamento Postal (postal code)', severity: 1 },
  CREDIT_CARD: { description: 'Credit card number', severity: 5 },
  SEI_PROCESS: { description: 'SEI administrative process number', severity: 1 },
  PERSON_NAME: { description: 'Person name', severity: 2 },
  LOCATION: { description: 'Address or location', severity: 2 },
  DATE_BIRTH: { description: 'Date of birth', severity: 1 },
};

/**
 * Total order over PII types, highest priority first.
 */
export const TYPE_PRIORITY: readonly PiiType[] = [
  'CPF',
  'CNPJ',
  'CREDIT_CARD',
  'SEI_PROCESS',
  'RG',
  'CEP',
  'PHONE',
  'EMAIL',
  'DATE_BIRTH',
  'PERSON_NAME',
  'LOCATION',
];

const RANK = new Map<PiiType, number>(TYPE_PRIORITY.map((type, i) => [type, i]));

/**
 * Lower rank = higher priority.
 */
export function typeRank(type: PiiType): number {
  return RANK.get(type) ?? TYPE_PRIORITY.length;
}

export function describePiiType(type: PiiType): string {
  return PII_TYPE_INFO[type].description;
}

export function typesWithSeverity(severity: PiiTypeInfo['severity']): PiiType[] {
  return TYPE_PRIORITY.filter(type => PII_TYPE_INFO[type].severity === severity);
}

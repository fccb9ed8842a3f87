export * from './types/index.js';
export { PII_TYPE_INFO, TYPE_PRIORITY, describePiiType, typeRank } from './detection/piiTypes.js';
export { isValidCpf, isValidCnpj, luhnCheck } from './detection/checksums.js';
export { detectPatterns, scanPatterns, type PatternOptions, type PatternScan } from './detection/validatorRegistry.js';
export {
  LibPhoneNumberValidator,
  defaultPhoneValidator,
  type PhoneValidation,
  type PhoneValidator,
} from './detection/phoneValidator.js';
export {
  DEFAULT_LABEL_MAP,
  detectEntities,
  type EntityDetection,
  type EntityOptions,
  type EntityRecognizer,
  type RecognizedEntity,
} from './detection/entityRecognizer.js';
export { DictionaryRecognizer, NullRecognizer, type Lexicon } from './detection/dictionaryRecognizer.js';
export { resolveSpans, isNonOverlapping } from './detection/spanResolver.js';
export { anonymize, maskValue, redactText, type AnonymizationResult } from './detection/anonymizer.js';
export {
  classifyRisk,
  compareRisk,
  maxRisk,
  describeRisk,
  recommendationsFor,
  type RiskOptions,
} from './report/riskClassifier.js';
export { ReportAggregator, type AggregateSnapshot, type FinalizeOptions } from './report/reportAggregator.js';
export { formatReport, summarizeRecords } from './report/textReport.js';
export { renderReportPdf } from './report/pdfReport.js';
export { PiiScanner, type ScannerOptions, type TextAnalysis } from './core/scanner.js';
export { processBatch, type BatchOptions, type BatchOutcome } from './core/batchRunner.js';
export { loadConfig } from './core/config.js';
export {
  ScannerError,
  ConfigError,
  DetectorError,
  InputFileError,
  OutputFileError,
  ReportFinalizedError,
} from './core/errors.js';
export { readRecords, validateInputFile } from './sources/recordSource.js';

/**
 * PII Scanner
 * Per-record pipeline: pattern detection → entity detection → resolution →
 * anonymization. Pure per record apart from audit logging.
 */
import type {
  DetectorName,
  PiiType,
  RecordResult,
  ScannerConfig,
  SourceRecord,
  Span,
} from '../types/index.js';
import { scanPatterns } from '../detection/validatorRegistry.js';
import { detectEntities, type EntityRecognizer } from '../detection/entityRecognizer.js';
import { resolveSpans } from '../detection/spanResolver.js';
import { anonymize, DEFAULT_MASK_CHAR } from '../detection/anonymizer.js';
import { defaultPhoneValidator, type PhoneValidator } from '../detection/phoneValidator.js';
import { DictionaryRecognizer, NullRecognizer } from '../detection/dictionaryRecognizer.js';
import { classifyRisk, DEFAULT_HIGH_VOLUME_THRESHOLD } from '../report/riskClassifier.js';
import { auditError, auditWarn } from '../audit/auditLogger.js';
import { DetectorError } from './errors.js';
import { resolvePath } from './config.js';

export interface ScannerOptions {
  recognizer?: EntityRecognizer;
  phoneValidator?: PhoneValidator;
  phoneRegion?: string;
  enabledTypes?: readonly PiiType[];
  maskChar?: string;
  /** Deadline for one recognizer call. */
  recognizerTimeoutMs?: number;
  minPersonNameWords?: number;
  highVolumeThreshold?: number;
}

export interface TextAnalysis {
  spans: Span[];
  failedDetectors: DetectorName[];
  invalidCpfCount: number;
}

/**
 * Reject with DetectorError if `promise` does not settle within `ms`.
 */
export function withTimeout<T>(promise: Promise<T>, ms: number, detector: DetectorName): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new DetectorError(detector, `timed out after ${ms}ms`));
    }, ms);
    promise.then(
      value => {
        clearTimeout(timer);
        resolve(value);
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      },
    );
  });
}

export class PiiScanner {
  private readonly recognizer: EntityRecognizer;
  private readonly phoneValidator: PhoneValidator;
  private readonly phoneRegion: string;
  private readonly enabledTypes: ReadonlySet<PiiType> | undefined;
  private readonly maskChar: string;
  private readonly recognizerTimeoutMs: number | undefined;
  private readonly minPersonNameWords: number;
  private readonly highVolumeThreshold: number;

  constructor(options: ScannerOptions = {}) {
    this.recognizer = options.recognizer ?? new NullRecognizer();
    this.phoneValidator = options.phoneValidator ?? defaultPhoneValidator;
    this.phoneRegion = options.phoneRegion ?? 'BR';
    this.enabledTypes = options.enabledTypes ? new Set(options.enabledTypes) : undefined;
    this.maskChar = options.maskChar ?? DEFAULT_MASK_CHAR;
    this.recognizerTimeoutMs = options.recognizerTimeoutMs;
    this.minPersonNameWords = options.minPersonNameWords ?? 1;
    this.highVolumeThreshold = options.highVolumeThreshold ?? DEFAULT_HIGH_VOLUME_THRESHOLD;
  }

  /**
   * Build a scanner from loaded config.
   */
  static fromConfig(config: ScannerConfig, overrides: Pick<ScannerOptions, 'recognizer' | 'phoneValidator'> = {}): PiiScanner {
    const recognizer = overrides.recognizer ?? (config.recognizer.kind === 'dictionary'
      ? DictionaryRecognizer.fromFile(config.recognizer.dictionaryPath ? resolvePath(config.recognizer.dictionaryPath) : undefined)
      : new NullRecognizer());

    return new PiiScanner({
      recognizer,
      phoneValidator: overrides.phoneValidator,
      phoneRegion: config.detection.phoneRegion,
      enabledTypes: config.detection.enabledTypes,
      maskChar: config.detection.maskChar,
      recognizerTimeoutMs: config.recognizer.timeoutMs,
      minPersonNameWords: config.recognizer.minPersonNameWords,
      highVolumeThreshold: config.risk.highVolumeThreshold,
    });
  }

  /**
   * Detect and resolve spans. Collaborator failures are reported in
   * `failedDetectors`; pattern spans are always returned.
   */
  async analyze(text: string, recordId?: string): Promise<TextAnalysis> {
    const failedDetectors: DetectorName[] = [];
    if (text.length === 0) return { spans: [], failedDetectors, invalidCpfCount: 0 };

    const patterns = scanPatterns(text, {
      enabledTypes: this.enabledTypes ? [...this.enabledTypes] : undefined,
      phoneRegion: this.phoneRegion,
      phoneValidator: this.phoneValidator,
      onValidatorError: err => {
        failedDetectors.push('phone-validator');
        auditError('detector_failed', {
          recordId,
          details: { detector: 'phone-validator', error: String(err) },
        });
      },
    });

    let modelSpans: Span[] = [];
    try {
      const pending = detectEntities(text, this.recognizer, { minPersonNameWords: this.minPersonNameWords });
      const detection = this.recognizerTimeoutMs !== undefined
        ? await withTimeout(pending, this.recognizerTimeoutMs, 'entity-recognizer')
        : await pending;
      modelSpans = detection.spans.filter(span => this.isEnabled(span.type));
      // Contract violations count as a recognizer failure.
      if (detection.rejected > 0) failedDetectors.push('entity-recognizer');
    } catch (err) {
      if (!(err instanceof DetectorError)) throw err;
      failedDetectors.push(err.detector);
      auditWarn('detector_failed', {
        recordId,
        details: { detector: err.detector, error: err.message },
      });
    }

    return {
      spans: resolveSpans([...patterns.spans, ...modelSpans]),
      failedDetectors,
      invalidCpfCount: patterns.invalidCpfCount,
    };
  }

  /**
   * Produce the immutable per-record result.
   */
  async processRecord(record: SourceRecord): Promise<RecordResult> {
    const text = typeof record.text === 'string' ? record.text : '';
    const { spans, failedDetectors, invalidCpfCount } = await this.analyze(text, record.recordId);
    const { anonymizedText, piiCounts, hasPii } = anonymize(text, spans, { maskChar: this.maskChar });

    const result: RecordResult = {
      recordId: record.recordId,
      originalLength: text.length,
      anonymizedText,
      piiCounts: Object.freeze(piiCounts),
      hasPii,
      riskLevel: classifyRisk(piiCounts, { highVolumeThreshold: this.highVolumeThreshold }),
      status: failedDetectors.length > 0 ? 'partial' : 'complete',
      failedDetectors: Object.freeze(failedDetectors),
      invalidCpfCount,
    };
    return Object.freeze(result);
  }

  private isEnabled(type: PiiType): boolean {
    return this.enabledTypes === undefined || this.enabledTypes.has(type);
  }
}

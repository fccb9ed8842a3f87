import type { DetectorName } from '../types/index.js';

export class ScannerError extends Error {
  code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'ScannerError';
    this.code = code;
  }
}

export class ConfigError extends ScannerError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

/**
 * A detection collaborator (entity recognizer, phone validator) failed or
 * timed out. The pipeline converts this into a partial record, never a
 * batch failure.
 */
export class DetectorError extends ScannerError {
  detector: DetectorName;
  override cause: unknown;

  constructor(detector: DetectorName, message: string, cause?: unknown) {
    super(`${detector}: ${message}`, 'DETECTOR_ERROR');
    this.name = 'DetectorError';
    this.detector = detector;
    this.cause = cause;
  }
}

export class InputFileError extends ScannerError {
  path: string;

  constructor(path: string, message: string) {
    super(message, 'INPUT_FILE_ERROR');
    this.name = 'InputFileError';
    this.path = path;
  }
}

export class OutputFileError extends ScannerError {
  path: string;
  override cause: unknown;

  constructor(path: string, cause: unknown) {
    super(`Cannot write ${path}: ${cause instanceof Error ? cause.message : String(cause)}`, 'OUTPUT_FILE_ERROR');
    this.name = 'OutputFileError';
    this.path = path;
    this.cause = cause;
  }
}

export class ReportFinalizedError extends ScannerError {
  processId: string;

  constructor(processId: string) {
    super(`Report already finalized: ${processId}`, 'REPORT_FINALIZED');
    this.name = 'ReportFinalizedError';
    this.processId = processId;
  }
}

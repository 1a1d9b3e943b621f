export type CrashScanErrorCode =
  | 'CONFIGURATION'
  | 'FILE_ACCESS'
  | 'RULE_EVALUATION'
  | 'DIRECTORY_NOT_FOUND';

export class CrashScanError extends Error {
  readonly code: CrashScanErrorCode;

  constructor(code: CrashScanErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Bad rule set or configuration file. Fatal before scanning starts. */
export class ConfigurationError extends CrashScanError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIGURATION', message, options);
  }
}

export class FileAccessError extends CrashScanError {
  readonly filePath: string;

  constructor(filePath: string, options?: { cause?: unknown }) {
    super('FILE_ACCESS', `Cannot read ${filePath}: ${describeError(options?.cause)}`, options);
    this.filePath = filePath;
  }
}

/** Raised by scanning primitives when a boundary cannot be resolved; rules skip the occurrence. */
export class RuleEvaluationError extends CrashScanError {
  constructor(message: string) {
    super('RULE_EVALUATION', message);
  }
}

export class DirectoryNotFoundError extends CrashScanError {
  readonly path: string;

  constructor(path: string, options?: { cause?: unknown }) {
    super('DIRECTORY_NOT_FOUND', `Scan root does not exist or is not a directory: ${path}`, options);
    this.path = path;
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (err === undefined) return 'unknown error';
  return String(err);
}

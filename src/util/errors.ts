/**
 * Error types raised while reading, parsing and analyzing orchestration files.
 *
 * Every failure carries a stable `code` so the directory scan can record it per file.
 */

export enum ErrorCode {
  /** File missing or unreadable. */
  IO_ERROR = 'IO_ERROR',
  /** Missing XML declaration or sentinel, or malformed XML. */
  FORMAT_ERROR = 'FORMAT_ERROR',
  /** Required name fields absent (e.g. no orchestration name). */
  SEMANTIC_ERROR = 'SEMANTIC_ERROR',
  /** A named sub-section (messages, port types, ports, shapes) failed to build. */
  SECTION_ERROR = 'SECTION_ERROR',
  /** Analyzer configuration file is unreadable or invalid. */
  CONFIG_ERROR = 'CONFIG_ERROR',
}

export type OdxErrorOptions = {
  cause?: unknown;
};

export class OdxError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options: OdxErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.code = code;
    // Keep instanceof working for subclasses compiled to ES5-style prototypes.
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = new.target.name;
  }
}

export class IoError extends OdxError {
  readonly filePath: string;

  constructor(filePath: string, message: string, options: OdxErrorOptions = {}) {
    super(ErrorCode.IO_ERROR, message, options);
    this.filePath = filePath;
  }
}

export type SourcePosition = {
  /** 1-based line within the source file. */
  line: number;
  /** 1-based column within the source file. */
  column: number;
};

export class FormatError extends OdxError {
  readonly position?: SourcePosition;

  constructor(message: string, position?: SourcePosition, options: OdxErrorOptions = {}) {
    super(ErrorCode.FORMAT_ERROR, message, options);
    this.position = position;
  }
}

export class SemanticError extends OdxError {
  constructor(message: string, options: OdxErrorOptions = {}) {
    super(ErrorCode.SEMANTIC_ERROR, message, options);
  }
}

export type OrchestrationSection = 'messages' | 'portTypes' | 'ports' | 'shapes' | 'correlations';

export class SectionError extends OdxError {
  readonly orchestration: string;
  readonly section: OrchestrationSection;

  constructor(orchestration: string, section: OrchestrationSection, cause: unknown) {
    super(
      ErrorCode.SECTION_ERROR,
      `Failed to parse ${section} in orchestration '${orchestration}': ${errorMessage(cause)}`,
      { cause },
    );
    this.orchestration = orchestration;
    this.section = section;
  }
}

export class ConfigError extends OdxError {
  constructor(message: string, options: OdxErrorOptions = {}) {
    super(ErrorCode.CONFIG_ERROR, message, options);
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}

export function errorCodeOf(e: unknown): ErrorCode | undefined {
  return e instanceof OdxError ? e.code : undefined;
}

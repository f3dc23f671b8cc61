/**
 * Custom Error Classes for Codec Operations
 *
 * Every failure of a read or write is terminal for that file and carries a
 * `_tag` so callers can switch over the `CodecError` union.
 */

import { ZodError, ZodIssue } from 'zod';
import { ERROR_CODES } from './constants/errors';

/**
 * Base Codec Error Class
 */
export abstract class BaseCodecError extends Error {
  abstract readonly _tag: string;
  abstract readonly code: string;
  readonly timestamp: Date;
  readonly context?: Record<string, unknown>;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.timestamp = new Date();
    this.context = context;
  }

  /**
   * Get error details for logging
   */
  getDetails(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      tag: this._tag,
      timestamp: this.timestamp,
      context: this.context,
    };
  }
}

/**
 * Wrong magic or signature.
 */
export class MalformedHeaderError extends BaseCodecError {
  readonly _tag = 'MalformedHeaderError' as const;
  readonly code = ERROR_CODES.MALFORMED_HEADER;
  readonly format: string;

  constructor(message: string, format: string, context?: Record<string, unknown>) {
    super(message, { format, ...context });
    this.format = format;
  }
}

/**
 * Recognized magic with a version number the codec does not handle.
 */
export class UnsupportedVersionError extends BaseCodecError {
  readonly _tag = 'UnsupportedVersionError' as const;
  readonly code = ERROR_CODES.UNSUPPORTED_VERSION;
  readonly format: string;
  readonly version: number | string;

  constructor(message: string, format: string, version: number | string, context?: Record<string, unknown>) {
    super(message, { format, version, ...context });
    this.format = format;
    this.version = version;
  }
}

/**
 * Buffer shorter than a field or section requires.
 */
export class UnexpectedEofError extends BaseCodecError {
  readonly _tag = 'UnexpectedEofError' as const;
  readonly code = ERROR_CODES.UNEXPECTED_EOF;
  readonly field: string;
  readonly offset: number;
  readonly needed: number;
  readonly available: number;

  constructor(field: string, offset: number, needed: number, available: number) {
    super(
      `Unexpected end of buffer reading ${field} at offset ${offset}: needed ${needed} bytes, ${available} available`,
      { field, offset, needed, available }
    );
    this.field = field;
    this.offset = offset;
    this.needed = needed;
    this.available = available;
  }
}

/**
 * Field value outside what the format allows (limits, mip counts, masks, indices).
 */
export class InvalidFieldValueError extends BaseCodecError {
  readonly _tag = 'InvalidFieldValueError' as const;
  readonly code = ERROR_CODES.INVALID_FIELD_VALUE;
  readonly field: string;
  readonly expected?: unknown;
  readonly actual?: unknown;
  readonly zodError?: ZodError;

  constructor(
    message: string,
    field: string,
    details: { expected?: unknown; actual?: unknown; zodError?: ZodError } = {}
  ) {
    super(message, { field, expected: details.expected, actual: details.actual });
    this.field = field;
    this.expected = details.expected;
    this.actual = details.actual;
    this.zodError = details.zodError;
  }

  /**
   * Get Zod validation issues
   */
  getValidationIssues(): ZodIssue[] {
    return this.zodError?.issues || [];
  }

  /**
   * Get formatted validation errors
   */
  getFormattedErrors(): string[] {
    return this.zodError?.issues.map(issue =>
      `${issue.path.join('.')}: ${issue.message}`
    ) || [];
  }
}

/**
 * FourCC or pixel flags that do not map to a known block or raw codec.
 */
export class UnsupportedPixelFormatError extends BaseCodecError {
  readonly _tag = 'UnsupportedPixelFormatError' as const;
  readonly code = ERROR_CODES.UNSUPPORTED_PIXEL_FORMAT;
  readonly pixelFormat: string;

  constructor(message: string, pixelFormat: string, context?: Record<string, unknown>) {
    super(message, { pixelFormat, ...context });
    this.pixelFormat = pixelFormat;
  }
}

/**
 * Codec Configuration Error
 */
export class CodecConfigError extends BaseCodecError {
  readonly _tag = 'CodecConfigError' as const;
  readonly code = ERROR_CODES.CONFIG_VALIDATION_ERROR;
  readonly configKey: string;

  constructor(message: string, configKey: string, context?: Record<string, unknown>) {
    super(message, { configKey, ...context });
    this.configKey = configKey;
  }
}

/**
 * Codec File System Error
 */
export class CodecFileSystemError extends BaseCodecError {
  readonly _tag = 'CodecFileSystemError' as const;
  readonly code = ERROR_CODES.FILE_SYSTEM_ERROR;
  readonly filePath: string;
  readonly operation: string;

  constructor(message: string, filePath: string, operation: string, context?: Record<string, unknown>) {
    super(message, { filePath, operation, ...context });
    this.filePath = filePath;
    this.operation = operation;
  }
}

/**
 * Union type for all codec errors
 */
export type CodecError =
  | MalformedHeaderError
  | UnsupportedVersionError
  | UnexpectedEofError
  | InvalidFieldValueError
  | UnsupportedPixelFormatError
  | CodecConfigError
  | CodecFileSystemError;

/**
 * Error factory functions
 */
export const CodecErrorFactory = {
  malformedHeader(format: string, expected: unknown, actual: unknown): MalformedHeaderError {
    return new MalformedHeaderError(
      `Wrong ${format} signature: expected ${String(expected)}, got ${String(actual)}`,
      format,
      { expected, actual }
    );
  },

  unsupportedVersion(format: string, version: number | string, context?: Record<string, unknown>): UnsupportedVersionError {
    return new UnsupportedVersionError(`Unsupported ${format} version: ${version}`, format, version, context);
  },

  unexpectedEof(field: string, offset: number, needed: number, available: number): UnexpectedEofError {
    return new UnexpectedEofError(field, offset, needed, available);
  },

  /**
   * Create a field error with expected vs actual values in the message
   */
  invalidField(field: string, expected: unknown, actual: unknown, message?: string): InvalidFieldValueError {
    return new InvalidFieldValueError(
      message ?? `Invalid ${field}: expected ${String(expected)}, got ${String(actual)}`,
      field,
      { expected, actual }
    );
  },

  /**
   * Create a field error from a failed schema parse
   */
  schemaError(field: string, zodError: ZodError): InvalidFieldValueError {
    const first = zodError.issues[0];
    const path = first ? [field, ...first.path].join('.') : field;
    return new InvalidFieldValueError(
      `Invalid ${path}: ${first ? first.message : 'validation failed'}`,
      path,
      { zodError }
    );
  },

  unsupportedPixelFormat(pixelFormat: string, context?: Record<string, unknown>): UnsupportedPixelFormatError {
    return new UnsupportedPixelFormatError(`Unsupported pixel format: ${pixelFormat}`, pixelFormat, context);
  },

  configError(message: string, configKey: string, context?: Record<string, unknown>): CodecConfigError {
    return new CodecConfigError(message, configKey, context);
  },

  fileSystemError(message: string, filePath: string, operation: string, context?: Record<string, unknown>): CodecFileSystemError {
    return new CodecFileSystemError(message, filePath, operation, context);
  },
};

/**
 * Type guard for codec errors
 */
export function isCodecError(error: unknown): error is CodecError {
  return error instanceof BaseCodecError;
}

/**
 * Error types for mxhr-buffer
 */

/**
 * Error kind categories
 */
export type ErrorKind = 'argument' | 'resource' | 'encoding';

/**
 * Base MXHR error class
 */
export class MxhrError extends Error {
  /** Error code */
  code: string;
  /** Error kind category */
  kind: ErrorKind;

  constructor(message: string, code: string, kind: ErrorKind) {
    super(message);
    this.name = 'MxhrError';
    this.code = code;
    this.kind = kind;
    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Caller error: missing mimetype, missing or conflicting data sources,
 * unsupported encoding names, invalid boundaries
 */
export class MxhrArgumentError extends MxhrError {
  override kind: 'argument' = 'argument';
  /** Name of the offending argument */
  argument: string;

  constructor(message: string, argument: string) {
    super(message, 'INVALID_ARGUMENT', 'argument');
    this.name = 'MxhrArgumentError';
    this.argument = argument;
  }
}

/**
 * A named file or an open descriptor could not be opened or read
 */
export class MxhrResourceError extends MxhrError {
  override kind: 'resource' = 'resource';
  /** File name or descriptor number */
  resource: string | number;

  constructor(message: string, resource: string | number, cause?: Error) {
    super(message, 'RESOURCE_ERROR', 'resource');
    this.name = 'MxhrResourceError';
    this.resource = resource;
    if (cause) {
      this.cause = cause;
    }
  }
}

/**
 * Text cannot be represented in, or bytes cannot be decoded from,
 * the named character encoding
 */
export class MxhrEncodingError extends MxhrError {
  override kind: 'encoding' = 'encoding';
  /** Canonical name of the encoding involved */
  encoding: string;
  /** Offset of the first offending code unit or byte, when known */
  position?: number;

  constructor(message: string, encoding: string, position?: number, cause?: Error) {
    super(message, 'ENCODING_ERROR', 'encoding');
    this.name = 'MxhrEncodingError';
    this.encoding = encoding;
    this.position = position;
    if (cause) {
      this.cause = cause;
    }
  }
}

/**
 * Normalizes an unknown thrown value into an Error for use as a cause
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * Load, parse, query and encode errors with line/column and a source excerpt.
 */

import type { SourcePosition } from './ast.js';

export type ParseErrorCode =
  | 'InvalidFormat'
  | 'InvalidToken'
  | 'InvalidKeyword'
  | 'InvalidNumber'
  | 'UnexpectedEndOfInput'
  | 'MaxDepthExceeded';

export type QueryErrorCode =
  | 'InvalidQuery'
  | 'UnexpectedDataType'
  | 'IntegerOverflow'
  | 'DocumentReleased';

export type ErrorCode = ParseErrorCode | QueryErrorCode | 'IOError';

type ConstructorOptions = { position?: SourcePosition; excerpt?: string; cause?: unknown };

export class ConfError extends Error {
  override readonly name: string = 'ConfError';
  readonly code: ErrorCode;
  readonly position?: SourcePosition;
  /** Source text leading up to the failure point. */
  readonly excerpt?: string;

  constructor(code: ErrorCode, message: string, options?: ConstructorOptions) {
    super(message);
    this.code = code;
    this.position = options?.position;
    this.excerpt = options?.excerpt;
    if (options?.cause !== undefined) this.cause = options.cause;
    Object.setPrototypeOf(this, ConfError.prototype);
  }

  /** Human-readable location string */
  get location(): string {
    if (this.position) {
      return `line ${this.position.line}, column ${this.position.column}`;
    }
    return '';
  }

  override toString(): string {
    const loc = this.location;
    return loc ? `${this.message} (${loc})` : this.message;
  }
}

export class ConfIOError extends ConfError {
  override readonly name = 'ConfIOError';
  declare readonly code: 'IOError';
  constructor(message: string, options?: ConstructorOptions) {
    super('IOError', message, options);
    Object.setPrototypeOf(this, ConfIOError.prototype);
  }
}

export class ConfParseError extends ConfError {
  override readonly name = 'ConfParseError';
  declare readonly code: ParseErrorCode;
  constructor(code: ParseErrorCode, message: string, options?: ConstructorOptions) {
    super(code, message, options);
    Object.setPrototypeOf(this, ConfParseError.prototype);
  }
}

export class ConfQueryError extends ConfError {
  override readonly name = 'ConfQueryError';
  declare readonly code: QueryErrorCode;
  constructor(code: QueryErrorCode, message: string, options?: ConstructorOptions) {
    super(code, message, options);
    Object.setPrototypeOf(this, ConfQueryError.prototype);
  }
}

export class ConfEncodeError extends ConfError {
  override readonly name = 'ConfEncodeError';
  constructor(message: string, options?: ConstructorOptions) {
    super('InvalidFormat', message, options);
    Object.setPrototypeOf(this, ConfEncodeError.prototype);
  }
}

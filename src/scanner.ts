/**
 * Character cursor over configuration source text. Tracks line and column
 * for diagnostics; the comment filter lives here as well.
 */

import type { SourcePosition } from './ast.js';
import { ConfParseError, type ParseErrorCode } from './errors.js';

export const DEFAULT_EXCERPT_WIDTH = 64;

function pos(line: number, column: number, offset: number): SourcePosition {
  return { line, column, offset };
}

export function isWhitespace(c: string | undefined): boolean {
  return c === ' ' || c === '\t' || c === '\r' || c === '\n';
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

export class Scanner {
  private offset = 0;
  private line = 1;
  private column = 1;

  constructor(readonly source: string) {}

  peek(): string | undefined {
    return this.source[this.offset];
  }

  next(): string {
    const c = this.source[this.offset];
    if (c === undefined) this.fail('UnexpectedEndOfInput', 'Unexpected end of input');
    this.offset++;
    if (c === '\n') {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    return c;
  }

  eat(ch: string): boolean {
    if (this.source[this.offset] !== ch) return false;
    this.next();
    return true;
  }

  /** Consumes a run of space, tab, CR and LF. Returns whether anything was consumed. */
  eatWhitespace(): boolean {
    const begin = this.offset;
    while (isWhitespace(this.peek())) this.next();
    return this.offset > begin;
  }

  cursor(): number {
    return this.offset;
  }

  slice(begin: number, end: number): string {
    return this.source.slice(begin, end);
  }

  position(): SourcePosition {
    return pos(this.line, this.column, this.offset);
  }

  positionAt(offset: number): SourcePosition {
    if (offset === this.offset) return this.position();
    let line = 1;
    let column = 1;
    const end = Math.min(offset, this.source.length);
    for (let i = 0; i < end; i++) {
      if (this.source[i] === '\n') {
        line++;
        column = 1;
      } else {
        column++;
      }
    }
    return pos(line, column, offset);
  }

  /** At most `width` characters of source ending at `offset`. */
  excerpt(offset: number = this.offset, width: number = DEFAULT_EXCERPT_WIDTH): string {
    let start = Math.max(0, offset - width);
    // Never begin on the second half of a surrogate pair.
    if (start > 0 && isLowSurrogate(this.source.charCodeAt(start))) start++;
    return this.source.slice(start, Math.max(start, offset));
  }

  fail(code: ParseErrorCode, message: string, offset: number = this.offset): never {
    throw new ConfParseError(code, message, {
      position: this.positionAt(offset),
      excerpt: this.excerpt(offset),
    });
  }
}

/**
 * Skips whitespace and `#` comments up to the next grammar token.
 * A comment runs through the end of its line or the end of input.
 */
export function skipTrivia(scanner: Scanner): void {
  for (;;) {
    scanner.eatWhitespace();
    if (!scanner.eat('#')) return;
    while (scanner.peek() !== undefined && !scanner.eat('\n')) scanner.next();
  }
}

/**
 * Property value literals: quoted strings, booleans, base-10 integers and
 * single-level lists of those.
 */

import type { ConfValue } from './ast.js';
import { fitsWidth } from './integers.js';
import { isWhitespace, type Scanner } from './scanner.js';

export type ParsedValue =
  | { kind: 'scalar'; value: ConfValue }
  | { kind: 'list'; values: ConfValue[] };

const INTEGER = /^[+-]?\d+(?:_\d+)*$/;

function isTerminator(c: string | undefined): boolean {
  return (
    c === undefined ||
    isWhitespace(c) ||
    c === ',' ||
    c === ']' ||
    c === '}' ||
    c === '#'
  );
}

/** Parses the value of a property; the scanner sits just past `=`. */
export function parseValue(scanner: Scanner): ParsedValue {
  scanner.eatWhitespace();
  const c = scanner.peek();
  if (c === undefined) scanner.fail('UnexpectedEndOfInput', 'Expected a value');
  if (c === '[') return { kind: 'list', values: parseList(scanner) };
  return { kind: 'scalar', value: parseScalar(scanner) };
}

function parseList(scanner: Scanner): ConfValue[] {
  const open = scanner.cursor();
  scanner.next(); // consume '['
  const values: ConfValue[] = [];
  for (;;) {
    scanner.eatWhitespace();
    const c = scanner.peek();
    if (c === undefined) scanner.fail('UnexpectedEndOfInput', 'Unclosed list', open);
    if (c === ']') break;
    if (c === '[') scanner.fail('InvalidToken', 'Nested lists are not supported');
    if (c === ',') scanner.fail('InvalidToken', 'Empty list element');
    values.push(parseScalar(scanner));
    scanner.eatWhitespace();
    if (scanner.eat(',')) continue;
    if (scanner.peek() === undefined) {
      scanner.fail('UnexpectedEndOfInput', 'Unclosed list', open);
    }
    if (scanner.peek() !== ']') scanner.fail('InvalidToken', 'Expected "," or "]" in list');
  }
  scanner.next(); // consume ']'
  return values;
}

/** The leading character decides the type: `"` string, `t`/`f` boolean, else integer. */
export function parseScalar(scanner: Scanner): ConfValue {
  const c = scanner.peek();
  if (c === '"') {
    const value = readString(scanner);
    if (!isTerminator(scanner.peek())) {
      scanner.fail('InvalidToken', 'Unexpected character after string');
    }
    return value;
  }
  const start = scanner.cursor();
  const token = readBareToken(scanner);
  if (token === '') scanner.fail('InvalidToken', 'Expected a value', start);
  if (c === 't' || c === 'f') return toBoolean(scanner, token, start);
  return toInteger(scanner, token, start);
}

function readString(scanner: Scanner): string {
  const open = scanner.cursor();
  scanner.next(); // consume opening quote
  const begin = scanner.cursor();
  for (;;) {
    const c = scanner.peek();
    if (c === undefined) scanner.fail('UnexpectedEndOfInput', 'Unclosed string', open);
    if (c === '"') break;
    scanner.next();
  }
  const value = scanner.slice(begin, scanner.cursor());
  scanner.next(); // consume closing quote
  return value;
}

function readBareToken(scanner: Scanner): string {
  const begin = scanner.cursor();
  while (!isTerminator(scanner.peek())) scanner.next();
  return scanner.slice(begin, scanner.cursor());
}

function toBoolean(scanner: Scanner, token: string, start: number): boolean {
  if (token === 'true') return true;
  if (token === 'false') return false;
  scanner.fail('InvalidToken', `Invalid boolean: ${JSON.stringify(token)}`, start);
}

function toInteger(scanner: Scanner, token: string, start: number): bigint {
  if (!INTEGER.test(token)) {
    scanner.fail('InvalidNumber', `Invalid number: ${JSON.stringify(token)}`, start);
  }
  const n = BigInt(token.replace(/_/g, ''));
  if (!fitsWidth(n, 'i64')) {
    scanner.fail('InvalidNumber', `Integer out of range: ${token}`, start);
  }
  return n;
}

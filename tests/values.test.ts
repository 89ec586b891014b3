import { describe, it, expect } from 'vitest';
import { ConfParseError } from '../src/errors.js';
import { Scanner } from '../src/scanner.js';
import { parseValue } from '../src/values.js';
import { catchError } from './helpers.js';

function value(src: string) {
  return parseValue(new Scanner(src));
}

function failure(src: string) {
  const err = catchError(() => value(src));
  expect(err).toBeInstanceOf(ConfParseError);
  return err;
}

describe('parseValue', () => {
  it('parses integers', () => {
    expect(value('100')).toEqual({ kind: 'scalar', value: 100n });
    expect(value('-42')).toEqual({ kind: 'scalar', value: -42n });
    expect(value('+7')).toEqual({ kind: 'scalar', value: 7n });
    expect(value('1_000_000')).toEqual({ kind: 'scalar', value: 1000000n });
    expect(value('-0')).toEqual({ kind: 'scalar', value: 0n });
  });

  it('parses booleans', () => {
    expect(value('true')).toEqual({ kind: 'scalar', value: true });
    expect(value('false')).toEqual({ kind: 'scalar', value: false });
  });

  it('parses strings verbatim', () => {
    expect(value('"hello world"')).toEqual({ kind: 'scalar', value: 'hello world' });
    expect(value('""')).toEqual({ kind: 'scalar', value: '' });
    expect(value('"a\\nb # c"')).toEqual({ kind: 'scalar', value: 'a\\nb # c' });
  });

  it('skips whitespace before the value', () => {
    expect(value(' \n  5')).toEqual({ kind: 'scalar', value: 5n });
  });

  it('parses mixed lists', () => {
    expect(value('[100, true, "hi"]')).toEqual({ kind: 'list', values: [100n, true, 'hi'] });
    expect(value('[ "a, b" ,false ]')).toEqual({ kind: 'list', values: ['a, b', false] });
  });

  it('parses empty lists and trailing commas', () => {
    expect(value('[]')).toEqual({ kind: 'list', values: [] });
    expect(value('[ ]')).toEqual({ kind: 'list', values: [] });
    expect(value('[1, 2,]')).toEqual({ kind: 'list', values: [1n, 2n] });
  });

  it('stops at the end of the token', () => {
    const s = new Scanner('5} rest');
    expect(parseValue(s)).toEqual({ kind: 'scalar', value: 5n });
    expect(s.peek()).toBe('}');

    const t = new Scanner('"a b" rest');
    parseValue(t);
    expect(t.cursor()).toBe(5);
  });

  it('rejects misspelled booleans', () => {
    expect(failure('tru')).toMatchObject({ code: 'InvalidToken' });
    expect(failure('falsey')).toMatchObject({ code: 'InvalidToken' });
  });

  it('rejects malformed numbers', () => {
    expect(failure('yes')).toMatchObject({ code: 'InvalidNumber' });
    expect(failure('12ab')).toMatchObject({ code: 'InvalidNumber' });
    expect(failure('1.5')).toMatchObject({ code: 'InvalidNumber' });
    expect(failure('1__0')).toMatchObject({ code: 'InvalidNumber' });
  });

  it('parses the full signed 64-bit range', () => {
    expect(value('9007199254740993')).toEqual({ kind: 'scalar', value: 9007199254740993n });
    expect(value('9223372036854775807')).toEqual({
      kind: 'scalar',
      value: 9223372036854775807n,
    });
    expect(value('-9223372036854775808')).toEqual({
      kind: 'scalar',
      value: -9223372036854775808n,
    });
  });

  it('rejects integers outside the signed 64-bit range', () => {
    expect(failure('9223372036854775808')).toMatchObject({
      code: 'InvalidNumber',
      message: 'Integer out of range: 9223372036854775808',
    });
    expect(failure('-9223372036854775809')).toMatchObject({ code: 'InvalidNumber' });
  });

  it('reports unterminated strings at the opening quote', () => {
    expect(failure('  "abc')).toMatchObject({
      code: 'UnexpectedEndOfInput',
      position: { line: 1, column: 3, offset: 2 },
    });
  });

  it('rejects text glued to a string', () => {
    expect(failure('"a"b')).toMatchObject({ code: 'InvalidToken' });
  });

  it('rejects missing values', () => {
    expect(failure('')).toMatchObject({ code: 'UnexpectedEndOfInput' });
    expect(failure('   ')).toMatchObject({ code: 'UnexpectedEndOfInput' });
  });

  it('rejects malformed lists', () => {
    expect(failure('[1, [2]]')).toMatchObject({ code: 'InvalidToken' });
    expect(failure('[1,,2]')).toMatchObject({ code: 'InvalidToken' });
    expect(failure('[1 2]')).toMatchObject({ code: 'InvalidToken' });
    expect(failure('[1, 2')).toMatchObject({
      code: 'UnexpectedEndOfInput',
      position: { offset: 0 },
    });
    expect(failure('[tru]')).toMatchObject({ code: 'InvalidToken' });
  });
});

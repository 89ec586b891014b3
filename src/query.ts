/**
 * Dotted-path queries over a parsed document.
 *
 * For `a.b.c`, `a` must be a nested section at the root, `b` a flat section
 * inside `a`, and `c` an item of `b`. The root only holds sections, so a path
 * without a `.` never names an item.
 */

import {
  isConfBoolean,
  isConfInteger,
  isConfString,
  isFlat,
  isNested,
  type ConfValue,
  type Item,
  type Section,
} from './ast.js';
import type { ConfDocument } from './document.js';
import { ConfQueryError } from './errors.js';
import {
  fitsWidth,
  isNarrowWidth,
  type IntegerWidth,
  type NarrowWidth,
  type WideWidth,
} from './integers.js';

export type Resolved =
  | { kind: 'item'; item: Item }
  | { kind: 'sections'; sections: readonly Section[] };

function splitPath(path: string): string[] | undefined {
  const segments = path.split('.');
  return segments.every((s) => s.length > 0) ? segments : undefined;
}

function findNested(parent: readonly Section[], name: string): readonly Section[] | undefined {
  for (const section of parent) {
    if (section.name === name && isNested(section)) return section.body.sections;
  }
  return undefined;
}

function findFlat(parent: readonly Section[], name: string): readonly Item[] | undefined {
  for (const section of parent) {
    if (section.name === name && isFlat(section)) return section.body.items;
  }
  return undefined;
}

/** Walks every segment but the last through nested sections. */
function walk(doc: ConfDocument, segments: readonly string[]): readonly Section[] | undefined {
  let current = doc.sections;
  for (let i = 0; i < segments.length - 1; i++) {
    const next = findNested(current, segments[i]!);
    if (next === undefined) return undefined;
    current = next;
  }
  return current;
}

/** Items of the flat section at `path`. */
export function getProperties(doc: ConfDocument, path: string): readonly Item[] | undefined {
  const segments = splitPath(path);
  if (segments === undefined) return undefined;
  const parent = walk(doc, segments);
  return parent && findFlat(parent, segments[segments.length - 1]!);
}

/** Child sections of the nested section at `path`; `''` is the document root. */
export function getSections(doc: ConfDocument, path: string): readonly Section[] | undefined {
  if (path === '') return doc.sections;
  const segments = splitPath(path);
  if (segments === undefined) return undefined;
  const parent = walk(doc, segments);
  return parent && findNested(parent, segments[segments.length - 1]!);
}

/**
 * Resolve a path to an item, or to the children of a nested section.
 * Items win when both exist under the same path.
 */
export function resolve(doc: ConfDocument, path: string): Resolved | undefined {
  const cut = path.lastIndexOf('.');
  if (cut !== -1) {
    const items = getProperties(doc, path.slice(0, cut));
    const name = path.slice(cut + 1);
    const item = items?.find((it) => it.name === name);
    if (item) return { kind: 'item', item };
  }
  const sections = path === '' ? undefined : getSections(doc, path);
  return sections && { kind: 'sections', sections };
}

function findItem(doc: ConfDocument, path: string): Item {
  const resolved = resolve(doc, path);
  if (resolved?.kind !== 'item') {
    throw new ConfQueryError('InvalidQuery', `No property at "${path}"`);
  }
  return resolved.item;
}

function kindOf(item: Item): string {
  if (item.kind === 'list') return 'list';
  return isConfInteger(item.value) ? 'integer' : typeof item.value;
}

function mismatch(path: string, expected: string, item: Item): never {
  throw new ConfQueryError(
    'UnexpectedDataType',
    `Expected ${expected} at "${path}", found ${kindOf(item)}`
  );
}

/** Scalar value of the pair at `path`, whatever its type. */
export function getValue(doc: ConfDocument, path: string): ConfValue {
  const item = findItem(doc, path);
  if (item.kind !== 'pair') mismatch(path, 'scalar', item);
  return item.value;
}

/**
 * Integer at `path`, checked against `width`. Widths up to 32 bits come back
 * as `number`, the 64-bit and pointer-sized ones as `bigint`.
 */
export function getInt(doc: ConfDocument, path: string, width: NarrowWidth): number;
export function getInt(doc: ConfDocument, path: string, width?: WideWidth): bigint;
export function getInt(doc: ConfDocument, path: string, width: IntegerWidth): number | bigint;
export function getInt(
  doc: ConfDocument,
  path: string,
  width: IntegerWidth = 'isize'
): number | bigint {
  const item = findItem(doc, path);
  if (item.kind !== 'pair' || !isConfInteger(item.value)) mismatch(path, 'integer', item);
  if (!fitsWidth(item.value, width)) {
    throw new ConfQueryError(
      'IntegerOverflow',
      `Value ${item.value} at "${path}" does not fit ${width}`
    );
  }
  return isNarrowWidth(width) ? Number(item.value) : item.value;
}

export function getBool(doc: ConfDocument, path: string): boolean {
  const item = findItem(doc, path);
  if (item.kind !== 'pair' || !isConfBoolean(item.value)) mismatch(path, 'boolean', item);
  return item.value;
}

export function getStr(doc: ConfDocument, path: string): string {
  const item = findItem(doc, path);
  if (item.kind !== 'pair' || !isConfString(item.value)) mismatch(path, 'string', item);
  return item.value;
}

export function getList(doc: ConfDocument, path: string): readonly ConfValue[] {
  const item = findItem(doc, path);
  if (item.kind !== 'list') mismatch(path, 'list', item);
  return item.values;
}

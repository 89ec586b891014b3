/**
 * Document tree types and positions.
 * All tree nodes are immutable once the parser hands them out.
 */

export interface SourcePosition {
  line: number;
  column: number;
  offset: number;
}

/** Scalar value of a property or list element. Integers are 64-bit signed. */
export type ConfValue = bigint | boolean | string;

export interface PairItem {
  readonly kind: 'pair';
  readonly name: string;
  readonly value: ConfValue;
}

export interface ListItem {
  readonly kind: 'list';
  readonly name: string;
  readonly values: readonly ConfValue[];
}

export type Item = PairItem | ListItem;

export interface FlatBody {
  readonly kind: 'flat';
  readonly items: readonly Item[];
}

export interface NestedBody {
  readonly kind: 'nested';
  readonly sections: readonly Section[];
}

/** A section holds either items or sections, never both. */
export type SectionBody = FlatBody | NestedBody;

export interface Section {
  readonly name: string;
  readonly body: SectionBody;
}

export function isConfInteger(v: ConfValue): v is bigint {
  return typeof v === 'bigint';
}

export function isConfBoolean(v: ConfValue): v is boolean {
  return typeof v === 'boolean';
}

export function isConfString(v: ConfValue): v is string {
  return typeof v === 'string';
}

export function isFlat(section: Section): section is Section & { readonly body: FlatBody } {
  return section.body.kind === 'flat';
}

export function isNested(section: Section): section is Section & { readonly body: NestedBody } {
  return section.body.kind === 'nested';
}

/** Identifier rule shared by the parser and the serializer. */
export function isIdentifier(s: string): boolean {
  return /^[A-Za-z0-9_]+$/.test(s);
}

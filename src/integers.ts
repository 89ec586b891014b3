/**
 * Integer widths accepted by `getInt`. Stored integers are 64-bit signed, so
 * the unsigned 64-bit kinds only ever see values up to the `i64` maximum.
 */

/** Widths whose values always fit a JavaScript number. */
export type NarrowWidth = 'i8' | 'u8' | 'i16' | 'u16' | 'i32' | 'u32';

/** 64-bit and pointer-sized widths, read as `bigint`. */
export type WideWidth = 'i64' | 'u64' | 'isize' | 'usize';

export type IntegerWidth = NarrowWidth | WideWidth;

export interface IntegerRange {
  min: bigint;
  max: bigint;
}

const I64: IntegerRange = { min: -0x8000_0000_0000_0000n, max: 0x7fff_ffff_ffff_ffffn };
const U64: IntegerRange = { min: 0n, max: 0xffff_ffff_ffff_ffffn };

export const INTEGER_RANGES: Readonly<Record<IntegerWidth, IntegerRange>> = {
  i8: { min: -0x80n, max: 0x7fn },
  u8: { min: 0n, max: 0xffn },
  i16: { min: -0x8000n, max: 0x7fffn },
  u16: { min: 0n, max: 0xffffn },
  i32: { min: -0x8000_0000n, max: 0x7fff_ffffn },
  u32: { min: 0n, max: 0xffff_ffffn },
  i64: I64,
  u64: U64,
  isize: I64,
  usize: U64,
};

const NARROW: ReadonlySet<string> = new Set(['i8', 'u8', 'i16', 'u16', 'i32', 'u32']);

export function isIntegerWidth(s: string): s is IntegerWidth {
  return Object.prototype.hasOwnProperty.call(INTEGER_RANGES, s);
}

export function isNarrowWidth(width: IntegerWidth): width is NarrowWidth {
  return NARROW.has(width);
}

export function fitsWidth(n: bigint, width: IntegerWidth): boolean {
  const { min, max } = INTEGER_RANGES[width];
  return n >= min && n <= max;
}

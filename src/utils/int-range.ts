/**
 * Range checks for the fixed-width integer fields the writers emit.
 */
export type IntegerType = 'u8' | 'u16' | 'i16' | 'u32' | 'i32';

const INTEGER_RANGES: Readonly<Record<IntegerType, readonly [number, number]>> = {
  u8: [0, 0xff],
  u16: [0, 0xffff],
  i16: [-0x8000, 0x7fff],
  u32: [0, 0xffffffff],
  i32: [-0x80000000, 0x7fffffff],
};

export function fitsInteger(value: number, type: IntegerType): boolean {
  const [min, max] = INTEGER_RANGES[type];
  return Number.isInteger(value) && value >= min && value <= max;
}

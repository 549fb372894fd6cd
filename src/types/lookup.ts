/**
 * Lookup table entries that address records stored elsewhere in a pack.
 */

/** INFO entry: `blockId` formatted as hex names the texture block. */
export interface TextureLookupEntry {
  readonly blockId: number;
  readonly unknown: number;
}

/** Body entry: `offset` locates the animation header slice inside the Body block. */
export interface AnimationLookupEntry {
  readonly offset: number;
  readonly unknown: number;
}

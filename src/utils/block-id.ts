/**
 * Block naming conventions used by lookup tables to address sibling blocks.
 */

/**
 * Formats a texture block id the way packs name texture blocks: lowercase hex, no leading zeros.
 * Names are only ever looked up, never parsed back into ids.
 */
export function blockIdToName(blockId: number): string {
  return (blockId >>> 0).toString(16);
}

/** Name of the companion block holding the payload of animation `index`. */
export function animationBlockName(index: number): string {
  return `Julien${index}`;
}

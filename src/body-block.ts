/**
 * Body block: animation lookup table of an animation pack.
 *
 * Layout: "MKJC", count (u32), then `count` {offset, unknown} pairs. The offsets point at
 * fixed-size animation header slices stored later in the same block.
 */
import { ANIMATION_HEADER_SIZE, BLOCK_MAGIC, BlockNames, LOOKUP_ENTRY_SIZE } from './constants/pack-format.js';
import type { BlockMap } from './block-container.js';
import { fail, ok, type PackResult } from './types/pack-error.js';
import type { AnimationLookupEntry } from './types/lookup.js';
import { ByteCursor } from './utils/byte-cursor.js';
import { ByteWriter } from './utils/byte-writer.js';

/** Animation header slice destined for Body, plus its lookup entry's unknown field. */
export interface BodyAnimationHeader {
  readonly header: Buffer;
  readonly unknown: number;
}

export function resolveBodyBlock(blocks: BlockMap, source: string): PackResult<AnimationLookupEntry[]> {
  const data = blocks.get(BlockNames.body);
  if (!data) {
    return fail('MissingRequiredBlock', 'no Body block in anim pack', source);
  }

  const cursor = new ByteCursor(data);
  if (!cursor.canRead(BLOCK_MAGIC.length + 4)) {
    return fail('TruncatedFile', 'Body block cannot fit its header', source);
  }
  const magic = cursor.readTag(BLOCK_MAGIC.length);
  if (magic !== BLOCK_MAGIC) {
    return fail('BadMagic', `Unrecognized Body block header: ${JSON.stringify(magic)}`, source);
  }

  const totalAnimations = cursor.readUint32();
  if (!cursor.canRead(totalAnimations * LOOKUP_ENTRY_SIZE)) {
    return fail('TruncatedFile', `Body block declares ${totalAnimations} animations but cannot fit their lookup table`, source);
  }

  const lookup: AnimationLookupEntry[] = [];
  for (let i = 0; i < totalAnimations; i++) {
    const offset = cursor.readUint32();
    const unknown = cursor.readUint32();
    lookup.push({ offset, unknown });
  }
  return ok(lookup);
}

/**
 * Builds a Body block with header slices laid out right after the lookup table.
 * Every header must be `ANIMATION_HEADER_SIZE` bytes.
 */
export function encodeBodyBlock(animations: readonly BodyAnimationHeader[]): Buffer {
  const tableEnd = BLOCK_MAGIC.length + 4 + animations.length * LOOKUP_ENTRY_SIZE;
  const writer = new ByteWriter(tableEnd + animations.length * ANIMATION_HEADER_SIZE);
  writer.writeTag(BLOCK_MAGIC);
  writer.writeUint32(animations.length);
  animations.forEach((animation, index) => {
    writer.writeUint32(tableEnd + index * ANIMATION_HEADER_SIZE);
    writer.writeUint32(animation.unknown);
  });
  for (const animation of animations) {
    writer.writeBytes(animation.header);
  }
  return writer.toBuffer();
}

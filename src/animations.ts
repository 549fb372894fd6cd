/**
 * Animation records: a header slice from Body joined with the payload of block `Julien<i>`.
 */
import { ANIMATION_HEADER_SIZE, BlockNames } from './constants/pack-format.js';
import type { BlockMap } from './block-container.js';
import { fail, ok, type PackResult } from './types/pack-error.js';
import type { AnimationLookupEntry } from './types/lookup.js';
import { animationBlockName } from './utils/block-id.js';
import { ByteCursor } from './utils/byte-cursor.js';

export function extractAnimations(
  blocks: BlockMap,
  lookup: readonly AnimationLookupEntry[],
  source: string
): PackResult<Buffer[]> {
  const body = blocks.get(BlockNames.body);
  if (!body) {
    return fail('MissingRequiredBlock', 'no Body block in anim pack', source);
  }

  const cursor = new ByteCursor(body);
  const animations: Buffer[] = [];
  for (let i = 0; i < lookup.length; i++) {
    const name = animationBlockName(i);
    const payload = blocks.get(name);
    if (!payload) {
      return fail('MissingRequiredBlock', `Required animation block "${name}" missing`, source);
    }

    const { offset } = lookup[i];
    if (!cursor.seek(offset) || !cursor.canRead(ANIMATION_HEADER_SIZE)) {
      return fail('InvalidRange', `Animation ${i} header at offset ${offset} runs past the Body block (${body.length} bytes)`, source);
    }
    animations.push(Buffer.concat([cursor.readBytes(ANIMATION_HEADER_SIZE), payload]));
  }
  return ok(animations);
}

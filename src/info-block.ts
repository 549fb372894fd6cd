/**
 * INFO block: texture lookup table of a mesh pack.
 */
import { BlockNames, LOOKUP_ENTRY_SIZE } from './constants/pack-format.js';
import type { BlockMap } from './block-container.js';
import { fail, ok, type PackResult } from './types/pack-error.js';
import type { TextureLookupEntry } from './types/lookup.js';
import { ByteCursor } from './utils/byte-cursor.js';
import { ByteWriter } from './utils/byte-writer.js';

/**
 * Decodes the texture lookup table from the INFO block.
 */
export function resolveInfoBlock(blocks: BlockMap, source: string): PackResult<TextureLookupEntry[]> {
  const data = blocks.get(BlockNames.info);
  if (!data) {
    return fail('MissingRequiredBlock', 'no INFO block in mesh pack', source);
  }

  const cursor = new ByteCursor(data);
  if (!cursor.canRead(4)) {
    return fail('TruncatedFile', 'INFO block cannot fit its texture count', source);
  }
  const totalTextures = cursor.readUint32();
  if (!cursor.canRead(totalTextures * LOOKUP_ENTRY_SIZE)) {
    return fail('TruncatedFile', `INFO block declares ${totalTextures} textures but holds ${Math.floor(cursor.remaining / LOOKUP_ENTRY_SIZE)}`, source);
  }

  const lookup: TextureLookupEntry[] = [];
  for (let i = 0; i < totalTextures; i++) {
    const blockId = cursor.readUint32();
    const unknown = cursor.readUint32();
    lookup.push({ blockId, unknown });
  }
  return ok(lookup);
}

export function encodeInfoBlock(lookup: readonly TextureLookupEntry[]): Buffer {
  const writer = new ByteWriter(4 + lookup.length * LOOKUP_ENTRY_SIZE);
  writer.writeUint32(lookup.length);
  for (const entry of lookup) {
    writer.writeUint32(entry.blockId);
    writer.writeUint32(entry.unknown);
  }
  return writer.toBuffer();
}

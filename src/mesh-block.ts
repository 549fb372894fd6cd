/**
 * MESHES block: "MKJC", mesh count (u32), `count` block-relative offsets (u32), then the
 * meshes back to back. Mesh sub-format is not decoded here.
 */
import { BLOCK_MAGIC, BlockNames } from './constants/pack-format.js';
import type { BlockMap } from './block-container.js';
import { fail, ok, type PackResult } from './types/pack-error.js';
import { ByteCursor } from './utils/byte-cursor.js';
import { ByteWriter } from './utils/byte-writer.js';

/**
 * Slices the MESHES block into one buffer per mesh.
 * Mesh `i` spans from its offset to the next mesh's offset, the last one to the block end.
 */
export function resolveMeshBlock(blocks: BlockMap, source: string): PackResult<Buffer[]> {
  const data = blocks.get(BlockNames.meshes);
  if (!data) {
    return fail('MissingRequiredBlock', 'no MESHES block in mesh pack', source);
  }

  const cursor = new ByteCursor(data);
  if (!cursor.canRead(BLOCK_MAGIC.length + 4)) {
    return fail('TruncatedFile', 'MESHES block cannot fit its header', source);
  }
  const magic = cursor.readTag(BLOCK_MAGIC.length);
  if (magic !== BLOCK_MAGIC) {
    return fail('BadMagic', `Unrecognized MESHES block header: ${JSON.stringify(magic)}`, source);
  }

  const meshCount = cursor.readUint32();
  if (!cursor.canRead(meshCount * 4)) {
    return fail('TruncatedFile', `MESHES block declares ${meshCount} meshes but cannot fit their offset table`, source);
  }
  const offsets: number[] = [];
  for (let i = 0; i < meshCount; i++) {
    offsets.push(cursor.readUint32());
  }

  if (meshCount > 0 && offsets[0] !== cursor.position) {
    return fail('InconsistentSize', `First mesh offset ${offsets[0]} does not follow the offset table ending at ${cursor.position}`, source);
  }

  const meshes: Buffer[] = [];
  for (let i = 0; i < meshCount; i++) {
    const end = i === meshCount - 1 ? data.length : offsets[i + 1];
    if (end < offsets[i] || end > data.length) {
      return fail('InvalidRange', `Mesh ${i} spans ${offsets[i]}..${end}, outside MESHES block of ${data.length} bytes`, source);
    }
    meshes.push(cursor.readBytes(end - offsets[i]));
  }
  return ok(meshes);
}

/**
 * Builds a MESHES block, computing offsets as running totals after the offset table.
 */
export function encodeMeshBlock(meshes: readonly Buffer[]): Buffer {
  const tableEnd = BLOCK_MAGIC.length + 4 + meshes.length * 4;
  const totalSize = meshes.reduce((sum, mesh) => sum + mesh.length, tableEnd);
  const writer = new ByteWriter(totalSize);
  writer.writeTag(BLOCK_MAGIC);
  writer.writeUint32(meshes.length);

  let offset = tableEnd;
  for (const mesh of meshes) {
    writer.writeUint32(offset);
    offset += mesh.length;
  }
  for (const mesh of meshes) {
    writer.writeBytes(mesh);
  }
  return writer.toBuffer();
}

/**
 * Texture blocks of a mesh pack, addressed through the INFO lookup table.
 *
 * Block layout: size, id, type, ddsSize (u32 each) followed by a DDS file without its magic.
 */
import { DDS_HEADER_SIZE, DDS_PIXEL_FORMAT_SIZE, TEXTURE_HEADER_SIZE } from './constants/pack-format.js';
import type { BlockMap } from './block-container.js';
import { decodeDdsHeader, encodeDdsHeader, hasValidDdsSizes, withLinearSize } from './dds-header.js';
import { fail, ok, type PackResult } from './types/pack-error.js';
import type { TextureLookupEntry } from './types/lookup.js';
import type { DdsHeader, TextureBlockHeader, TextureRecord } from './types/texture.js';
import { blockIdToName } from './utils/block-id.js';
import { ByteCursor } from './utils/byte-cursor.js';
import { ByteWriter } from './utils/byte-writer.js';

function decodeTextureBlock(name: string, data: Buffer, entry: TextureLookupEntry, source: string): PackResult<TextureRecord> {
  const cursor = new ByteCursor(data);
  if (!cursor.canRead(TEXTURE_HEADER_SIZE)) {
    return fail('TruncatedFile', `Texture block "${name}" cannot fit its header`, source);
  }
  const header: TextureBlockHeader = {
    size: cursor.readUint32(),
    id: cursor.readUint32(),
    type: cursor.readUint32(),
    ddsSize: cursor.readUint32(),
  };

  if (header.id !== entry.blockId) {
    return fail('BlockIdMismatch', `Texture block "${name}" has id ${header.id}, expected ${entry.blockId}`, source);
  }
  if (!cursor.canRead(header.ddsSize)) {
    return fail('TruncatedFile', `Texture block "${name}" declares ${header.ddsSize} DDS bytes but holds ${cursor.remaining}`, source);
  }

  const ddsCursor = new ByteCursor(cursor.readBytes(header.ddsSize));
  if (!ddsCursor.canRead(DDS_HEADER_SIZE)) {
    return fail('TruncatedFile', `Texture block "${name}" cannot fit a DDS header`, source);
  }
  const decoded = decodeDdsHeader(ddsCursor);
  if (!hasValidDdsSizes(decoded)) {
    return fail(
      'InvalidDdsHeader',
      `Invalid DDS header sizes in texture "${name}": header ${decoded.size} (expected ${DDS_HEADER_SIZE}), pixel format ${decoded.format.size} (expected ${DDS_PIXEL_FORMAT_SIZE})`,
      source
    );
  }

  const dds = withLinearSize(decoded);
  if (!ddsCursor.canRead(dds.pitchOrLinearSize)) {
    return fail('TruncatedFile', `Texture "${name}" needs ${dds.pitchOrLinearSize} pixel bytes but holds ${ddsCursor.remaining}`, source);
  }
  const texels = ddsCursor.readBytes(dds.pitchOrLinearSize);
  return ok({ header, dds, texels });
}

/**
 * Extracts one texture per INFO lookup entry, keyed by texture block name.
 */
export function extractTextures(
  blocks: BlockMap,
  lookup: readonly TextureLookupEntry[],
  source: string
): PackResult<Map<string, TextureRecord>> {
  const textures = new Map<string, TextureRecord>();
  for (const entry of lookup) {
    const name = blockIdToName(entry.blockId);
    const data = blocks.get(name);
    if (!data) {
      return fail('MissingRequiredBlock', `Required texture block "${name}" missing`, source);
    }
    if (textures.has(name)) {
      return fail('DuplicateBlock', `Duplicate texture extracted: ${name}`, source);
    }

    const record = decodeTextureBlock(name, data, entry, source);
    if (!record.ok) {
      return record;
    }
    textures.set(name, record.value);
  }
  return ok(textures);
}

/**
 * Builds a texture block body. `size` and `ddsSize` both record the DDS length without magic.
 */
export function encodeTextureBlock(id: number, type: number, dds: DdsHeader, texels: Buffer): Buffer {
  const ddsBytes = Buffer.concat([encodeDdsHeader(dds), texels]);
  const writer = new ByteWriter(TEXTURE_HEADER_SIZE + ddsBytes.length);
  writer.writeUint32(ddsBytes.length);
  writer.writeUint32(id);
  writer.writeUint32(type);
  writer.writeUint32(ddsBytes.length);
  writer.writeBytes(ddsBytes);
  return writer.toBuffer();
}

/**
 * DDS header codec for textures embedded in texture blocks.
 * Texture blocks store the DDS file without its leading "DDS " magic.
 */
import { DDS_HEADER_SIZE, DDS_PIXEL_FORMAT_SIZE } from './constants/pack-format.js';
import type { DdsHeader, DdsPixelFormat } from './types/texture.js';
import { ByteCursor } from './utils/byte-cursor.js';
import { ByteWriter } from './utils/byte-writer.js';
import { fitsInteger } from './utils/int-range.js';

const RESERVED1_COUNT = 11;

/** Four-character codes whose 4x4 blocks take 8 bytes; other block-compressed formats take 16. */
const EIGHT_BYTE_BLOCK_FORMATS: ReadonlySet<string> = new Set(['DXT1', 'BC1', 'BC4']);

function readFourCC(cursor: ByteCursor): string {
  return cursor.readTag(4).replace(/\0+$/, '');
}

/**
 * Decodes a 124-byte DDS header. The cursor must have `DDS_HEADER_SIZE` bytes available.
 */
export function decodeDdsHeader(cursor: ByteCursor): DdsHeader {
  const size = cursor.readUint32();
  const flags = cursor.readUint32();
  const height = cursor.readUint32();
  const width = cursor.readUint32();
  const pitchOrLinearSize = cursor.readUint32();
  const depth = cursor.readUint32();
  const mipMapCount = cursor.readUint32();
  const reserved1: number[] = [];
  for (let i = 0; i < RESERVED1_COUNT; i++) {
    reserved1.push(cursor.readUint32());
  }
  const format: DdsPixelFormat = {
    size: cursor.readUint32(),
    flags: cursor.readUint32(),
    fourCC: readFourCC(cursor),
    rgbBitCount: cursor.readUint32(),
    rBitMask: cursor.readUint32(),
    gBitMask: cursor.readUint32(),
    bBitMask: cursor.readUint32(),
    aBitMask: cursor.readUint32(),
  };
  return {
    size,
    flags,
    height,
    width,
    pitchOrLinearSize,
    depth,
    mipMapCount,
    reserved1,
    format,
    caps: cursor.readUint32(),
    caps2: cursor.readUint32(),
    caps3: cursor.readUint32(),
    caps4: cursor.readUint32(),
    reserved2: cursor.readUint32(),
  };
}

export function encodeDdsHeader(header: DdsHeader): Buffer {
  const writer = new ByteWriter(DDS_HEADER_SIZE);
  writer.writeUint32(header.size);
  writer.writeUint32(header.flags);
  writer.writeUint32(header.height);
  writer.writeUint32(header.width);
  writer.writeUint32(header.pitchOrLinearSize);
  writer.writeUint32(header.depth);
  writer.writeUint32(header.mipMapCount);
  for (let i = 0; i < RESERVED1_COUNT; i++) {
    writer.writeUint32(header.reserved1[i] ?? 0);
  }
  writer.writeUint32(header.format.size);
  writer.writeUint32(header.format.flags);
  const fourCC = Buffer.alloc(4);
  fourCC.write(header.format.fourCC, 'latin1');
  writer.writeBytes(fourCC);
  writer.writeUint32(header.format.rgbBitCount);
  writer.writeUint32(header.format.rBitMask);
  writer.writeUint32(header.format.gBitMask);
  writer.writeUint32(header.format.bBitMask);
  writer.writeUint32(header.format.aBitMask);
  writer.writeUint32(header.caps);
  writer.writeUint32(header.caps2);
  writer.writeUint32(header.caps3);
  writer.writeUint32(header.caps4);
  writer.writeUint32(header.reserved2);
  return writer.toBuffer();
}

/**
 * Names the first field that cannot be stored as written, or null when every field fits.
 */
export function findUnencodableDdsField(header: DdsHeader): string | null {
  const fields: ReadonlyArray<readonly [string, number]> = [
    ['size', header.size],
    ['flags', header.flags],
    ['height', header.height],
    ['width', header.width],
    ['pitchOrLinearSize', header.pitchOrLinearSize],
    ['depth', header.depth],
    ['mipMapCount', header.mipMapCount],
    ...header.reserved1.map((value, index): readonly [string, number] => [`reserved1[${index}]`, value]),
    ['format.size', header.format.size],
    ['format.flags', header.format.flags],
    ['format.rgbBitCount', header.format.rgbBitCount],
    ['format.rBitMask', header.format.rBitMask],
    ['format.gBitMask', header.format.gBitMask],
    ['format.bBitMask', header.format.bBitMask],
    ['format.aBitMask', header.format.aBitMask],
    ['caps', header.caps],
    ['caps2', header.caps2],
    ['caps3', header.caps3],
    ['caps4', header.caps4],
    ['reserved2', header.reserved2],
  ];
  if (header.reserved1.length !== RESERVED1_COUNT) {
    return 'reserved1';
  }
  if (!/^[\x00-\xff]{0,4}$/.test(header.format.fourCC)) {
    return 'format.fourCC';
  }
  const invalid = fields.find(([, value]) => !fitsInteger(value, 'u32'));
  return invalid ? invalid[0] : null;
}

export function hasValidDdsSizes(header: DdsHeader): boolean {
  return header.size === DDS_HEADER_SIZE && header.format.size === DDS_PIXEL_FORMAT_SIZE;
}

/**
 * Size of the top-level surface of a block-compressed texture.
 */
export function computeLinearSize(width: number, height: number, fourCC: string): number {
  const blockSize = EIGHT_BYTE_BLOCK_FORMATS.has(fourCC) ? 8 : 16;
  return Math.ceil(width / 4) * Math.ceil(height / 4) * blockSize;
}

/**
 * Fills in `pitchOrLinearSize` when a texture leaves it zero.
 * Some Creature Isle DXT5 textures omit the field.
 */
export function withLinearSize(header: DdsHeader): DdsHeader {
  if (header.pitchOrLinearSize !== 0) {
    return header;
  }
  return { ...header, pitchOrLinearSize: computeLinearSize(header.width, header.height, header.format.fourCC) };
}

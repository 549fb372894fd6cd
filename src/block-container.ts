/**
 * Outer framing of a Pack file: an 8-byte magic followed by name/size-prefixed blocks.
 */
import { BLOCK_HEADER_SIZE, BLOCK_NAME_SIZE, PACK_MAGIC } from './constants/pack-format.js';
import { fail, ok, type PackResult } from './types/pack-error.js';
import { ByteCursor } from './utils/byte-cursor.js';
import { ByteWriter } from './utils/byte-writer.js';

export type BlockMap = Map<string, Buffer>;

const PRINTABLE_NAME = /^[\x20-\x7e]+$/;

/**
 * Checks that a name can be stored in a 32-byte block name field with its terminator.
 */
export function validateBlockName(name: string, source: string): PackResult<string> {
  if (name.length === 0 || name.length >= BLOCK_NAME_SIZE) {
    return fail('InvalidBlockName', `Block name must be 1-${BLOCK_NAME_SIZE - 1} characters: "${name}"`, source);
  }
  if (!PRINTABLE_NAME.test(name)) {
    return fail('InvalidBlockName', `Block name contains non-printable characters: ${JSON.stringify(name)}`, source);
  }
  return ok(name);
}

/**
 * Splits a Pack file into its named blocks.
 *
 * @param buffer - Complete file contents
 * @param source - File name reported in errors
 * @returns Block bodies keyed by name, in file order
 */
export function readBlocks(buffer: Buffer, source: string): PackResult<BlockMap> {
  if (buffer.length < PACK_MAGIC.length + BLOCK_HEADER_SIZE) {
    return fail('TruncatedFile', `File too small to be a valid Pack file: ${buffer.length} bytes`, source);
  }

  const cursor = new ByteCursor(buffer);
  const magic = cursor.readTag(PACK_MAGIC.length);
  if (magic !== PACK_MAGIC) {
    return fail('BadMagic', `Unrecognized Pack header: ${JSON.stringify(magic)}`, source);
  }

  const blocks: BlockMap = new Map();
  while (cursor.remaining >= BLOCK_HEADER_SIZE) {
    const headerOffset = cursor.position;
    const nameField = cursor.readBytes(BLOCK_NAME_SIZE);
    const terminator = nameField.indexOf(0);
    if (terminator === -1) {
      return fail('InvalidBlockName', `Block name at offset ${headerOffset} is not NUL-terminated`, source);
    }
    const name = nameField.toString('latin1', 0, terminator);
    const size = cursor.readUint32();

    if (!cursor.canRead(size)) {
      return fail('TruncatedFile', `Block "${name}" declares ${size} bytes but only ${cursor.remaining} remain`, source);
    }
    if (blocks.has(name)) {
      return fail('DuplicateBlock', `Duplicate block name: ${name}`, source);
    }
    blocks.set(name, cursor.readBytes(size));
  }

  if (cursor.remaining > 0) {
    return fail('TrailingData', `File not evenly split into whole blocks: ${cursor.remaining} trailing bytes`, source);
  }
  return ok(blocks);
}

/**
 * Serializes blocks in iteration order behind the Pack magic.
 */
export function writeBlocks(blocks: ReadonlyMap<string, Buffer>): Buffer {
  let totalSize = PACK_MAGIC.length;
  for (const body of blocks.values()) {
    totalSize += BLOCK_HEADER_SIZE + body.length;
  }

  const writer = new ByteWriter(totalSize);
  writer.writeTag(PACK_MAGIC);
  for (const [name, body] of blocks) {
    writer.writeFixedString(name, BLOCK_NAME_SIZE);
    writer.writeUint32(body.length);
    writer.writeBytes(body);
  }
  return writer.toBuffer();
}

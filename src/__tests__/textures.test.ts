import { describe, it, expect } from 'vitest';
import type { BlockMap } from '../block-container.js';
import {
  computeLinearSize,
  decodeDdsHeader,
  encodeDdsHeader,
  findUnencodableDdsField,
  withLinearSize,
} from '../dds-header.js';
import { encodeInfoBlock, resolveInfoBlock } from '../info-block.js';
import { PackFile } from '../pack-file.js';
import { encodeTextureBlock, extractTextures } from '../textures.js';
import { blockIdToName } from '../utils/block-id.js';
import { ByteCursor } from '../utils/byte-cursor.js';
import { expectFailure, expectSuccess, filled, makeDdsHeader, rawPack, u32s } from './pack-fixtures.js';

describe('blockIdToName', () => {
  it('formats ids as lowercase hex without leading zeros', () => {
    expect(blockIdToName(1)).toBe('1');
    expect(blockIdToName(0)).toBe('0');
    expect(blockIdToName(255)).toBe('ff');
    expect(blockIdToName(0x1a2b)).toBe('1a2b');
    expect(blockIdToName(0xffffffff)).toBe('ffffffff');
  });
});

describe('resolveInfoBlock', () => {
  it('reads the count and the lookup entries', () => {
    const blocks: BlockMap = new Map([['INFO', u32s(2, 0x10, 7, 0xab, 9)]]);
    expect(expectSuccess(resolveInfoBlock(blocks, 'x'))).toEqual([
      { blockId: 0x10, unknown: 7 },
      { blockId: 0xab, unknown: 9 },
    ]);
  });

  it('requires an INFO block', () => {
    expect(expectFailure(resolveInfoBlock(new Map(), 'x')).kind).toBe('MissingRequiredBlock');
  });

  it('rejects a count larger than the table', () => {
    const blocks: BlockMap = new Map([['INFO', u32s(3, 1, 0)]]);
    expect(expectFailure(resolveInfoBlock(blocks, 'x')).kind).toBe('TruncatedFile');
  });

  it('encodes the same layout it reads', () => {
    expect(encodeInfoBlock([{ blockId: 0x10, unknown: 7 }])).toEqual(u32s(1, 0x10, 7));
  });
});

describe('DDS header', () => {
  it('computes the linear size of block-compressed textures', () => {
    expect(computeLinearSize(8, 8, 'DXT1')).toBe(32);
    expect(computeLinearSize(8, 8, 'DXT5')).toBe(64);
    expect(computeLinearSize(5, 5, 'DXT1')).toBe(32);
    expect(computeLinearSize(8, 4, 'BC4')).toBe(16);
    expect(computeLinearSize(4, 4, 'DXT3')).toBe(16);
  });

  it('fills in a zero pitchOrLinearSize and keeps a present one', () => {
    expect(withLinearSize(makeDdsHeader({ pitchOrLinearSize: 0, fourCC: 'DXT1' })).pitchOrLinearSize).toBe(32);
    expect(withLinearSize(makeDdsHeader({ pitchOrLinearSize: 0, fourCC: 'DXT5' })).pitchOrLinearSize).toBe(64);
    expect(withLinearSize(makeDdsHeader({ pitchOrLinearSize: 48 })).pitchOrLinearSize).toBe(48);
  });

  it('strips the NUL padding of three-character codes', () => {
    const header = makeDdsHeader({ fourCC: 'BC1' });
    const encoded = encodeDdsHeader(header);
    expect(encoded.length).toBe(124);
    expect([...encoded.subarray(80, 84)]).toEqual([0x42, 0x43, 0x31, 0]);

    const decoded = decodeDdsHeader(new ByteCursor(encoded));
    expect(decoded).toEqual(header);
    expect(computeLinearSize(decoded.width, decoded.height, decoded.format.fourCC)).toBe(32);
  });

  it('names the first field that cannot be stored', () => {
    expect(findUnencodableDdsField(makeDdsHeader())).toBeNull();
    expect(findUnencodableDdsField(makeDdsHeader({ width: 2 ** 32 }))).toBe('width');
    expect(findUnencodableDdsField(makeDdsHeader({ caps: -1 }))).toBe('caps');
    expect(findUnencodableDdsField(makeDdsHeader({ reserved1: [0, 0, 0] }))).toBe('reserved1');
    expect(findUnencodableDdsField(makeDdsHeader({ fourCC: 'DXT10' }))).toBe('format.fourCC');
  });
});

describe('extractTextures', () => {
  function textureBlocks(textureBlock: Buffer, info: Buffer = encodeInfoBlock([{ blockId: 1, unknown: 0 }])): BlockMap {
    return new Map([
      ['INFO', info],
      ['1', textureBlock],
    ]);
  }

  function texturesOf(blocks: BlockMap) {
    return extractTextures(blocks, expectSuccess(resolveInfoBlock(blocks, 'x')), 'x');
  }

  it('decodes the header, DDS header and pixel payload', () => {
    const texels = filled(32);
    const textures = expectSuccess(texturesOf(textureBlocks(encodeTextureBlock(1, 3, makeDdsHeader(), texels))));

    const texture = textures.get('1');
    expect(texture?.header).toEqual({ size: 156, id: 1, type: 3, ddsSize: 156 });
    expect(texture?.dds.format.fourCC).toBe('DXT1');
    expect(texture?.texels).toEqual(texels);
  });

  it('looks texture blocks up by hex name', () => {
    const blocks: BlockMap = new Map([
      ['INFO', encodeInfoBlock([{ blockId: 0xab, unknown: 0 }])],
      ['ab', encodeTextureBlock(0xab, 0, makeDdsHeader(), filled(32))],
    ]);
    expect([...expectSuccess(texturesOf(blocks)).keys()]).toEqual(['ab']);
  });

  it('recomputes a missing linear size before reading pixels', () => {
    const dds = makeDdsHeader({ pitchOrLinearSize: 0, fourCC: 'DXT5' });
    const textures = expectSuccess(texturesOf(textureBlocks(encodeTextureBlock(1, 0, dds, filled(64)))));
    expect(textures.get('1')?.dds.pitchOrLinearSize).toBe(64);
    expect(textures.get('1')?.texels.length).toBe(64);
  });

  it('fails when a lookup entry names a missing block', () => {
    const blocks: BlockMap = new Map([['INFO', encodeInfoBlock([{ blockId: 2, unknown: 0 }])]]);
    const error = expectFailure(texturesOf(blocks));
    expect(error.kind).toBe('MissingRequiredBlock');
    expect(error.detail).toBe('Required texture block "2" missing');
  });

  it('fails when the texture header id differs from the lookup id', () => {
    const error = expectFailure(texturesOf(textureBlocks(encodeTextureBlock(2, 0, makeDdsHeader(), filled(32)))));
    expect(error.kind).toBe('BlockIdMismatch');
  });

  it('fails on wrong DDS header or pixel format sizes', () => {
    const badHeader = encodeTextureBlock(1, 0, makeDdsHeader({ size: 120 }), filled(32));
    expect(expectFailure(texturesOf(textureBlocks(badHeader))).kind).toBe('InvalidDdsHeader');

    const goodFormat = makeDdsHeader();
    const badFormat = encodeTextureBlock(1, 0, { ...goodFormat, format: { ...goodFormat.format, size: 31 } }, filled(32));
    expect(expectFailure(texturesOf(textureBlocks(badFormat))).kind).toBe('InvalidDdsHeader');
  });

  it('fails when the pixel payload is shorter than the linear size', () => {
    const block = encodeTextureBlock(1, 0, makeDdsHeader({ pitchOrLinearSize: 32 }), filled(16));
    expect(expectFailure(texturesOf(textureBlocks(block))).kind).toBe('TruncatedFile');
  });

  it('fails when ddsSize runs past the block', () => {
    const block = encodeTextureBlock(1, 0, makeDdsHeader(), filled(32));
    block.writeUInt32LE(1000, 12);
    expect(expectFailure(texturesOf(textureBlocks(block))).kind).toBe('TruncatedFile');
  });

  it('fails when the same texture is listed twice', () => {
    const info = encodeInfoBlock([
      { blockId: 1, unknown: 0 },
      { blockId: 1, unknown: 0 },
    ]);
    const error = expectFailure(texturesOf(textureBlocks(encodeTextureBlock(1, 0, makeDdsHeader(), filled(32)), info)));
    expect(error.kind).toBe('DuplicateBlock');
  });
});

describe('mesh pack', () => {
  it('decodes one texture and one mesh from a minimal pack', () => {
    const mesh = filled(50, 7);
    const file = rawPack([
      ['INFO', u32s(1, 1, 0)],
      ['1', encodeTextureBlock(1, 0, makeDdsHeader(), filled(32))],
      ['MESHES', Buffer.concat([Buffer.from('MKJC'), u32s(1, 12), mesh])],
    ]);

    const pack = expectSuccess(PackFile.fromBuffer({ buffer: file }));
    expect(pack.kinds).toEqual(['mesh']);
    expect(pack.textures.size).toBe(1);
    expect(pack.textures.get('1')?.header.id).toBe(1);
    expect(pack.textureLookup).toEqual([{ blockId: 1, unknown: 0 }]);
    expect(pack.meshes).toEqual([mesh]);
  });

  it('requires a MESHES block next to INFO', () => {
    const file = rawPack([
      ['INFO', u32s(1, 1, 0)],
      ['1', encodeTextureBlock(1, 0, makeDdsHeader(), filled(32))],
    ]);
    expect(expectFailure(PackFile.fromBuffer({ buffer: file })).kind).toBe('MissingRequiredBlock');
  });

  it('builds texture, INFO and MESHES blocks that load back', () => {
    const builder = PackFile.create();
    const dds = makeDdsHeader({ fourCC: 'DXT5', pitchOrLinearSize: 64 });
    expectSuccess(builder.insertTexture({ blockId: 0x2f, unknown: 4, type: 1, dds, texels: filled(64) }));
    expectSuccess(builder.insertTexture({ blockId: 3, unknown: 5, type: 2, dds: makeDdsHeader(), texels: filled(32, 9) }));
    expectSuccess(builder.insertMesh(filled(10)));
    expectSuccess(builder.insertMesh(filled(20, 1)));
    expectSuccess(builder.createTextureBlocks());
    expectSuccess(builder.createInfoBlock());
    expectSuccess(builder.createMeshBlock());
    expect(builder.blockNames).toEqual(['2f', '3', 'INFO', 'MESHES']);

    const pack = expectSuccess(PackFile.fromBuffer({ buffer: expectSuccess(builder.toBuffer()) }));
    expect(pack.textureLookup).toEqual([
      { blockId: 0x2f, unknown: 4 },
      { blockId: 3, unknown: 5 },
    ]);
    expect(pack.textures.get('2f')?.texels).toEqual(filled(64));
    expect(pack.textures.get('2f')?.header.type).toBe(1);
    expect(pack.textures.get('3')?.dds).toEqual(makeDdsHeader());
    expect(pack.meshes).toEqual([filled(10), filled(20, 1)]);
  });

  it('refuses to insert the same texture id twice', () => {
    const builder = PackFile.create();
    expectSuccess(builder.insertTexture({ blockId: 1, unknown: 0, type: 0, dds: makeDdsHeader(), texels: filled(32) }));
    const error = expectFailure(builder.insertTexture({ blockId: 1, unknown: 0, type: 0, dds: makeDdsHeader(), texels: filled(32) }));
    expect(error.kind).toBe('DuplicateBlock');
  });

  it('refuses pixel data that does not match the linear size', () => {
    const builder = PackFile.create();
    const error = expectFailure(
      builder.insertTexture({ blockId: 1, unknown: 0, type: 0, dds: makeDdsHeader({ pitchOrLinearSize: 32 }), texels: filled(16) })
    );
    expect(error.kind).toBe('InconsistentSize');
    expect(error.detail).toBe('Texture 1 has 16 pixel bytes, its DDS header needs 32');
    expectSuccess(builder.createTextureBlocks());
    expect(builder.blockNames).toEqual([]);
  });

  it('measures pixel data against the recomputed linear size', () => {
    const builder = PackFile.create();
    const dds = makeDdsHeader({ pitchOrLinearSize: 0, fourCC: 'DXT5' });
    expect(expectFailure(builder.insertTexture({ blockId: 1, unknown: 0, type: 0, dds, texels: filled(32) })).kind).toBe(
      'InconsistentSize'
    );
    expectSuccess(builder.insertTexture({ blockId: 1, unknown: 0, type: 0, dds, texels: filled(64) }));
  });

  it('refuses DDS headers with wrong sizes', () => {
    const builder = PackFile.create();
    const error = expectFailure(builder.insertTexture({ blockId: 1, unknown: 0, type: 0, dds: makeDdsHeader({ size: 0 }), texels: filled(32) }));
    expect(error.kind).toBe('InvalidDdsHeader');
  });

  it('refuses fields that do not fit in their header', () => {
    const builder = PackFile.create();
    const negativeId = expectFailure(builder.insertTexture({ blockId: -1, unknown: 0, type: 0, dds: makeDdsHeader(), texels: filled(32) }));
    expect(negativeId.kind).toBe('InvalidRange');
    expect(negativeId.detail).toBe('Texture field blockId cannot be stored in its header');

    const wideType = expectFailure(builder.insertTexture({ blockId: 1, unknown: 0, type: 2 ** 32, dds: makeDdsHeader(), texels: filled(32) }));
    expect(wideType.detail).toBe('Texture field type cannot be stored in its header');

    const longCode = expectFailure(
      builder.insertTexture({ blockId: 1, unknown: 0, type: 0, dds: makeDdsHeader({ fourCC: 'DXT10' }), texels: filled(32) })
    );
    expect(longCode.detail).toBe('Texture field format.fourCC cannot be stored in its header');
  });
});

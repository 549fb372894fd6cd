/**
 * Pack file reading, building and writing.
 */
import { readFile, writeFile } from 'node:fs/promises';
import { createHash } from 'node:crypto';
import { extractAnimations } from './animations.js';
import { encodeAudioSampleTable, findUnencodableAudioField, MAX_AUDIO_SAMPLES, resolveAudioSampleTable } from './audio-sample-table.js';
import { type BlockMap, readBlocks, validateBlockName, writeBlocks } from './block-container.js';
import { encodeBodyBlock, resolveBodyBlock } from './body-block.js';
import { ANIMATION_HEADER_SIZE, BlockNames, BUFFER_SOURCE } from './constants/pack-format.js';
import { findUnencodableDdsField, hasValidDdsSizes, withLinearSize } from './dds-header.js';
import { encodeInfoBlock, resolveInfoBlock } from './info-block.js';
import { encodeMeshBlock, resolveMeshBlock } from './mesh-block.js';
import { encodeWaveData, extractSounds } from './sounds.js';
import { encodeTextureBlock, extractTextures } from './textures.js';
import type { AudioSampleHeader, AudioSampleTable } from './types/audio-sample.js';
import type { AnimationLookupEntry, TextureLookupEntry } from './types/lookup.js';
import { fail, ok, type PackResult } from './types/pack-error.js';
import type { DdsHeader, TextureRecord } from './types/texture.js';
import { animationBlockName, blockIdToName } from './utils/block-id.js';
import { fitsInteger } from './utils/int-range.js';

export type PackKind = 'mesh' | 'animation' | 'sound';

export interface PackReadOptions {
  /** Run the INFO/MESHES/Body/audio resolvers after splitting blocks. Defaults to true. */
  readonly resolveContents?: boolean;
}

export interface TextureInput {
  readonly blockId: number;
  readonly unknown: number;
  readonly type: number;
  readonly dds: DdsHeader;
  readonly texels: Buffer;
}

export interface AnimationInput {
  /** Exactly `ANIMATION_HEADER_SIZE` bytes, stored in Body. */
  readonly header: Buffer;
  /** Stored as block `Julien<i>`. */
  readonly payload: Buffer;
  readonly unknown: number;
}

export interface SoundInput {
  /** Offset and size are recomputed when the wave data block is built. */
  readonly header: AudioSampleHeader;
  readonly data: Buffer;
}

interface PackContents {
  readonly textureLookup: readonly TextureLookupEntry[];
  readonly textures: ReadonlyMap<string, TextureRecord>;
  readonly meshes: readonly Buffer[];
  readonly animationLookup: readonly AnimationLookupEntry[];
  readonly animations: readonly Buffer[];
  readonly audioSampleTable: AudioSampleTable | null;
  readonly audioSamples: readonly Buffer[];
}

const EMPTY_CONTENTS: PackContents = {
  textureLookup: [],
  textures: new Map(),
  meshes: [],
  animationLookup: [],
  animations: [],
  audioSampleTable: null,
  audioSamples: [],
};

function copyAudioHeader(header: AudioSampleHeader): AudioSampleHeader {
  return {
    ...header,
    nameField: header.nameField && Buffer.from(header.nameField),
    descriptionField: header.descriptionField && Buffer.from(header.descriptionField),
  };
}

function findUnencodableTextureField(texture: TextureInput): string | null {
  if (!fitsInteger(texture.blockId, 'u32')) {
    return 'blockId';
  }
  if (!fitsInteger(texture.unknown, 'u32')) {
    return 'unknown';
  }
  if (!fitsInteger(texture.type, 'u32')) {
    return 'type';
  }
  return findUnencodableDdsField(texture.dds);
}

function detectKinds(blocks: BlockMap): PackKind[] {
  const kinds: PackKind[] = [];
  if (blocks.has(BlockNames.info)) {
    kinds.push('mesh');
  }
  if (blocks.has(BlockNames.body)) {
    kinds.push('animation');
  }
  if (blocks.has(BlockNames.audioSampleTable)) {
    kinds.push('sound');
  }
  return kinds;
}

/**
 * Runs the resolvers and extractors selected by the sentinel blocks present.
 */
function resolveContents(blocks: BlockMap, source: string): PackResult<PackContents> {
  let contents: PackContents = EMPTY_CONTENTS;

  if (blocks.has(BlockNames.info)) {
    const textureLookup = resolveInfoBlock(blocks, source);
    if (!textureLookup.ok) {
      return textureLookup;
    }
    const textures = extractTextures(blocks, textureLookup.value, source);
    if (!textures.ok) {
      return textures;
    }
    const meshes = resolveMeshBlock(blocks, source);
    if (!meshes.ok) {
      return meshes;
    }
    contents = { ...contents, textureLookup: textureLookup.value, textures: textures.value, meshes: meshes.value };
  }

  if (blocks.has(BlockNames.body)) {
    const animationLookup = resolveBodyBlock(blocks, source);
    if (!animationLookup.ok) {
      return animationLookup;
    }
    const animations = extractAnimations(blocks, animationLookup.value, source);
    if (!animations.ok) {
      return animations;
    }
    contents = { ...contents, animationLookup: animationLookup.value, animations: animations.value };
  }

  if (blocks.has(BlockNames.audioSampleTable)) {
    const audioSampleTable = resolveAudioSampleTable(blocks, source);
    if (!audioSampleTable.ok) {
      return audioSampleTable;
    }
    const audioSamples = extractSounds(blocks, audioSampleTable.value.headers, source);
    if (!audioSamples.ok) {
      return audioSamples;
    }
    contents = { ...contents, audioSampleTable: audioSampleTable.value, audioSamples: audioSamples.value };
  }

  return ok(contents);
}

/**
 * A Pack file, either loaded (immutable) or under construction.
 *
 * Loaded instances come from `open`/`fromBuffer` and expose the decoded records.
 * Builders come from `create`/`fromBlocks`, accept blocks and records, and are written
 * with `write`/`toBuffer`. Calling a builder method on a loaded instance, or writing a
 * loaded instance, fails with `InvalidOperation`.
 */
export class PackFile {
  private readonly pendingMeshes: Buffer[] = [];
  private readonly pendingTextures: TextureInput[] = [];
  private readonly pendingAnimations: AnimationInput[] = [];
  private readonly pendingSounds: SoundInput[] = [];

  private constructor(
    private readonly blocks: BlockMap,
    private readonly contents: PackContents,
    private readonly loaded: boolean,
    /** File path, or "buffer" for in-memory packs. */
    readonly source: string,
    /** SHA256 of the bytes a loaded pack was read from. */
    readonly sha256: string | null,
    readonly totalSize: number
  ) {}

  /**
   * Reads and decodes a pack from disk.
   *
   * @param filePath - Path to the pack file
   * @param resolveContents - Set false to only split the file into blocks
   * @returns The loaded pack, or the first error met; `IoFailure` if the file cannot be read
   */
  static async open({ filePath, resolveContents = true }: { readonly filePath: string } & PackReadOptions): Promise<PackResult<PackFile>> {
    let buffer: Buffer;
    try {
      buffer = await readFile(filePath);
    } catch (error) {
      return fail('IoFailure', `Could not open file: ${error instanceof Error ? error.message : String(error)}`, filePath, error);
    }
    return PackFile.load(buffer, filePath, resolveContents);
  }

  /** Reads and decodes a pack held in memory. Errors name the source "buffer". */
  static fromBuffer({ buffer, resolveContents = true }: { readonly buffer: Buffer } & PackReadOptions): PackResult<PackFile> {
    return PackFile.load(buffer, BUFFER_SOURCE, resolveContents);
  }

  /** Starts an empty pack to be built block by block. */
  static create(): PackFile {
    return new PackFile(new Map(), EMPTY_CONTENTS, false, BUFFER_SOURCE, null, 0);
  }

  /** Starts a builder holding copies of another pack's raw blocks, in the same order. */
  static fromBlocks(pack: PackFile): PackFile {
    const blocks: BlockMap = new Map();
    for (const [name, data] of pack.blocks) {
      blocks.set(name, Buffer.from(data));
    }
    return new PackFile(blocks, EMPTY_CONTENTS, false, BUFFER_SOURCE, null, 0);
  }

  /** SHA256 of a block body, hex encoded. */
  static hashBlock({ data }: { readonly data: Buffer }): string {
    return createHash('sha256').update(data).digest('hex');
  }

  private static load(buffer: Buffer, source: string, resolve: boolean): PackResult<PackFile> {
    const blocks = readBlocks(buffer, source);
    if (!blocks.ok) {
      return blocks;
    }
    let contents = EMPTY_CONTENTS;
    if (resolve) {
      const resolved = resolveContents(blocks.value, source);
      if (!resolved.ok) {
        return resolved;
      }
      contents = resolved.value;
    }
    const sha256 = createHash('sha256').update(buffer).digest('hex');
    return ok(new PackFile(blocks.value, contents, true, source, sha256, buffer.length));
  }

  get isLoaded(): boolean {
    return this.loaded;
  }

  get kinds(): PackKind[] {
    return detectKinds(this.blocks);
  }

  get blockNames(): string[] {
    return [...this.blocks.keys()];
  }

  hasBlock(name: string): boolean {
    return this.blocks.has(name);
  }

  /** Returns a copy of a block body, or null if the pack has no such block. */
  getBlock(name: string): Buffer | null {
    const data = this.blocks.get(name);
    return data ? Buffer.from(data) : null;
  }

  get textureLookup(): readonly TextureLookupEntry[] {
    return this.contents.textureLookup;
  }

  /** Textures keyed by texture block name. Like every record accessor, returns copies. */
  get textures(): ReadonlyMap<string, TextureRecord> {
    const textures = new Map<string, TextureRecord>();
    for (const [name, texture] of this.contents.textures) {
      textures.set(name, { ...texture, texels: Buffer.from(texture.texels) });
    }
    return textures;
  }

  get meshes(): readonly Buffer[] {
    return this.contents.meshes.map((mesh) => Buffer.from(mesh));
  }

  get animationLookup(): readonly AnimationLookupEntry[] {
    return this.contents.animationLookup;
  }

  get animations(): readonly Buffer[] {
    return this.contents.animations.map((animation) => Buffer.from(animation));
  }

  get audioSampleHeaders(): readonly AudioSampleHeader[] {
    return (this.contents.audioSampleTable?.headers ?? []).map(copyAudioHeader);
  }

  get audioSampleTableUnknown(): number | null {
    return this.contents.audioSampleTable?.unknown ?? null;
  }

  get audioSamples(): readonly Buffer[] {
    return this.contents.audioSamples.map((sample) => Buffer.from(sample));
  }

  /**
   * Adds a block with arbitrary contents.
   * Fails with `DuplicateBlock` if the name is taken, `InvalidBlockName` if it cannot be stored.
   */
  createRawBlock(name: string, data: Buffer): PackResult<void> {
    const checked = this.checkNewBlocks([name]);
    if (!checked.ok) {
      return checked;
    }
    this.blocks.set(name, Buffer.from(data));
    return ok(undefined);
  }

  insertMesh(data: Buffer): PackResult<void> {
    const mutable = this.ensureMutable('insertMesh');
    if (!mutable.ok) {
      return mutable;
    }
    this.pendingMeshes.push(Buffer.from(data));
    return ok(undefined);
  }

  /** Builds MESHES from the meshes inserted so far. */
  createMeshBlock(): PackResult<void> {
    const checked = this.checkNewBlocks([BlockNames.meshes]);
    if (!checked.ok) {
      return checked;
    }
    this.blocks.set(BlockNames.meshes, encodeMeshBlock(this.pendingMeshes));
    return ok(undefined);
  }

  /**
   * Queues a texture for `createTextureBlocks`.
   * Fails with `InvalidRange` when a field cannot be stored, `InvalidDdsHeader` when the DDS
   * header sizes are wrong, and `InconsistentSize` when `texels` is not the linear size.
   */
  insertTexture(texture: TextureInput): PackResult<void> {
    const mutable = this.ensureMutable('insertTexture');
    if (!mutable.ok) {
      return mutable;
    }
    const unencodable = findUnencodableTextureField(texture);
    if (unencodable !== null) {
      return fail('InvalidRange', `Texture field ${unencodable} cannot be stored in its header`, this.source);
    }
    if (!hasValidDdsSizes(texture.dds)) {
      return fail('InvalidDdsHeader', `Texture ${blockIdToName(texture.blockId)} has invalid DDS header sizes`, this.source);
    }
    const linearSize = withLinearSize(texture.dds).pitchOrLinearSize;
    if (texture.texels.length !== linearSize) {
      return fail(
        'InconsistentSize',
        `Texture ${blockIdToName(texture.blockId)} has ${texture.texels.length} pixel bytes, its DDS header needs ${linearSize}`,
        this.source
      );
    }
    if (this.pendingTextures.some((pending) => pending.blockId === texture.blockId)) {
      return fail('DuplicateBlock', `Texture ${blockIdToName(texture.blockId)} already inserted`, this.source);
    }
    this.pendingTextures.push({ ...texture, texels: Buffer.from(texture.texels) });
    return ok(undefined);
  }

  /** Writes one block per inserted texture, named by its hex block id. */
  createTextureBlocks(): PackResult<void> {
    const names = this.pendingTextures.map((texture) => blockIdToName(texture.blockId));
    const checked = this.checkNewBlocks(names);
    if (!checked.ok) {
      return checked;
    }
    this.pendingTextures.forEach((texture, index) => {
      this.blocks.set(names[index], encodeTextureBlock(texture.blockId, texture.type, texture.dds, texture.texels));
    });
    return ok(undefined);
  }

  /** Builds INFO from the lookup entries of the textures inserted so far. */
  createInfoBlock(): PackResult<void> {
    const checked = this.checkNewBlocks([BlockNames.info]);
    if (!checked.ok) {
      return checked;
    }
    const lookup = this.pendingTextures.map(({ blockId, unknown }): TextureLookupEntry => ({ blockId, unknown }));
    this.blocks.set(BlockNames.info, encodeInfoBlock(lookup));
    return ok(undefined);
  }

  insertAnimation(animation: AnimationInput): PackResult<void> {
    const mutable = this.ensureMutable('insertAnimation');
    if (!mutable.ok) {
      return mutable;
    }
    if (animation.header.length !== ANIMATION_HEADER_SIZE) {
      return fail('InconsistentSize', `Animation header must be ${ANIMATION_HEADER_SIZE} bytes, got ${animation.header.length}`, this.source);
    }
    if (!fitsInteger(animation.unknown, 'u32')) {
      return fail('InvalidRange', `Animation lookup field unknown cannot be stored: ${animation.unknown}`, this.source);
    }
    this.pendingAnimations.push({ ...animation, header: Buffer.from(animation.header), payload: Buffer.from(animation.payload) });
    return ok(undefined);
  }

  /** Builds Body and one `Julien<i>` block per inserted animation. */
  createBodyBlock(): PackResult<void> {
    const payloadNames = this.pendingAnimations.map((_, index) => animationBlockName(index));
    const checked = this.checkNewBlocks([BlockNames.body, ...payloadNames]);
    if (!checked.ok) {
      return checked;
    }
    this.blocks.set(BlockNames.body, encodeBodyBlock(this.pendingAnimations));
    this.pendingAnimations.forEach((animation, index) => {
      this.blocks.set(payloadNames[index], animation.payload);
    });
    return ok(undefined);
  }

  insertSound(sound: SoundInput): PackResult<void> {
    const mutable = this.ensureMutable('insertSound');
    if (!mutable.ok) {
      return mutable;
    }
    const unencodable = findUnencodableAudioField(sound.header);
    if (unencodable !== null) {
      return fail('InvalidRange', `Sound "${sound.header.name}" field ${unencodable} cannot be stored in its header`, this.source);
    }
    this.pendingSounds.push({ header: copyAudioHeader(sound.header), data: Buffer.from(sound.data) });
    return ok(undefined);
  }

  /**
   * Builds LHAudioBankSampleTable and LHAudioWaveData from the sounds inserted so far.
   *
   * @param unknown - Value of the table's unknown u16 prefix field
   */
  createAudioBlocks(unknown: number = 0): PackResult<void> {
    const checked = this.checkNewBlocks([BlockNames.audioSampleTable, BlockNames.audioWaveData]);
    if (!checked.ok) {
      return checked;
    }
    if (!fitsInteger(unknown, 'u16')) {
      return fail('InvalidRange', `Sample table prefix field unknown cannot be stored: ${unknown}`, this.source);
    }
    if (this.pendingSounds.length === 0) {
      return fail('EmptyTable', 'There are no sound entries', this.source);
    }
    if (this.pendingSounds.length > MAX_AUDIO_SAMPLES) {
      return fail('InconsistentSize', `A sample table holds at most ${MAX_AUDIO_SAMPLES} samples, got ${this.pendingSounds.length}`, this.source);
    }
    const { waveData, headers } = encodeWaveData(this.pendingSounds);
    this.blocks.set(BlockNames.audioSampleTable, encodeAudioSampleTable({ unknown, headers }));
    this.blocks.set(BlockNames.audioWaveData, waveData);
    return ok(undefined);
  }

  /** Serializes the blocks in insertion order. */
  toBuffer(): PackResult<Buffer> {
    const mutable = this.ensureMutable('toBuffer');
    if (!mutable.ok) {
      return mutable;
    }
    return ok(writeBlocks(this.blocks));
  }

  /**
   * Writes the pack to disk.
   *
   * @returns `IoFailure` if the file cannot be written
   */
  async write({ filePath }: { readonly filePath: string }): Promise<PackResult<void>> {
    const buffer = this.toBuffer();
    if (!buffer.ok) {
      return buffer;
    }
    try {
      await writeFile(filePath, buffer.value);
    } catch (error) {
      return fail('IoFailure', `Could not write file: ${error instanceof Error ? error.message : String(error)}`, filePath, error);
    }
    return ok(undefined);
  }

  private ensureMutable(operation: string): PackResult<void> {
    if (this.loaded) {
      return fail('InvalidOperation', `${operation} is not allowed on a loaded pack`, this.source);
    }
    return ok(undefined);
  }

  /** Checks that every name is storable and unused before any block is added. */
  private checkNewBlocks(names: readonly string[]): PackResult<void> {
    const mutable = this.ensureMutable('block creation');
    if (!mutable.ok) {
      return mutable;
    }
    const seen = new Set<string>();
    for (const name of names) {
      const valid = validateBlockName(name, this.source);
      if (!valid.ok) {
        return valid;
      }
      if (this.blocks.has(name) || seen.has(name)) {
        return fail('DuplicateBlock', `Pack file already has a ${name} block`, this.source);
      }
      seen.add(name);
    }
    return ok(undefined);
  }
}

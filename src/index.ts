/**
 * Pack Tools - Main entry point
 *
 * Reads and writes LiOnHeAd Pack files: mesh, texture, animation and sound packs.
 */

export { PackFile } from './pack-file.js';
export type { PackKind, PackReadOptions, TextureInput, AnimationInput, SoundInput } from './pack-file.js';

export { readBlocks, writeBlocks, validateBlockName } from './block-container.js';
export type { BlockMap } from './block-container.js';
export { resolveInfoBlock, encodeInfoBlock } from './info-block.js';
export { extractTextures, encodeTextureBlock } from './textures.js';
export {
  decodeDdsHeader,
  encodeDdsHeader,
  computeLinearSize,
  withLinearSize,
  hasValidDdsSizes,
  findUnencodableDdsField,
} from './dds-header.js';
export { resolveBodyBlock, encodeBodyBlock } from './body-block.js';
export { extractAnimations } from './animations.js';
export { MAX_AUDIO_SAMPLES, findUnencodableAudioField, resolveAudioSampleTable, encodeAudioSampleTable, decodeAudioSampleHeader, encodeAudioSampleHeader } from './audio-sample-table.js';
export { extractSounds, encodeWaveData } from './sounds.js';
export { resolveMeshBlock, encodeMeshBlock } from './mesh-block.js';

export { extractPack, packDirectory, rawBlockFileName, blockNameFromFileName } from './pack-tools.js';
export type { ExtractOptions, PackDirectoryOptions } from './pack-tools.js';

export { blockIdToName, animationBlockName } from './utils/block-id.js';
export { ByteCursor } from './utils/byte-cursor.js';
export { ByteWriter } from './utils/byte-writer.js';
export { fitsInteger } from './utils/int-range.js';
export type { IntegerType } from './utils/int-range.js';
export * from './constants/pack-format.js';

export { PackError, ok, fail } from './types/pack-error.js';
export type { PackErrorKind, PackResult } from './types/pack-error.js';
export { AudioLoopType } from './types/audio-sample.js';
export type { AudioSampleHeader, AudioSampleTable } from './types/audio-sample.js';
export type { TextureLookupEntry, AnimationLookupEntry } from './types/lookup.js';
export type { TextureBlockHeader, DdsHeader, DdsPixelFormat, TextureRecord } from './types/texture.js';

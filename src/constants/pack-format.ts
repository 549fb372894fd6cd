/**
 * Fixed values of the Pack file layout.
 */

/** File magic, the first 8 bytes of every pack. */
export const PACK_MAGIC = 'LiOnHeAd';

/** Sub-magic opening the MESHES and Body blocks. */
export const BLOCK_MAGIC = 'MKJC';

export const BLOCK_NAME_SIZE = 0x20;
export const BLOCK_HEADER_SIZE = BLOCK_NAME_SIZE + 4;

/** Name used as the error source when a pack is read from memory. */
export const BUFFER_SOURCE = 'buffer';

export const BlockNames = {
  info: 'INFO',
  meshes: 'MESHES',
  body: 'Body',
  audioSampleTable: 'LHAudioBankSampleTable',
  audioWaveData: 'LHAudioWaveData',
} as const;

export const LOOKUP_ENTRY_SIZE = 8;
export const TEXTURE_HEADER_SIZE = 16;
export const ANIMATION_HEADER_SIZE = 0x54;
export const AUDIO_SAMPLE_HEADER_SIZE = 640;
export const AUDIO_TABLE_PREFIX_SIZE = 4;

export const DDS_MAGIC = 'DDS ';
export const DDS_HEADER_SIZE = 124;
export const DDS_PIXEL_FORMAT_SIZE = 32;

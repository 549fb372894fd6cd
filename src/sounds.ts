/**
 * Sound samples sliced out of the LHAudioWaveData block.
 */
import { BlockNames } from './constants/pack-format.js';
import type { BlockMap } from './block-container.js';
import type { AudioSampleHeader } from './types/audio-sample.js';
import { fail, ok, type PackResult } from './types/pack-error.js';

export function extractSounds(
  blocks: BlockMap,
  headers: readonly AudioSampleHeader[],
  source: string
): PackResult<Buffer[]> {
  const data = blocks.get(BlockNames.audioWaveData);
  if (!data) {
    return fail('MissingRequiredBlock', 'No LHAudioWaveData block in sound pack', source);
  }

  const samples: Buffer[] = [];
  for (const sample of headers) {
    if (sample.offset > data.length) {
      return fail('InvalidRange', `Sound sample "${sample.name}" offset ${sample.offset} points beyond LHAudioWaveData (${data.length} bytes)`, source);
    }
    if (sample.offset + sample.size > data.length) {
      return fail('InvalidRange', `Sound sample "${sample.name}" size ${sample.size} at offset ${sample.offset} exceeds LHAudioWaveData (${data.length} bytes)`, source);
    }
    samples.push(Buffer.from(data.subarray(sample.offset, sample.offset + sample.size)));
  }
  return ok(samples);
}

/**
 * Concatenates samples into a wave data block and rewrites each header's offset and size to match.
 */
export function encodeWaveData(
  samples: readonly { readonly header: AudioSampleHeader; readonly data: Buffer }[]
): { readonly waveData: Buffer; readonly headers: AudioSampleHeader[] } {
  let offset = 0;
  const headers: AudioSampleHeader[] = samples.map(({ header, data }) => {
    const placed: AudioSampleHeader = { ...header, offset, size: data.length };
    offset += data.length;
    return placed;
  });
  return { waveData: Buffer.concat(samples.map((sample) => sample.data)), headers };
}

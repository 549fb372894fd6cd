/**
 * Metadata record of one sample in an LHAudioBankSampleTable block.
 * Fields named `unknown*` and `padding*` have no known meaning and are kept verbatim.
 */

export enum AudioLoopType {
  None = 0,
  Restart = 1,
  Once = 2,
  Overlap = 3,
}

export interface AudioSampleHeader {
  readonly name: string;
  /**
   * Raw 256-byte name field as read, including any bytes after the terminator.
   * Written back unchanged while it still decodes to `name`.
   */
  readonly nameField?: Buffer;
  readonly unknown0: number;
  readonly id: number;
  readonly isBank: number;
  readonly size: number;
  /** Byte offset of the sample inside LHAudioWaveData. */
  readonly offset: number;
  readonly isClone: number;
  readonly group: number;
  readonly atmosphericGroup: number;
  readonly unknown1: number;
  readonly unknown2: number;
  readonly unknown3: number;
  readonly unknown4: number;
  readonly sampleRate: number;
  readonly unknown5: number;
  readonly unknown6: number;
  readonly unknown7: number;
  readonly unknown8: number;
  readonly unknown9: number;
  readonly start: number;
  readonly end: number;
  readonly description: string;
  /** Raw 256-byte description field, kept like `nameField`. */
  readonly descriptionField?: Buffer;
  readonly priority: number;
  readonly unknown10: number;
  readonly unknown11: number;
  readonly unknown12: number;
  readonly loop: number;
  readonly startPosition: number;
  readonly pan: number;
  readonly padding0: number;
  readonly unknown13: number;
  readonly position: readonly [number, number, number];
  readonly volume: number;
  readonly padding1: number;
  readonly userParameter: number;
  readonly pitch: number;
  readonly unknown14: number;
  readonly pitchDeviation: number;
  readonly unknown15: number;
  readonly minDistance: number;
  readonly maxDistance: number;
  readonly scale: number;
  readonly loopType: AudioLoopType;
  readonly unknown16: number;
  readonly unknown17: number;
  readonly unknown18: number;
  readonly atmosphere: number;
  readonly padding2: number;
}

/** Sample table contents: the unknown prefix field plus one header per sample. */
export interface AudioSampleTable {
  readonly unknown: number;
  readonly headers: readonly AudioSampleHeader[];
}

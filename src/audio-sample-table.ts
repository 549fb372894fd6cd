/**
 * LHAudioBankSampleTable block: sample count (u16), an unknown u16, then fixed 640-byte sample headers.
 */
import { AUDIO_SAMPLE_HEADER_SIZE, AUDIO_TABLE_PREFIX_SIZE, BlockNames } from './constants/pack-format.js';
import type { BlockMap } from './block-container.js';
import type { AudioSampleHeader, AudioSampleTable } from './types/audio-sample.js';
import { fail, ok, type PackResult } from './types/pack-error.js';
import { ByteCursor } from './utils/byte-cursor.js';
import { ByteWriter } from './utils/byte-writer.js';
import { fitsInteger, type IntegerType } from './utils/int-range.js';

const TEXT_FIELD_SIZE = 0x100;

/** Largest sample count the u16 prefix can hold. */
export const MAX_AUDIO_SAMPLES = 0xffff;

type IntegerField = {
  [K in keyof AudioSampleHeader]-?: AudioSampleHeader[K] extends number ? K : never;
}[keyof AudioSampleHeader];

const INTEGER_FIELDS: ReadonlyArray<readonly [IntegerField, IntegerType]> = [
  ['unknown0', 'i32'],
  ['id', 'i32'],
  ['isBank', 'i32'],
  ['size', 'u32'],
  ['offset', 'u32'],
  ['isClone', 'i32'],
  ['group', 'i16'],
  ['atmosphericGroup', 'i16'],
  ['unknown1', 'i32'],
  ['unknown2', 'i32'],
  ['unknown3', 'i16'],
  ['unknown4', 'i16'],
  ['sampleRate', 'u32'],
  ['unknown5', 'i16'],
  ['unknown6', 'i16'],
  ['unknown7', 'i16'],
  ['unknown8', 'i16'],
  ['unknown9', 'i32'],
  ['start', 'i32'],
  ['end', 'i32'],
  ['priority', 'u16'],
  ['unknown10', 'u16'],
  ['unknown11', 'u16'],
  ['unknown12', 'u16'],
  ['loop', 'i16'],
  ['startPosition', 'u16'],
  ['pan', 'u8'],
  ['padding0', 'u8'],
  ['unknown13', 'u16'],
  ['volume', 'u8'],
  ['padding1', 'u8'],
  ['userParameter', 'u16'],
  ['pitch', 'u16'],
  ['unknown14', 'u16'],
  ['pitchDeviation', 'u16'],
  ['unknown15', 'u16'],
  ['loopType', 'u16'],
  ['unknown16', 'u16'],
  ['unknown17', 'u16'],
  ['unknown18', 'u16'],
  ['atmosphere', 'u16'],
  ['padding2', 'u16'],
];

function decodeText(field: Buffer): string {
  const end = field.indexOf(0);
  return field.toString('latin1', 0, end === -1 ? field.length : end);
}

function writeTextField(writer: ByteWriter, text: string, field: Buffer | undefined): void {
  if (field && field.length === TEXT_FIELD_SIZE && decodeText(field) === text) {
    writer.writeBytes(field);
  } else {
    writer.writeFixedString(text, TEXT_FIELD_SIZE);
  }
}

/**
 * Names the first integer field outside the range of its stored type, or null when all fit.
 */
export function findUnencodableAudioField(header: AudioSampleHeader): string | null {
  const invalid = INTEGER_FIELDS.find(([field, type]) => !fitsInteger(header[field], type));
  return invalid ? invalid[0] : null;
}

/**
 * Decodes one sample header. The cursor must have `AUDIO_SAMPLE_HEADER_SIZE` bytes available.
 */
export function decodeAudioSampleHeader(cursor: ByteCursor): AudioSampleHeader {
  const nameField = cursor.readBytes(TEXT_FIELD_SIZE);
  return {
    name: decodeText(nameField),
    nameField,
    unknown0: cursor.readInt32(),
    id: cursor.readInt32(),
    isBank: cursor.readInt32(),
    size: cursor.readUint32(),
    offset: cursor.readUint32(),
    isClone: cursor.readInt32(),
    group: cursor.readInt16(),
    atmosphericGroup: cursor.readInt16(),
    unknown1: cursor.readInt32(),
    unknown2: cursor.readInt32(),
    unknown3: cursor.readInt16(),
    unknown4: cursor.readInt16(),
    sampleRate: cursor.readUint32(),
    unknown5: cursor.readInt16(),
    unknown6: cursor.readInt16(),
    unknown7: cursor.readInt16(),
    unknown8: cursor.readInt16(),
    unknown9: cursor.readInt32(),
    start: cursor.readInt32(),
    end: cursor.readInt32(),
    ...decodeDescription(cursor),
    priority: cursor.readUint16(),
    unknown10: cursor.readUint16(),
    unknown11: cursor.readUint16(),
    unknown12: cursor.readUint16(),
    loop: cursor.readInt16(),
    startPosition: cursor.readUint16(),
    pan: cursor.readUint8(),
    padding0: cursor.readUint8(),
    unknown13: cursor.readUint16(),
    position: [cursor.readFloat32(), cursor.readFloat32(), cursor.readFloat32()],
    volume: cursor.readUint8(),
    padding1: cursor.readUint8(),
    userParameter: cursor.readUint16(),
    pitch: cursor.readUint16(),
    unknown14: cursor.readUint16(),
    pitchDeviation: cursor.readUint16(),
    unknown15: cursor.readUint16(),
    minDistance: cursor.readFloat32(),
    maxDistance: cursor.readFloat32(),
    scale: cursor.readFloat32(),
    loopType: cursor.readUint16(),
    unknown16: cursor.readUint16(),
    unknown17: cursor.readUint16(),
    unknown18: cursor.readUint16(),
    atmosphere: cursor.readUint16(),
    padding2: cursor.readUint16(),
  };
}

function decodeDescription(cursor: ByteCursor): Pick<AudioSampleHeader, 'description' | 'descriptionField'> {
  const descriptionField = cursor.readBytes(TEXT_FIELD_SIZE);
  return { description: decodeText(descriptionField), descriptionField };
}

/**
 * Writes one 640-byte sample header. Callers check `findUnencodableAudioField` first;
 * an out-of-range integer field makes Buffer throw a RangeError.
 */
export function encodeAudioSampleHeader(writer: ByteWriter, header: AudioSampleHeader): void {
  writeTextField(writer, header.name, header.nameField);
  writer.writeInt32(header.unknown0);
  writer.writeInt32(header.id);
  writer.writeInt32(header.isBank);
  writer.writeUint32(header.size);
  writer.writeUint32(header.offset);
  writer.writeInt32(header.isClone);
  writer.writeInt16(header.group);
  writer.writeInt16(header.atmosphericGroup);
  writer.writeInt32(header.unknown1);
  writer.writeInt32(header.unknown2);
  writer.writeInt16(header.unknown3);
  writer.writeInt16(header.unknown4);
  writer.writeUint32(header.sampleRate);
  writer.writeInt16(header.unknown5);
  writer.writeInt16(header.unknown6);
  writer.writeInt16(header.unknown7);
  writer.writeInt16(header.unknown8);
  writer.writeInt32(header.unknown9);
  writer.writeInt32(header.start);
  writer.writeInt32(header.end);
  writeTextField(writer, header.description, header.descriptionField);
  writer.writeUint16(header.priority);
  writer.writeUint16(header.unknown10);
  writer.writeUint16(header.unknown11);
  writer.writeUint16(header.unknown12);
  writer.writeInt16(header.loop);
  writer.writeUint16(header.startPosition);
  writer.writeUint8(header.pan);
  writer.writeUint8(header.padding0);
  writer.writeUint16(header.unknown13);
  for (const coordinate of header.position) {
    writer.writeFloat32(coordinate);
  }
  writer.writeUint8(header.volume);
  writer.writeUint8(header.padding1);
  writer.writeUint16(header.userParameter);
  writer.writeUint16(header.pitch);
  writer.writeUint16(header.unknown14);
  writer.writeUint16(header.pitchDeviation);
  writer.writeUint16(header.unknown15);
  writer.writeFloat32(header.minDistance);
  writer.writeFloat32(header.maxDistance);
  writer.writeFloat32(header.scale);
  writer.writeUint16(header.loopType);
  writer.writeUint16(header.unknown16);
  writer.writeUint16(header.unknown17);
  writer.writeUint16(header.unknown18);
  writer.writeUint16(header.atmosphere);
  writer.writeUint16(header.padding2);
}

/**
 * Decodes the sample table. The block must hold exactly `4 + count * 640` bytes with a nonzero count.
 */
export function resolveAudioSampleTable(blocks: BlockMap, source: string): PackResult<AudioSampleTable> {
  const data = blocks.get(BlockNames.audioSampleTable);
  if (!data) {
    return fail('MissingRequiredBlock', 'no LHAudioBankSampleTable block in sound pack', source);
  }
  if (data.length < AUDIO_TABLE_PREFIX_SIZE) {
    return fail('TruncatedFile', `Audio bank block cannot fit sample count: ${data.length} < ${AUDIO_TABLE_PREFIX_SIZE}`, source);
  }

  const cursor = new ByteCursor(data);
  const sampleCount = cursor.readUint16();
  const unknown = cursor.readUint16();
  if (sampleCount === 0) {
    return fail('EmptyTable', 'There are no sound entries', source);
  }

  const expectedSize = AUDIO_TABLE_PREFIX_SIZE + sampleCount * AUDIO_SAMPLE_HEADER_SIZE;
  if (data.length !== expectedSize) {
    return fail('InconsistentSize', `Cannot fit all ${sampleCount} sample headers: block is ${data.length} bytes, expected ${expectedSize}`, source);
  }

  const headers: AudioSampleHeader[] = [];
  for (let i = 0; i < sampleCount; i++) {
    headers.push(decodeAudioSampleHeader(cursor));
  }
  return ok({ unknown, headers });
}

/**
 * Builds a sample table block. The caller guarantees 1..MAX_AUDIO_SAMPLES headers.
 */
export function encodeAudioSampleTable(table: AudioSampleTable): Buffer {
  const writer = new ByteWriter(AUDIO_TABLE_PREFIX_SIZE + table.headers.length * AUDIO_SAMPLE_HEADER_SIZE);
  writer.writeUint16(table.headers.length);
  writer.writeUint16(table.unknown);
  for (const header of table.headers) {
    encodeAudioSampleHeader(writer, header);
  }
  return writer.toBuffer();
}

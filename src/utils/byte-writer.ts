/**
 * Growable little-endian writer used to serialize blocks.
 */
export class ByteWriter {
  private buffer: Buffer;
  private offset: number;

  constructor(initialSize: number = 1024) {
    this.buffer = Buffer.alloc(Math.max(initialSize, 16));
    this.offset = 0;
  }

  get position(): number {
    return this.offset;
  }

  writeUint8(value: number): void {
    this.ensureCapacity(1);
    this.buffer.writeUInt8(value, this.offset);
    this.offset += 1;
  }

  writeUint16(value: number): void {
    this.ensureCapacity(2);
    this.buffer.writeUInt16LE(value, this.offset);
    this.offset += 2;
  }

  writeInt16(value: number): void {
    this.ensureCapacity(2);
    this.buffer.writeInt16LE(value, this.offset);
    this.offset += 2;
  }

  writeUint32(value: number): void {
    this.ensureCapacity(4);
    this.buffer.writeUInt32LE(value, this.offset);
    this.offset += 4;
  }

  writeInt32(value: number): void {
    this.ensureCapacity(4);
    this.buffer.writeInt32LE(value, this.offset);
    this.offset += 4;
  }

  writeFloat32(value: number): void {
    this.ensureCapacity(4);
    this.buffer.writeFloatLE(value, this.offset);
    this.offset += 4;
  }

  writeBytes(bytes: Uint8Array): void {
    this.ensureCapacity(bytes.length);
    this.buffer.set(bytes, this.offset);
    this.offset += bytes.length;
  }

  /** Writes latin1 text into a fixed-size field, NUL-padded and truncated to leave a terminator. */
  writeFixedString(value: string, size: number): void {
    const field = Buffer.alloc(size);
    field.write(value.slice(0, size - 1), 'latin1');
    this.writeBytes(field);
  }

  /** Writes an ASCII tag verbatim. */
  writeTag(tag: string): void {
    this.writeBytes(Buffer.from(tag, 'latin1'));
  }

  toBuffer(): Buffer {
    return Buffer.from(this.buffer.subarray(0, this.offset));
  }

  private ensureCapacity(additionalBytes: number): void {
    const requiredSize = this.offset + additionalBytes;
    if (requiredSize > this.buffer.length) {
      const newSize = Math.max(requiredSize, this.buffer.length * 2);
      const newBuffer = Buffer.alloc(newSize);
      this.buffer.copy(newBuffer);
      this.buffer = newBuffer;
    }
  }
}

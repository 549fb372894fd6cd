/**
 * Little-endian read cursor over a block buffer.
 *
 * Fixed-width reads assume the caller checked `canRead` first; the underlying
 * Buffer accessors throw a RangeError rather than read out of bounds.
 */
export class ByteCursor {
  private offset: number;

  constructor(private readonly buffer: Buffer) {
    this.offset = 0;
  }

  get position(): number {
    return this.offset;
  }

  get length(): number {
    return this.buffer.length;
  }

  get remaining(): number {
    return this.buffer.length - this.offset;
  }

  canRead(byteCount: number): boolean {
    return byteCount >= 0 && this.offset + byteCount <= this.buffer.length;
  }

  /**
   * Moves to an absolute position.
   * @returns false, leaving the position unchanged, if `position` lies outside the buffer
   */
  seek(position: number): boolean {
    if (position < 0 || position > this.buffer.length) {
      return false;
    }
    this.offset = position;
    return true;
  }

  readUint8(): number {
    const value = this.buffer.readUInt8(this.offset);
    this.offset += 1;
    return value;
  }

  readUint16(): number {
    const value = this.buffer.readUInt16LE(this.offset);
    this.offset += 2;
    return value;
  }

  readInt16(): number {
    const value = this.buffer.readInt16LE(this.offset);
    this.offset += 2;
    return value;
  }

  readUint32(): number {
    const value = this.buffer.readUInt32LE(this.offset);
    this.offset += 4;
    return value;
  }

  readInt32(): number {
    const value = this.buffer.readInt32LE(this.offset);
    this.offset += 4;
    return value;
  }

  readFloat32(): number {
    const value = this.buffer.readFloatLE(this.offset);
    this.offset += 4;
    return value;
  }

  /** Returns a copy of the next `length` bytes. */
  readBytes(length: number): Buffer {
    if (!this.canRead(length)) {
      throw new RangeError(`Cannot read ${length} bytes at offset ${this.offset} of ${this.buffer.length}`);
    }
    const bytes = Buffer.from(this.buffer.subarray(this.offset, this.offset + length));
    this.offset += length;
    return bytes;
  }

  /** Reads a fixed-size ASCII tag, e.g. a magic number. */
  readTag(size: number): string {
    return this.readBytes(size).toString('latin1');
  }
}

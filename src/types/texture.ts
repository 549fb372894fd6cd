/**
 * Texture block and embedded DDS structures.
 */

/** 16-byte header opening every texture block. */
export interface TextureBlockHeader {
  readonly size: number;
  readonly id: number;
  readonly type: number;
  readonly ddsSize: number;
}

export interface DdsPixelFormat {
  readonly size: number;
  readonly flags: number;
  /** Four-character code, trailing NULs stripped. */
  readonly fourCC: string;
  readonly rgbBitCount: number;
  readonly rBitMask: number;
  readonly gBitMask: number;
  readonly bBitMask: number;
  readonly aBitMask: number;
}

export interface DdsHeader {
  readonly size: number;
  readonly flags: number;
  readonly height: number;
  readonly width: number;
  readonly pitchOrLinearSize: number;
  readonly depth: number;
  readonly mipMapCount: number;
  readonly reserved1: readonly number[];
  readonly format: DdsPixelFormat;
  readonly caps: number;
  readonly caps2: number;
  readonly caps3: number;
  readonly caps4: number;
  readonly reserved2: number;
}

export interface TextureRecord {
  readonly header: TextureBlockHeader;
  readonly dds: DdsHeader;
  /** Top-level pixel payload, `dds.pitchOrLinearSize` bytes. */
  readonly texels: Buffer;
}

/**
 * File-system tooling around the codec: unpacking a pack into loose files and
 * packing a directory of raw blocks back into a pack.
 */
import { mkdir, readdir, readFile, writeFile } from 'node:fs/promises';
import { basename, dirname, extname, join } from 'node:path';
import { DDS_MAGIC } from './constants/pack-format.js';
import { encodeDdsHeader } from './dds-header.js';
import { PackFile } from './pack-file.js';
import { fail, ok, type PackResult } from './types/pack-error.js';

const RAW_BLOCK_EXTENSION = '.bin';

export interface ExtractOptions {
  readonly inputFile: string;
  readonly outputDir: string;
  /** Dump every block verbatim instead of the decoded records. */
  readonly raw?: boolean;
}

export interface PackDirectoryOptions {
  readonly inputDir: string;
  readonly outputFile: string;
}

/** File name a raw block is dumped to; reversible with `blockNameFromFileName`. */
export function rawBlockFileName(blockName: string): string {
  return `${encodeURIComponent(blockName)}${RAW_BLOCK_EXTENSION}`;
}

export function blockNameFromFileName(fileName: string): PackResult<string> {
  const encoded = basename(fileName, RAW_BLOCK_EXTENSION);
  try {
    return ok(decodeURIComponent(encoded));
  } catch (error) {
    return fail('InvalidBlockName', `Block file name is not a valid encoded block name: ${fileName}`, fileName, error);
  }
}

async function writeOutput(path: string, data: Buffer): Promise<PackResult<string>> {
  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, data);
  } catch (error) {
    return fail('IoFailure', `Could not write ${path}: ${error instanceof Error ? error.message : String(error)}`, path, error);
  }
  return ok(path);
}

function collectOutputs(pack: PackFile, outputDir: string, raw: boolean): Array<{ path: string; data: Buffer }> {
  if (raw) {
    return pack.blockNames.map((name) => ({
      path: join(outputDir, 'blocks', rawBlockFileName(name)),
      data: pack.getBlock(name) ?? Buffer.alloc(0),
    }));
  }

  const outputs: Array<{ path: string; data: Buffer }> = [];
  pack.meshes.forEach((mesh, index) => {
    outputs.push({ path: join(outputDir, 'meshes', `${index}.l3d`), data: mesh });
  });
  for (const [name, texture] of pack.textures) {
    // Only the top-level surface is stored, so the written header declares a single mip level.
    const header = encodeDdsHeader({ ...texture.dds, mipMapCount: 1 });
    const dds = Buffer.concat([Buffer.from(DDS_MAGIC, 'latin1'), header, texture.texels]);
    outputs.push({ path: join(outputDir, 'textures', `${name}.dds`), data: dds });
  }
  pack.animations.forEach((animation, index) => {
    outputs.push({ path: join(outputDir, 'animations', `${index}.anm`), data: animation });
  });
  pack.audioSamples.forEach((sample, index) => {
    outputs.push({ path: join(outputDir, 'sounds', `${index}.raw`), data: sample });
  });
  return outputs;
}

/**
 * Unpacks a pack file into `outputDir`.
 *
 * Decoded mode writes meshes/<i>.l3d, textures/<name>.dds (DDS magic restored, one mip level),
 * animations/<i>.anm and sounds/<i>.raw. Raw mode writes blocks/<name>.bin for every block.
 *
 * @returns Paths of the written files
 */
export async function extractPack({ inputFile, outputDir, raw = false }: ExtractOptions): Promise<PackResult<string[]>> {
  const pack = await PackFile.open({ filePath: inputFile, resolveContents: !raw });
  if (!pack.ok) {
    return pack;
  }

  const written: string[] = [];
  for (const { path, data } of collectOutputs(pack.value, outputDir, raw)) {
    const result = await writeOutput(path, data);
    if (!result.ok) {
      return result;
    }
    written.push(result.value);
  }
  return ok(written);
}

/**
 * Builds a pack from every `<name>.bin` file in `inputDir`, in file name order.
 *
 * @returns Names of the packed blocks
 */
export async function packDirectory({ inputDir, outputFile }: PackDirectoryOptions): Promise<PackResult<string[]>> {
  let fileNames: string[];
  try {
    const entries = await readdir(inputDir, { withFileTypes: true });
    fileNames = entries
      .filter((entry) => entry.isFile() && extname(entry.name) === RAW_BLOCK_EXTENSION)
      .map((entry) => entry.name)
      .sort();
  } catch (error) {
    return fail('IoFailure', `Could not read directory: ${error instanceof Error ? error.message : String(error)}`, inputDir, error);
  }

  const pack = PackFile.create();
  const blockNames: string[] = [];
  for (const fileName of fileNames) {
    const filePath = join(inputDir, fileName);
    let data: Buffer;
    try {
      data = await readFile(filePath);
    } catch (error) {
      return fail('IoFailure', `Could not read block file: ${error instanceof Error ? error.message : String(error)}`, filePath, error);
    }

    const name = blockNameFromFileName(fileName);
    if (!name.ok) {
      return name;
    }
    const created = pack.createRawBlock(name.value, data);
    if (!created.ok) {
      return created;
    }
    blockNames.push(name.value);
  }

  const written = await pack.write({ filePath: outputFile });
  if (!written.ok) {
    return written;
  }
  return ok(blockNames);
}

#!/usr/bin/env node
/**
 * Pack Tools - CLI Interface
 *
 * Command-line interface for inspecting, unpacking and repacking Pack files.
 */

import { Command } from 'commander';
import { resolve } from 'node:path';
import { PackFile } from './pack-file.js';
import { extractPack, packDirectory } from './pack-tools.js';
import type { PackError } from './types/pack-error.js';

const program = new Command();

// Version is set at build time
const version = '0.1.0';

function reportFailure(action: string, error: PackError): never {
  console.error(`❌ ${action} failed: ${error.message}`);
  process.exit(1);
}

program
  .name('pack-tools')
  .description('Inspect, unpack and repack LiOnHeAd Pack files')
  .version(version);

program
  .command('info')
  .description('List the blocks and decoded records of a Pack file')
  .argument('<pack-file>', 'Path to the Pack file')
  .action(async (packFile: string) => {
    const result = await PackFile.open({ filePath: resolve(packFile) });
    if (!result.ok) {
      reportFailure('Info', result.error);
    }
    const pack = result.value;

    console.log(`Pack file: ${pack.source}`);
    console.log(`Size: ${pack.totalSize} bytes`);
    console.log(`SHA256: ${pack.sha256 ?? '-'}`);
    console.log(`Kinds: ${pack.kinds.length > 0 ? pack.kinds.join(', ') : 'raw'}`);
    console.log('');
    console.log(`Blocks (${pack.blockNames.length}):`);
    for (const name of pack.blockNames) {
      const data = pack.getBlock(name) ?? Buffer.alloc(0);
      console.log(`  ${name.padEnd(32)} ${String(data.length).padStart(10)}  ${PackFile.hashBlock({ data }).slice(0, 16)}`);
    }
    console.log('');
    console.log(`Textures: ${pack.textures.size}`);
    console.log(`Meshes: ${pack.meshes.length}`);
    console.log(`Animations: ${pack.animations.length}`);
    console.log(`Sound samples: ${pack.audioSamples.length}`);
  });

program
  .command('extract')
  .description('Unpack the meshes, textures, animations and sounds of a Pack file')
  .argument('<pack-file>', 'Path to the Pack file')
  .argument('<output-dir>', 'Directory where extracted files will be written')
  .option('--raw', 'Dump every block verbatim to <output-dir>/blocks instead of decoding')
  .action(async (packFile: string, outputDir: string, options: { raw?: boolean }) => {
    console.log(`Extracting: ${packFile}`);
    console.log(`Output will be written to: ${outputDir}`);
    console.log('');

    const result = await extractPack({ inputFile: resolve(packFile), outputDir: resolve(outputDir), raw: options.raw === true });
    if (!result.ok) {
      reportFailure('Extract', result.error);
    }

    for (const path of result.value) {
      console.log(`  - ${path}`);
    }
    console.log('');
    console.log(`✅ Extracted ${result.value.length} files`);
  });

program
  .command('pack')
  .description('Build a Pack file from a directory of <block-name>.bin files')
  .argument('<input-dir>', 'Directory containing raw block files')
  .argument('<output-file>', 'Path where the Pack file will be written')
  .action(async (inputDir: string, outputFile: string) => {
    console.log(`Packing blocks from: ${inputDir}`);
    console.log(`Output will be written to: ${outputFile}`);
    console.log('');

    const result = await packDirectory({ inputDir: resolve(inputDir), outputFile: resolve(outputFile) });
    if (!result.ok) {
      reportFailure('Pack', result.error);
    }

    console.log(`✅ Packed ${result.value.length} blocks`);
  });

await program.parseAsync();

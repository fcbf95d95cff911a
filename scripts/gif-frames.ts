#!/usr/bin/env node
import path from 'node:path';

import { analyzeGif, exportFramesAsPng } from '../src/infrastructure/gif-playback/media/gifToolkit.js';

interface GifFramesOptions {
  input: string;
  outDir: string | null;
  sampleStride: number;
}

async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2));
  const analysis = await analyzeGif(options.input, options.sampleStride);

  console.log(`[gif-frames] ${path.basename(options.input)}`);
  console.log(`  size:        ${analysis.width}x${analysis.height}`);
  console.log(`  frames:      ${analysis.frameCount} (${analysis.duplicateFrames} duplicates)`);
  console.log(`  duration:    ${analysis.durationMs} ms`);
  console.log(`  fps:         ${analysis.timing.fps} (jitter ${analysis.timing.stdDeviationMs} ms)`);
  console.log(`  colours:     ~${analysis.paletteEstimate}`);
  console.log(`  transparent: ${analysis.hasTransparency ? 'yes' : 'no'}`);
  console.log(`  disposal:    ${analysis.disposalModes.join(', ')}`);

  if (options.outDir) {
    const written = await exportFramesAsPng(options.input, options.outDir);
    console.log(`[gif-frames] wrote ${written.length} PNG frames to ${path.resolve(options.outDir)}`);
  }
}

function parseArgs(argv: string[]): GifFramesOptions {
  const options: GifFramesOptions = { input: '', outDir: null, sampleStride: 4 };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === undefined) continue;

    if (!arg.startsWith('--')) {
      options.input = arg;
      continue;
    }

    const next = argv[i + 1];
    switch (arg) {
      case '--out':
        options.outDir = next ?? null;
        i += 1;
        break;
      case '--stride':
        options.sampleStride = Number.parseInt(next ?? '', 10);
        i += 1;
        break;
      default:
        throw new Error(`Unknown argument: ${arg}`);
    }
  }

  if (!options.input || !Number.isInteger(options.sampleStride) || options.sampleStride < 1) {
    throw new Error('Usage: gif-frames <input.gif> [--out <dir>] [--stride 4]');
  }

  return options;
}

main().catch((error: unknown) => {
  console.error('[gif-frames] fatal:', error);
  process.exitCode = 1;
});

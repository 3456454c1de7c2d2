/**
 * Basic Usage Example
 *
 * Reads an image, prints its text and word boxes, then produces text, HOCR
 * and PDF from a single engine pass.
 *
 *   TESSPIPE_IMAGE=./scan.png npx tsx examples/basic-usage.ts
 */

import { readFile } from 'fs/promises';
import dotenv from 'dotenv';
import { Tesseract, ConfigManager, ErrorHandler } from '../src/index.js';

dotenv.config();

async function main() {
  const image = process.env.TESSPIPE_IMAGE ?? 'scan.png';

  // 1. Build an engine from ~/.tesspipe/config.json plus TESSPIPE_* overrides
  const manager = new ConfigManager();
  const tess = new Tesseract(manager.toTesseractOptions(manager.loadWithEnvOverrides()));

  console.log(`Tesseract ${await tess.tesseractVersion()}`);
  console.log(`Languages: ${(await tess.languages()).join(', ')}`);

  // 2. Plain text
  console.log(await tess.imageToString(image));

  // 3. Words with confidences
  const words = (await tess.imageToData(image, { psm: 11 })).filter((row) => row.level === 5);
  for (const w of words) {
    console.log(`${w.text}\t${w.conf.toFixed(1)}\t(${w.left}, ${w.top})`);
  }

  // 4. Several outputs in one pass
  const bytes = await readFile(image);
  const sizes = await tess.run(bytes, { outputFilename: 'page', outputFormats: ['txt', 'hocr', 'pdf'] }, (paths) =>
    Promise.all(paths.map(async (p) => `${p}: ${(await readFile(p)).length} bytes`))
  );
  console.log(sizes.join('\n'));
}

main().catch((err: unknown) => {
  console.error(ErrorHandler.toUserMessage(err));
  process.exitCode = 1;
});

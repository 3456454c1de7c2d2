/**
 * Module-level operations backed by a shared default `Tesseract` instance,
 * for callers that do not need a custom binary path or defaults.
 */

import { Tesseract } from './tesseract.js';
import type { RunConsumer, RunOptions } from './tesseract.js';
import type { ImageInput } from '../engine/image.js';
import type { RecognizeOptions } from '../engine/options.js';
import type { Box, OSD, Parameter, WordData } from '../models/types.js';

export { Tesseract } from './tesseract.js';
export type { TesseractOptions, RunOptions, RunConsumer } from './tesseract.js';

let defaultInstance: Tesseract | undefined;

export function getDefaultTesseract(): Tesseract {
  defaultInstance ??= new Tesseract();
  return defaultInstance;
}

/** Replace the shared instance, e.g. after loading configuration. */
export function setDefaultTesseract(instance: Tesseract): void {
  defaultInstance = instance;
}

type Opts = Partial<RecognizeOptions>;

export const imageToString = (image: ImageInput, options?: Opts): Promise<string> =>
  getDefaultTesseract().imageToString(image, options);

export const imageToHocr = (image: ImageInput, options?: Opts): Promise<string> =>
  getDefaultTesseract().imageToHocr(image, options);

export const imageToPdf = (image: ImageInput, options?: Opts): Promise<Buffer> =>
  getDefaultTesseract().imageToPdf(image, options);

export const imageToBoxes = (image: ImageInput, options?: Opts): Promise<Box[]> =>
  getDefaultTesseract().imageToBoxes(image, options);

export const imageToData = (image: ImageInput, options?: Opts): Promise<WordData[]> =>
  getDefaultTesseract().imageToData(image, options);

export const imageToOsd = (image: ImageInput, options?: Opts): Promise<OSD> =>
  getDefaultTesseract().imageToOsd(image, options);

export const confidence = (image: ImageInput, options?: Opts): Promise<number> =>
  getDefaultTesseract().confidence(image, options);

export const deskew = (image: ImageInput, options?: Opts): Promise<number> =>
  getDefaultTesseract().deskew(image, options);

export const languages = (options?: Opts): Promise<string[]> => getDefaultTesseract().languages(options);

export const getLanguages = (options?: Opts): Promise<string[]> => getDefaultTesseract().getLanguages(options);

export const tesseractVersion = (options?: Opts): Promise<string> =>
  getDefaultTesseract().tesseractVersion(options);

export const getTesseractVersion = (options?: Opts): Promise<string> =>
  getDefaultTesseract().getTesseractVersion(options);

export const tesseractParameters = (options?: Opts): Promise<Parameter[]> =>
  getDefaultTesseract().tesseractParameters(options);

export const run = <T>(image: Uint8Array, options: RunOptions, consumer: RunConsumer<T>): Promise<T> =>
  getDefaultTesseract().run(image, options, consumer);

/**
 * Public OCR operations.
 *
 * Each method builds the argument list for one tesseract invocation, runs
 * it through the process helper and parses what comes back. A `Tesseract`
 * instance only holds the binary path and default options; concurrent
 * calls share nothing.
 */

import { mkdtemp, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import { TESSERACT_CMD, TEMP_DIR_PREFIX } from '../engine/constants.js';
import {
  buildArgs,
  configFilesFor,
  defaultRecognizeOptions,
  resolveOptions,
  runConfigFilesFor,
} from '../engine/options.js';
import type { ArgOptions, OutputFormat, RecognizeOptions } from '../engine/options.js';
import { executeChecked } from '../engine/process.js';
import { describeType, resolveImage } from '../engine/image.js';
import type { ImageInput } from '../engine/image.js';
import { ConfigurationError, UnsupportedImageError } from '../errors/index.js';
import type { Box, OSD, Parameter, WordData } from '../models/types.js';
import {
  parseBoxes,
  parseData,
  parseDeskewAngle,
  parseLanguages,
  parseOsd,
  parseParameters,
  parseScriptConfidence,
  parseVersion,
} from '../parsers/index.js';
import { createLogger } from '../logging/logger.js';

const log = createLogger('Tesseract');

export type { ImageInput } from '../engine/image.js';

export interface TesseractOptions {
  /** Binary to run. Default: 'tesseract' on PATH */
  cmd?: string;
  /** Defaults applied to every call, overridable per call */
  defaults?: Partial<RecognizeOptions>;
}

export interface RunOptions extends Partial<RecognizeOptions> {
  /** Base name of the output files inside the temporary directory */
  outputFilename: string;
  /** Renderers to enable in a single pass, e.g. ['txt', 'hocr', 'pdf'] */
  outputFormats: readonly OutputFormat[];
}

/** Called with the produced file paths, one per requested format, in order. */
export type RunConsumer<T> = (paths: string[]) => Promise<T>;

export class Tesseract {
  readonly cmd: string;
  private readonly defaults: RecognizeOptions;

  constructor(options: TesseractOptions = {}) {
    this.cmd = options.cmd ?? TESSERACT_CMD;
    this.defaults = resolveOptions(defaultRecognizeOptions(), options.defaults);
  }

  /** Effective defaults for this instance. */
  getDefaults(): RecognizeOptions {
    return { ...this.defaults };
  }

  // ---------------------------------------------------------------------------
  // Text outputs
  // ---------------------------------------------------------------------------

  /** Recognized plain text. */
  async imageToString(image: ImageInput, options?: Partial<RecognizeOptions>): Promise<string> {
    const opts = this.options(options);
    const stdout = await this.recognize(image, opts, configFilesFor('txt'));
    return stdout.toString(opts.encoding);
  }

  /** HOCR markup (XHTML with positional metadata). */
  async imageToHocr(image: ImageInput, options?: Partial<RecognizeOptions>): Promise<string> {
    const opts = this.options(options);
    const stdout = await this.recognize(image, opts, configFilesFor('hocr'));
    return stdout.toString(opts.encoding);
  }

  /** Searchable PDF, returned as the raw bytes the engine wrote. */
  async imageToPdf(image: ImageInput, options?: Partial<RecognizeOptions>): Promise<Buffer> {
    return this.recognize(image, this.options(options), configFilesFor('pdf'));
  }

  // ---------------------------------------------------------------------------
  // Structured outputs
  // ---------------------------------------------------------------------------

  /** Per-character bounding boxes. */
  async imageToBoxes(image: ImageInput, options?: Partial<RecognizeOptions>): Promise<Box[]> {
    const opts = this.options(options);
    const stdout = await this.recognize(image, opts, configFilesFor('box'));
    return parseBoxes(stdout.toString(opts.encoding));
  }

  /** Word-level table: boxes, confidences, block/paragraph/line numbering. */
  async imageToData(image: ImageInput, options?: Partial<RecognizeOptions>): Promise<WordData[]> {
    const opts = this.options(options);
    const withTsv = { ...opts, config: { ...opts.config, tessedit_create_tsv: 1 } };
    const stdout = await this.recognize(image, withTsv, []);
    return parseData(stdout.toString(opts.encoding));
  }

  /** Orientation and script detection. Always runs with `--psm 0` and no language. */
  async imageToOsd(image: ImageInput, options?: Partial<RecognizeOptions>): Promise<OSD> {
    const opts = this.options(options);
    const stdout = await this.recognize(image, { ...opts, psm: 0, language: undefined }, []);
    return parseOsd(stdout.toString(opts.encoding));
  }

  /** Script confidence from an OSD-only pass; 0 when the engine reports none. */
  async confidence(image: ImageInput, options?: Partial<RecognizeOptions>): Promise<number> {
    const opts = this.options(options);
    const stdout = await this.recognize(image, { ...opts, psm: 0 }, []);
    return parseScriptConfidence(stdout.toString(opts.encoding));
  }

  /**
   * Skew angle of the page, read from the engine's diagnostic output of an
   * auto-segmentation pass with OSD; 0 when the engine reports none.
   */
  async deskew(image: ImageInput, options?: Partial<RecognizeOptions>): Promise<number> {
    const opts = this.options(options);
    const bytes = await resolveImage(image);
    const args = buildArgs('stdin', 'stdout', this.argOptions({ ...opts, psm: 2 }));
    const { stderr } = await executeChecked(args, bytes, this.execOptions(opts));
    return parseDeskewAngle(stderr.toString(opts.encoding));
  }

  // ---------------------------------------------------------------------------
  // Engine metadata
  // ---------------------------------------------------------------------------

  /** Installed languages that are known tessdata codes. */
  async languages(options?: Partial<RecognizeOptions>): Promise<string[]> {
    const opts = this.options(options);
    const args = opts.tessdataDir ? ['--tessdata-dir', opts.tessdataDir, '--list-langs'] : ['--list-langs'];
    const { stdout } = await executeChecked(args, undefined, this.execOptions(opts));
    return parseLanguages(stdout.toString(opts.encoding));
  }

  getLanguages(options?: Partial<RecognizeOptions>): Promise<string[]> {
    return this.languages(options);
  }

  async tesseractVersion(options?: Partial<RecognizeOptions>): Promise<string> {
    const opts = this.options(options);
    const { stdout } = await executeChecked(['--version'], undefined, this.execOptions(opts));
    return parseVersion(stdout.toString(opts.encoding));
  }

  getTesseractVersion(options?: Partial<RecognizeOptions>): Promise<string> {
    return this.tesseractVersion(options);
  }

  /** Every engine parameter with its default value and a short description. */
  async tesseractParameters(options?: Partial<RecognizeOptions>): Promise<Parameter[]> {
    const opts = this.options(options);
    const { stdout } = await executeChecked(['--print-parameters'], undefined, this.execOptions(opts));
    return parseParameters(stdout.toString(opts.encoding));
  }

  // ---------------------------------------------------------------------------
  // Multi-output run
  // ---------------------------------------------------------------------------

  /**
   * Produce several output formats with one engine pass.
   *
   * Files are written to a fresh temporary directory which is removed once
   * `consumer` settles; copy anything you need to keep from inside it.
   * `osd` runs a detection-only pass (`--psm 0`, no language) and cannot be
   * combined with the recognition formats.
   */
  async run<T>(image: Uint8Array, options: RunOptions, consumer: RunConsumer<T>): Promise<T> {
    if (!(image instanceof Uint8Array)) {
      throw new UnsupportedImageError(describeType(image));
    }
    const { outputFilename, outputFormats, ...rest } = options;
    const osd = outputFormats.includes('osd');
    if (osd && outputFormats.some((format) => format !== 'osd')) {
      throw new ConfigurationError(
        `osd cannot be combined with other output formats, got: ${outputFormats.join(', ')}`,
        { outputFormats: [...outputFormats] }
      );
    }
    const opts = this.options(rest);
    const argOptions = this.argOptions(osd ? { ...opts, psm: 0, language: undefined } : opts);

    const dir = await mkdtemp(path.join(os.tmpdir(), TEMP_DIR_PREFIX));
    try {
      const base = path.join(dir, outputFilename);
      const args = buildArgs('stdin', base, argOptions, runConfigFilesFor(outputFormats));
      await executeChecked(args, image, this.execOptions(opts));
      return await consumer(outputFormats.map((format) => `${base}.${format}`));
    } finally {
      await rm(dir, { recursive: true, force: true });
      log.debug(`removed ${dir}`);
    }
  }

  // ── Private helpers ────────────────────────────────────────────────────────

  private options(overrides?: Partial<RecognizeOptions>): RecognizeOptions {
    return resolveOptions(this.defaults, overrides);
  }

  private argOptions(opts: Partial<RecognizeOptions>): ArgOptions {
    return {
      userWords: opts.userWords,
      userPatterns: opts.userPatterns,
      tessdataDir: opts.tessdataDir,
      dpi: opts.dpi,
      psm: opts.psm,
      oem: opts.oem,
      language: opts.language,
      config: opts.config,
    };
  }

  private execOptions(opts: RecognizeOptions): { cmd: string; timeoutMs: number; encoding: BufferEncoding } {
    return { cmd: this.cmd, timeoutMs: opts.timeoutMs, encoding: opts.encoding };
  }

  /** Resolve the image, run `stdin stdout …` and return stdout. */
  private async recognize(
    image: ImageInput,
    opts: Partial<RecognizeOptions> & Pick<RecognizeOptions, 'timeoutMs' | 'encoding'>,
    configFiles: readonly string[]
  ): Promise<Buffer> {
    const bytes = await resolveImage(image);
    const args = buildArgs('stdin', 'stdout', this.argOptions(opts), configFiles);
    const { stdout } = await executeChecked(args, bytes, {
      cmd: this.cmd,
      timeoutMs: opts.timeoutMs,
      encoding: opts.encoding,
    });
    return stdout;
  }
}

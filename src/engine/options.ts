/**
 * Command-line argument construction for the tesseract binary.
 *
 * Grammar (tesseract 4/5):
 *   tesseract [--user-words f] [--user-patterns f] [--tessdata-dir d]
 *             <input> <output> [--dpi n] [--psm n] [--oem n] [-l lang]
 *             [-c name=value ...] [configfile ...]
 */

import {
  DEFAULT_DPI,
  DEFAULT_ENCODING,
  DEFAULT_LANGUAGE,
  DEFAULT_OEM,
  DEFAULT_PSM,
  DEFAULT_TIMEOUT_MS,
} from './constants.js';

/**
 * Config file names the engine resolves to an output renderer.
 * `txt` is the implicit default and adds no argument.
 */
export type OutputFormat = 'txt' | 'hocr' | 'pdf' | 'tsv' | 'box' | 'osd';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['txt', 'hocr', 'pdf', 'tsv', 'box', 'osd'];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/** Engine configuration variables, passed as `-c name=value`. */
export type ConfigVariables = Record<string, string | number | boolean>;

export interface RecognizeOptions {
  /** Language(s), e.g. 'eng' or 'eng+por+fra'. Default: 'eng' */
  language: string;
  /** Image resolution hint. Default: 300 */
  dpi: number;
  /** Page segmentation mode 0-13. Default: 3 */
  psm: number;
  /** OCR engine mode 0-3. Default: 3 */
  oem: number;
  /** Kill the process after this long. Default: 30000 ms */
  timeoutMs: number;
  /** Text encoding of the engine's output. Default: utf-8 */
  encoding: BufferEncoding;
  userWords?: string;
  userPatterns?: string;
  tessdataDir?: string;
  config?: ConfigVariables;
}

/** Fields that end up on the command line. Unset fields are omitted. */
export type ArgOptions = Partial<
  Pick<
    RecognizeOptions,
    'language' | 'dpi' | 'psm' | 'oem' | 'userWords' | 'userPatterns' | 'tessdataDir' | 'config'
  >
>;

export function defaultRecognizeOptions(): RecognizeOptions {
  return {
    language: DEFAULT_LANGUAGE,
    dpi: DEFAULT_DPI,
    psm: DEFAULT_PSM,
    oem: DEFAULT_OEM,
    timeoutMs: DEFAULT_TIMEOUT_MS,
    encoding: DEFAULT_ENCODING,
  };
}

/**
 * Merge per-call overrides over base options. `undefined` overrides are
 * ignored so callers can spread optional CLI flags straight in.
 */
export function resolveOptions(
  base: RecognizeOptions,
  overrides: Partial<RecognizeOptions> = {}
): RecognizeOptions {
  const result: RecognizeOptions = { ...base };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      Object.assign(result, { [key]: value });
    }
  }
  if (base.config || overrides.config) {
    result.config = { ...base.config, ...overrides.config };
  }
  return result;
}

export function buildArgs(
  input: string,
  output: string,
  options: ArgOptions,
  configFiles: readonly string[] = []
): string[] {
  const args: string[] = [];

  if (options.userWords) args.push('--user-words', options.userWords);
  if (options.userPatterns) args.push('--user-patterns', options.userPatterns);
  if (options.tessdataDir) args.push('--tessdata-dir', options.tessdataDir);

  args.push(input, output);

  if (options.dpi !== undefined) args.push('--dpi', String(options.dpi));
  if (options.psm !== undefined) args.push('--psm', String(options.psm));
  if (options.oem !== undefined) args.push('--oem', String(options.oem));
  if (options.language) args.push('-l', options.language);

  for (const [name, value] of Object.entries(options.config ?? {})) {
    args.push('-c', `${name}=${typeof value === 'boolean' ? Number(value) : value}`);
  }

  args.push(...configFiles);
  return args;
}

/**
 * Config file arguments that select an output renderer for a single
 * stdout run. Plain text is what the engine prints when no renderer is
 * named, so `txt` adds nothing.
 */
export function configFilesFor(format: OutputFormat): string[] {
  switch (format) {
    case 'txt':
      return [];
    case 'box':
      return ['batch.nochop', 'makebox'];
    default:
      return [format];
  }
}

/**
 * Config file arguments for a run that writes several files. Once any
 * renderer is named the engine drops the implicit text output, so `txt`
 * must be named too. There is no `osd` config file: the report is written
 * by a `--psm 0` pass instead.
 */
export function runConfigFilesFor(formats: readonly OutputFormat[]): string[] {
  return formats.flatMap((format) => {
    switch (format) {
      case 'txt':
        return ['txt'];
      case 'osd':
        return [];
      default:
        return configFilesFor(format);
    }
  });
}

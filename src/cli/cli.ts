/**
 * tesspipe CLI
 *
 * Commands:
 *   tesspipe text <image>
 *   tesspipe hocr <image>
 *   tesspipe pdf <image> --output <file>
 *   tesspipe boxes <image> [--json]
 *   tesspipe data <image> [--json]
 *   tesspipe osd <image> [--json]
 *   tesspipe confidence <image>
 *   tesspipe deskew <image>
 *   tesspipe run <image> --formats txt,hocr,pdf --out-dir <dir> [--name <base>]
 *   tesspipe langs | version | params [--filter <text>]
 *   tesspipe config get [key] | set <key> <value> | validate | reset
 */

import { Command, InvalidArgumentError } from 'commander';
import { copyFile, mkdir, writeFile } from 'fs/promises';
import path from 'path';
import { ConfigManager } from '../config/config.js';
import type { TesspipeConfig } from '../config/config.js';
import { Tesseract } from '../tesseract/tesseract.js';
import type { TesseractOptions } from '../tesseract/tesseract.js';
import { isOutputFormat } from '../engine/options.js';
import type { ConfigVariables, OutputFormat, RecognizeOptions } from '../engine/options.js';
import { resolveImage } from '../engine/image.js';
import { ConfigurationError } from '../errors/index.js';
import { OutputFormatter } from './formatter.js';
import { createLogger } from '../logging/logger.js';

const log = createLogger('CLI');

export interface Spinner {
  stop: (symbol?: string, text?: string) => void;
}

export type SpinnerFactory = (text: string) => Promise<Spinner>;

// ora is imported lazily; without it progress goes to stderr as plain text.
export async function oraSpinner(text: string): Promise<Spinner> {
  try {
    const { default: ora } = await import('ora');
    const s = ora(text).start();
    return {
      stop: (symbol?: string, text?: string) => {
        if (symbol === '✓') {
          s.succeed(text);
        } else if (symbol === '✗') {
          s.fail(text);
        } else {
          s.stop();
        }
      },
    };
  } catch (err) {
    log.debug(`spinner unavailable: ${err instanceof Error ? err.message : String(err)}`);
    process.stderr.write(`${text}...\n`);
    return { stop: () => {} };
  }
}

export interface CLIDependencies {
  configManager?: ConfigManager;
  formatter?: OutputFormatter;
  createTesseract?: (options: TesseractOptions) => Tesseract;
  spinner?: SpinnerFactory;
}

/** Flags shared by every command that runs recognition. */
interface RecognitionFlags {
  lang?: string;
  dpi?: number;
  psm?: number;
  oem?: number;
  timeout?: number;
  userWords?: string;
  userPatterns?: string;
  tessdataDir?: string;
  config?: string[];
  json?: boolean;
}

// ─── Argument parsers ────────────────────────────────────────────────────────

function integerArg(min: number, max = Number.MAX_SAFE_INTEGER): (value: string) => number {
  return (value: string) => {
    const n = Number(value);
    if (!Number.isInteger(n) || n < min || n > max) {
      throw new InvalidArgumentError(
        max === Number.MAX_SAFE_INTEGER ? `Expected an integer >= ${min}.` : `Expected an integer ${min}-${max}.`
      );
    }
    return n;
  };
}

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

export function parseConfigVariables(pairs: string[] = []): ConfigVariables {
  const vars: ConfigVariables = {};
  for (const pair of pairs) {
    const eq = pair.indexOf('=');
    if (eq <= 0) {
      throw new InvalidArgumentError(`Expected name=value, got: ${pair}`);
    }
    vars[pair.slice(0, eq)] = pair.slice(eq + 1);
  }
  return vars;
}

export function parseFormats(value: string): OutputFormat[] {
  const formats = value.split(/[\s,]+/).filter(Boolean);
  if (!formats.length) {
    throw new InvalidArgumentError('At least one output format is required.');
  }
  return formats.map((format) => {
    if (!isOutputFormat(format)) {
      throw new InvalidArgumentError(`Unknown output format: ${format}`);
    }
    return format;
  });
}

export function toRecognizeOptions(flags: RecognitionFlags): Partial<RecognizeOptions> {
  return {
    language: flags.lang,
    dpi: flags.dpi,
    psm: flags.psm,
    oem: flags.oem,
    timeoutMs: flags.timeout,
    userWords: flags.userWords,
    userPatterns: flags.userPatterns,
    tessdataDir: flags.tessdataDir,
    config: flags.config?.length ? parseConfigVariables(flags.config) : undefined,
  };
}

function withRecognitionOptions(cmd: Command): Command {
  return cmd
    .option('-l, --lang <language>', 'Language(s), e.g. eng or eng+por')
    .option('--dpi <n>', 'Image resolution', integerArg(1))
    .option('--psm <n>', 'Page segmentation mode (0-13)', integerArg(0, 13))
    .option('--oem <n>', 'OCR engine mode (0-3)', integerArg(0, 3))
    .option('--timeout <ms>', 'Kill tesseract after this many milliseconds', integerArg(1))
    .option('--user-words <file>', 'User words file')
    .option('--user-patterns <file>', 'User patterns file')
    .option('--tessdata-dir <dir>', 'Directory holding traineddata files')
    .option('-c, --config <name=value>', 'Engine configuration variable (repeatable)', collect);
}

// ─── Config key access ───────────────────────────────────────────────────────

const CONFIG_SECTIONS = ['tesseract', 'defaults', 'output'] as const;
type ConfigSection = (typeof CONFIG_SECTIONS)[number];

function isConfigSection(value: string): value is ConfigSection {
  return CONFIG_SECTIONS.some((section) => section === value);
}

function configKey(key: string): [ConfigSection, string | undefined] {
  const [section, name, ...rest] = key.split('.');
  if (!isConfigSection(section) || rest.length) {
    throw new ConfigurationError(`Unknown config key: ${key}`, { key });
  }
  return [section, name];
}

export function getConfigValue(config: TesspipeConfig, key: string): unknown {
  const [section, name] = configKey(key);
  const values: Record<string, unknown> = { ...config[section] };
  return name === undefined ? values : values[name];
}

/**
 * Set `section.name` from its string form. Numbers are parsed for numeric
 * keys; only keys present in the defaults (plus tesseract.tessdataDir) exist.
 */
export function setConfigValue(config: TesspipeConfig, key: string, raw: string): TesspipeConfig {
  const [section, name] = configKey(key);
  const defaults: Record<string, unknown> = { ...ConfigManager.defaults()[section] };
  if (name === undefined || !(name in defaults || (section === 'tesseract' && name === 'tessdataDir'))) {
    throw new ConfigurationError(`Unknown config key: ${key}`, { key });
  }
  let value: string | number = raw;
  if (typeof defaults[name] === 'number') {
    value = Number(raw);
    if (!Number.isFinite(value)) {
      throw new ConfigurationError(`${key} must be a number, got: ${raw}`, { key });
    }
  }
  return { ...config, [section]: { ...config[section], [name]: value } };
}

// ─── CLI ─────────────────────────────────────────────────────────────────────

export class TesspipeCLI {
  private readonly program: Command;
  private readonly configManager: ConfigManager;
  private readonly formatter: OutputFormatter;
  private readonly createTesseract: (options: TesseractOptions) => Tesseract;
  private readonly spinner: SpinnerFactory;

  constructor(deps: CLIDependencies = {}) {
    this.configManager = deps.configManager ?? new ConfigManager();
    this.formatter = deps.formatter ?? new OutputFormatter();
    this.createTesseract = deps.createTesseract ?? ((options) => new Tesseract(options));
    this.spinner = deps.spinner ?? oraSpinner;
    this.program = this.buildProgram();
  }

  /** Parse argv and execute the matching command. */
  async run(argv: string[]): Promise<void> {
    await this.program.parseAsync(argv);
  }

  // ─── Program builder ──────────────────────────────────────────────────────

  private buildProgram(): Command {
    const program = new Command('tesspipe')
      .version('0.1.0', '-V, --version', 'Print version')
      .description('Run the Tesseract OCR engine and parse its output');

    // ── text / hocr ─────────────────────────────────────────────────────────
    withRecognitionOptions(program.command('text <image>'))
      .description('Print the recognized text')
      .action((image: string, flags: RecognitionFlags) =>
        this.recognition('Recognizing text', async (tess) => {
          const text = await tess.imageToString(image, toRecognizeOptions(flags));
          console.log(text.trimEnd());
        })
      );

    withRecognitionOptions(program.command('hocr <image>'))
      .description('Print HOCR markup')
      .action((image: string, flags: RecognitionFlags) =>
        this.recognition('Generating HOCR', async (tess) => {
          console.log((await tess.imageToHocr(image, toRecognizeOptions(flags))).trimEnd());
        })
      );

    // ── pdf ─────────────────────────────────────────────────────────────────
    withRecognitionOptions(program.command('pdf <image>'))
      .description('Write a searchable PDF')
      .requiredOption('-o, --output <file>', 'Destination PDF file')
      .action((image: string, flags: RecognitionFlags & { output: string }) =>
        this.recognition('Generating PDF', async (tess) => {
          const pdf = await tess.imageToPdf(image, toRecognizeOptions(flags));
          await writeFile(flags.output, pdf);
          console.log(`Wrote ${pdf.length} bytes to ${flags.output}`);
        })
      );

    // ── boxes / data / osd ──────────────────────────────────────────────────
    withRecognitionOptions(program.command('boxes <image>'))
      .description('Print per-character bounding boxes')
      .option('--json', 'Print JSON')
      .action((image: string, flags: RecognitionFlags) =>
        this.recognition('Estimating boxes', async (tess, config) => {
          const boxes = await tess.imageToBoxes(image, toRecognizeOptions(flags));
          console.log(this.wantsJson(flags, config) ? toJson(boxes) : this.formatter.formatBoxes(boxes));
        })
      );

    withRecognitionOptions(program.command('data <image>'))
      .description('Print the word-level data table')
      .option('--json', 'Print JSON (all rows)')
      .action((image: string, flags: RecognitionFlags) =>
        this.recognition('Extracting data', async (tess, config) => {
          const data = await tess.imageToData(image, toRecognizeOptions(flags));
          console.log(this.wantsJson(flags, config) ? toJson(data) : this.formatter.formatData(data));
        })
      );

    withRecognitionOptions(program.command('osd <image>'))
      .description('Print orientation and script detection')
      .option('--json', 'Print JSON')
      .action((image: string, flags: RecognitionFlags) =>
        this.recognition('Detecting orientation', async (tess, config) => {
          const osd = await tess.imageToOsd(image, toRecognizeOptions(flags));
          console.log(this.wantsJson(flags, config) ? toJson(osd) : this.formatter.formatOsd(osd));
        })
      );

    // ── confidence / deskew ─────────────────────────────────────────────────
    withRecognitionOptions(program.command('confidence <image>'))
      .description('Print the script confidence')
      .action((image: string, flags: RecognitionFlags) =>
        this.recognition('Measuring confidence', async (tess) => {
          console.log(String(await tess.confidence(image, toRecognizeOptions(flags))));
        })
      );

    withRecognitionOptions(program.command('deskew <image>'))
      .description('Print the deskew angle')
      .action((image: string, flags: RecognitionFlags) =>
        this.recognition('Measuring skew', async (tess) => {
          console.log(String(await tess.deskew(image, toRecognizeOptions(flags))));
        })
      );

    // ── run ─────────────────────────────────────────────────────────────────
    withRecognitionOptions(program.command('run <image>'))
      .description('Produce several output formats in one pass')
      .requiredOption('-f, --formats <list>', 'Comma-separated formats: txt,hocr,pdf,tsv,box,osd', parseFormats)
      .requiredOption('-d, --out-dir <dir>', 'Directory to copy the outputs into')
      .option('-n, --name <base>', 'Base name of the output files', 'output')
      .action((image: string, flags: RecognitionFlags & { formats: OutputFormat[]; outDir: string; name: string }) =>
        this.recognition(`Running ${flags.formats.join(', ')}`, async (tess) => {
          const bytes = await resolveImage(image);
          await mkdir(flags.outDir, { recursive: true });
          const written = await tess.run(
            bytes,
            { ...toRecognizeOptions(flags), outputFilename: flags.name, outputFormats: flags.formats },
            async (paths) => {
              const copies: string[] = [];
              for (const file of paths) {
                const dest = path.join(flags.outDir, path.basename(file));
                await copyFile(file, dest);
                copies.push(dest);
              }
              return copies;
            }
          );
          console.log(this.formatter.formatRunResult(written));
        })
      );

    // ── engine metadata ─────────────────────────────────────────────────────
    program
      .command('langs')
      .description('List installed languages')
      .option('--tessdata-dir <dir>', 'Directory holding traineddata files')
      .option('--json', 'Print JSON')
      .action((flags: { tessdataDir?: string; json?: boolean }) =>
        this.recognition(undefined, async (tess, config) => {
          const langs = await tess.languages({ tessdataDir: flags.tessdataDir });
          console.log(this.wantsJson(flags, config) ? toJson(langs) : this.formatter.formatLanguages(langs));
        })
      );

    program
      .command('version')
      .description('Print the Tesseract engine version')
      .action(() =>
        this.recognition(undefined, async (tess) => {
          console.log(await tess.tesseractVersion());
        })
      );

    program
      .command('params')
      .description('List engine parameters with defaults and descriptions')
      .option('--filter <text>', 'Only parameters whose name contains <text>')
      .option('--json', 'Print JSON')
      .action((flags: { filter?: string; json?: boolean }) =>
        this.recognition(undefined, async (tess, config) => {
          const filter = flags.filter;
          const params = (await tess.tesseractParameters()).filter((p) => !filter || p.name.includes(filter));
          console.log(this.wantsJson(flags, config) ? toJson(params) : this.formatter.formatParameters(params));
        })
      );

    program.addCommand(this.configCommand());

    return program;
  }

  // ── config ───────────────────────────────────────────────────────────────

  private configCommand(): Command {
    const cmd = new Command('config').description('Manage tesspipe configuration');

    cmd
      .command('get [key]')
      .description('Show full config or a specific key')
      .action((key?: string) =>
        this.guard(() => {
          const config = this.configManager.loadWithEnvOverrides();
          const value = key ? getConfigValue(config, key) : config;
          console.log(value !== undefined ? toJson(value) : `Key not found: ${key}`);
        })
      );

    cmd
      .command('set <key> <value>')
      .description('Set a configuration key, e.g. defaults.language eng+por')
      .action((key: string, value: string) =>
        this.guard(() => {
          const updated = setConfigValue(this.configManager.load(), key, value);
          this.configManager.save(updated);
          console.log(`✅ Set ${key} = ${value}`);
        })
      );

    cmd
      .command('validate')
      .description('Validate the current configuration')
      .action(() =>
        this.guard(() => {
          const { valid, errors } = this.configManager.validate(this.configManager.loadWithEnvOverrides());
          if (valid) {
            console.log('✅ Configuration is valid');
          } else {
            console.error('❌ Configuration has errors:');
            for (const err of errors) {
              console.error(`  - ${err}`);
            }
            process.exitCode = 1;
          }
        })
      );

    cmd
      .command('reset')
      .description('Reset configuration to defaults')
      .action(() =>
        this.guard(() => {
          this.configManager.save(ConfigManager.defaults());
          console.log('✅ Configuration reset to defaults');
        })
      );

    return cmd;
  }

  // ─── Helpers ──────────────────────────────────────────────────────────────

  private wantsJson(flags: { json?: boolean }, config: TesspipeConfig): boolean {
    return flags.json === true || config.output.format === 'json';
  }

  /**
   * Load config, build a `Tesseract` from it and run `task` under a
   * spinner. Failures are printed and set a nonzero exit code.
   */
  private async recognition(
    label: string | undefined,
    task: (tess: Tesseract, config: TesspipeConfig) => Promise<unknown>
  ): Promise<void> {
    const spin = label ? await this.spinner(label) : undefined;
    try {
      const config = this.configManager.loadWithEnvOverrides();
      const tess = this.createTesseract(this.configManager.toTesseractOptions(config));
      await task(tess, config);
      spin?.stop('✓', 'Done');
    } catch (err) {
      spin?.stop('✗', 'Failed');
      console.error(this.formatter.formatError(err));
      process.exitCode = 1;
    }
  }

  private async guard(task: () => void | Promise<void>): Promise<void> {
    try {
      await task();
    } catch (err) {
      console.error(this.formatter.formatError(err));
      process.exitCode = 1;
    }
  }
}

function toJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

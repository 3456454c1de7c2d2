/**
 * tesspipe CLI Tests
 *
 * Tests for: OutputFormatter, argument helpers, config key access, TesspipeCLI commands
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { Mock } from 'vitest';
import os from 'os';
import fs from 'fs';
import path from 'path';
import { OutputFormatter } from './formatter.js';
import {
  TesspipeCLI,
  getConfigValue,
  parseConfigVariables,
  parseFormats,
  setConfigValue,
  toRecognizeOptions,
} from './index.js';
import { ConfigManager } from '../config/config.js';
import { Tesseract } from '../tesseract/tesseract.js';
import type { TesseractOptions } from '../tesseract/tesseract.js';
import {
  ConfigurationError,
  ImageNotFoundError,
  TesseractNotFoundError,
  TesseractRuntimeError,
  TesseractTimeoutError,
} from '../errors/index.js';
import type { Box, WordData } from '../models/types.js';

const BOLD = '\x1b[1m';
const RED = '\x1b[31m';
const YELLOW = '\x1b[33m';
const RESET = '\x1b[0m';

function word(overrides: Partial<WordData> = {}): WordData {
  return {
    level: 5,
    pageNum: 1,
    blockNum: 1,
    parNum: 1,
    lineNum: 1,
    wordNum: 1,
    left: 10,
    top: 20,
    width: 30,
    height: 12,
    conf: 91.234,
    text: 'Hello',
    ...overrides,
  };
}

// ─── OutputFormatter ─────────────────────────────────────────────────────────

describe('OutputFormatter', () => {
  const formatter = new OutputFormatter();

  it('formats boxes as an aligned table', () => {
    const boxes: Box[] = [{ character: 'H', left: 1, bottom: 2, right: 3, top: 4, page: 0 }];
    const lines = formatter.formatBoxes(boxes).split('\n');
    expect(lines[1]).toBe(`${BOLD}Boxes (1)${RESET}`);
    expect(lines[lines.length - 1]).toBe('  ' + ['   1', '     2', '    3', '  4', '   0', 'H'].join('  '));
  });

  it('reports an empty box list', () => {
    expect(formatter.formatBoxes([])).toBe(`${YELLOW}No boxes found.${RESET}`);
  });

  it('shows only word rows from the data table', () => {
    const output = formatter.formatData([word({ level: 1, text: '' }), word()]);
    const lines = output.split('\n');
    expect(lines[1]).toBe(`${BOLD}Words (1 of 2 rows)${RESET}`);
    expect(lines[lines.length - 1].endsWith('91.2  Hello')).toBe(true);
  });

  it('reports a table without words', () => {
    expect(formatter.formatData([word({ level: 2 })])).toBe(`${YELLOW}No words found.${RESET}`);
  });

  it('formats OSD fields', () => {
    const output = formatter.formatOsd({
      pageNumber: 0,
      orientationInDegrees: 180,
      rotate: 180,
      orientationConfidence: 12.3456,
      script: '',
      scriptConfidence: 1,
    });
    expect(output).toContain('Orientation in degrees');
    expect(output).toContain('12.35');
    expect(output).toContain('Unknown');
  });

  it('marks empty parameter values', () => {
    const output = formatter.formatParameters([{ name: 'tessedit_char_whitelist', value: '', description: 'Whitelist' }]);
    expect(output.split('\n')[3]).toBe(`  ${BOLD}tessedit_char_whitelist${RESET} = \x1b[2m(empty)${RESET}`);
  });

  it('lists languages one per line', () => {
    const lines = formatter.formatLanguages(['eng', 'por']).split('\n');
    expect(lines.slice(-2)).toEqual(['  eng', '  por']);
    expect(formatter.formatLanguages([])).toBe(`${YELLOW}No languages installed.${RESET}`);
  });

  it('adds an install hint for a missing binary', () => {
    const lines = formatter.formatError(new TesseractNotFoundError('tesseract')).split('\n');
    expect(lines[1]).toBe(`${RED}${BOLD}Error:${RESET} Could not start \`tesseract\`. Is Tesseract installed and on PATH?`);
    expect(lines[2]).toBe(`${YELLOW}Hint:${RESET} Install Tesseract or point TESSPIPE_CMD / tesseract.cmd at the binary.`);
  });

  it('adds a language hint when traineddata is missing', () => {
    const err = new TesseractRuntimeError("Failed loading language 'xyz'\nTesseract couldn't load any languages!\n", 1);
    const lines = formatter.formatError(err).split('\n');
    expect(lines[1]).toBe(`${RED}${BOLD}Error:${RESET} Tesseract failed (exit 1): Failed loading language 'xyz'`);
    expect(lines[2]).toContain('tesspipe langs');
  });

  it('formats errors without a hint', () => {
    expect(formatter.formatError('boom')).toBe(`\n${RED}${BOLD}Error:${RESET} An unexpected error occurred.`);
  });
});

// ─── Argument helpers ────────────────────────────────────────────────────────

describe('argument helpers', () => {
  it('parseConfigVariables splits on the first =', () => {
    expect(parseConfigVariables(['a=1', 'b=x=y', 'c='])).toEqual({ a: '1', b: 'x=y', c: '' });
  });

  it('parseConfigVariables rejects pairs without a name', () => {
    expect(() => parseConfigVariables(['=1'])).toThrow('Expected name=value, got: =1');
    expect(() => parseConfigVariables(['novalue'])).toThrow('Expected name=value, got: novalue');
  });

  it('parseFormats accepts commas and spaces', () => {
    expect(parseFormats('txt,hocr pdf')).toEqual(['txt', 'hocr', 'pdf']);
  });

  it('parseFormats rejects unknown formats', () => {
    expect(() => parseFormats('txt,docx')).toThrow('Unknown output format: docx');
    expect(() => parseFormats(' , ')).toThrow('At least one output format is required.');
  });

  it('toRecognizeOptions maps flags to options', () => {
    expect(toRecognizeOptions({ lang: 'deu', psm: 6, timeout: 500, config: ['x=1'] })).toEqual({
      language: 'deu',
      psm: 6,
      timeoutMs: 500,
      config: { x: '1' },
    });
  });
});

// ─── Config key access ───────────────────────────────────────────────────────

describe('config key access', () => {
  it('reads sections and keys', () => {
    const config = ConfigManager.defaults();
    expect(getConfigValue(config, 'defaults.dpi')).toBe(300);
    expect(getConfigValue(config, 'output')).toEqual({ format: 'plain' });
    expect(getConfigValue(config, 'defaults.nope')).toBeUndefined();
  });

  it('rejects unknown sections', () => {
    expect(() => getConfigValue(ConfigManager.defaults(), 'ai.provider')).toThrow('Unknown config key: ai.provider');
  });

  it('parses numeric values and leaves the input untouched', () => {
    const config = ConfigManager.defaults();
    const updated = setConfigValue(config, 'defaults.psm', '11');
    expect(updated.defaults.psm).toBe(11);
    expect(config.defaults.psm).toBe(3);
  });

  it('accepts tesseract.tessdataDir', () => {
    const updated = setConfigValue(ConfigManager.defaults(), 'tesseract.tessdataDir', '/td');
    expect(updated.tesseract.tessdataDir).toBe('/td');
  });

  it('rejects unknown keys and non-numeric numbers', () => {
    expect(() => setConfigValue(ConfigManager.defaults(), 'defaults.nope', '1')).toThrow(ConfigurationError);
    expect(() => setConfigValue(ConfigManager.defaults(), 'defaults', '1')).toThrow('Unknown config key: defaults');
    expect(() => setConfigValue(ConfigManager.defaults(), 'defaults.dpi', 'high')).toThrow(
      'defaults.dpi must be a number, got: high'
    );
  });
});

// ─── TesspipeCLI ─────────────────────────────────────────────────────────────

describe('TesspipeCLI', () => {
  let tmpDir: string;
  let configManager: ConfigManager;
  let tess: Tesseract;
  let createTesseract: Mock<(options: TesseractOptions) => Tesseract>;
  let stop: Mock<(symbol?: string, text?: string) => void>;
  let cli: TesspipeCLI;
  let logSpy: ReturnType<typeof vi.spyOn>;
  let errorSpy: ReturnType<typeof vi.spyOn>;
  const formatter = new OutputFormatter();

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'tesspipe-cli-'));
    configManager = new ConfigManager(path.join(tmpDir, 'config.json'));
    tess = new Tesseract();
    createTesseract = vi.fn((_options: TesseractOptions) => tess);
    stop = vi.fn((_symbol?: string, _text?: string) => {});
    cli = new TesspipeCLI({
      configManager,
      formatter,
      createTesseract,
      spinner: async () => ({ stop }),
    });
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function run(...args: string[]): Promise<void> {
    return cli.run(['node', 'tesspipe', ...args]);
  }

  it('builds the engine from the loaded config', async () => {
    vi.spyOn(tess, 'imageToString').mockResolvedValue('text\n');
    await run('text', 'scan.png');
    expect(createTesseract).toHaveBeenCalledWith({
      cmd: 'tesseract',
      defaults: { language: 'eng', dpi: 300, psm: 3, oem: 3, timeoutMs: 30000, encoding: 'utf-8' },
    });
  });

  it('text prints the trimmed recognized text', async () => {
    const spy = vi.spyOn(tess, 'imageToString').mockResolvedValue('Hello world\n\n');
    await run('text', 'scan.png', '-l', 'por', '--psm', '6', '-c', 'a=1', '-c', 'b=2');

    expect(spy).toHaveBeenCalledWith('scan.png', {
      language: 'por',
      psm: 6,
      config: { a: '1', b: '2' },
    });
    expect(logSpy).toHaveBeenCalledWith('Hello world');
    expect(stop).toHaveBeenCalledWith('✓', 'Done');
    expect(process.exitCode).toBeUndefined();
  });

  it('hocr prints the markup', async () => {
    vi.spyOn(tess, 'imageToHocr').mockResolvedValue('<html/>\n');
    await run('hocr', 'scan.png');
    expect(logSpy).toHaveBeenCalledWith('<html/>');
  });

  it('pdf writes the bytes to the output file', async () => {
    vi.spyOn(tess, 'imageToPdf').mockResolvedValue(Buffer.from('%PDF-1.5'));
    const out = path.join(tmpDir, 'scan.pdf');
    await run('pdf', 'scan.png', '-o', out);

    expect(fs.readFileSync(out, 'utf-8')).toBe('%PDF-1.5');
    expect(logSpy).toHaveBeenCalledWith(`Wrote 8 bytes to ${out}`);
  });

  it('boxes prints JSON with --json', async () => {
    const boxes: Box[] = [{ character: 'a', left: 1, bottom: 2, right: 3, top: 4, page: 0 }];
    vi.spyOn(tess, 'imageToBoxes').mockResolvedValue(boxes);
    await run('boxes', 'scan.png', '--json');
    expect(logSpy).toHaveBeenCalledWith(JSON.stringify(boxes, null, 2));
  });

  it('data prints JSON when the config asks for it', async () => {
    configManager.save({ ...ConfigManager.defaults(), output: { format: 'json' } });
    const rows = [word()];
    vi.spyOn(tess, 'imageToData').mockResolvedValue(rows);
    await run('data', 'scan.png');
    expect(logSpy).toHaveBeenCalledWith(JSON.stringify(rows, null, 2));
  });

  it('osd prints the formatted report', async () => {
    const osd = {
      pageNumber: 0,
      orientationInDegrees: 90,
      rotate: 270,
      orientationConfidence: 2,
      script: 'Latin',
      scriptConfidence: 1.5,
    };
    vi.spyOn(tess, 'imageToOsd').mockResolvedValue(osd);
    await run('osd', 'scan.png');
    expect(logSpy).toHaveBeenCalledWith(formatter.formatOsd(osd));
  });

  it('confidence and deskew print a number', async () => {
    vi.spyOn(tess, 'confidence').mockResolvedValue(4.5);
    vi.spyOn(tess, 'deskew').mockResolvedValue(-0.125);
    await run('confidence', 'scan.png');
    await run('deskew', 'scan.png');
    expect(logSpy).toHaveBeenNthCalledWith(1, '4.5');
    expect(logSpy).toHaveBeenNthCalledWith(2, '-0.125');
  });

  it('run copies every output into the target directory', async () => {
    const image = path.join(tmpDir, 'scan.png');
    fs.writeFileSync(image, 'png');
    const produced = path.join(tmpDir, 'engine');
    fs.mkdirSync(produced);
    fs.writeFileSync(path.join(produced, 'page.txt'), 'text');
    fs.writeFileSync(path.join(produced, 'page.hocr'), '<html/>');

    const spy = vi
      .spyOn(tess, 'run')
      .mockImplementation((_image, _options, consumer) =>
        consumer([path.join(produced, 'page.txt'), path.join(produced, 'page.hocr')])
      );
    const outDir = path.join(tmpDir, 'out');
    await run('run', image, '-f', 'txt,hocr', '-d', outDir, '-n', 'page');

    expect(spy.mock.calls[0][1]).toMatchObject({ outputFilename: 'page', outputFormats: ['txt', 'hocr'] });
    expect(fs.readFileSync(path.join(outDir, 'page.txt'), 'utf-8')).toBe('text');
    expect(fs.readFileSync(path.join(outDir, 'page.hocr'), 'utf-8')).toBe('<html/>');
    expect(logSpy).toHaveBeenCalledWith(
      formatter.formatRunResult([path.join(outDir, 'page.txt'), path.join(outDir, 'page.hocr')])
    );
  });

  it('run reports a missing image', async () => {
    const missing = path.join(tmpDir, 'missing.png');
    await run('run', missing, '-f', 'txt', '-d', path.join(tmpDir, 'out'));
    expect(errorSpy).toHaveBeenCalledWith(formatter.formatError(new ImageNotFoundError(missing)));
    expect(process.exitCode).toBe(1);
  });

  it('langs passes the tessdata directory', async () => {
    const spy = vi.spyOn(tess, 'languages').mockResolvedValue(['eng']);
    await run('langs', '--tessdata-dir', '/td', '--json');
    expect(spy).toHaveBeenCalledWith({ tessdataDir: '/td' });
    expect(logSpy).toHaveBeenCalledWith(JSON.stringify(['eng'], null, 2));
  });

  it('version prints the engine version', async () => {
    vi.spyOn(tess, 'tesseractVersion').mockResolvedValue('5.3.4');
    await run('version');
    expect(logSpy).toHaveBeenCalledWith('5.3.4');
  });

  it('params filters by name', async () => {
    vi.spyOn(tess, 'tesseractParameters').mockResolvedValue([
      { name: 'load_system_dawg', value: '1', description: 'Load dawg' },
      { name: 'textord_debug', value: '0', description: 'Debug' },
    ]);
    await run('params', '--filter', 'dawg', '--json');
    expect(logSpy).toHaveBeenCalledWith(
      JSON.stringify([{ name: 'load_system_dawg', value: '1', description: 'Load dawg' }], null, 2)
    );
  });

  it('prints a formatted error and sets the exit code on failure', async () => {
    const err = new TesseractTimeoutError(30000);
    vi.spyOn(tess, 'imageToString').mockRejectedValue(err);
    await run('text', 'scan.png');

    expect(stop).toHaveBeenCalledWith('✗', 'Failed');
    expect(errorSpy).toHaveBeenCalledWith(formatter.formatError(err));
    expect(process.exitCode).toBe(1);
  });

  it('refuses to run with an invalid config', async () => {
    configManager.save({ ...ConfigManager.defaults(), defaults: { ...ConfigManager.defaults().defaults, psm: 99 } });
    await run('text', 'scan.png');
    expect(createTesseract).not.toHaveBeenCalled();
    expect(process.exitCode).toBe(1);
  });

  // ─── config ─────────────────────────────────────────────────────────────────

  it('config set stores the value and config get reads it back', async () => {
    await run('config', 'set', 'defaults.language', 'eng+por');
    expect(logSpy).toHaveBeenCalledWith('✅ Set defaults.language = eng+por');
    expect(configManager.load().defaults.language).toBe('eng+por');

    await run('config', 'get', 'defaults.language');
    expect(logSpy).toHaveBeenLastCalledWith('"eng+por"');
  });

  it('config set rejects unknown keys', async () => {
    await run('config', 'set', 'defaults.colour', 'red');
    expect(errorSpy).toHaveBeenCalledWith(
      formatter.formatError(new ConfigurationError('Unknown config key: defaults.colour'))
    );
    expect(process.exitCode).toBe(1);
  });

  it('config validate lists the errors', async () => {
    configManager.save({ ...ConfigManager.defaults(), defaults: { ...ConfigManager.defaults().defaults, oem: 7 } });
    await run('config', 'validate');
    expect(errorSpy).toHaveBeenCalledWith('❌ Configuration has errors:');
    expect(errorSpy).toHaveBeenCalledWith('  - defaults.oem must be 0-3, got: 7');
    expect(process.exitCode).toBe(1);
  });

  it('config validate accepts the defaults', async () => {
    await run('config', 'validate');
    expect(logSpy).toHaveBeenCalledWith('✅ Configuration is valid');
  });

  it('config reset writes the defaults', async () => {
    configManager.save({ ...ConfigManager.defaults(), output: { format: 'json' } });
    await run('config', 'reset');
    expect(configManager.load()).toEqual(ConfigManager.defaults());
  });
});

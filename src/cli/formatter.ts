/**
 * Output Formatter
 *
 * Formats result records into human-readable strings for CLI output.
 */

import type { Box, OSD, Parameter, WordData } from '../models/types.js';
import {
  ErrorHandler,
  ConfigurationError,
  ImageNotFoundError,
  TesseractNotFoundError,
  TesseractRuntimeError,
  TesseractTimeoutError,
  UnsupportedImageError,
} from '../errors/index.js';

const LINE = '─'.repeat(60);
const DIM = '\x1b[2m';
const BOLD = '\x1b[1m';
const YELLOW = '\x1b[33m';
const RED = '\x1b[31m';
const RESET = '\x1b[0m';

function header(title: string): string {
  return `\n${BOLD}${title}${RESET}\n${LINE}`;
}

function field(label: string, value: string | number): string {
  return `  ${DIM}${label.padEnd(24)}${RESET}${value}`;
}

/** Right-aligned numeric columns followed by a free-text column. */
function table(headings: string[], rows: Array<Array<string | number>>): string[] {
  const widths = headings.map((h, col) =>
    Math.max(h.length, ...rows.map((row) => String(row[col]).length))
  );
  const last = headings.length - 1;
  const render = (cells: Array<string | number>): string =>
    cells
      .map((cell, col) => (col === last ? String(cell) : String(cell).padStart(widths[col])))
      .join('  ')
      .trimEnd();
  return [`  ${DIM}${render(headings)}${RESET}`, ...rows.map((row) => `  ${render(row)}`)];
}

export class OutputFormatter {
  formatBoxes(boxes: Box[]): string {
    if (!boxes.length) {
      return `${YELLOW}No boxes found.${RESET}`;
    }
    const rows = boxes.map((b) => [b.left, b.bottom, b.right, b.top, b.page, b.character]);
    return [header(`Boxes (${boxes.length})`), ...table(['left', 'bottom', 'right', 'top', 'page', 'char'], rows)].join('\n');
  }

  /**
   * Word rows only (level 5); page, block, paragraph and line rows carry no
   * text and are summarised in the header.
   */
  formatData(data: WordData[]): string {
    const words = data.filter((d) => d.level === 5);
    if (!words.length) {
      return `${YELLOW}No words found.${RESET}`;
    }
    const rows = words.map((w) => [
      w.blockNum,
      w.parNum,
      w.lineNum,
      w.wordNum,
      w.left,
      w.top,
      w.width,
      w.height,
      w.conf.toFixed(1),
      w.text,
    ]);
    return [
      header(`Words (${words.length} of ${data.length} rows)`),
      ...table(['block', 'par', 'line', 'word', 'left', 'top', 'width', 'height', 'conf', 'text'], rows),
    ].join('\n');
  }

  formatOsd(osd: OSD): string {
    return [
      header('Orientation and Script Detection'),
      field('Page number', osd.pageNumber),
      field('Orientation in degrees', osd.orientationInDegrees),
      field('Rotate', osd.rotate),
      field('Orientation confidence', osd.orientationConfidence.toFixed(2)),
      field('Script', osd.script || 'Unknown'),
      field('Script confidence', osd.scriptConfidence.toFixed(2)),
    ].join('\n');
  }

  formatParameters(params: Parameter[]): string {
    if (!params.length) {
      return `${YELLOW}No parameters found.${RESET}`;
    }
    const lines: string[] = [header(`Parameters (${params.length})`)];
    for (const p of params) {
      lines.push(`  ${BOLD}${p.name}${RESET} = ${p.value === '' ? `${DIM}(empty)${RESET}` : p.value}`);
      if (p.description) lines.push(`      ${DIM}${p.description}${RESET}`);
    }
    return lines.join('\n');
  }

  formatLanguages(langs: string[]): string {
    if (!langs.length) {
      return `${YELLOW}No languages installed.${RESET}`;
    }
    return [header(`Languages (${langs.length})`), ...langs.map((l) => `  ${l}`)].join('\n');
  }

  formatRunResult(paths: string[]): string {
    return [header(`Outputs (${paths.length})`), ...paths.map((p) => `  ${p}`)].join('\n');
  }

  /**
   * Format an error into a one-line message plus a hint where one applies.
   */
  formatError(error: unknown): string {
    const lines = [`\n${RED}${BOLD}Error:${RESET} ${ErrorHandler.toUserMessage(error)}`];

    if (error instanceof TesseractNotFoundError) {
      lines.push(`${YELLOW}Hint:${RESET} Install Tesseract or point TESSPIPE_CMD / tesseract.cmd at the binary.`);
    } else if (error instanceof TesseractTimeoutError) {
      lines.push(`${YELLOW}Hint:${RESET} Raise the limit with --timeout <ms> for large images.`);
    } else if (error instanceof ImageNotFoundError) {
      lines.push(`${YELLOW}Hint:${RESET} Check the image path and try again.`);
    } else if (error instanceof UnsupportedImageError) {
      lines.push(`${YELLOW}Hint:${RESET} Pass a file path or image bytes.`);
    } else if (error instanceof TesseractRuntimeError && /Failed loading language/i.test(error.stderr)) {
      lines.push(`${YELLOW}Hint:${RESET} The language is not installed. Run \`tesspipe langs\` to list installed ones.`);
    } else if (error instanceof ConfigurationError) {
      lines.push(`${YELLOW}Hint:${RESET} Run \`tesspipe config validate\` or \`tesspipe config reset\`.`);
    }

    return lines.join('\n');
  }
}

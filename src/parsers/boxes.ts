import type { Box } from '../models/types.js';
import { createLogger } from '../logging/logger.js';

const log = createLogger('Parser');

/**
 * Parse `makebox` output: `<char> <left> <bottom> <right> <top> <page>` per
 * line. Lines that do not fit are skipped.
 */
export function parseBoxes(text: string): Box[] {
  const boxes: Box[] = [];
  for (const line of text.split('\n')) {
    if (!line.trim()) continue;
    const fields = line.trim().split(/\s+/);
    if (fields.length < 6) {
      log.debug(`skipping box line: ${line}`);
      continue;
    }
    // The character column is the only one that may be non-numeric; take
    // the coordinates from the end so a multi-codepoint glyph stays intact.
    const numbers = fields.slice(-5).map(Number);
    if (numbers.some((n) => !Number.isFinite(n))) {
      log.debug(`skipping box line: ${line}`);
      continue;
    }
    const [left, bottom, right, top, page] = numbers;
    boxes.push({
      character: fields.slice(0, -5).join(' '),
      left,
      bottom,
      right,
      top,
      page,
    });
  }
  return boxes;
}

import type { WordData } from '../models/types.js';
import { createLogger } from '../logging/logger.js';

const log = createLogger('Parser');

const NUMERIC_COLUMNS = 11;

/**
 * Parse the TSV data table. Columns, in order:
 * level page_num block_num par_num line_num word_num left top width height conf text
 *
 * The header row and malformed rows are skipped. Rows above word level
 * carry an empty text column.
 */
export function parseData(text: string): WordData[] {
  const rows: WordData[] = [];
  for (const line of text.split('\n')) {
    const row = line.replace(/\r$/, '');
    if (!row) continue;
    const columns = row.split('\t');
    if (columns.length < NUMERIC_COLUMNS) {
      log.debug(`skipping data row: ${row}`);
      continue;
    }
    const numbers = columns.slice(0, NUMERIC_COLUMNS).map((c) => (c.trim() === '' ? NaN : Number(c)));
    if (numbers.some((n) => !Number.isFinite(n))) {
      // header row lands here too
      log.debug(`skipping data row: ${row}`);
      continue;
    }
    const [level, pageNum, blockNum, parNum, lineNum, wordNum, left, top, width, height, conf] = numbers;
    rows.push({
      level,
      pageNum,
      blockNum,
      parNum,
      lineNum,
      wordNum,
      left,
      top,
      width,
      height,
      conf,
      text: columns.slice(NUMERIC_COLUMNS).join('\t'),
    });
  }
  return rows;
}

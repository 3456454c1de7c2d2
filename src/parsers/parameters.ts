import type { Parameter } from '../models/types.js';

const NAME_RE = /^\w+$/;

/**
 * Parse `--print-parameters`: a `Tesseract parameters:` header followed by
 * one tab-separated `name value description` entry per line. String
 * parameters may have an empty value.
 */
export function parseParameters(text: string): Parameter[] {
  const params: Parameter[] = [];
  for (const line of text.split('\n')) {
    const fields = line.replace(/\r$/, '').split('\t');
    if (fields.length < 3 || !NAME_RE.test(fields[0])) continue;
    params.push({
      name: fields[0],
      value: fields[1],
      description: fields.slice(2).join('\t').trim(),
    });
  }
  return params;
}

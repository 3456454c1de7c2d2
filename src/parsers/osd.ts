import type { OSD } from '../models/types.js';

const KEY_VALUE_RE = /^\s*([A-Za-z][A-Za-z ]*?)\s*:\s*(\S+)\s*$/;

/**
 * Parse the orientation and script detection report:
 *
 *   Page number: 0
 *   Orientation in degrees: 270
 *   Rotate: 90
 *   Orientation confidence: 4.21
 *   Script: Latin
 *   Script confidence: 2.00
 *
 * Missing numbers default to 0, a missing script to ''.
 */
export function parseOsd(text: string): OSD {
  const values = new Map<string, string>();
  for (const line of text.split('\n')) {
    const match = KEY_VALUE_RE.exec(line);
    if (match) values.set(match[1].toLowerCase(), match[2]);
  }

  const num = (key: string): number => {
    const n = Number(values.get(key));
    return Number.isFinite(n) ? n : 0;
  };

  return {
    pageNumber: num('page number'),
    orientationInDegrees: num('orientation in degrees'),
    rotate: num('rotate'),
    orientationConfidence: num('orientation confidence'),
    script: values.get('script') ?? '',
    scriptConfidence: num('script confidence'),
  };
}

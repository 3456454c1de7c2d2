import { readFileSync } from 'fs';

let knownLanguages: ReadonlySet<string> | undefined;

/** Traineddata codes shipped by the tessdata repositories. */
export function loadKnownLanguages(): ReadonlySet<string> {
  if (!knownLanguages) {
    const file = new URL('../../data/languages.json', import.meta.url);
    const parsed: unknown = JSON.parse(readFileSync(file, 'utf-8'));
    if (!Array.isArray(parsed) || !parsed.every((code) => typeof code === 'string')) {
      throw new Error(`Malformed language list: ${file.pathname}`);
    }
    knownLanguages = new Set(parsed);
  }
  return knownLanguages;
}

/**
 * Pick the language codes out of `--list-langs` output. The header line
 * (`List of available languages in "/usr/share/tessdata/" (3):`) and any
 * unknown tokens are dropped.
 */
export function parseLanguages(
  text: string,
  known: ReadonlySet<string> = loadKnownLanguages()
): string[] {
  return text
    .split(/\s+/)
    .map((token) => token.trim())
    .filter((token) => known.has(token));
}

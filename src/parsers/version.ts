/** `tesseract 5.3.0\n leptonica-1.82.0 …` → `5.3.0` */
export function parseVersion(text: string): string {
  const firstLine = text.split('\n')[0] ?? '';
  return firstLine.trim().split(/\s+/)[1] ?? '';
}

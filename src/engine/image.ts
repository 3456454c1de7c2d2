/**
 * Image input dispatch: a file path is read from disk, raw bytes pass
 * through. Anything else is rejected before a process is spawned.
 */

import { readFile } from 'fs/promises';
import { ImageNotFoundError, UnsupportedImageError } from '../errors/index.js';

/** A file path or the encoded image bytes (PNG, JPEG, TIFF, …). */
export type ImageInput = string | Uint8Array;

export function isImageInput(value: unknown): value is ImageInput {
  return typeof value === 'string' || value instanceof Uint8Array;
}

export function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'object') return value.constructor?.name ?? 'object';
  return typeof value;
}

/** Throws `UnsupportedImageError` unless `value` is a path or bytes. */
export function assertImageInput(value: unknown): asserts value is ImageInput {
  if (!isImageInput(value)) {
    throw new UnsupportedImageError(describeType(value));
  }
}

export async function resolveImage(image: ImageInput): Promise<Uint8Array> {
  assertImageInput(image);
  if (image instanceof Uint8Array) {
    return image;
  }
  try {
    return await readFile(image);
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      throw new ImageNotFoundError(image);
    }
    throw err;
  }
}

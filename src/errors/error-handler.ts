/**
 * Converts thrown values to one-line, user-facing messages.
 */

import {
  TesspipeError,
  TesseractRuntimeError,
  TesseractTimeoutError,
  TesseractNotFoundError,
  ImageNotFoundError,
} from './tesspipe-error.js';

export class ErrorHandler {
  /**
   * Convert any thrown value to a friendly user-facing message.
   */
  static toUserMessage(err: unknown): string {
    if (err instanceof TesseractTimeoutError) {
      const seconds = Math.ceil(err.timeoutMs / 1000);
      return `Tesseract did not finish within ${seconds}s and was stopped.`;
    }
    if (err instanceof TesseractNotFoundError) {
      return `Could not start \`${err.cmd}\`. Is Tesseract installed and on PATH?`;
    }
    if (err instanceof ImageNotFoundError) {
      return `No such image: ${err.path}`;
    }
    if (err instanceof TesseractRuntimeError) {
      const firstLine = err.stderr.trim().split('\n')[0];
      return `Tesseract failed (exit ${err.exitCode ?? 'signal'}): ${firstLine || 'no error output'}`;
    }
    if (err instanceof TesspipeError) {
      return `${err.message} (${err.code})`;
    }
    if (err instanceof Error) {
      return err.message;
    }
    return 'An unexpected error occurred.';
  }
}

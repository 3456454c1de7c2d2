/**
 * tesspipe - async wrapper around the Tesseract OCR command-line engine
 *
 * Main entry point for the library.
 */

// Operations
export {
  Tesseract,
  getDefaultTesseract,
  setDefaultTesseract,
  imageToString,
  imageToHocr,
  imageToPdf,
  imageToBoxes,
  imageToData,
  imageToOsd,
  confidence,
  deskew,
  languages,
  getLanguages,
  tesseractVersion,
  getTesseractVersion,
  tesseractParameters,
  run,
} from './tesseract/index.js';
export type { TesseractOptions, RunOptions, RunConsumer } from './tesseract/index.js';

// Result records
export type { Box, WordData, OSD, Parameter } from './models/types.js';

// Engine plumbing
export * from './engine/index.js';

// Parsers
export * from './parsers/index.js';

// Errors
export * from './errors/index.js';

// Config
export * from './config/index.js';

// Logging
export { createLogger, currentLogLevel, isLogLevel } from './logging/logger.js';
export type { Logger, LogLevel } from './logging/logger.js';

// CLI
export * from './cli/index.js';

/**
 * Library version
 */
export const VERSION = '0.1.0';

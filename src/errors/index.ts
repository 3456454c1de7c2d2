export {
  TesspipeError,
  TesseractRuntimeError,
  TesseractTimeoutError,
  TesseractNotFoundError,
  UnsupportedImageError,
  ImageNotFoundError,
  ConfigurationError,
} from './tesspipe-error.js';

export { ErrorHandler } from './error-handler.js';

/**
 * Typed error hierarchy.
 *
 * Every error carries a machine-readable code and optional context so the
 * CLI and library consumers can branch on failure kind without string
 * matching.
 */

export class TesspipeError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'TesspipeError';
    // Maintain proper prototype chain for instanceof checks in transpiled JS
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** The engine exited with a nonzero status. */
export class TesseractRuntimeError extends TesspipeError {
  constructor(
    public readonly stderr: string,
    public readonly exitCode: number | null,
    context?: Record<string, unknown>
  ) {
    super(stderr.trim() || `Tesseract exited with status ${exitCode}`, 'TESSERACT_RUNTIME', context);
    this.name = 'TesseractRuntimeError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class TesseractTimeoutError extends TesspipeError {
  constructor(
    public readonly timeoutMs: number,
    context?: Record<string, unknown>
  ) {
    super('Tesseract process timeout', 'TIMEOUT', context);
    this.name = 'TesseractTimeoutError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class TesseractNotFoundError extends TesspipeError {
  constructor(
    public readonly cmd: string,
    context?: Record<string, unknown>
  ) {
    super(`Tesseract binary not found: ${cmd}`, 'TESSERACT_NOT_FOUND', context);
    this.name = 'TesseractNotFoundError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UnsupportedImageError extends TesspipeError {
  constructor(
    public readonly received: string,
    context?: Record<string, unknown>
  ) {
    super(`Type ${received} not supported.`, 'UNSUPPORTED_INPUT', context);
    this.name = 'UnsupportedImageError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ImageNotFoundError extends TesspipeError {
  constructor(
    public readonly path: string,
    context?: Record<string, unknown>
  ) {
    super(`Image not found: ${path}`, 'NOT_FOUND', context);
    this.name = 'ImageNotFoundError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ConfigurationError extends TesspipeError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', context);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

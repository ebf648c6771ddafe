/**
 * The document cannot be rasterized at all. The only run-aborting failure.
 */
export class RasterizationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RasterizationError';
  }
}

/**
 * One recognition strategy failed inside the engine.
 * Caught by the recognizer and recorded as an empty attempt.
 */
export class RecognitionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RecognitionError';
  }
}

/**
 * Invalid command-line or environment configuration
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Error Types
 *
 * Three tiers of failure used across the watermark pipeline:
 * - InvalidArgumentError: bad caller input, raised before any external call
 * - AppError: recoverable failure with a message that is safe to show a user
 *   and a separate internal diagnostic
 * - EngineUnavailableError: the recognition runtime is missing (fatal)
 *
 * Non-fatal conditions (out-of-bounds ROI, empty crop, low confidence) are not
 * errors at all; they surface as `skipped` outcomes in the OCR aggregator.
 */

export class InvalidArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

/**
 * Recoverable application error.
 *
 * `userMessage` is what a caller may surface to an end user;
 * `internalMessage` carries the diagnostic detail (stderr, paths, causes).
 */
export class AppError extends Error {
  readonly userMessage: string;
  readonly internalMessage: string | null;

  constructor(userMessage: string, internalMessage: string | null = null) {
    super(userMessage);
    this.name = 'AppError';
    this.userMessage = userMessage;
    this.internalMessage = internalMessage;
  }

  toJSON(): { name: string; userMessage: string; internalMessage: string | null } {
    return {
      name: this.name,
      userMessage: this.userMessage,
      internalMessage: this.internalMessage,
    };
  }
}

/**
 * The OCR runtime itself cannot be located. Retrying per call is pointless;
 * treat it as a configuration problem.
 */
export class EngineUnavailableError extends Error {
  readonly retryable = false;

  constructor(message = 'Tesseract not installed or not in PATH.') {
    super(message);
    this.name = 'EngineUnavailableError';
  }
}

/**
 * Transient fault inside a single recognition call.
 */
export class OcrEngineError extends AppError {
  constructor(internalMessage: string | null = null) {
    super('Error during OCR processing.', internalMessage);
    this.name = 'OcrEngineError';
  }
}

/**
 * Cooperative cancellation between units of work
 */
export class AbortError extends Error {
  constructor(message = 'Operation was aborted') {
    super(message);
    this.name = 'AbortError';
  }
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new AbortError();
  }
}

/**
 * Extract a printable message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

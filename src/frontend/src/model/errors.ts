/**
 * Raised when the model weights cannot be used: the file is missing, is not a
 * valid weight file, or does not fit the declared architecture. Not retryable.
 */
export class LoadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'LoadError'
  }
}

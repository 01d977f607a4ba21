/**
 * Errors raised while validating options, before any traversal starts.
 * Anything that goes wrong after that point is recorded per entry instead.
 */
export class ConfigurationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

/** Short reason text for a filesystem error: the errno code when there is one. */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    // fs errors already lead with their code
    if (!code || error.message.startsWith(code)) return error.message;
    return `${code}: ${error.message}`;
  }
  return String(error);
}

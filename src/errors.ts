export class FetchError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FetchError';
  }
}

export const describeError = (err: unknown): string =>
  err instanceof Error ? err.message : String(err);

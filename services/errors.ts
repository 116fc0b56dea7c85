/** Required fields are absent after column normalization. Not retryable without a new mapping or dataset. */
export class SchemaError extends Error {
  readonly missing: string[];

  constructor(missing: string[]) {
    super(`Missing required fields: ${missing.join(', ')}`);
    this.name = 'SchemaError';
    this.missing = missing;
  }
}

/** Input file or remote sheet could not be read or decoded. */
export class LoadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LoadError';
  }
}

export const describeCause = (error: unknown): string => {
  if (error instanceof Error) return error.message;
  return String(error);
};

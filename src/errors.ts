export class PostcardError extends Error {
  constructor(message: string, readonly filePath?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The source could not be read or decoded. Nothing is written for it. */
export class DecodeError extends PostcardError {}

/** The finished canvas could not be encoded or written. */
export class EncodeError extends PostcardError {}

export class LayoutError extends PostcardError {}

export const describeError = (error: unknown) =>
  error instanceof Error ? error.message : String(error);

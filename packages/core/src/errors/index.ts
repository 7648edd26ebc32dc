const DISABLE_STACKTRACE : boolean = true;

export class TnsPackError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name  = new.target.name;
    if (DISABLE_STACKTRACE) this.stack = undefined;
  }
}

/** Keystream input whose length is not a whole number of cipher blocks. */
export class InvalidBlockLengthError extends TnsPackError {
  constructor(readonly length: number, readonly blockSize: number = 8) {
    super(`Data length must be a multiple of ${blockSize} bytes, got ${length} bytes`);
  }
}

/** Filesystem read or write failure; `path` is the file involved. */
export class IoError extends TnsPackError {
  constructor(message: string, readonly path: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class CompressionError   extends TnsPackError {}
export class DecompressionError extends TnsPackError {}
export class InvalidInputError  extends TnsPackError {}
export class ArchiveWriteError  extends TnsPackError {}
export class VariantError       extends TnsPackError {}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Raised when the collection cannot be written (disk full, permissions, ...).
 */
export class StoreWriteError extends Error {
  constructor(
    public readonly filePath: string,
    cause: unknown
  ) {
    super(
      `Failed to write ${filePath}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    );
    this.name = 'StoreWriteError';
  }
}

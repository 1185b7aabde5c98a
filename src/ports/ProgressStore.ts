/**
 * Raw checkpoint persistence. The progress tracker owns the shape; the
 * store only moves JSON-compatible values to and from durable storage.
 */
export interface ProgressStore {
  /** `undefined` when nothing was saved yet. Rejects when the saved data cannot be decoded. */
  read(): Promise<unknown>;
  write(value: unknown): Promise<void>;
}

/**
 * Read-only view over a collection of records loaded once from a bundled resource.
 */
export interface RecordRepo<T> {
  /** Absolute path of the resource the records were loaded from. */
  readonly resourcePath: string;

  /**
   * All records, in the order they appear in the resource.
   * Each call returns a fresh array the caller may reorder; the records are frozen.
   */
  getAll(): Readonly<T>[];

  count(): number;
}

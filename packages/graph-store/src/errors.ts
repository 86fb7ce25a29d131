/**
 * Base error for failures raised by the graph store.
 * `code` is stable and safe to branch on; `cause` carries the underlying error.
 */
export class GraphStoreError extends Error {
  constructor(
    message: string,
    cause?: unknown,
    public readonly code: string = "GRAPH_STORE_ERROR"
  ) {
    super(message, { cause });
    this.name = "GraphStoreError";
  }
}

/**
 * The package store could not be opened or read, or returned rows of the wrong shape.
 */
export class SourceUnavailableError extends GraphStoreError {
  constructor(message: string, cause?: unknown) {
    super(message, cause, "SOURCE_UNAVAILABLE");
    this.name = "SourceUnavailableError";
  }
}

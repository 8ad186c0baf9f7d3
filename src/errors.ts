/** A single source could not be read or dated. The run skips it and continues. */
export class SourceParseError extends Error {
  constructor(
    message: string,
    public sourceId: string
  ) {
    super(message);
    this.name = 'SourceParseError';
  }
}

/** Nothing was ingested; the pipeline stops before deriving metrics. */
export class EmptyDatasetError extends Error {
  constructor(
    message: string,
    public failures: Array<{ sourceId: string; error: string }> = []
  ) {
    super(message);
    this.name = 'EmptyDatasetError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

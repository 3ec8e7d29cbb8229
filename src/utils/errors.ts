/**
 * Error conditions raised by the sales pipeline. Each one is caught at the
 * file / request / run level and reported; none is meant to crash a run.
 */

export class HeaderNotFoundError extends Error {
  constructor(
    public readonly keyword: string,
    public readonly scannedRows: number,
    public readonly source?: string
  ) {
    super(
      `Header keyword '${keyword}' not found in the first ${scannedRows} rows` +
        (source ? ` of ${source}` : '')
    );
    this.name = 'HeaderNotFoundError';
  }
}

export class EmptyCorpusError extends Error {
  constructor() {
    super('No data was successfully processed.');
    this.name = 'EmptyCorpusError';
  }
}

/** Non-success HTTP status for a download. Transport failures surface as fetch's own errors. */
export class DownloadError extends Error {
  constructor(public readonly status: number, public readonly url: string) {
    super(`Status code ${status} for ${url}`);
    this.name = 'DownloadError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

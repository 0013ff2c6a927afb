export type DataSourceErrorKind = 'SOURCE_UNAVAILABLE' | 'SOURCE_EMPTY' | 'SOURCE_INVALID';

/**
 * Raised while loading the card source or deriving transactions from it.
 * Fatal at startup: the service does not serve without data.
 */
export class DataSourceError extends Error {
  constructor(
    readonly kind: DataSourceErrorKind,
    message: string,
    readonly source?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'DataSourceError';
  }
}

/** Base class for every error the service raises on purpose. */
export class BookstoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Kubernetes login against the secret store failed. Logged, never fatal. */
export class AuthBootstrapError extends BookstoreError {}

/** The secret bundle could not be read or merged. Fatal at startup. */
export class SecretFetchError extends BookstoreError {}

/** Any query, execute or row-mapping failure against the database. */
export class DataAccessError extends BookstoreError {}

/** A point lookup matched no row. Reported to clients like any other data error. */
export class NotFoundError extends DataAccessError {}

/** A request body could not be decoded into a book. */
export class DecodeError extends BookstoreError {}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

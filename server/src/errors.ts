// server/src/errors.ts

/**
 * Raised while building a catalog (or loading the dataset behind it) when
 * the input breaks a structural invariant. The catalog is never published.
 */
export class DataIntegrityError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DataIntegrityError';
  }
}

/** Lookup of a player or cluster id the catalog does not hold. */
export class NotFoundError extends Error {
  readonly id: string;

  constructor(kind: 'player' | 'cluster', id: string | number) {
    super(`Unknown ${kind}: ${id}`);
    this.name = 'NotFoundError';
    this.id = String(id);
  }
}

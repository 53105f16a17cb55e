export type RatingErrorKind =
  | "UnknownPlayer"
  | "DuplicatePlayer"
  | "InvalidMatch"
  | "InvalidPlayer"
  | "StorageReadError"
  | "StorageWriteError";

/**
 * Base for every failure the rating engine reports to the web layer.
 * `status` is the HTTP status the error page is served with.
 */
export abstract class RatingError extends Error {
  abstract readonly kind: RatingErrorKind;
  abstract readonly status: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  /** Storage failures are operator problems; their details stay in the log. */
  get isUserFacing(): boolean {
    return this.status < 500;
  }
}

export class UnknownPlayerError extends RatingError {
  readonly kind = "UnknownPlayer";
  readonly status = 404;

  constructor(public readonly playerName: string) {
    super(`Player '${playerName}' is not on the roster.`);
  }
}

export class DuplicatePlayerError extends RatingError {
  readonly kind = "DuplicatePlayer";
  readonly status = 409;

  constructor(public readonly playerName: string) {
    super(`Player '${playerName}' already exists.`);
  }
}

export class InvalidMatchError extends RatingError {
  readonly kind = "InvalidMatch";
  readonly status = 400;
}

export class InvalidPlayerError extends RatingError {
  readonly kind = "InvalidPlayer";
  readonly status = 400;
}

export class StorageReadError extends RatingError {
  readonly kind = "StorageReadError";
  readonly status = 500;
}

export class StorageWriteError extends RatingError {
  readonly kind = "StorageWriteError";
  readonly status = 500;
}

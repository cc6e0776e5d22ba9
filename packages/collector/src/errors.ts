export class SamplerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SamplerError";
  }
}

/** A ranking mode, time window, limit or resolution bound outside the accepted vocabulary. */
export class InvalidFilterError extends SamplerError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidFilterError";
  }
}

export class TargetNotFoundError extends SamplerError {
  readonly subreddits: readonly string[];

  constructor(subreddits: readonly string[]) {
    const names = subreddits.map((name) => `r/${name}`);
    super(
      names.length === 1
        ? `${names[0]} does not exist`
        : `Subreddits do not exist: ${names.join(", ")}`,
    );
    this.name = "TargetNotFoundError";
    this.subreddits = subreddits;
  }
}

export class SchemaMismatchError extends SamplerError {
  readonly existingColumns: readonly string[];
  readonly incomingColumns: readonly string[];

  constructor(
    message: string,
    existingColumns: readonly string[],
    incomingColumns: readonly string[],
  ) {
    super(message);
    this.name = "SchemaMismatchError";
    this.existingColumns = existingColumns;
    this.incomingColumns = incomingColumns;
  }
}

/** Non-OK response from the platform API. */
export class RedditApiError extends Error {
  readonly status: number;
  readonly url: string;

  constructor(status: number, url: string, message?: string) {
    super(message ?? `Request failed ${status}: ${url}`);
    this.name = "RedditApiError";
    this.status = status;
    this.url = url;
  }
}

const GONE_STATUSES = new Set([403, 404, 410]);

/** True when the error means the requested post was deleted, removed or made private. */
export const isGoneError = (error: unknown): boolean =>
  error instanceof RedditApiError && GONE_STATUSES.has(error.status);

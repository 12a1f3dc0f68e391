/**
 * Error taxonomy for the scraping pipeline.
 *
 * `CantFindTheRightTable` and `FavoredTeamError` mean "this document is not the
 * one we hoped for" and are the only failures the home/away swap retries.
 */

/** The table locator matched zero or several tables, or the page does not exist. */
export class CantFindTheRightTable extends Error {
  override readonly name = 'CantFindTheRightTable';

  constructor(what: string, readonly matches: number) {
    super(`Expected exactly one ${what} table, found ${matches}`);
  }
}

/** The favored-team landmark did not have the expected shape. */
export class FavoredTeamError extends Error {
  override readonly name = 'FavoredTeamError';
}

/** A source cell that must parse did not. */
export class ParseError extends Error {
  override readonly name = 'ParseError';
}

/** Records disagree with each other after they were built. */
export class DataIntegrityError extends Error {
  override readonly name = 'DataIntegrityError';
}

export class HttpError extends Error {
  override readonly name = 'HttpError';

  constructor(readonly url: string, readonly status: number) {
    super(`GET ${url} responded ${status}`);
  }
}

export class DeadlineExceededError extends Error {
  override readonly name = 'DeadlineExceededError';

  constructor(readonly timeoutMs: number) {
    super(`Abandoned after the ${timeoutMs}ms batch deadline`);
  }
}

export function invariant(condition: boolean, message: string): asserts condition {
  if (!condition) throw new Error(`Invariant violated: ${message}`);
}

export function isSwapRetryable(err: unknown): boolean {
  return err instanceof CantFindTheRightTable || err instanceof FavoredTeamError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

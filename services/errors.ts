/**
 * Errors raised while loading coin data.
 *
 * LoadFailure: the request did not succeed (non-2xx status, network error, timeout).
 * FormatFailure: the request succeeded but the payload is empty or malformed.
 */

export class CoinDataError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class LoadFailure extends CoinDataError {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.status = status;
  }
}

export class FormatFailure extends CoinDataError {}

export const getErrorMessage = (error: unknown): string => {
  if (error instanceof Error) return error.message;
  return String(error);
};

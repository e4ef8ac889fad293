/**
 * Raised when the upstream data source could not be reached or answered
 * with something other than "not found". The engine treats it as a
 * per-ticker exclusion.
 */
export class TransportError extends Error {
  readonly code = 'TRANSPORT_ERROR';
  readonly ticker: string;

  constructor(ticker: string, message: string, options?: { cause?: unknown }) {
    super(`${ticker}: ${message}`, options);
    this.name = 'TransportError';
    this.ticker = ticker;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

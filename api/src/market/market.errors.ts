/**
 * A symbol's history (or profile) could not be obtained from any source.
 * Screening treats this as a per-symbol omission, never as a failed run.
 */
export class DataUnavailableError extends Error {
  readonly symbol: string;

  constructor(symbol: string, message: string) {
    super(message);
    this.name = 'DataUnavailableError';
    this.symbol = symbol;
  }
}

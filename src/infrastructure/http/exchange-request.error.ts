export class ExchangeRequestError extends Error {
  constructor(
    readonly endpoint: string,
    readonly status: number,
    message: string,
  ) {
    super(`${endpoint} failed with HTTP ${status}: ${message}`);
    this.name = 'ExchangeRequestError';
  }
}

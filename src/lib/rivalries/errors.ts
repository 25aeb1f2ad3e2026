export const RIVALRY_UNAVAILABLE_MESSAGE = 'Rivalry data temporarily unavailable';

/** Upstream could not be read, so there is nothing trustworthy to report. */
export class RivalryUnavailableError extends Error {
  constructor(readonly reason: string, options?: ErrorOptions) {
    super(`${RIVALRY_UNAVAILABLE_MESSAGE} (${reason})`, options);
    this.name = 'RivalryUnavailableError';
  }
}

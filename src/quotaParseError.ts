export type QuotaParseErrorCode =
  | 'COUNT_NOT_FOUND'
  | 'PERIOD_NOT_FOUND'
  | 'DURATION_NOT_PARSEABLE'
  | 'ZERO_DURATION';

/** Thrown when a quota phrase cannot be turned into bucket parameters. */
export class QuotaParseError extends Error {
  /**
   * @param code which part of the phrase could not be parsed
   * @param input the offending text: the whole expression, or the period phrase
   */
  constructor(
    message: string,
    readonly code: QuotaParseErrorCode,
    readonly input: string
  ) {
    super(message);
    this.name = 'QuotaParseError';
  }
}

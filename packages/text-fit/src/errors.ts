export class FontUnavailableError extends Error {
  readonly code = 'FONT_UNAVAILABLE';

  constructor(
    message: string,
    public readonly fontSource: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'FontUnavailableError';
  }
}

export interface FitRequestIssue {
  path: string;
  message: string;
}

export class InvalidFitRequestError extends Error {
  readonly code = 'INVALID_FIT_REQUEST';

  constructor(public readonly issues: FitRequestIssue[]) {
    super(`Invalid fit request: ${issues.map((i) => `${i.path} ${i.message}`).join('; ')}`);
    this.name = 'InvalidFitRequestError';
  }
}

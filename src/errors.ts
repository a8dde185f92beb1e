export type UpdateCheckErrorCode = 'NETWORK_ERROR' | 'PARSE_ERROR' | 'INVALID_QUERY';

export class UpdateCheckError extends Error {
  constructor(
    message: string,
    public readonly code: UpdateCheckErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'UpdateCheckError';
  }
}

/**
 * The endpoint could not be reached, timed out, answered with a status
 * other than 200, or sent an empty body.
 */
export class NetworkError extends UpdateCheckError {
  constructor(
    message: string,
    public readonly status: number | null = null,
    options?: { cause?: unknown },
  ) {
    super(message, 'NETWORK_ERROR', options);
    this.name = 'NetworkError';
  }
}

export class ParseError extends UpdateCheckError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'PARSE_ERROR', options);
    this.name = 'ParseError';
  }
}

export class QueryValidationError extends UpdateCheckError {
  constructor(public readonly issues: string[]) {
    super(`Invalid release query: ${issues.join('; ')}`, 'INVALID_QUERY');
    this.name = 'QueryValidationError';
  }
}

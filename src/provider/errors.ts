export type FailureCode =
  | 'rate_limited'
  | 'retries_exhausted'
  | 'http_error'
  | 'malformed_response'
  | 'timeout'
  | 'aborted'
  | 'unsupported_market'
  | 'deadline_exceeded'
  | 'unknown';

export interface FetchFailure {
  code: FailureCode;
  message: string;
}

export class ProviderError extends Error {
  constructor(readonly code: FailureCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ProviderError';
  }
}

export class RateLimitError extends ProviderError {
  constructor(readonly endpoint: string) {
    super('rate_limited', `Provider rejected ${endpoint} with 429 Too Many Requests`);
    this.name = 'RateLimitError';
  }
}

export class ProviderHttpError extends ProviderError {
  constructor(readonly endpoint: string, readonly status: number, body: string) {
    super('http_error', `Provider error ${status} on ${endpoint}${body ? `: ${body}` : ''}`);
    this.name = 'ProviderHttpError';
  }
}

export class RetriesExhaustedError extends ProviderError {
  constructor(readonly endpoint: string, readonly attempts: number, lastError: unknown) {
    const reason = lastError instanceof Error ? lastError.message : String(lastError);
    super('retries_exhausted', `Gave up on ${endpoint} after ${attempts} attempts (${reason})`, { cause: lastError });
    this.name = 'RetriesExhaustedError';
  }
}

export class MalformedResponseError extends ProviderError {
  constructor(message: string) {
    super('malformed_response', message);
    this.name = 'MalformedResponseError';
  }
}

export class QueryTimeoutError extends ProviderError {
  constructor(subject: string, readonly timeoutMs: number) {
    super('timeout', `${subject} timed out after ${timeoutMs}ms`);
    this.name = 'QueryTimeoutError';
  }
}

export class QueryAbortedError extends ProviderError {
  constructor(message = 'Query was aborted', code: Extract<FailureCode, 'aborted' | 'deadline_exceeded'> = 'aborted') {
    super(code, message);
    this.name = 'QueryAbortedError';
  }
}

export class UnsupportedMarketError extends ProviderError {
  constructor(readonly market: string) {
    super('unsupported_market', `No search engine configured for market "${market}"`);
    this.name = 'UnsupportedMarketError';
  }
}

export function isTransientStatus(status: number): boolean {
  return status === 429 || status === 500 || status === 502 || status === 503 || status === 504;
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

export function toFetchFailure(error: unknown): FetchFailure {
  if (error instanceof ProviderError) {
    return { code: error.code, message: error.message };
  }
  if (isAbortError(error)) {
    return { code: 'aborted', message: error instanceof Error ? error.message : String(error) };
  }
  return { code: 'unknown', message: error instanceof Error ? error.message : String(error) };
}

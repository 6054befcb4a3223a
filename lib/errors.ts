import { AxiosError } from 'axios';

const SNIPPET_LENGTH = 200;

// ── Error Taxonomy ──
// Every error a caller can see extends HeatPumpError. The facade tags them
// with the operation that failed but never changes their class.

export class HeatPumpError extends Error {
  operation?: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'HeatPumpError';
  }

  withOperation(operation: string): this {
    if (this.operation === undefined) {
      this.operation = operation;
      this.message = `${operation}: ${this.message}`;
    }
    return this;
  }
}

export type AuthFailureReason =
  | 'InvalidCredentials'
  | 'NetworkFailure'
  | 'UnexpectedResponse'
  | 'SessionRejected';

export class AuthenticationError extends HeatPumpError {
  constructor(
    public readonly reason: AuthFailureReason,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'AuthenticationError';
  }
}

export type TransportErrorKind = 'network' | 'http' | 'decode';

export interface TransportErrorDetails {
  statusCode?: number;
  /** In-band error code reported by the backend inside a 2xx response. */
  vendorCode?: string;
  /** Start of the body that could not be decoded. */
  bodySnippet?: string;
  cause?: unknown;
}

export class TransportError extends HeatPumpError {
  readonly statusCode?: number;
  readonly vendorCode?: string;
  readonly bodySnippet?: string;

  constructor(
    public readonly kind: TransportErrorKind,
    message: string,
    details: TransportErrorDetails = {}
  ) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = 'TransportError';
    this.statusCode = details.statusCode;
    this.vendorCode = details.vendorCode;
    this.bodySnippet = details.bodySnippet;
  }
}

export class ParseError extends HeatPumpError {
  constructor(
    public readonly field: string,
    public readonly rawSnippet: string,
    message = `Unexpected value for "${field}" in response`
  ) {
    super(message);
    this.name = 'ParseError';
  }
}

export class ConversionError extends HeatPumpError {
  constructor(
    public readonly key: string,
    public readonly rawValue: unknown
  ) {
    super(`Cannot convert raw value ${JSON.stringify(rawValue)} for "${key}"`);
    this.name = 'ConversionError';
  }
}

/**
 * Raised by adapters when the backend no longer accepts the session.
 * Only the SessionManager sees it: it re-authenticates and retries once,
 * then reports an AuthenticationError instead.
 */
export class SessionRejectedError extends Error {
  constructor(message = 'Session rejected by server') {
    super(message);
    this.name = 'SessionRejectedError';
  }
}

// ── Helpers ──

export function snippet(value: unknown): string {
  let text: string;
  try {
    text = typeof value === 'string' ? value : JSON.stringify(value) ?? String(value);
  } catch {
    text = String(value);
  }
  return text.length > SNIPPET_LENGTH ? `${text.slice(0, SNIPPET_LENGTH)}…` : text;
}

export function translateError(error: unknown): Error {
  if (error instanceof HeatPumpError) {
    return error;
  }
  if (error instanceof AxiosError) {
    if (error.response) {
      return new TransportError('http', `Request failed with status ${error.response.status}`, {
        statusCode: error.response.status,
        cause: error,
      });
    }
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new TransportError('network', 'Request timed out', { cause: error });
    }
    if (error.code === 'ECONNREFUSED' || error.code === 'ENOTFOUND') {
      return new TransportError(
        'network',
        'Could not connect to the heat pump cloud. Check your internet.',
        { cause: error }
      );
    }
    return new TransportError('network', `Network error: ${error.message}`, { cause: error });
  }
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * BirdDog client errors
 *
 * Every failure surfaces as a BirdDogError subclass. The client never retries
 * or substitutes a default value.
 */

// =============================================================================
// ERROR TYPES
// =============================================================================

export type BirdDogErrorCode =
  | 'TRANSPORT_ERROR'
  | 'HTTP_ERROR'
  | 'DECODE_ERROR'
  | 'INVALID_ARGUMENT'
  | 'CONFIG_ERROR';

export interface BirdDogErrorOptions {
  cause?: unknown;
  requestId?: string;
}

export class BirdDogError extends Error {
  public readonly requestId?: string;

  constructor(
    message: string,
    public code: BirdDogErrorCode,
    public details?: Record<string, unknown>,
    options?: BirdDogErrorOptions
  ) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'BirdDogError';
    this.requestId = options?.requestId;
  }
}

/** Network, TLS or timeout failure before a response was read */
export class BirdDogTransportError extends BirdDogError {
  constructor(message: string, details?: Record<string, unknown>, options?: BirdDogErrorOptions) {
    super(message, 'TRANSPORT_ERROR', details, options);
    this.name = 'BirdDogTransportError';
  }
}

export class BirdDogHttpError extends BirdDogError {
  constructor(
    public statusCode: number,
    statusText: string,
    public body: string,
    request: { method: string; path: string; requestId?: string }
  ) {
    const status = statusText ? `${statusCode} ${statusText}` : `${statusCode}`;
    super(
      `BirdDog API error: ${status} (${request.method} ${request.path})`,
      'HTTP_ERROR',
      { method: request.method, path: request.path },
      { requestId: request.requestId }
    );
    this.name = 'BirdDogHttpError';
  }
}

/** Malformed JSON, or an envelope without the expected field */
export class BirdDogDecodeError extends BirdDogError {
  constructor(message: string, details?: Record<string, unknown>, options?: BirdDogErrorOptions) {
    super(message, 'DECODE_ERROR', details, options);
    this.name = 'BirdDogDecodeError';
  }
}

export class BirdDogArgumentError extends BirdDogError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INVALID_ARGUMENT', details);
    this.name = 'BirdDogArgumentError';
  }
}

export class BirdDogConfigError extends BirdDogError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'BirdDogConfigError';
  }
}

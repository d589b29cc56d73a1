export const StreamErrorCode = {
  AUTHENTICATION: 'AUTHENTICATION',
  VALIDATION: 'VALIDATION',
  INTEGRITY: 'INTEGRITY',
  RATE_LIMIT: 'RATE_LIMIT',
  PERSISTENCE: 'PERSISTENCE',
  SIZE_LIMIT: 'SIZE_LIMIT',
  TRANSPORT: 'TRANSPORT',
} as const;

export type StreamErrorCode = (typeof StreamErrorCode)[keyof typeof StreamErrorCode];

export class StreamError extends Error {
  constructor(
    message: string,
    public readonly code: StreamErrorCode,
  ) {
    super(message);
    this.name = 'StreamError';
  }
}

// Bad key, bad token or expired session
export class AuthenticationError extends StreamError {
  constructor(message = 'Authentication failed') {
    super(message, StreamErrorCode.AUTHENTICATION);
    this.name = 'AuthenticationError';
  }
}

export class ValidationError extends StreamError {
  constructor(message = 'Payload failed validation') {
    super(message, StreamErrorCode.VALIDATION);
    this.name = 'ValidationError';
  }
}

// Signature mismatch on receive
export class IntegrityError extends StreamError {
  constructor(message = 'HMAC verification failed') {
    super(message, StreamErrorCode.INTEGRITY);
    this.name = 'IntegrityError';
  }
}

export class RateLimitError extends StreamError {
  constructor(message = 'Rate limit exceeded') {
    super(message, StreamErrorCode.RATE_LIMIT);
    this.name = 'RateLimitError';
  }
}

export class PersistenceError extends StreamError {
  constructor(message = 'Store operation failed') {
    super(message, StreamErrorCode.PERSISTENCE);
    this.name = 'PersistenceError';
  }
}

export class SizeLimitError extends StreamError {
  constructor(message = 'Payload exceeds size limit') {
    super(message, StreamErrorCode.SIZE_LIMIT);
    this.name = 'SizeLimitError';
  }
}

// Socket closed, never opened, or timed out
export class TransportError extends StreamError {
  constructor(message = 'Transport failure') {
    super(message, StreamErrorCode.TRANSPORT);
    this.name = 'TransportError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

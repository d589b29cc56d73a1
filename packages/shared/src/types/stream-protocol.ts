import type { CountPayload } from './counts';

// Client → Server (once, right after the socket opens)
export interface AuthRequestFrame {
  api_key: string;
  client_id: string;
}

// Server → Client (handshake success)
export interface AuthResponseFrame {
  status: 'authenticated';
  token: string;
  expires_in: number;
}

// Server → Client (one persisted, signed record)
export interface BroadcastFrame {
  data: Required<CountPayload>;
  hmac: string;
}

// Bidirectional keep-alive
export interface PingFrame {
  type: 'ping';
  token?: string;
}

export interface PongFrame {
  type: 'pong';
}

export interface RateLimitFrame {
  error: 'rate limit exceeded';
}

export type ServerFrame = AuthResponseFrame | BroadcastFrame | PongFrame | RateLimitFrame;

export const RATE_LIMIT_NOTICE: RateLimitFrame = { error: 'rate limit exceeded' };

export const SESSION_TTL_SECONDS = 3600;

export const StreamCloseCode = {
  NORMAL: 1000,
  INVALID_FORMAT: 4001,
  INVALID_CREDENTIALS: 4002,
  IP_NOT_ALLOWED: 4003,
  SESSION_EXPIRED: 4004,
  AUTH_TIMEOUT: 4008,
  SESSION_SUPERSEDED: 4009,
} as const;

export type StreamCloseCode = (typeof StreamCloseCode)[keyof typeof StreamCloseCode];

export const StreamCloseReason: Record<StreamCloseCode, string> = {
  [StreamCloseCode.NORMAL]: 'Normal closure',
  [StreamCloseCode.INVALID_FORMAT]: 'Invalid authentication format',
  [StreamCloseCode.INVALID_CREDENTIALS]: 'Invalid credentials',
  [StreamCloseCode.IP_NOT_ALLOWED]: 'IP not allowed',
  [StreamCloseCode.SESSION_EXPIRED]: 'Session expired',
  [StreamCloseCode.AUTH_TIMEOUT]: 'Authentication timeout',
  [StreamCloseCode.SESSION_SUPERSEDED]: 'Session superseded',
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isAuthRequestFrame(value: unknown): value is AuthRequestFrame {
  return isRecord(value) && typeof value.api_key === 'string' && typeof value.client_id === 'string' && value.client_id.length > 0;
}

export function isAuthResponseFrame(value: unknown): value is AuthResponseFrame {
  return isRecord(value) && value.status === 'authenticated' && typeof value.token === 'string';
}

export function isPingFrame(value: unknown): value is PingFrame {
  return isRecord(value) && value.type === 'ping';
}

export function isPongFrame(value: unknown): value is PongFrame {
  return isRecord(value) && value.type === 'pong';
}

export function isRateLimitFrame(value: unknown): value is RateLimitFrame {
  return isRecord(value) && value.error === RATE_LIMIT_NOTICE.error;
}

/**
 * Structural check only: `data` is a mapping and `hmac` a string.
 * The payload itself is verified and validated by the receiver.
 */
export function isBroadcastFrame(value: unknown): value is { data: Record<string, unknown>; hmac: string } {
  return isRecord(value) && isRecord(value.data) && typeof value.hmac === 'string';
}

// Optional per-frame session token sent by clients in steady state
export function readFrameToken(value: unknown): string | undefined {
  return isRecord(value) && typeof value.token === 'string' ? value.token : undefined;
}

/** Payload shapes `ws` hands to a `message` listener. */
export type RawFrame = Buffer | ArrayBuffer | Buffer[];

export function rawFrameToString(data: RawFrame): string {
  if (Buffer.isBuffer(data)) {
    return data.toString('utf8');
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  return Buffer.from(data).toString('utf8');
}

/**
 * JSON-decodes one frame. Returns undefined for anything that is not JSON.
 */
export function decodeFrame(data: RawFrame): unknown {
  try {
    return JSON.parse(rawFrameToString(data));
  } catch {
    return undefined;
  }
}

import WebSocket from 'ws';
import {
  AuthenticationError,
  IntegrityError,
  MAX_FRAME_BYTES,
  RateLimitError,
  SizeLimitError,
  StreamCloseCode,
  StreamError,
  TransportError,
  ValidationError,
  checkCountPayload,
  checkFrameSize,
  decodeFrame,
  isAuthResponseFrame,
  isBroadcastFrame,
  isPongFrame,
  isRateLimitFrame,
  rawFrameToString,
  verifySignature,
} from '@tallystream/shared';
import type { AuthRequestFrame, CountPayload, PingFrame } from '@tallystream/shared';

export const DEFAULT_CONNECT_TIMEOUT_MS = 5000;
export const DEFAULT_RECEIVE_TIMEOUT_MS = 30000;

export type StreamClientLogger = Pick<Console, 'log' | 'warn' | 'error'>;

export interface StreamClientOptions {
  url: string;
  clientId: string;
  apiKey: string;
  /** Accept self-signed server certificates on wss:// URLs. */
  insecure?: boolean;
  connectTimeoutMs?: number;
  receiveTimeoutMs?: number;
  logger?: StreamClientLogger;
}

export type ReceiveResult =
  | { ok: true; payload: CountPayload }
  | { ok: false; error: StreamError };

export interface CloseInfo {
  code: number;
  reason: string;
}

type FrameOutcome = { ok: true; frame: unknown } | { ok: false; error: StreamError };

// Close codes the server uses to refuse a handshake
const REFUSAL_CODES: ReadonlySet<number> = new Set([
  StreamCloseCode.INVALID_FORMAT,
  StreamCloseCode.INVALID_CREDENTIALS,
  StreamCloseCode.IP_NOT_ALLOWED,
  StreamCloseCode.AUTH_TIMEOUT,
]);

function fail(error: StreamError): ReceiveResult {
  return { ok: false, error };
}

/**
 * One authenticated subscription to the broadcast stream.
 *
 * Every broadcast frame is checked against its HMAC and re-validated before
 * `receive()` hands it out; nothing unverified reaches the caller.
 */
export class StreamClient {
  private ws: WebSocket | null = null;
  private token: string | null = null;
  private expiresAt: number | null = null;
  private frames: FrameOutcome[] = [];
  private waiters: Array<(outcome: FrameOutcome) => void> = [];
  private closeError: TransportError | null = null;
  private lastCloseInfo: CloseInfo | null = null;
  private connectError: StreamError | null = null;
  private readonly logger: StreamClientLogger;

  constructor(private readonly options: StreamClientOptions) {
    this.logger = options.logger ?? console;
  }

  get isConnected(): boolean {
    return this.ws !== null && this.ws.readyState === WebSocket.OPEN && this.token !== null;
  }

  get sessionToken(): string | null {
    return this.token;
  }

  /** Unix seconds */
  get sessionExpiresAt(): number | null {
    return this.expiresAt;
  }

  get lastClose(): CloseInfo | null {
    return this.lastCloseInfo;
  }

  /** Why the most recent `connect()` returned false; null after a successful one. */
  get lastError(): StreamError | null {
    return this.connectError;
  }

  /**
   * Opens the socket and performs the key handshake. Anything other than an
   * explicit `authenticated` reply closes the socket and returns false.
   */
  async connect(): Promise<boolean> {
    if (this.isConnected) {
      return true;
    }
    await this.disconnect();
    this.connectError = null;

    const timeoutMs = this.options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
    const ws = new WebSocket(this.options.url, {
      handshakeTimeout: timeoutMs,
      rejectUnauthorized: !this.options.insecure,
    });
    this.attach(ws);

    if (!(await this.waitForOpen(ws))) {
      this.connectError = this.closeError ?? new TransportError('Connection closed before opening');
      this.logger.error(`[StreamClient] Could not connect to ${this.options.url}: ${this.connectError.message}`);
      await this.disconnect();
      return false;
    }

    const request: AuthRequestFrame = { api_key: this.options.apiKey, client_id: this.options.clientId };
    ws.send(JSON.stringify(request));

    const reply = await this.nextFrame(timeoutMs);
    if (!reply.ok) {
      const refusal = this.lastCloseInfo && REFUSAL_CODES.has(this.lastCloseInfo.code) ? this.lastCloseInfo : null;
      this.connectError = refusal ? new AuthenticationError(`Handshake refused: ${refusal.reason}`) : reply.error;
      this.logger.error(`[StreamClient] Authentication failed: ${reply.error.message}`);
      await this.disconnect();
      return false;
    }

    const frame = reply.frame;
    if (!isAuthResponseFrame(frame)) {
      this.connectError = new AuthenticationError('Unexpected handshake reply');
      this.logger.error('[StreamClient] Authentication failed: unexpected handshake reply');
      await this.disconnect();
      return false;
    }

    this.token = frame.token;
    this.expiresAt = Date.now() / 1000 + frame.expires_in;
    this.logger.log(`[StreamClient] Authenticated as ${this.options.clientId}`);
    return true;
  }

  /**
   * Waits for the next broadcast. Pong frames are skipped; every other frame
   * ends the wait with either a verified payload or the reason it was refused.
   */
  async receive(): Promise<ReceiveResult> {
    if (!this.ws) {
      return fail(new TransportError('Not connected'));
    }

    const timeoutMs = this.options.receiveTimeoutMs ?? DEFAULT_RECEIVE_TIMEOUT_MS;
    for (;;) {
      const next = await this.nextFrame(timeoutMs);
      if (!next.ok) {
        return next;
      }

      const frame = next.frame;
      if (isPongFrame(frame)) {
        continue;
      }
      if (isRateLimitFrame(frame)) {
        this.logger.warn('[StreamClient] Server reported rate limit exceeded');
        return fail(new RateLimitError('Server reported rate limit exceeded'));
      }
      if (!isBroadcastFrame(frame)) {
        return fail(new ValidationError('Unrecognised frame from server'));
      }

      if (!verifySignature(frame.data, frame.hmac, this.options.apiKey)) {
        this.logger.error('[StreamClient] HMAC verification failed, payload discarded');
        return fail(new IntegrityError());
      }

      const check = checkCountPayload(frame.data);
      if (!check.valid) {
        const detail = check.issues.map((i) => `${i.path}: ${i.message}`).join('; ');
        return fail(new ValidationError(`Invalid payload: ${detail}`));
      }
      return { ok: true, payload: check.payload };
    }
  }

  /**
   * Keep-alive. The server answers with a pong frame that `receive()` skips.
   */
  ping(): boolean {
    if (!this.ws || this.ws.readyState !== WebSocket.OPEN) {
      return false;
    }
    const frame: PingFrame = this.token ? { type: 'ping', token: this.token } : { type: 'ping' };
    this.ws.send(JSON.stringify(frame));
    return true;
  }

  async disconnect(): Promise<void> {
    const ws = this.ws;
    this.ws = null;
    this.token = null;
    this.expiresAt = null;
    if (!ws || ws.readyState === WebSocket.CLOSED) {
      return;
    }

    const closed = new Promise<void>((resolve) => ws.once('close', () => resolve()));
    if (ws.readyState === WebSocket.CONNECTING) {
      ws.terminate();
    } else if (ws.readyState === WebSocket.OPEN) {
      ws.close(1000, 'Client disconnect');
    }
    await closed;
  }

  private attach(ws: WebSocket): void {
    this.ws = ws;
    this.frames = [];
    this.waiters = [];
    this.closeError = null;

    ws.on('message', (data) => {
      const text = rawFrameToString(data);
      if (!checkFrameSize(text)) {
        const bytes = Buffer.byteLength(text);
        this.deliver({ ok: false, error: new SizeLimitError(`Frame of ${bytes} bytes exceeds ${MAX_FRAME_BYTES}`) });
        return;
      }
      this.deliver({ ok: true, frame: decodeFrame(data) });
    });

    ws.on('close', (code, reason) => {
      const text = reason.toString();
      this.lastCloseInfo = { code, reason: text };
      if (this.ws === ws) {
        this.token = null;
      }
      this.closeError = new TransportError(`Connection closed (${code}${text ? `: ${text}` : ''})`);
      const waiters = this.waiters;
      this.waiters = [];
      for (const waiter of waiters) {
        waiter({ ok: false, error: this.closeError });
      }
    });

    ws.on('error', (err) => {
      this.logger.warn(`[StreamClient] Socket error: ${err.message}`);
    });
  }

  private waitForOpen(ws: WebSocket): Promise<boolean> {
    return new Promise((resolve) => {
      const onOpen = () => {
        ws.off('close', onClose);
        resolve(true);
      };
      const onClose = () => {
        ws.off('open', onOpen);
        resolve(false);
      };
      ws.once('open', onOpen);
      ws.once('close', onClose);
    });
  }

  private deliver(outcome: FrameOutcome): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(outcome);
    } else {
      this.frames.push(outcome);
    }
  }

  private nextFrame(timeoutMs: number): Promise<FrameOutcome> {
    const queued = this.frames.shift();
    if (queued) {
      return Promise.resolve(queued);
    }
    if (this.closeError) {
      return Promise.resolve({ ok: false, error: this.closeError });
    }

    return new Promise((resolve) => {
      const waiter = (outcome: FrameOutcome) => {
        clearTimeout(timer);
        resolve(outcome);
      };
      const timer = setTimeout(() => {
        this.waiters = this.waiters.filter((w) => w !== waiter);
        resolve({ ok: false, error: new TransportError(`No frame received within ${timeoutMs}ms`) });
      }, timeoutMs);
      this.waiters.push(waiter);
    });
  }
}

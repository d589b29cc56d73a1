import WebSocket, { WebSocketServer } from 'ws';
import { computeSignature, decodeFrame, isAuthRequestFrame, isPingFrame } from '@tallystream/shared';

export const API_KEY = 'test-secret-0123456789';

export type HandshakeMode = 'accept' | 'reject' | 'silent' | 'deny';

export const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export async function waitFor(predicate: () => boolean, timeoutMs = 3000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error('Timed out waiting for condition');
    }
    await delay(10);
  }
}

export function signed(data: Record<string, unknown>, key: string = API_KEY): { data: Record<string, unknown>; hmac: string } {
  return { data, hmac: computeSignature(data, key) };
}

/**
 * Minimal in-process stand-in for the broadcast endpoint: key handshake,
 * ping/pong, and helpers to push frames at connected clients.
 */
export class FakeStreamServer {
  readonly sockets: WebSocket[] = [];
  readonly received: unknown[] = [];
  handshake: HandshakeMode = 'accept';
  onAuthenticated: ((ws: WebSocket, index: number) => void) | null = null;
  private authenticatedCount = 0;
  private readonly wss: WebSocketServer;

  constructor() {
    this.wss = new WebSocketServer({ port: 0, host: '127.0.0.1' });
    this.wss.on('connection', (ws) => this.handleConnection(ws));
  }

  async url(): Promise<string> {
    if (this.wss.address() === null) {
      await new Promise<void>((resolve) => this.wss.once('listening', () => resolve()));
    }
    const address = this.wss.address();
    if (typeof address === 'string' || address === null) {
      throw new Error('Server is not listening on a TCP port');
    }
    return `ws://127.0.0.1:${address.port}/stream`;
  }

  get connections(): number {
    return this.sockets.length;
  }

  send(frame: unknown, index = this.sockets.length - 1): void {
    this.sockets[index].send(JSON.stringify(frame));
  }

  async close(): Promise<void> {
    for (const ws of this.sockets) {
      ws.terminate();
    }
    await new Promise<void>((resolve, reject) => this.wss.close((err) => (err ? reject(err) : resolve())));
  }

  private handleConnection(ws: WebSocket): void {
    this.sockets.push(ws);
    let authenticated = false;

    ws.on('message', (data) => {
      const frame = decodeFrame(data);
      this.received.push(frame);

      if (!authenticated) {
        if (this.handshake === 'silent') {
          return;
        }
        if (this.handshake === 'deny') {
          ws.send(JSON.stringify({ status: 'denied' }));
          return;
        }
        if (this.handshake === 'reject' || !isAuthRequestFrame(frame) || frame.api_key !== API_KEY) {
          ws.close(4002, 'Invalid credentials');
          return;
        }
        authenticated = true;
        this.authenticatedCount++;
        ws.send(JSON.stringify({ status: 'authenticated', token: `token-${this.authenticatedCount}`, expires_in: 3600 }));
        this.onAuthenticated?.(ws, this.authenticatedCount);
        return;
      }

      if (isPingFrame(frame)) {
        ws.send(JSON.stringify({ type: 'pong' }));
      }
    });
    ws.on('error', () => undefined);
  }
}

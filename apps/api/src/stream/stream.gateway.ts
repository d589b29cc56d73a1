import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { WebSocketServer, WebSocket, RawData } from 'ws';
import { IncomingMessage } from 'http';
import { Duplex } from 'stream';
import { EventEmitter } from 'events';
import {
  MAX_FRAME_BYTES,
  RATE_LIMIT_NOTICE,
  StreamCloseCode,
  StreamCloseReason,
  TransportError,
  checkCountPayload,
  checkFrameSize,
  decodeFrame,
  errorMessage,
  isAuthRequestFrame,
  isPingFrame,
  nowSeconds,
  pickCounts,
  readFrameToken,
  sanitizeCountPayload,
} from '@tallystream/shared';
import type { AuthResponseFrame, BroadcastFrame, CountRecord, PongFrame, ServerFrame } from '@tallystream/shared';
import { AccessControlService, normalizeIp } from '../access-control/access-control.service';
import { AuditService } from '../audit/audit.service';
import { CountStoreService } from '../storage/count-store.service';
import { ExclusiveScope } from '../common/utils/exclusive-scope';
import type { StreamConfig } from '../config/configuration';

const SEND_TIMEOUT_MS = 10_000;

type ConnectionState = 'authenticating' | 'registered' | 'closed';

interface StreamConnection {
  ws: WebSocket;
  ip: string;
  state: ConnectionState;
  clientId: string | null;
  token: string | null;
  handshakeTimer: NodeJS.Timeout | null;
  // Frames from one socket are handled strictly in arrival order
  chain: Promise<void>;
}

export type BroadcastRejection = 'validation' | 'persistence' | 'size';

export interface BroadcastOutcome {
  status: 'delivered' | 'rejected';
  reason?: BroadcastRejection;
  message?: string;
  record?: CountRecord;
  recipients: number;
  evicted: number;
}

/**
 * Authenticated broadcast endpoint.
 *
 * Connections move through authenticating → registered → closed. The
 * registry maps client id to its live connection and is only mutated inside
 * the ExclusiveScope shared with the count store.
 */
@Injectable()
export class StreamGateway implements OnModuleDestroy {
  private readonly logger = new Logger(StreamGateway.name);
  private readonly wss: WebSocketServer;
  private readonly registry = new Map<string, StreamConnection>();
  private readonly connections = new Set<StreamConnection>();
  private readonly path: string;
  private readonly handshakeTimeoutMs: number;

  constructor(
    private readonly accessControl: AccessControlService,
    private readonly countStore: CountStoreService,
    private readonly audit: AuditService,
    @Inject('EXCLUSIVE_SCOPE')
    private readonly scope: ExclusiveScope,
    configService: ConfigService,
  ) {
    const stream = configService.getOrThrow<StreamConfig>('stream');
    this.path = stream.path;
    this.handshakeTimeoutMs = stream.handshakeTimeoutMs;
    this.wss = new WebSocketServer({ noServer: true, maxPayload: MAX_FRAME_BYTES });
  }

  /**
   * Routes HTTP upgrade requests for the stream path to this gateway; other
   * upgrade requests are refused.
   */
  attach(server: EventEmitter): void {
    server.on('upgrade', (request: IncomingMessage, socket: Duplex, head: Buffer) => {
      this.handleUpgrade(request, socket, head);
    });
    this.logger.log(`Stream endpoint listening for upgrades on ${this.path}`);
  }

  handleUpgrade(request: IncomingMessage, socket: Duplex, head: Buffer): void {
    const pathname = new URL(request.url ?? '/', 'http://localhost').pathname;
    if (pathname !== this.path) {
      socket.destroy();
      return;
    }

    this.wss.handleUpgrade(request, socket, head, (ws) => {
      this.onConnection(ws, request);
    });
  }

  connectedClients(): string[] {
    return [...this.registry.keys()];
  }

  /**
   * validate → sanitize → timestamp → persist → sign → size check → fan-out.
   * Nothing reaches a client unless the record was persisted first.
   */
  async broadcast(raw: unknown): Promise<BroadcastOutcome> {
    const check = checkCountPayload(raw);
    if (!check.valid) {
      const message = check.issues.map((issue) => `${issue.path}: ${issue.message}`).join('; ');
      await this.audit.record('ValidationError', `Broadcast rejected: ${message}`);
      return { status: 'rejected', reason: 'validation', message, recipients: 0, evicted: 0 };
    }

    const counts = sanitizeCountPayload(check.payload);
    const record = await this.countStore.insertRecord(counts, nowSeconds());
    if (!record) {
      const message = 'Count record could not be persisted';
      await this.audit.record('PersistenceError', `Broadcast aborted: ${message}`, 'ERROR');
      return { status: 'rejected', reason: 'persistence', message, recipients: 0, evicted: 0 };
    }

    const data = { ...pickCounts(record), timestamp: record.timestamp };
    const frame: BroadcastFrame = { data, hmac: this.accessControl.sign(data) };
    const serialized = JSON.stringify(frame);
    if (!checkFrameSize(serialized)) {
      const message = `Frame of ${Buffer.byteLength(serialized)} bytes exceeds ${MAX_FRAME_BYTES}`;
      await this.audit.record('SizeLimitError', `Broadcast rejected: ${message}`);
      return { status: 'rejected', reason: 'size', message, record, recipients: 0, evicted: 0 };
    }

    const targets = await this.scope.run(() => [...this.registry.values()]);
    const results = await Promise.allSettled(targets.map((conn) => this.sendRaw(conn, serialized)));

    const failed: StreamConnection[] = [];
    results.forEach((result, i) => {
      if (result.status === 'rejected') {
        const conn = targets[i];
        this.logger.warn(`Delivery to ${conn.clientId ?? conn.ip} failed: ${errorMessage(result.reason)}`);
        failed.push(conn);
      }
    });

    if (failed.length > 0) {
      await this.scope.run(() => {
        for (const conn of failed) {
          this.deregister(conn);
        }
      });
      for (const conn of failed) {
        conn.state = 'closed';
        conn.ws.terminate();
      }
    }

    this.logger.debug(`Broadcast record ${record.id} to ${targets.length - failed.length} clients`);
    return {
      status: 'delivered',
      record,
      recipients: targets.length - failed.length,
      evicted: failed.length,
    };
  }

  async close(): Promise<void> {
    await this.scope.run(() => {
      this.registry.clear();
    });
    for (const conn of this.connections) {
      this.closeConnection(conn, StreamCloseCode.NORMAL);
    }
    await new Promise<void>((resolve) => this.wss.close(() => resolve()));
  }

  async onModuleDestroy(): Promise<void> {
    await this.close();
  }

  private onConnection(ws: WebSocket, request: IncomingMessage): void {
    const conn: StreamConnection = {
      ws,
      ip: normalizeIp(request.socket.remoteAddress ?? 'unknown'),
      state: 'authenticating',
      clientId: null,
      token: null,
      handshakeTimer: null,
      chain: Promise.resolve(),
    };
    this.connections.add(conn);

    conn.handshakeTimer = setTimeout(() => {
      if (conn.state === 'authenticating') {
        this.logger.warn(`Client at ${conn.ip} did not authenticate in time`);
        this.closeConnection(conn, StreamCloseCode.AUTH_TIMEOUT);
      }
    }, this.handshakeTimeoutMs);

    this.enqueue(conn, () => this.checkIp(conn));

    ws.on('message', (data) => {
      this.clearHandshakeTimer(conn);
      this.enqueue(conn, () => this.handleFrame(conn, data));
    });

    ws.on('close', () => {
      this.clearHandshakeTimer(conn);
      this.enqueue(conn, () => this.onClose(conn));
    });

    ws.on('error', (err) => {
      this.logger.error(`Socket error from ${conn.clientId ?? conn.ip}: ${err.message}`);
    });
  }

  private enqueue(conn: StreamConnection, task: () => Promise<void>): void {
    conn.chain = conn.chain.then(task).catch((error: unknown) => {
      this.logger.error(`Error handling connection ${conn.clientId ?? conn.ip}: ${errorMessage(error)}`);
    });
  }

  private async checkIp(conn: StreamConnection): Promise<void> {
    if (!(await this.accessControl.ipAllowed(conn.ip))) {
      this.closeConnection(conn, StreamCloseCode.IP_NOT_ALLOWED);
    }
  }

  private async handleFrame(conn: StreamConnection, data: RawData): Promise<void> {
    switch (conn.state) {
      case 'authenticating':
        return this.authenticate(conn, data);
      case 'registered':
        return this.handleRegisteredFrame(conn, data);
      default:
        return;
    }
  }

  private async authenticate(conn: StreamConnection, data: RawData): Promise<void> {
    const frame = decodeFrame(data);
    if (!isAuthRequestFrame(frame)) {
      await this.audit.record('AuthenticationError', `Invalid authentication format from ${conn.ip}`);
      this.closeConnection(conn, StreamCloseCode.INVALID_FORMAT);
      return;
    }

    if (!(await this.accessControl.validateKey(frame.api_key, conn.ip))) {
      this.closeConnection(conn, StreamCloseCode.INVALID_CREDENTIALS);
      return;
    }

    if (conn.state !== 'authenticating' || conn.ws.readyState !== WebSocket.OPEN) {
      return;
    }

    const clientId = frame.client_id;
    const session = await this.accessControl.issueSession(clientId);
    conn.clientId = clientId;
    conn.token = session.token;

    const response: AuthResponseFrame = {
      status: 'authenticated',
      token: session.token,
      expires_in: this.accessControl.sessionTtlSeconds,
    };
    await this.send(conn, response);

    const superseded = await this.scope.run(() => {
      const previous = this.registry.get(clientId);
      this.registry.set(clientId, conn);
      conn.state = 'registered';
      return previous;
    });

    if (superseded && superseded !== conn) {
      this.logger.log(`Client ${clientId} reconnected; closing the previous connection`);
      this.closeConnection(superseded, StreamCloseCode.SESSION_SUPERSEDED);
    }
    this.logger.log(`Client ${clientId} authenticated from ${conn.ip}`);
  }

  private async handleRegisteredFrame(conn: StreamConnection, data: RawData): Promise<void> {
    const clientId = conn.clientId ?? '';

    if (!(await this.accessControl.checkRate(clientId))) {
      await this.send(conn, RATE_LIMIT_NOTICE);
      return;
    }

    const frame = decodeFrame(data);
    if (frame === undefined) {
      this.logger.warn(`Ignoring malformed frame from ${clientId}`);
      return;
    }

    const token = readFrameToken(frame) ?? conn.token ?? '';
    if (!(await this.accessControl.validateSession(clientId, token))) {
      this.closeConnection(conn, StreamCloseCode.SESSION_EXPIRED);
      return;
    }

    if (isPingFrame(frame)) {
      const pong: PongFrame = { type: 'pong' };
      await this.send(conn, pong);
      return;
    }

    this.logger.debug(`Ignoring unrecognised frame from ${clientId}`);
  }

  private async onClose(conn: StreamConnection): Promise<void> {
    conn.state = 'closed';
    this.connections.delete(conn);

    const { clientId, token } = conn;
    if (!clientId) {
      return;
    }

    await this.scope.run(() => {
      this.deregister(conn);
    });
    if (token) {
      this.accessControl.revokeSession(clientId, token);
    }
    this.logger.log(`Client ${clientId} disconnected`);
  }

  // Caller holds the scope
  private deregister(conn: StreamConnection): void {
    if (conn.clientId && this.registry.get(conn.clientId) === conn) {
      this.registry.delete(conn.clientId);
    }
  }

  private closeConnection(conn: StreamConnection, code: StreamCloseCode): void {
    conn.state = 'closed';
    this.clearHandshakeTimer(conn);
    if (conn.ws.readyState === WebSocket.OPEN) {
      conn.ws.close(code, StreamCloseReason[code]);
    }
  }

  private clearHandshakeTimer(conn: StreamConnection): void {
    if (conn.handshakeTimer) {
      clearTimeout(conn.handshakeTimer);
      conn.handshakeTimer = null;
    }
  }

  private send(conn: StreamConnection, frame: ServerFrame): Promise<void> {
    return this.sendRaw(conn, JSON.stringify(frame)).catch((error: unknown) => {
      this.logger.warn(`Failed to send to ${conn.clientId ?? conn.ip}: ${errorMessage(error)}`);
    });
  }

  private sendRaw(conn: StreamConnection, payload: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (conn.ws.readyState !== WebSocket.OPEN) {
        reject(new TransportError('Socket is not open'));
        return;
      }

      const timer = setTimeout(() => {
        reject(new TransportError(`Send timed out after ${SEND_TIMEOUT_MS}ms`));
      }, SEND_TIMEOUT_MS);

      conn.ws.send(payload, (err) => {
        clearTimeout(timer);
        if (err) {
          reject(new TransportError(err.message));
        } else {
          resolve();
        }
      });
    });
  }
}

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomBytes } from 'crypto';
import { computeSignature, constantTimeEquals, verifySignature } from '@tallystream/shared';
import { AuditService } from '../audit/audit.service';
import type { StreamConfig } from '../config/configuration';

const RATE_WINDOW_MS = 60_000;

export interface ClientSession {
  clientId: string;
  token: string;
  /** Unix seconds */
  created: number;
  /** Unix seconds */
  expires: number;
}

/**
 * Strips the IPv4-mapped IPv6 prefix Node reports for IPv4 peers on dual-stack sockets.
 */
export function normalizeIp(ip: string): string {
  return ip.startsWith('::ffff:') ? ip.slice(7) : ip;
}

/**
 * Key and session authentication, per-client sliding-window rate limiting,
 * IP allow/block lists and HMAC signing with the shared secret.
 *
 * All state is owned by this instance.
 */
@Injectable()
export class AccessControlService {
  private readonly logger = new Logger(AccessControlService.name);
  private readonly sessions = new Map<string, ClientSession>();
  private readonly rateWindows = new Map<string, number[]>();
  private lastRatePrune = 0;
  private readonly allowedIps = new Set<string>();
  private readonly blockedIps = new Set<string>();
  private readonly apiKey: string;
  private readonly rateLimit: number;
  readonly sessionTtlSeconds: number;

  constructor(
    configService: ConfigService,
    private readonly audit: AuditService,
  ) {
    const stream = configService.getOrThrow<StreamConfig>('stream');
    this.apiKey = stream.apiKey;
    this.rateLimit = stream.rateLimit;
    this.sessionTtlSeconds = stream.sessionTtlSeconds;
    stream.ipAllowlist.forEach((ip) => this.allowedIps.add(normalizeIp(ip)));
    stream.ipBlocklist.forEach((ip) => this.blockedIps.add(normalizeIp(ip)));
  }

  /**
   * Constant-time comparison against the configured key. A failure writes one
   * AuthenticationError audit event.
   */
  async validateKey(key: unknown, source?: string): Promise<boolean> {
    if (typeof key === 'string' && constantTimeEquals(key, this.apiKey)) {
      return true;
    }
    await this.audit.record('AuthenticationError', `Invalid API key${source ? ` from ${source}` : ''}`);
    return false;
  }

  /**
   * Issues a fresh session, replacing any prior session for the same client,
   * and records a SessionIssued audit event.
   */
  async issueSession(clientId: string): Promise<ClientSession> {
    const created = Date.now() / 1000;
    const session: ClientSession = {
      clientId,
      token: randomBytes(32).toString('base64url'),
      created,
      expires: created + this.sessionTtlSeconds,
    };
    this.sessions.set(clientId, session);
    await this.audit.record('SessionIssued', `Session issued for client ${clientId}`, 'INFO');
    return session;
  }

  /**
   * Expired sessions are evicted on first use.
   */
  async validateSession(clientId: string, token: string): Promise<boolean> {
    const session = this.sessions.get(clientId);
    if (!session) {
      await this.audit.record('AuthenticationError', `No active session for client ${clientId}`);
      return false;
    }

    if (Date.now() / 1000 >= session.expires) {
      this.sessions.delete(clientId);
      await this.audit.record('AuthenticationError', `Session expired for client ${clientId}`);
      return false;
    }

    if (!constantTimeEquals(token, session.token)) {
      await this.audit.record('AuthenticationError', `Invalid session token for client ${clientId}`);
      return false;
    }
    return true;
  }

  /**
   * Removes the client's session. With a token, only removes it while that token is still current.
   */
  revokeSession(clientId: string, token?: string): boolean {
    const session = this.sessions.get(clientId);
    if (!session || (token !== undefined && session.token !== token)) {
      return false;
    }
    this.rateWindows.delete(clientId);
    return this.sessions.delete(clientId);
  }

  hasSession(clientId: string): boolean {
    return this.sessions.has(clientId);
  }

  /**
   * Sliding 60 s window. A request at or over the limit is rejected and not counted.
   */
  async checkRate(clientId: string): Promise<boolean> {
    const now = Date.now();
    const cutoff = now - RATE_WINDOW_MS;
    if (now - this.lastRatePrune >= RATE_WINDOW_MS) {
      this.pruneRateWindows(cutoff);
      this.lastRatePrune = now;
    }
    const window = (this.rateWindows.get(clientId) ?? []).filter((t) => t > cutoff);

    if (window.length >= this.rateLimit) {
      this.rateWindows.set(clientId, window);
      await this.audit.record('RateLimitError', `Rate limit exceeded for client ${clientId}`);
      return false;
    }

    window.push(now);
    this.rateWindows.set(clientId, window);
    return true;
  }

  /** Clients with a live rate-limit window. */
  get rateTrackedClients(): number {
    return this.rateWindows.size;
  }

  private pruneRateWindows(cutoff: number): void {
    for (const [clientId, window] of this.rateWindows) {
      if (window.every((t) => t <= cutoff)) {
        this.rateWindows.delete(clientId);
      }
    }
  }

  async ipAllowed(ip: string): Promise<boolean> {
    const address = normalizeIp(ip);

    if (this.blockedIps.has(address)) {
      await this.audit.record('IpBlocked', `Blocked IP attempted connection: ${address}`);
      return false;
    }

    if (this.allowedIps.size > 0 && !this.allowedIps.has(address)) {
      await this.audit.record('IpBlocked', `IP not in allowlist: ${address}`);
      return false;
    }

    return true;
  }

  allowIp(ip: string): void {
    this.allowedIps.add(normalizeIp(ip));
    this.logger.log(`IP allowlisted: ${ip}`);
  }

  blockIp(ip: string): void {
    this.blockedIps.add(normalizeIp(ip));
    this.logger.warn(`IP blocked: ${ip}`);
  }

  sign(payload: unknown): string {
    return computeSignature(payload, this.apiKey);
  }

  verify(payload: unknown, mac: string): boolean {
    return verifySignature(payload, mac, this.apiKey);
  }
}

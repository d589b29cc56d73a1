import { StreamError, TransportError, errorMessage } from '@tallystream/shared';
import type { CountPayload } from '@tallystream/shared';
import { StreamClient, StreamClientLogger, StreamClientOptions } from './stream-client';

export const BASE_RECONNECT_DELAY_MS = 1000;
export const MAX_RECONNECT_DELAY_MS = 30000;

export interface StreamSubscriberOptions extends StreamClientOptions {
  onRecord: (payload: CountPayload) => void;
  /** Refused frames and transport failures. Defaults to a warning on the logger. */
  onError?: (error: StreamError) => void;
  baseReconnectDelayMs?: number;
  maxReconnectDelayMs?: number;
}

export function reconnectDelay(
  attempt: number,
  base: number = BASE_RECONNECT_DELAY_MS,
  max: number = MAX_RECONNECT_DELAY_MS,
): number {
  return Math.min(base * Math.pow(2, attempt), max);
}

/**
 * Keeps a StreamClient connected and hands every verified payload to `onRecord`.
 * Lost or refused connections are retried with exponential backoff.
 */
export class StreamSubscriber {
  private running = false;
  private reconnectAttempt = 0;
  private client: StreamClient | null = null;
  private loop: Promise<void> | null = null;
  private sleepTimer: ReturnType<typeof setTimeout> | null = null;
  private wake: (() => void) | null = null;
  private readonly logger: StreamClientLogger;

  constructor(private readonly options: StreamSubscriberOptions) {
    this.logger = options.logger ?? console;
  }

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.loop = this.run();
  }

  async stop(): Promise<void> {
    this.running = false;
    if (this.sleepTimer) {
      clearTimeout(this.sleepTimer);
      this.sleepTimer = null;
    }
    this.wake?.();
    await this.client?.disconnect();
    await this.loop;
    this.loop = null;
  }

  private async run(): Promise<void> {
    while (this.running) {
      const client = new StreamClient(this.options);
      this.client = client;

      if (await client.connect()) {
        this.reconnectAttempt = 0;
        await this.consume(client);
      }
      await client.disconnect();
      this.client = null;

      if (!this.running) {
        break;
      }
      const delay = reconnectDelay(
        this.reconnectAttempt,
        this.options.baseReconnectDelayMs,
        this.options.maxReconnectDelayMs,
      );
      this.reconnectAttempt++;
      this.logger.log(`[StreamClient] Reconnecting in ${delay}ms (attempt ${this.reconnectAttempt})`);
      await this.sleep(delay);
    }
  }

  private async consume(client: StreamClient): Promise<void> {
    while (this.running) {
      const result = await client.receive();
      if (result.ok) {
        this.dispatch(result.payload);
        continue;
      }

      if (result.error instanceof TransportError) {
        if (client.isConnected) {
          // Quiet stream: ping and keep waiting
          client.ping();
          continue;
        }
        if (this.running) {
          this.report(result.error);
        }
        return;
      }

      this.report(result.error);
    }
  }

  private dispatch(payload: CountPayload): void {
    try {
      this.options.onRecord(payload);
    } catch (error) {
      this.logger.error(`[StreamClient] Record handler failed: ${errorMessage(error)}`);
    }
  }

  private report(error: StreamError): void {
    if (this.options.onError) {
      this.options.onError(error);
    } else {
      this.logger.warn(`[StreamClient] ${error.name}: ${error.message}`);
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      this.wake = () => {
        this.wake = null;
        resolve();
      };
      this.sleepTimer = setTimeout(() => {
        this.sleepTimer = null;
        this.wake?.();
      }, ms);
    });
  }
}

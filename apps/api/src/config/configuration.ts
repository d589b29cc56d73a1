import { getValidatedEnv } from './env.schema';

export interface StreamConfig {
  apiKey: string;
  path: string;
  rateLimit: number;
  sessionTtlSeconds: number;
  handshakeTimeoutMs: number;
  ipAllowlist: string[];
  ipBlocklist: string[];
}

export interface AppConfig {
  port: number;
  nodeEnv: 'development' | 'production' | 'test';
  storage: {
    type: 'sqlite' | 'memory';
    sqlite: { filepath: string };
    exportDir: string;
  };
  stream: StreamConfig;
  tls: { certPath?: string; keyPath?: string };
  retention: { days?: number; sweepIntervalMs: number };
}

/**
 * Maps the flat, validated environment onto the nested keys read through ConfigService.
 */
export default function configuration(): AppConfig {
  const env = getValidatedEnv();

  return {
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
    storage: {
      type: env.STORAGE_TYPE,
      sqlite: { filepath: env.STORAGE_SQLITE_FILEPATH },
      exportDir: env.EXPORT_DIR,
    },
    stream: {
      apiKey: env.STREAM_API_KEY,
      path: env.STREAM_PATH,
      rateLimit: env.STREAM_RATE_LIMIT,
      sessionTtlSeconds: env.STREAM_SESSION_TTL_SECONDS,
      handshakeTimeoutMs: env.STREAM_HANDSHAKE_TIMEOUT_MS,
      ipAllowlist: env.STREAM_IP_ALLOWLIST,
      ipBlocklist: env.STREAM_IP_BLOCKLIST,
    },
    tls: {
      certPath: env.TLS_CERT_PATH,
      keyPath: env.TLS_KEY_PATH,
    },
    retention: {
      days: env.RETENTION_DAYS,
      sweepIntervalMs: env.RETENTION_SWEEP_INTERVAL_MS,
    },
  };
}

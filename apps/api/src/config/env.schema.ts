import { z } from 'zod';
import { SESSION_TTL_SECONDS } from '@tallystream/shared';

const DEVELOPMENT_STREAM_KEY = 'development-stream-key';

const ipList = z
  .string()
  .optional()
  .transform((value) =>
    (value ?? '')
      .split(',')
      .map((ip) => ip.trim())
      .filter((ip) => ip.length > 0),
  );

/**
 * Environment variable validation schema
 * Validates all environment variables at application startup
 */
export const envSchema = z.object({
  // Application
  PORT: z.coerce.number().int().min(1).max(65535).default(3001),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Storage configuration
  STORAGE_TYPE: z.enum(['sqlite', 'memory']).default('sqlite'),
  STORAGE_SQLITE_FILEPATH: z.string().min(1).default('./data/tallystream.db'),
  EXPORT_DIR: z.string().min(1).default('./exports'),

  // Broadcast stream
  STREAM_API_KEY: z.string().min(16).optional(),
  STREAM_PATH: z.string().regex(/^\/[A-Za-z0-9/_-]*$/).default('/stream'),
  STREAM_RATE_LIMIT: z.coerce.number().int().min(1).default(100),
  STREAM_SESSION_TTL_SECONDS: z.coerce.number().int().min(1).default(SESSION_TTL_SECONDS),
  STREAM_HANDSHAKE_TIMEOUT_MS: z.coerce.number().int().min(100).max(60000).default(5000),
  STREAM_IP_ALLOWLIST: ipList,
  STREAM_IP_BLOCKLIST: ipList,

  // TLS (WSS) - both or neither
  TLS_CERT_PATH: z.string().min(1).optional(),
  TLS_KEY_PATH: z.string().min(1).optional(),

  // Retention sweep
  RETENTION_DAYS: z.coerce.number().int().min(1).optional(),
  RETENTION_SWEEP_INTERVAL_MS: z.coerce.number().int().min(60000).default(3600000),
}).superRefine((data, ctx) => {
  if (data.NODE_ENV === 'production' && !data.STREAM_API_KEY) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'STREAM_API_KEY is required in production',
      path: ['STREAM_API_KEY'],
    });
  }

  if (Boolean(data.TLS_CERT_PATH) !== Boolean(data.TLS_KEY_PATH)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'TLS_CERT_PATH and TLS_KEY_PATH must be set together',
      path: [data.TLS_CERT_PATH ? 'TLS_KEY_PATH' : 'TLS_CERT_PATH'],
    });
  }
}).transform((data) => {
  if (data.STREAM_API_KEY) {
    return { ...data, STREAM_API_KEY: data.STREAM_API_KEY };
  }
  if (data.NODE_ENV === 'development') {
    console.warn('Warning: STREAM_API_KEY is not set, using the development default key');
  }
  return { ...data, STREAM_API_KEY: DEVELOPMENT_STREAM_KEY };
});

export type EnvConfig = z.infer<typeof envSchema>;

/**
 * Validates environment variables at application startup
 * Exits the process with detailed error messages if validation fails
 */
export function validateEnv(): EnvConfig {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    console.error('\n❌ Environment validation failed:\n');

    for (const issue of result.error.issues) {
      const path = issue.path.join('.');
      console.error(`  • ${path}: ${issue.message}`);
    }

    console.error('\nPlease check your environment variables and try again.\n');
    process.exit(1);
  }

  return result.data;
}

/**
 * Type-safe environment variable access
 * Use after calling validateEnv() to get validated config
 */
export function getValidatedEnv(): EnvConfig {
  return envSchema.parse(process.env);
}

export type StartupErrorCategory =
  | 'port_in_use'
  | 'permission_denied'
  | 'timeout'
  | 'config_invalid'
  | 'tls_invalid'
  | 'storage_init'
  | 'unknown';

export function categorizeError(error: Error): StartupErrorCategory {
  const msg = error.message || '';

  if (/EADDRINUSE/.test(msg)) return 'port_in_use';
  if (/EACCES|EPERM/.test(msg)) return 'permission_denied';
  if (/ETIMEDOUT|ECONNRESET|timeout/i.test(msg)) return 'timeout';
  if (/Invalid environment|validation failed|missing required/i.test(msg)) return 'config_invalid';
  if (/PEM|certificate|TLS|ENOENT.*\.(pem|crt|key)\b/i.test(msg)) return 'tls_invalid';
  if (/storage|sqlite|ENOENT.*\.db/i.test(msg)) return 'storage_init';

  return 'unknown';
}

/**
 * Formats epoch seconds as a UTC `YYYY-MM-DD HH:mm:ss.SSS` string.
 */
export function formatDatetime(epochSeconds: number): string {
  return new Date(epochSeconds * 1000).toISOString().replace('T', ' ').slice(0, 23);
}

// SQLite CURRENT_TIMESTAMP layout
export function formatSqlTimestamp(date: Date = new Date()): string {
  return date.toISOString().replace('T', ' ').slice(0, 19);
}

export function nowSeconds(): number {
  return Date.now() / 1000;
}

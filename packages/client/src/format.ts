import pc from 'picocolors';
import { VEHICLE_CATEGORIES, formatDatetime } from '@tallystream/shared';
import type { CountPayload } from '@tallystream/shared';

/**
 * One console line per record: UTC time, then each category with its count.
 */
export function formatRecord(payload: CountPayload): string {
  const when = payload.timestamp === undefined ? 'unknown time' : formatDatetime(payload.timestamp);
  const counts = VEHICLE_CATEGORIES.map((c) => `${c}=${pc.bold(String(payload[c]))}`).join(' ');
  return `${pc.dim(when)}  ${counts}`;
}

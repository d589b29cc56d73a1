import { z } from 'zod';
import { VEHICLE_CATEGORIES, CountPayload, emptyCounts } from '../types/counts';

export const MAX_FRAME_BYTES = 1024 * 1024;

const countField = z.number().int().nonnegative();

/**
 * Boundary schema for a count snapshot.
 * Unknown keys pass validation; sanitizeCountPayload() drops them.
 */
export const CountPayloadSchema = z
  .object({
    cars: countField,
    vans: countField,
    motors: countField,
    buses: countField,
    bicycles: countField,
    timestamp: z.number().finite().optional(),
  })
  .passthrough();

export type CountPayloadIssue = { path: string; message: string };

export type CountPayloadCheck =
  | { valid: true; payload: CountPayload & Record<string, unknown> }
  | { valid: false; issues: CountPayloadIssue[] };

export function checkCountPayload(payload: unknown): CountPayloadCheck {
  const result = CountPayloadSchema.safeParse(payload);
  if (result.success) {
    return { valid: true, payload: result.data };
  }
  return {
    valid: false,
    issues: result.error.issues.map((issue) => ({
      path: issue.path.join('.') || '(root)',
      message: issue.message,
    })),
  };
}

export function validateCountPayload(payload: unknown): payload is CountPayload {
  return CountPayloadSchema.safeParse(payload).success;
}

function toNonNegativeInt(value: unknown): number | undefined {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return undefined;
  }
  return Math.max(0, Math.trunc(value));
}

/**
 * Projects any mapping onto the recognised keys, each coerced to a
 * non-negative integer. Non-numeric values are discarded; a missing count becomes 0.
 */
export function sanitizeCountPayload(payload: Record<string, unknown>): CountPayload {
  const sanitized: CountPayload = emptyCounts();
  for (const category of VEHICLE_CATEGORIES) {
    const value = toNonNegativeInt(payload[category]);
    if (value !== undefined) {
      sanitized[category] = value;
    }
  }
  const timestamp = toNonNegativeInt(payload.timestamp);
  if (timestamp !== undefined) {
    sanitized.timestamp = timestamp;
  }
  return sanitized;
}

export function checkFrameSize(serialized: string): boolean {
  return Buffer.byteLength(serialized, 'utf8') <= MAX_FRAME_BYTES;
}

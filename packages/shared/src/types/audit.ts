export type AuditLevel = 'INFO' | 'WARNING' | 'ERROR';

export type AuditEventType =
  | 'AuthenticationError'
  | 'RateLimitError'
  | 'IpBlocked'
  | 'ValidationError'
  | 'SizeLimitError'
  | 'PersistenceError'
  | 'IntegrityError'
  | 'SessionIssued'
  | 'RetentionSweep';

export interface AuditEvent {
  id: number;
  timestamp: number;
  eventType: string;
  message: string;
  level: AuditLevel;
  createdAt?: string;
}

export interface AuditQueryOptions {
  eventType?: string;
  level?: AuditLevel;
  startTime?: number;
  endTime?: number;
  limit?: number;
}

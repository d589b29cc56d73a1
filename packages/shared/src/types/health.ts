export interface HealthResponse {
  status: 'ok' | 'degraded';
  storage: {
    type: string;
    ready: boolean;
  };
  connectedClients: number;
  totalRecords: number | null;
  uptimeSeconds: number;
  timestamp: number;
}

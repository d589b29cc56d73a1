export const VEHICLE_CATEGORIES = ['cars', 'vans', 'motors', 'buses', 'bicycles'] as const;

export type VehicleCategory = (typeof VEHICLE_CATEGORIES)[number];

export type VehicleCounts = Record<VehicleCategory, number>;

/**
 * Count snapshot as accepted at the system boundary.
 * `timestamp` is epoch seconds and optional; the server assigns its own before persisting.
 */
export interface CountPayload extends VehicleCounts {
  timestamp?: number;
}

// One persisted row of vehicle_counts
export interface CountRecord extends VehicleCounts {
  id: number;
  timestamp: number;
  datetimeStr: string;
  createdAt?: string;
}

export interface NewCountRecord extends VehicleCounts {
  timestamp: number;
  datetimeStr: string;
}

export interface CountStatistics {
  totalRecords: number;
  average: VehicleCounts;
  maximum: VehicleCounts;
  minimum: VehicleCounts;
  total: VehicleCounts;
}

export function emptyCounts(): VehicleCounts {
  return { cars: 0, vans: 0, motors: 0, buses: 0, bicycles: 0 };
}

export function pickCounts(source: VehicleCounts): VehicleCounts {
  return {
    cars: source.cars,
    vans: source.vans,
    motors: source.motors,
    buses: source.buses,
    bicycles: source.bicycles,
  };
}

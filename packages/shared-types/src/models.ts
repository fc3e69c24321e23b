/**
 * Core domain models used across the application
 */

// Battery charging state as reported by the OS
export const BATTERY_STATUSES = ['Charging', 'Discharging', 'Full', 'NotCharging', 'Unknown'] as const;

export type BatteryStatus = (typeof BATTERY_STATUSES)[number];

// A single point-in-time battery reading
export interface BatterySample {
  readonly timestamp: number; // epoch ms
  readonly capacityPercent: number; // 0-100
  readonly powerWatts: number; // positive = charging, negative = discharging
  readonly voltageVolts: number;
  readonly energyWattHours: number;
  readonly energyFullWattHours: number;
  readonly status: BatteryStatus;
}

// A contiguous run of Charging samples
export interface ChargeSession {
  startTime: number;
  endTime: number | null;
  startCapacity: number;
  endCapacity: number;
  samples: BatterySample[];
  reachedThreshold: boolean; // capacity hit the completion threshold at least once
  completed: boolean;
}

// On-disk document
export interface PersistedHistory {
  version: 1;
  samples: BatterySample[];
  completedSessions: ChargeSession[];
}

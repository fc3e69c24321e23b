import type { BatterySample, BatteryStatus } from '@battrack/shared-types';

export function makeSample(
  status: BatteryStatus,
  capacityPercent: number,
  timestamp: number,
  overrides: Partial<BatterySample> = {}
): BatterySample {
  return {
    timestamp,
    capacityPercent,
    powerWatts: status === 'Charging' ? 30 : status === 'Discharging' ? -8 : 0,
    voltageVolts: 12.4,
    energyWattHours: (capacityPercent / 100) * 60,
    energyFullWattHours: 60,
    status,
    ...overrides,
  };
}

// One sample per 5 seconds starting at `start`
export function makeSeries(
  steps: Array<[BatteryStatus, number]>,
  start = 0
): BatterySample[] {
  return steps.map(([status, capacity], i) => makeSample(status, capacity, start + i * 5000));
}

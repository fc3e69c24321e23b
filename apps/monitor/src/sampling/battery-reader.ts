import si from 'systeminformation';
import type { Systeminformation } from 'systeminformation';
import type { BatterySample, BatteryStatus } from '@battrack/shared-types';
import { createLogger } from '@battrack/shared-utils';

const logger = createLogger('BatteryReader');

export type BatteryQuery = () => Promise<Systeminformation.BatteryData>;

export interface SampleSource {
  // null when the sensor could not be read this tick
  read(): Promise<BatterySample | null>;
}

export function toStatus(data: Systeminformation.BatteryData): BatteryStatus {
  if (data.isCharging) return 'Charging';
  if (data.acConnected) return data.percent >= 100 ? 'Full' : 'NotCharging';
  return 'Discharging';
}

function toWattHours(value: number, data: Systeminformation.BatteryData): number {
  if (!Number.isFinite(value)) return 0;
  switch (data.capacityUnit) {
    case 'Wh':
      return value;
    case 'mWh':
      return value / 1000;
    case 'mAh':
      return (value / 1000) * (data.voltage || 0);
    default:
      return 0;
  }
}

// Power is the energy delta since the previous reading, signed by status
function derivePower(
  status: BatteryStatus,
  energyWh: number,
  timestamp: number,
  previous: BatterySample | null
): number {
  if (!previous || (status !== 'Charging' && status !== 'Discharging')) return 0;

  const hours = (timestamp - previous.timestamp) / 3_600_000;
  if (hours <= 0) return 0;

  const watts = Math.abs(energyWh - previous.energyWattHours) / hours;
  return status === 'Charging' ? watts : -watts;
}

export function toSample(
  data: Systeminformation.BatteryData,
  previous: BatterySample | null,
  timestamp: number
): BatterySample {
  const status = toStatus(data);
  const energyWattHours = toWattHours(data.currentCapacity, data);

  return {
    timestamp,
    capacityPercent: Math.min(100, Math.max(0, data.percent)),
    powerWatts: derivePower(status, energyWattHours, timestamp, previous),
    voltageVolts: data.voltage || 0,
    energyWattHours,
    energyFullWattHours: toWattHours(data.maxCapacity, data),
    status,
  };
}

export function batteryName(data: Systeminformation.BatteryData): string {
  const name = `${data.manufacturer || ''} ${data.model || ''}`.trim();
  return name || 'Battery';
}

export class BatteryReader implements SampleSource {
  private previous: BatterySample | null = null;

  constructor(
    private readonly query: BatteryQuery = () => si.battery(),
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Checks that a battery exists at all and returns its display name.
   * Throws NO_BATTERY otherwise, since there is nothing to monitor.
   */
  async probe(): Promise<string> {
    const data = await this.query();
    if (!data.hasBattery) {
      throw new Error('NO_BATTERY');
    }
    return batteryName(data);
  }

  async read(): Promise<BatterySample | null> {
    let data: Systeminformation.BatteryData;
    try {
      data = await this.query();
    } catch (error) {
      logger.debug('Battery query failed', error);
      return null;
    }

    if (!data.hasBattery || !Number.isFinite(data.percent)) {
      logger.debug('Battery reading unavailable');
      return null;
    }

    const sample = toSample(data, this.previous, this.now());
    this.previous = sample;
    return sample;
  }
}

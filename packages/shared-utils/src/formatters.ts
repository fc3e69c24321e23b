/**
 * Formatting utilities for battery readings
 */

// Capacity formatting
export function formatPercentage(value: number, decimals = 1): string {
  return `${value.toFixed(decimals)}%`;
}

// Signed power formatting, positive while charging
export function formatPower(watts: number): string {
  if (Math.abs(watts) < 0.01) {
    return '0.00 W';
  }
  if (watts > 0) {
    return `+${watts.toFixed(2)} W (charging)`;
  }
  return `${watts.toFixed(2)} W (discharging)`;
}

// Voltage formatting
export function formatVoltage(volts: number): string {
  return `${volts.toFixed(3)} V`;
}

// Energy formatting
export function formatEnergy(nowWh: number, fullWh: number): string {
  return `${nowWh.toFixed(2)} / ${fullWh.toFixed(2)} Wh`;
}

// Duration formatting, e.g. "1h 05m" or "42m"
export function formatDuration(milliseconds: number): string {
  const totalSeconds = Math.max(0, Math.floor(milliseconds / 1000));
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);

  if (hours > 0) {
    return `${hours}h ${String(minutes).padStart(2, '0')}m`;
  }
  return `${minutes}m`;
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

// Local wall-clock time, HH:MM
export function formatClock(timestamp: number): string {
  const date = new Date(timestamp);
  return `${pad2(date.getHours())}:${pad2(date.getMinutes())}`;
}

// Local date and time, MM/DD HH:MM
export function formatShortDateTime(timestamp: number): string {
  const date = new Date(timestamp);
  return `${pad2(date.getMonth() + 1)}/${pad2(date.getDate())} ${formatClock(timestamp)}`;
}

// Local date and time, YYYY-MM-DD HH:MM
export function formatDateTime(timestamp: number): string {
  const date = new Date(timestamp);
  return `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())} ${formatClock(timestamp)}`;
}

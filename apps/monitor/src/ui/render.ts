import type { BatterySample, BatteryStatus, ChargeSession } from '@battrack/shared-types';
import {
  formatDateTime,
  formatDuration,
  formatEnergy,
  formatPercentage,
  formatPower,
  formatShortDateTime,
  formatVoltage,
} from '@battrack/shared-utils';
import type { AppContext } from '../app/context';
import { activeViewport, selectedSession } from '../app/context';
import { bucket, powerBounds, renderBars, timeAxis } from './chart';

export interface RenderSize {
  columns: number;
  rows: number;
}

const STATUS_LABELS: Record<BatteryStatus, string> = {
  Charging: 'Charging',
  Discharging: 'Discharging',
  Full: 'Full',
  NotCharging: 'Not charging',
  Unknown: 'Unknown',
};

const CAPACITY_BAR_WIDTH = 20;
const Y_LABEL_WIDTH = 6;

function titleBar(ctx: AppContext): string {
  return ` ⚡ battrack — ${ctx.batteryName}`;
}

function helpBar(ctx: AppContext): string {
  switch (ctx.view.kind) {
    case 'dashboard':
      return ' [h] History Chart  [1/2] Session Detail  [q] Quit';
    case 'history':
      return ' [d] Dashboard  [←/→] Pan  [+/-] Zoom  [f] Fit  [1/2] Session  [q] Quit';
    case 'session':
      return ' [d] Dashboard  [h] History  [←/→] Pan  [+/-] Zoom  [f] Fit  [q] Quit';
  }
}

export function capacityBar(percent: number): string {
  const filled = Math.min(CAPACITY_BAR_WIDTH, Math.max(0, Math.floor((percent / 100) * CAPACITY_BAR_WIDTH)));
  return '█'.repeat(filled) + '░'.repeat(CAPACITY_BAR_WIDTH - filled);
}

function sessionDuration(session: ChargeSession): number {
  return session.endTime === null ? 0 : session.endTime - session.startTime;
}

export function sessionLine(session: ChargeSession, index: number): string {
  return (
    `  [${index + 1}] ${formatPercentage(session.startCapacity, 0)} → ${formatPercentage(session.endCapacity, 0)}` +
    `  (${formatDuration(sessionDuration(session))})  ${formatShortDateTime(session.startTime)}`
  );
}

function statusLines(sample: BatterySample | null): string[] {
  if (!sample) {
    return ['  Waiting for first battery sample...'];
  }
  return [
    `  Status:   ${STATUS_LABELS[sample.status]}`,
    '',
    `  Battery:  ${formatPercentage(sample.capacityPercent)}`,
    `            ${capacityBar(sample.capacityPercent)}`,
    '',
    `  Power:    ${formatPower(sample.powerWatts)}`,
    `  Voltage:  ${formatVoltage(sample.voltageVolts)}`,
    `  Energy:   ${formatEnergy(sample.energyWattHours, sample.energyFullWattHours)}`,
  ];
}

function renderDashboard(ctx: AppContext): string[] {
  const sessions = ctx.history.completedSessions();
  const sessionLines =
    sessions.length === 0
      ? ['  No completed charge sessions yet']
      : sessions.map(sessionLine).reverse();

  return [
    titleBar(ctx),
    '',
    ...statusLines(ctx.history.lastSample()),
    '',
    ` Charge Sessions (90%+)  |  ${ctx.history.sampleCount()} samples`,
    ...sessionLines,
    '',
    helpBar(ctx),
  ];
}

function chartPanel(
  title: string,
  values: readonly number[],
  timestamps: readonly number[],
  bounds: [number, number],
  size: RenderSize,
  height: number
): string[] {
  if (values.length === 0) {
    return [` ${title}`, '  No data yet'];
  }

  const width = Math.max(1, size.columns - Y_LABEL_WIDTH - 2);
  const columns = bucket(values, width);
  const rows = renderBars(columns, bounds[0], bounds[1], height);
  const [min, max] = bounds;

  const body = rows.map((row, i) => {
    const label = i === 0 ? max.toFixed(1) : i === rows.length - 1 ? min.toFixed(1) : '';
    return `${label.padStart(Y_LABEL_WIDTH)} │${row}`;
  });
  const axisPad = ' '.repeat(Y_LABEL_WIDTH + 2);

  return [` ${title}`, ...body, `${axisPad}${timeAxis(timestamps, columns.length)}`];
}

function renderCharts(samples: readonly BatterySample[], total: number, size: RenderSize, reserved: number): string[] {
  const height = Math.max(3, Math.floor((size.rows - reserved - 6) / 2));
  const timestamps = samples.map((s) => s.timestamp);
  const capacity = samples.map((s) => s.capacityPercent);
  const power = samples.map((s) => s.powerWatts);

  return [
    ...chartPanel('Battery %', capacity, timestamps, [0, 100], size, height),
    ...chartPanel('Power (W) — +charge / -discharge', power, timestamps, powerBounds(power), size, height),
    ` Showing ${samples.length} of ${total} samples`,
  ];
}

function renderHistory(ctx: AppContext, size: RenderSize): string[] {
  const viewport = activeViewport(ctx);
  const samples = viewport ? ctx.history.visibleSamples(viewport) : [];

  return [titleBar(ctx), ...renderCharts(samples, ctx.history.sampleCount(), size, 3), helpBar(ctx)];
}

function renderSession(ctx: AppContext, size: RenderSize): string[] {
  const session = selectedSession(ctx);
  if (!session || ctx.view.kind !== 'session') {
    return [titleBar(ctx), '  Session not found', helpBar(ctx)];
  }

  const viewport = activeViewport(ctx);
  const samples = viewport ? viewport.visibleSlice(session.samples) : session.samples;
  const index = ctx.view.index;
  const info =
    `  Session ${index + 1}  |  ${formatPercentage(session.startCapacity, 0)} → ` +
    `${formatPercentage(session.endCapacity, 0)}  |  ${formatDuration(sessionDuration(session))}  |  ` +
    `Started: ${formatDateTime(session.startTime)}`;

  return [
    titleBar(ctx),
    info,
    ...renderCharts(samples, session.samples.length, size, 4),
    helpBar(ctx),
  ];
}

export function render(ctx: AppContext, size: RenderSize): string[] {
  switch (ctx.view.kind) {
    case 'dashboard':
      return renderDashboard(ctx);
    case 'history':
      return renderHistory(ctx, size);
    case 'session':
      return renderSession(ctx, size);
  }
}

import { formatClock } from '@battrack/shared-utils';

const BLOCKS = '▁▂▃▄▅▆▇█';

// Averages values down to at most `width` columns
export function bucket(values: readonly number[], width: number): number[] {
  if (values.length <= width) return [...values];

  const columns: number[] = [];
  for (let c = 0; c < width; c++) {
    const from = Math.floor((c * values.length) / width);
    const to = Math.floor(((c + 1) * values.length) / width);
    let sum = 0;
    for (let i = from; i < to; i++) sum += values[i];
    columns.push(sum / (to - from));
  }
  return columns;
}

/**
 * Vertical bar rows, top row first, using eighth blocks for the partial cell.
 */
export function renderBars(values: readonly number[], min: number, max: number, height: number): string[] {
  const span = max - min || 1;
  const eighths = values.map((v) => Math.round(Math.min(1, Math.max(0, (v - min) / span)) * height * 8));

  const rows: string[] = [];
  for (let row = height - 1; row >= 0; row--) {
    let line = '';
    for (const level of eighths) {
      const fill = level - row * 8;
      line += fill >= 8 ? '█' : fill <= 0 ? ' ' : BLOCKS[fill - 1];
    }
    rows.push(line);
  }
  return rows;
}

// Y bounds for power, always keeping zero in view
export function powerBounds(values: readonly number[]): [number, number] {
  if (values.length === 0) return [-0.5, 0.5];
  const min = Math.min(...values);
  const max = Math.max(...values);
  const margin = Math.abs(max - min) * 0.1 + 0.5;
  return [Math.min(min - margin, -0.5), Math.max(max + margin, 0.5)];
}

// Up to `labels` HH:MM labels spread across `width` columns
export function timeAxis(timestamps: readonly number[], width: number, labels = 5): string {
  if (timestamps.length === 0 || width < 5) return '';

  const chars: string[] = new Array<string>(width).fill(' ');
  const count = Math.min(labels, Math.max(1, Math.floor(width / 6)));

  for (let i = 0; i < count; i++) {
    const frac = count === 1 ? 0 : i / (count - 1);
    const text = formatClock(timestamps[Math.round(frac * (timestamps.length - 1))]);
    const col = Math.round(frac * (width - text.length));
    for (let j = 0; j < text.length; j++) chars[col + j] = text[j];
  }
  return chars.join('').trimEnd();
}

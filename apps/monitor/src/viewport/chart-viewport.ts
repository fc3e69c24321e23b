import type { ViewportWindow } from '@battrack/shared-types';
import { MIN_VISIBLE_POINTS, PAN_FRACTION, ZOOM_FACTOR } from '../constants';

export type ViewportAnchor = 'center' | 'end';

export interface ChartViewportOptions {
  zoomFactor: number;
  panFraction: number;
  minVisiblePoints: number;
  // 'end' keeps the newest point in view while the window touches it
  anchor: ViewportAnchor;
}

const defaultOptions: ChartViewportOptions = {
  zoomFactor: ZOOM_FACTOR,
  panFraction: PAN_FRACTION,
  minVisiblePoints: MIN_VISIBLE_POINTS,
  anchor: 'center',
};

export interface IndexRange {
  start: number;
  end: number; // exclusive
}

// Absorbs float error such as 70 * 0.7 = 48.99999999999999
const EPSILON = 1e-9;

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Zoom/pan window over an ordered sequence of points, by index.
 *
 * Only the requested width and offset are stored. Every read clamps them to
 * the length it is given, so the window stays valid when the data grows or
 * shrinks between renders. A `null` width means "fit to data".
 */
export class ChartViewport {
  private width: number | null = null;
  private offset = 0;
  private following: boolean;
  private length = 0;
  private readonly opts: ChartViewportOptions;

  constructor(options: Partial<ChartViewportOptions> = {}) {
    this.opts = { ...defaultOptions, ...options };
    this.following = this.opts.anchor === 'end';
  }

  // Records the current data length used by zoom and pan
  sync(length: number): this {
    this.length = Math.max(0, Math.floor(length));
    return this;
  }

  visibleRange(length: number = this.length): IndexRange {
    this.sync(length);
    const n = this.length;
    if (n === 0) return { start: 0, end: 0 };

    const minWidth = Math.min(this.opts.minVisiblePoints, n);
    const width = this.width === null ? n : clamp(this.width, minWidth, n);
    const start = this.following ? n - width : clamp(this.offset, 0, n - width);
    return { start, end: start + width };
  }

  visibleSlice<T>(data: readonly T[]): T[] {
    const { start, end } = this.visibleRange(data.length);
    return data.slice(start, end);
  }

  currentWindow(): ViewportWindow {
    const { start, end } = this.visibleRange();
    const width = end - start;
    return {
      start,
      width,
      zoomLevel: this.length > 0 ? width / this.length : 1,
    };
  }

  isFitted(): boolean {
    return this.width === null;
  }

  zoomIn(): void {
    const current = this.visibleRange();
    const n = this.length;
    const width = current.end - current.start;
    const next = Math.max(Math.min(this.opts.minVisiblePoints, n), Math.floor(width * this.opts.zoomFactor + EPSILON));
    if (next >= width) return;
    this.resize(current, next);
  }

  zoomOut(): void {
    const current = this.visibleRange();
    const n = this.length;
    const width = current.end - current.start;
    const next = Math.min(n, Math.ceil(width / this.opts.zoomFactor - EPSILON));
    if (next <= width) return;
    if (next >= n) {
      this.fitToData();
      return;
    }
    this.resize(current, next);
  }

  panLeft(): void {
    const current = this.visibleRange();
    const width = current.end - current.start;
    if (current.start === 0) return;

    this.pin(current);
    this.offset = Math.max(0, current.start - this.panStep(width));
    this.following = false;
  }

  panRight(): void {
    const current = this.visibleRange();
    const n = this.length;
    const width = current.end - current.start;
    if (current.end >= n) return;

    this.pin(current);
    this.offset = Math.min(n - width, current.start + this.panStep(width));
    this.following = this.opts.anchor === 'end' && this.offset + width >= n;
  }

  fitToData(): void {
    this.width = null;
    this.offset = 0;
    this.following = this.opts.anchor === 'end';
  }

  private panStep(width: number): number {
    return Math.max(1, Math.round(width * this.opts.panFraction));
  }

  // Turns an implicit full-range window into an explicit one
  private pin(current: IndexRange): void {
    this.width = current.end - current.start;
    this.offset = current.start;
  }

  private resize(current: IndexRange, width: number): void {
    const n = this.length;
    if (this.following) {
      this.offset = n - width;
    } else {
      const center = (current.start + current.end) / 2;
      this.offset = clamp(Math.round(center - width / 2), 0, n - width);
    }
    this.width = width;
  }
}

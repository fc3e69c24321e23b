import type { BatterySample, ChargeSession, View } from '@battrack/shared-types';
import type { HistoryStore } from '../history/history-store';
import { ChartViewport } from '../viewport/chart-viewport';

/**
 * Everything the loop and the renderer share. Passed around explicitly.
 */
export interface AppContext {
  view: View;
  history: HistoryStore;
  historyViewport: ChartViewport;
  // Keyed by session start time so indices can shift without mixing state
  sessionViewports: Map<number, ChartViewport>;
  batteryName: string;
}

export function createAppContext(history: HistoryStore, batteryName: string): AppContext {
  return {
    view: { kind: 'dashboard' },
    history,
    historyViewport: new ChartViewport({ anchor: 'end' }),
    sessionViewports: new Map(),
    batteryName,
  };
}

export function selectedSession(ctx: AppContext): ChargeSession | null {
  if (ctx.view.kind !== 'session') return null;
  return ctx.history.completedSessions()[ctx.view.index] ?? null;
}

function sessionViewport(ctx: AppContext, session: ChargeSession): ChartViewport {
  const live = new Set(ctx.history.completedSessions().map((s) => s.startTime));
  for (const key of ctx.sessionViewports.keys()) {
    if (!live.has(key)) ctx.sessionViewports.delete(key);
  }

  let viewport = ctx.sessionViewports.get(session.startTime);
  if (!viewport) {
    viewport = new ChartViewport();
    ctx.sessionViewports.set(session.startTime, viewport);
  }
  return viewport;
}

// Samples charted by the current view
export function viewSamples(ctx: AppContext): readonly BatterySample[] {
  switch (ctx.view.kind) {
    case 'history':
      return ctx.history.allSamples();
    case 'session':
      return selectedSession(ctx)?.samples ?? [];
    case 'dashboard':
      return [];
  }
}

// Viewport of the current view, synced to its data; null on the dashboard
export function activeViewport(ctx: AppContext): ChartViewport | null {
  switch (ctx.view.kind) {
    case 'history':
      return ctx.historyViewport.sync(ctx.history.sampleCount());
    case 'session': {
      const session = selectedSession(ctx);
      return session ? sessionViewport(ctx, session).sync(session.samples.length) : null;
    }
    case 'dashboard':
      return null;
  }
}

export function switchToDashboard(ctx: AppContext): void {
  ctx.view = { kind: 'dashboard' };
}

export function switchToHistory(ctx: AppContext): void {
  ctx.view = { kind: 'history' };
  ctx.historyViewport.fitToData();
}

// Ignored when there is no completed session at that index
export function switchToSession(ctx: AppContext, index: number): boolean {
  const session = ctx.history.completedSessions()[index];
  if (!session) return false;

  ctx.view = { kind: 'session', index };
  sessionViewport(ctx, session).fitToData();
  return true;
}

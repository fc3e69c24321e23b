import { describe, expect, it } from 'vitest';
import type { PersistedHistory } from '@battrack/shared-types';
import { HistoryStore } from '../history/history-store';
import type { HistoryPersistence } from '../history/storage';
import { makeSample, makeSeries } from '../testing/samples';
import { activeViewport, createAppContext, selectedSession, viewSamples } from './context';
import { handleKey } from './keys';

const noStorage: HistoryPersistence = {
  load: () => null,
  write: async (_document: PersistedHistory) => {},
};

function storeWithHistory(): HistoryStore {
  const store = new HistoryStore(noStorage);
  for (let i = 0; i < 100; i++) {
    store.recordSample(makeSample('Discharging', 60, i * 5000));
  }
  return store;
}

function addSession(store: HistoryStore, start: number, length: number): void {
  const steps = Array.from({ length }, (_, i): ['Charging', number] => ['Charging', Math.min(100, 80 + i)]);
  for (const sample of makeSeries([...steps, ['Discharging', 99]], start)) {
    store.recordSample(sample);
  }
}

describe('handleKey', () => {
  it('quits on q and ctrl+c', () => {
    const ctx = createAppContext(storeWithHistory(), 'Battery');
    expect(handleKey(ctx, { name: 'q' })).toBe('quit');
    expect(handleKey(ctx, { name: 'c', ctrl: true })).toBe('quit');
    expect(handleKey(ctx, { name: 'c' })).toBe('ignored');
  });

  it('switches between dashboard and history', () => {
    const ctx = createAppContext(storeWithHistory(), 'Battery');

    expect(handleKey(ctx, { name: 'h' })).toBe('redraw');
    expect(ctx.view).toEqual({ kind: 'history' });
    expect(viewSamples(ctx)).toHaveLength(100);

    expect(handleKey(ctx, { name: 'd' })).toBe('redraw');
    expect(ctx.view).toEqual({ kind: 'dashboard' });
    expect(viewSamples(ctx)).toEqual([]);
  });

  it('ignores chart keys on the dashboard', () => {
    const ctx = createAppContext(storeWithHistory(), 'Battery');
    expect(handleKey(ctx, { sequence: '+' })).toBe('ignored');
    expect(handleKey(ctx, { name: 'left' })).toBe('ignored');
    expect(ctx.historyViewport.isFitted()).toBe(true);
  });

  it('zooms, pans and fits the history chart', () => {
    const ctx = createAppContext(storeWithHistory(), 'Battery');
    handleKey(ctx, { name: 'h' });

    handleKey(ctx, { sequence: '+' });
    expect(ctx.historyViewport.currentWindow()).toMatchObject({ start: 30, width: 70 });

    handleKey(ctx, { name: 'left' });
    expect(ctx.historyViewport.currentWindow()).toMatchObject({ start: 16, width: 70 });

    handleKey(ctx, { sequence: '-' });
    expect(ctx.historyViewport.isFitted()).toBe(true);

    handleKey(ctx, { sequence: '=' });
    handleKey(ctx, { name: 'f' });
    expect(ctx.historyViewport.currentWindow()).toEqual({ start: 0, width: 100, zoomLevel: 1 });
  });

  it('refits the history chart when switching to it', () => {
    const ctx = createAppContext(storeWithHistory(), 'Battery');
    handleKey(ctx, { name: 'h' });
    handleKey(ctx, { sequence: '+' });
    handleKey(ctx, { name: 'd' });
    handleKey(ctx, { name: 'h' });
    expect(ctx.historyViewport.isFitted()).toBe(true);
  });

  it('ignores session keys until the session exists', () => {
    const store = storeWithHistory();
    const ctx = createAppContext(store, 'Battery');
    expect(handleKey(ctx, { name: '1' })).toBe('ignored');

    addSession(store, 1_000_000, 12);
    expect(handleKey(ctx, { name: '2' })).toBe('ignored');
    expect(handleKey(ctx, { name: '1' })).toBe('redraw');
    expect(ctx.view).toEqual({ kind: 'session', index: 0 });
    expect(selectedSession(ctx)?.startTime).toBe(1_000_000);
    expect(viewSamples(ctx)).toHaveLength(12);
  });

  it('gives every session its own viewport', () => {
    const store = storeWithHistory();
    addSession(store, 1_000_000, 20);
    addSession(store, 2_000_000, 30);
    const ctx = createAppContext(store, 'Battery');

    handleKey(ctx, { name: '1' });
    handleKey(ctx, { sequence: '+' });
    expect(activeViewport(ctx)?.currentWindow()).toMatchObject({ start: 3, width: 14 });

    handleKey(ctx, { name: '2' });
    expect(activeViewport(ctx)?.currentWindow()).toEqual({ start: 0, width: 30, zoomLevel: 1 });
    expect(ctx.historyViewport.isFitted()).toBe(true);
  });

  it('drops viewports of evicted sessions', () => {
    const store = storeWithHistory();
    addSession(store, 1_000_000, 12);
    addSession(store, 2_000_000, 12);
    const ctx = createAppContext(store, 'Battery');
    handleKey(ctx, { name: '1' });
    handleKey(ctx, { name: '2' });

    addSession(store, 3_000_000, 12);
    handleKey(ctx, { name: '2' });

    expect([...ctx.sessionViewports.keys()].sort()).toEqual([2_000_000, 3_000_000]);
  });
});

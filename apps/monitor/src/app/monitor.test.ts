import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { BatterySample, PersistedHistory } from '@battrack/shared-types';
import { HistoryStore } from '../history/history-store';
import type { HistoryPersistence } from '../history/storage';
import type { SampleSource } from '../sampling/battery-reader';
import { makeSample } from '../testing/samples';
import { BatteryMonitor } from './monitor';

class RecordingPersistence implements HistoryPersistence {
  saved: PersistedHistory[] = [];

  load(): PersistedHistory | null {
    return null;
  }

  async write(document: PersistedHistory): Promise<void> {
    this.saved.push(document);
  }
}

class SequenceSource implements SampleSource {
  reads = 0;

  constructor(private readonly results: Array<BatterySample | null | Error>) {}

  async read(): Promise<BatterySample | null> {
    const result = this.results[Math.min(this.reads, this.results.length - 1)];
    this.reads++;
    if (result instanceof Error) throw result;
    return result;
  }
}

describe('BatteryMonitor', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('samples immediately and then on every interval', async () => {
    const history = new HistoryStore(new RecordingPersistence());
    const source = new SequenceSource([makeSample('Discharging', 70, 0)]);
    const monitor = new BatteryMonitor(source, history);
    const onSample = vi.fn();
    monitor.on('sample', onSample);

    await monitor.start();
    expect(history.sampleCount()).toBe(1);

    await vi.advanceTimersByTimeAsync(5000);
    await vi.advanceTimersByTimeAsync(5000);

    expect(history.sampleCount()).toBe(3);
    expect(onSample).toHaveBeenCalledTimes(3);
    expect(monitor.monitorState).toBe('running');
    await monitor.stop();
  });

  it('skips ticks where the sensor is unavailable', async () => {
    const history = new HistoryStore(new RecordingPersistence());
    const source = new SequenceSource([null, new Error('EIO'), makeSample('Charging', 40, 0)]);
    const monitor = new BatteryMonitor(source, history, { sampleIntervalMs: 1000 });
    const onUnavailable = vi.fn();
    monitor.on('unavailable', onUnavailable);

    await monitor.start();
    await vi.advanceTimersByTimeAsync(1000);
    expect(history.sampleCount()).toBe(0);
    expect(onUnavailable).toHaveBeenCalledTimes(2);

    await vi.advanceTimersByTimeAsync(1000);
    expect(history.sampleCount()).toBe(1);
    await monitor.stop();
  });

  it('announces autosaves', async () => {
    const persistence = new RecordingPersistence();
    const history = new HistoryStore(persistence, null, { autosaveEvery: 2 });
    const monitor = new BatteryMonitor(new SequenceSource([makeSample('Full', 100, 0)]), history);
    const onAutosave = vi.fn();
    monitor.on('autosave', onAutosave);

    await monitor.tick();
    await monitor.tick();
    await history.flush();

    expect(onAutosave).toHaveBeenCalledTimes(1);
    expect(persistence.saved).toHaveLength(1);
  });

  it('does not overlap reads', async () => {
    let release: (sample: BatterySample) => void = () => {};
    const source: SampleSource = {
      read: vi.fn(
        () =>
          new Promise<BatterySample | null>((resolve) => {
            release = resolve;
          })
      ),
    };
    const monitor = new BatteryMonitor(source, new HistoryStore(new RecordingPersistence()));

    const first = monitor.tick();
    await expect(monitor.tick()).resolves.toBeNull();
    release(makeSample('Charging', 50, 0));

    await expect(first).resolves.toMatchObject({ capacityPercent: 50 });
    expect(source.read).toHaveBeenCalledTimes(1);
  });

  it('saves on stop and stops sampling', async () => {
    const persistence = new RecordingPersistence();
    const history = new HistoryStore(persistence);
    const source = new SequenceSource([makeSample('Discharging', 70, 0)]);
    const monitor = new BatteryMonitor(source, history);
    const onSaved = vi.fn();
    monitor.on('saved', onSaved);

    await monitor.start();
    await expect(monitor.stop()).resolves.toBe(true);
    await vi.advanceTimersByTimeAsync(20_000);

    expect(source.reads).toBe(1);
    expect(persistence.saved).toHaveLength(1);
    expect(persistence.saved[0].samples).toHaveLength(1);
    expect(onSaved).toHaveBeenCalledWith(true);
    expect(monitor.monitorState).toBe('stopped');
    await expect(monitor.stop()).resolves.toBe(true);
    expect(persistence.saved).toHaveLength(1);
  });

  it('waits for an in-flight read before the final save', async () => {
    let release: (sample: BatterySample) => void = () => {};
    const source: SampleSource = {
      read: () =>
        new Promise<BatterySample | null>((resolve) => {
          release = resolve;
        }),
    };
    const persistence = new RecordingPersistence();
    const monitor = new BatteryMonitor(source, new HistoryStore(persistence));

    void monitor.tick();
    const stopping = monitor.stop();
    release(makeSample('Charging', 66, 0));
    await stopping;

    expect(persistence.saved[0].samples.map((s) => s.capacityPercent)).toEqual([66]);
  });
});

import { EventEmitter } from 'eventemitter3';
import type { BatterySample } from '@battrack/shared-types';
import { createLogger, type Logger } from '@battrack/shared-utils';
import { SAMPLE_INTERVAL_MS } from '../constants';
import type { HistoryStore } from '../history/history-store';
import type { SampleSource } from '../sampling/battery-reader';
import type { MonitorEvents, MonitorOptions, MonitorState } from './types';

/**
 * Sampling loop: reads the source on a fixed interval, records into the
 * history and lets it autosave. `stop()` waits for an in-flight read and
 * then forces a final save.
 */
export class BatteryMonitor extends EventEmitter<MonitorEvents> {
  private options: Required<MonitorOptions>;
  private state: MonitorState = 'idle';
  private sampleInterval: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<BatterySample | null> | null = null;
  private logger: Logger;

  constructor(
    private readonly source: SampleSource,
    private readonly history: HistoryStore,
    options: MonitorOptions = {}
  ) {
    super();
    this.options = {
      sampleIntervalMs: options.sampleIntervalMs ?? SAMPLE_INTERVAL_MS,
    };
    this.logger = createLogger('Monitor');
  }

  public get monitorState(): MonitorState {
    return this.state;
  }

  public async start(): Promise<void> {
    if (this.state !== 'idle') {
      this.logger.warn('Monitor already started');
      return;
    }

    this.setState('running');
    this.logger.info(`Sampling every ${this.options.sampleIntervalMs / 1000}s`);

    await this.tick();
    if (this.state !== 'running') return;

    this.sampleInterval = setInterval(() => {
      void this.tick();
    }, this.options.sampleIntervalMs);
  }

  /**
   * Takes one sample. A tick that overlaps a still running read is skipped.
   */
  public tick(): Promise<BatterySample | null> {
    if (this.inFlight) {
      this.logger.debug('Previous read still running, skipping tick');
      return Promise.resolve(null);
    }

    const current = this.sampleOnce().finally(() => {
      this.inFlight = null;
    });
    this.inFlight = current;
    return current;
  }

  public async stop(): Promise<boolean> {
    if (this.state === 'stopping' || this.state === 'stopped') {
      return true;
    }

    this.setState('stopping');
    if (this.sampleInterval) {
      clearInterval(this.sampleInterval);
      this.sampleInterval = null;
    }

    if (this.inFlight) {
      await this.inFlight;
    }

    const ok = await this.history.saveNow();
    this.emit('saved', ok);
    this.setState('stopped');
    return ok;
  }

  private async sampleOnce(): Promise<BatterySample | null> {
    let sample: BatterySample | null;
    try {
      sample = await this.source.read();
    } catch (error) {
      this.logger.warn('Sample source failed', error);
      sample = null;
    }

    if (!sample) {
      this.emit('unavailable');
      return null;
    }

    this.history.recordSample(sample);
    if (this.history.maybeAutosave()) {
      this.emit('autosave');
    }
    this.emit('sample', sample);
    return sample;
  }

  private setState(state: MonitorState): void {
    if (this.state !== state) {
      this.state = state;
      this.emit('stateChange', state);
    }
  }
}

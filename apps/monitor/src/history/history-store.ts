import type { BatterySample, ChargeSession, PersistedHistory } from '@battrack/shared-types';
import { createLogger } from '@battrack/shared-utils';
import { AUTOSAVE_EVERY_SAMPLES, MAX_SAMPLES } from '../constants';
import type { ChartViewport } from '../viewport/chart-viewport';
import { SessionTracker, type SessionTrackerOptions } from './session-tracker';
import type { HistoryPersistence } from './storage';

const logger = createLogger('HistoryStore');

export interface HistoryStoreOptions {
  capacityLimit: number;
  autosaveEvery: number;
  session: Partial<SessionTrackerOptions>;
}

const defaultOptions: HistoryStoreOptions = {
  capacityLimit: MAX_SAMPLES,
  autosaveEvery: AUTOSAVE_EVERY_SAMPLES,
  session: {},
};

/**
 * Bounded rolling sample history with charge session tracking.
 *
 * Samples beyond `capacityLimit` are evicted oldest first. Persistence is
 * asynchronous and never throws: a failed write is logged and the in-memory
 * state stays authoritative until the next save.
 */
export class HistoryStore {
  private samples: BatterySample[];
  // Evicted entries at the front of `samples`, dropped in bulk by compact()
  private head = 0;
  private samplesSinceSave = 0;
  private pendingWrite: Promise<boolean> = Promise.resolve(true);
  private readonly opts: HistoryStoreOptions;
  readonly sessions: SessionTracker;

  constructor(
    private readonly storage: HistoryPersistence,
    initial: PersistedHistory | null = null,
    options: Partial<HistoryStoreOptions> = {}
  ) {
    this.opts = { ...defaultOptions, ...options };
    this.samples = (initial?.samples ?? []).slice(-this.opts.capacityLimit);
    this.sessions = new SessionTracker(initial?.completedSessions ?? [], this.opts.session);
  }

  /**
   * Builds a store from whatever the storage holds. Missing or invalid
   * history yields an empty store.
   */
  static load(storage: HistoryPersistence, options: Partial<HistoryStoreOptions> = {}): HistoryStore {
    const initial = storage.load();
    const store = new HistoryStore(storage, initial, options);
    if (initial) {
      logger.info(
        `Loaded ${store.sampleCount()} samples and ${store.completedSessions().length} charge sessions`
      );
    }
    return store;
  }

  recordSample(sample: BatterySample): void {
    this.samples.push(sample);
    const overflow = this.sampleCount() - this.opts.capacityLimit;
    if (overflow > 0) {
      this.head += overflow;
      if (this.head >= this.opts.capacityLimit) {
        this.compact();
      }
    }
    this.samplesSinceSave++;
    this.sessions.record(sample);
  }

  /**
   * Schedules a save once `autosaveEvery` samples arrived since the last one.
   * Returns whether a save was scheduled.
   */
  maybeAutosave(): boolean {
    if (this.samplesSinceSave < this.opts.autosaveEvery) {
      return false;
    }
    void this.persist();
    return true;
  }

  /**
   * Saves regardless of the counter. Resolves to false if the write failed.
   */
  saveNow(): Promise<boolean> {
    return this.persist();
  }

  // Settles once every scheduled write has finished
  flush(): Promise<boolean> {
    return this.pendingWrite;
  }

  allSamples(): readonly BatterySample[] {
    return this.head === 0 ? this.samples : this.samples.slice(this.head);
  }

  sampleCount(): number {
    return this.samples.length - this.head;
  }

  lastSample(): BatterySample | null {
    return this.sampleCount() > 0 ? this.samples[this.samples.length - 1] : null;
  }

  completedSessions(): readonly ChargeSession[] {
    return this.sessions.completedSessions();
  }

  // Copies only the visible window; evicted entries stay until compact()
  visibleSamples(viewport: ChartViewport): BatterySample[] {
    const { start, end } = viewport.visibleRange(this.sampleCount());
    return this.samples.slice(this.head + start, this.head + end);
  }

  pendingSampleCount(): number {
    return this.samplesSinceSave;
  }

  snapshot(): PersistedHistory {
    return {
      version: 1,
      samples: this.samples.slice(this.head),
      completedSessions: [...this.completedSessions()],
    };
  }

  private compact(): void {
    if (this.head > 0) {
      this.samples = this.samples.slice(this.head);
      this.head = 0;
    }
  }

  private persist(): Promise<boolean> {
    const document = this.snapshot();
    this.samplesSinceSave = 0;

    // A write that throws synchronously must not leave the chain rejected
    this.pendingWrite = this.pendingWrite
      .then(() => this.storage.write(document))
      .then(
        () => true,
        (error: unknown) => {
          logger.error('Failed to save history', error);
          return false;
        }
      );
    return this.pendingWrite;
  }
}

import type { BatterySample, ChargeSession } from '@battrack/shared-types';
import { createLogger } from '@battrack/shared-utils';
import { MAX_COMPLETED_SESSIONS, SESSION_COMPLETE_PERCENT } from '../constants';

const logger = createLogger('SessionTracker');

export type TrackerState = 'idle' | 'active';

export interface SessionTrackerOptions {
  maxCompleted: number;
  completePercent: number;
}

const defaultOptions: SessionTrackerOptions = {
  maxCompleted: MAX_COMPLETED_SESSIONS,
  completePercent: SESSION_COMPLETE_PERCENT,
};

function copySample(sample: BatterySample): BatterySample {
  return { ...sample };
}

/**
 * Detects charge sessions from the sample stream.
 *
 * A session opens on the first Charging sample and closes on the first sample
 * with any other status. Only sessions that reached the completion threshold
 * are kept, and only the newest `maxCompleted` of those. Status is taken at
 * face value: a single non-Charging sample ends the session.
 */
export class SessionTracker {
  private active: ChargeSession | null = null;
  private completed: ChargeSession[];
  private readonly opts: SessionTrackerOptions;

  constructor(completed: ChargeSession[] = [], options: Partial<SessionTrackerOptions> = {}) {
    this.opts = { ...defaultOptions, ...options };
    this.completed = completed.slice(-this.opts.maxCompleted);
  }

  state(): TrackerState {
    return this.active ? 'active' : 'idle';
  }

  activeSession(): ChargeSession | null {
    return this.active;
  }

  // Oldest first
  completedSessions(): readonly ChargeSession[] {
    return this.completed;
  }

  record(sample: BatterySample): void {
    if (sample.status === 'Charging') {
      if (this.active) {
        this.extend(this.active, sample);
      } else {
        this.open(sample);
      }
      return;
    }

    if (this.active) {
      this.close(this.active);
    }
  }

  private open(sample: BatterySample): void {
    this.active = {
      startTime: sample.timestamp,
      endTime: null,
      startCapacity: sample.capacityPercent,
      endCapacity: sample.capacityPercent,
      samples: [copySample(sample)],
      reachedThreshold: sample.capacityPercent >= this.opts.completePercent,
      completed: false,
    };
    logger.info(`Charge session started at ${sample.capacityPercent}%`);
  }

  private extend(session: ChargeSession, sample: BatterySample): void {
    session.samples.push(copySample(sample));
    session.endCapacity = sample.capacityPercent;
    if (sample.capacityPercent >= this.opts.completePercent) {
      session.reachedThreshold = true;
    }
  }

  private close(session: ChargeSession): void {
    this.active = null;

    if (!session.reachedThreshold) {
      logger.info(`Charge session discarded at ${session.endCapacity}% (below ${this.opts.completePercent}%)`);
      return;
    }

    const last = session.samples[session.samples.length - 1];
    const sealed: ChargeSession = {
      ...session,
      endTime: last.timestamp,
      completed: true,
    };

    this.completed = [...this.completed, sealed].slice(-this.opts.maxCompleted);
    logger.info(`Charge session completed: ${sealed.startCapacity}% -> ${sealed.endCapacity}%`);
  }
}

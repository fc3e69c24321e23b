import { existsSync, readFileSync } from 'fs';
import { mkdir, rename, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { z } from 'zod';
import type { PersistedHistory } from '@battrack/shared-types';
import { BATTERY_STATUSES } from '@battrack/shared-types';
import { createLogger } from '@battrack/shared-utils';

const logger = createLogger('HistoryStorage');

const CURRENT_VERSION = 1 as const;

const statusSchema = z.enum(BATTERY_STATUSES);

const sampleSchema = z.object({
  timestamp: z.number().finite(),
  capacityPercent: z.number().min(0).max(100),
  powerWatts: z.number().finite(),
  voltageVolts: z.number().finite(),
  energyWattHours: z.number().finite(),
  energyFullWattHours: z.number().finite().default(0),
  status: statusSchema,
});

const sessionSchema = z.object({
  startTime: z.number().finite(),
  endTime: z.number().finite().nullable(),
  startCapacity: z.number().min(0).max(100),
  endCapacity: z.number().min(0).max(100),
  samples: z.array(sampleSchema).min(1),
  reachedThreshold: z.boolean(),
  completed: z.boolean(),
});

const historySchema = z.object({
  version: z.literal(CURRENT_VERSION),
  samples: z.array(sampleSchema),
  completedSessions: z.array(sessionSchema),
});

export interface HistoryPersistence {
  load(): PersistedHistory | null;
  write(document: PersistedHistory): Promise<void>;
}

export function parseHistory(raw: string): PersistedHistory | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    logger.warn('History file is not valid JSON');
    return null;
  }

  const result = historySchema.safeParse(parsed);
  if (!result.success) {
    logger.warn('History file failed validation', {
      issues: result.error.errors.slice(0, 3).map((e) => `${e.path.join('.')}: ${e.message}`),
    });
    return null;
  }

  return result.data;
}

/**
 * JSON file persistence for the sample history and completed sessions.
 *
 * Writes go to a sibling temp file that is renamed over the target, so a
 * crash mid-write leaves the previous history intact.
 */
export class HistoryFileStorage implements HistoryPersistence {
  constructor(public readonly filePath: string) {}

  load(): PersistedHistory | null {
    if (!existsSync(this.filePath)) {
      logger.info(`No history at ${this.filePath}, starting empty`);
      return null;
    }

    let raw: string;
    try {
      raw = readFileSync(this.filePath, 'utf-8');
    } catch (error) {
      logger.warn('Failed to read history file', error);
      return null;
    }

    return parseHistory(raw);
  }

  async write(document: PersistedHistory): Promise<void> {
    const data = JSON.stringify(document);
    const tmpPath = `${this.filePath}.tmp`;

    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFile(tmpPath, data, 'utf-8');
    await rename(tmpPath, this.filePath);
    logger.debug(`Saved ${document.samples.length} samples to ${this.filePath}`);
  }
}

import { createLogger } from '@battrack/shared-utils';
import type { BatteryMonitor } from './monitor';

const logger = createLogger('Shutdown');

/**
 * Stops sampling with a final save, restores the terminal and exits.
 * A failed save is logged but still exits with 0: history write failures
 * are never fatal.
 */
export async function shutdown(
  monitor: BatteryMonitor,
  restore?: () => void,
  exit: (code: number) => void = (code) => process.exit(code)
): Promise<void> {
  try {
    const saved = await monitor.stop();
    if (!saved) {
      logger.warn('Final save failed, latest samples were not written');
    }
  } catch (error) {
    logger.error('Shutdown failed', error);
  } finally {
    restore?.();
  }
  exit(0);
}

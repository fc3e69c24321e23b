#!/usr/bin/env tsx

import { join } from 'path';
import { emitKeypressEvents } from 'readline';
import { createLogger, setLogLevel } from '@battrack/shared-utils';
import { loadConfig } from './config';
import { HISTORY_FILE_NAME } from './constants';
import { describeError, isKnownError } from './errors';
import { BatteryReader } from './sampling/battery-reader';
import { HistoryFileStorage } from './history/storage';
import { HistoryStore } from './history/history-store';
import { BatteryMonitor } from './app/monitor';
import { shutdown } from './app/shutdown';
import { createAppContext, type AppContext } from './app/context';
import { handleKey, type KeyPress } from './app/keys';
import { render } from './ui/render';

const logger = createLogger('battrack');

const USAGE = `Usage: battrack [--record] [-h|--help]

  --record     Sample and save history without the interactive view
  -h, --help   Show this help

Environment:
  BATTRACK_DATA_DIR    Directory for history.json (default ~/.local/share/battrack)
  BATTRACK_LOG_LEVEL   debug | info | warn | error (default info)`;

const CLEAR_SCREEN = '\x1b[2J\x1b[H';
const HIDE_CURSOR = '\x1b[?25l';
const SHOW_CURSOR = '\x1b[?25h';

interface CliArgs {
  record: boolean;
  help: boolean;
}

function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { record: false, help: false };
  for (const arg of argv) {
    if (arg === '--record') {
      args.record = true;
    } else if (arg === '-h' || arg === '--help') {
      args.help = true;
    } else {
      console.error(`Unknown argument: ${arg}\n`);
      process.exitCode = 2;
      args.help = true;
    }
  }
  return args;
}

function onShutdownSignal(handler: () => void): void {
  process.once('SIGINT', handler);
  process.once('SIGTERM', handler);
}

async function runRecord(monitor: BatteryMonitor): Promise<void> {
  monitor.on('sample', (sample) => {
    logger.debug(`${sample.status} ${sample.capacityPercent.toFixed(1)}% ${sample.powerWatts.toFixed(2)} W`);
  });
  monitor.on('autosave', () => logger.info('Autosaving history'));

  onShutdownSignal(() => {
    logger.info('Shutting down...');
    void shutdown(monitor);
  });

  await monitor.start();
  logger.info('Recording. Press Ctrl+C to stop.');
}

async function runInteractive(monitor: BatteryMonitor, ctx: AppContext): Promise<void> {
  const { stdin, stdout } = process;
  if (!stdin.isTTY || !stdout.isTTY) {
    throw new Error('NO_TTY');
  }

  // Log lines would tear the frame
  setLogLevel('warn');

  const draw = () => {
    const lines = render(ctx, { columns: stdout.columns, rows: stdout.rows });
    stdout.write(CLEAR_SCREEN + lines.join('\n'));
  };

  let quitting = false;
  const quit = () => {
    if (quitting) return;
    quitting = true;
    void shutdown(monitor, () => {
      stdin.setRawMode(false);
      stdin.pause();
      stdout.write(CLEAR_SCREEN + SHOW_CURSOR);
    });
  };

  emitKeypressEvents(stdin);
  stdin.setRawMode(true);
  stdin.resume();
  stdout.write(HIDE_CURSOR);

  stdin.on('keypress', (_chunk: string | undefined, key: KeyPress | undefined) => {
    if (!key) return;
    const outcome = handleKey(ctx, key);
    if (outcome === 'quit') {
      quit();
    } else if (outcome === 'redraw') {
      draw();
    }
  });
  stdout.on('resize', draw);
  monitor.on('sample', draw);
  onShutdownSignal(quit);

  draw();
  await monitor.start();
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    console.log(USAGE);
    return;
  }

  const config = loadConfig();
  setLogLevel(config.logLevel);

  const reader = new BatteryReader();
  const batteryName = await reader.probe();
  logger.info(`Monitoring ${batteryName}`);

  const storage = new HistoryFileStorage(join(config.dataDir, HISTORY_FILE_NAME));
  const history = HistoryStore.load(storage);
  const monitor = new BatteryMonitor(reader, history);

  if (args.record) {
    await runRecord(monitor);
  } else {
    await runInteractive(monitor, createAppContext(history, batteryName));
  }
}

main().catch((error: unknown) => {
  if (isKnownError(error)) {
    console.error(`Error: ${describeError(error)}`);
  } else {
    console.error('Error:', error);
  }
  process.exit(1);
});

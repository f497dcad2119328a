/**
 * CLI: quotawatch live / once: the terminal KPI view.
 */

import { DualCadenceScheduler, toJSON } from '@quotawatch/engine';
import { getFlag, getNumberFlag } from './args.js';
import { createContext } from './context.js';
import { renderFrame } from './render.js';

const CLEAR_SCREEN = '\x1b[2J\x1b[H';

export async function runLive(args: string[]): Promise<void> {
  const ctx = createContext({ configPath: getFlag(args, '--config'), logToFile: true });
  const intervalSec = getNumberFlag(args, '--interval') ?? ctx.config.engine.refreshIntervalSec;
  const color = Boolean(process.stdout.isTTY) && !args.includes('--no-color');

  const scheduler = new DualCadenceScheduler({
    engine: ctx.engine,
    tickMs: ctx.config.engine.tickMs,
    refreshMs: intervalSec * 1000,
    logger: ctx.logger,
    onTick: (snapshot, now) => {
      process.stdout.write(CLEAR_SCREEN + renderFrame(snapshot, now, { color }) + '\n');
    },
  });

  const shutdown = (): void => {
    scheduler.stop();
    ctx.close();
    process.stdout.write('\n');
    process.exit(0);
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  await scheduler.start();
}

export async function runOnce(args: string[]): Promise<void> {
  const ctx = createContext({ configPath: getFlag(args, '--config') });

  try {
    const outcome = await ctx.engine.refresh();
    if (outcome.status === 'source-unavailable') {
      console.error(`Usage source unavailable: ${outcome.error.message}`);
      process.exitCode = 1;
      return;
    }

    if (args.includes('--json')) {
      console.log(toJSON(outcome.snapshot));
      return;
    }

    const color = Boolean(process.stdout.isTTY) && !args.includes('--no-color');
    console.log(renderFrame(outcome.snapshot, new Date(), { color }));
  } finally {
    ctx.close();
  }
}

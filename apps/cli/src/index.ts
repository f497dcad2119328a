#!/usr/bin/env node

import { errorMessage, isQuotawatchError } from '@quotawatch/core';
import { runCalibrate } from './calibrate.js';
import { runLive, runOnce } from './live.js';
import { runReport } from './report.js';
import { runTrack } from './track.js';

const USAGE = `
quotawatch - usage KPI monitor

Usage:
  quotawatch live [--interval N] [--no-color]   Live view; data refresh every N seconds (default 60)
  quotawatch once [--json] [--no-color]         Print one frame (or the snapshot as JSON)
  quotawatch report [--json] [--out FILE]       Markdown usage report
  quotawatch track [--days N]                   Record daily efficiency rows and write the outbox report
  quotawatch calibrate --show                   Show the stored calibration
  quotawatch calibrate --set-cap NAME=LIMIT[@HOUR][:MODELS] [--set-cap ...]
                       [--anchor YYYY-MM-DD] [--reset-hour H]
                       [--baseline RATIO] [--floor RATIO]
  quotawatch calibrate --cap NAME --pct N [--cap NAME --pct N]
                                                Derive cap limits from observed usage %

Options:
  --config <file>  Config file (default: ./quotawatch.toml, then $QUOTAWATCH_HOME/config.toml)
  --json           Machine-readable output
  --interval <N>   Seconds between data refreshes in live mode
  --days <N>       Days to record in track (default: 8)
`.trim();

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const command = args[0];

  switch (command) {
    case 'live':
      await runLive(args.slice(1));
      break;

    case 'once':
      await runOnce(args.slice(1));
      break;

    case 'report':
      await runReport(args.slice(1));
      break;

    case 'track':
      await runTrack(args.slice(1));
      break;

    case 'calibrate':
      await runCalibrate(args.slice(1));
      break;

    case 'help':
    case '--help':
    case '-h':
      console.log(USAGE);
      break;

    default:
      if (command) {
        console.error(`Unknown command: ${command}\n`);
      }
      console.log(USAGE);
      process.exit(command ? 1 : 0);
  }
}

main().catch((err) => {
  console.error(isQuotawatchError(err) ? `Error: ${err.message}` : `Fatal error: ${errorMessage(err)}`);
  process.exit(1);
});

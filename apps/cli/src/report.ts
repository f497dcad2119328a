/**
 * CLI: quotawatch report: one refresh, printed as the Markdown usage report.
 */

import fs from 'node:fs';
import path from 'node:path';
import { formatReport, toJSON } from '@quotawatch/engine';
import { getFlag } from './args.js';
import { createContext } from './context.js';

export async function runReport(args: string[]): Promise<void> {
  const ctx = createContext({ configPath: getFlag(args, '--config') });

  try {
    const outcome = await ctx.engine.refresh();
    if (outcome.status === 'source-unavailable') {
      console.error(`Usage source unavailable: ${outcome.error.message}`);
      process.exitCode = 1;
      return;
    }

    const text = args.includes('--json') ? toJSON(outcome.snapshot) : formatReport(outcome.snapshot);
    const outPath = getFlag(args, '--out');

    if (outPath) {
      fs.mkdirSync(path.dirname(path.resolve(outPath)), { recursive: true });
      fs.writeFileSync(outPath, text, 'utf-8');
      console.log(`Report written: ${outPath}`);
      return;
    }

    console.log(text);
  } finally {
    ctx.close();
  }
}

/**
 * Usage source over Claude's JSONL session logs (~/.claude/projects).
 * Streamed assistant turns are written several times; the last copy of each
 * message id wins. Turns are priced and rolled into one record per hour and
 * model.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { startOfHour } from '@quotawatch/core';
import type { RateTable, UsageRecord, UsageRecordSource } from '@quotawatch/core';
import { MODEL_PRICING, priceTokens, resolvePricing } from './rates.js';
import type { JsonlFileInfo, TokenEntry } from './types.js';

export interface JsonlSourceOptions {
  projectsDir: string;
  rates: RateTable;
}

export function defaultProjectsDir(): string {
  return path.join(process.env.HOME ?? '~', '.claude', 'projects');
}

const usageSchema = z.object({
  input_tokens: z.number().optional(),
  output_tokens: z.number().optional(),
  cache_creation_input_tokens: z.number().optional(),
  cache_read_input_tokens: z.number().optional(),
});

const messageSchema = z.object({
  id: z.string().optional(),
  model: z.string(),
  usage: usageSchema,
});

const assistantLineSchema = z.object({
  type: z.literal('assistant'),
  timestamp: z.string(),
  requestId: z.string().optional(),
  message: messageSchema,
});

const progressLineSchema = z.object({
  type: z.literal('progress'),
  timestamp: z.string().optional(),
  data: z.object({
    message: z.object({
      timestamp: z.string().optional(),
      requestId: z.string().optional(),
      message: messageSchema,
    }),
  }),
});

interface ExtractedTurn {
  key: string | undefined;
  timestamp: string | undefined;
  message: z.infer<typeof messageSchema>;
}

function extractTurn(obj: unknown): ExtractedTurn | null {
  const assistant = assistantLineSchema.safeParse(obj);
  if (assistant.success) {
    const line = assistant.data;
    return { key: line.message.id ?? line.requestId, timestamp: line.timestamp, message: line.message };
  }

  const progress = progressLineSchema.safeParse(obj);
  if (progress.success) {
    const inner = progress.data.data.message;
    return {
      key: inner.message.id ?? inner.requestId,
      timestamp: inner.timestamp ?? progress.data.timestamp,
      message: inner.message,
    };
  }

  return null;
}

/**
 * Parse one JSONL file's content into token entries keyed by message id.
 * Lines before `sinceMs`, synthetic turns and unparsable lines are skipped.
 */
export function parseJsonlContent(
  content: string,
  filePath: string,
  sinceMs: number,
  into: Map<string, TokenEntry> = new Map(),
): Map<string, TokenEntry> {
  for (const line of content.split('\n')) {
    if (!line.trim()) continue;
    let obj: unknown;
    try { obj = JSON.parse(line); } catch { continue; }

    const turn = extractTurn(obj);
    if (!turn || !turn.timestamp) continue;
    if (turn.message.model === '<synthetic>') continue;

    const ts = Date.parse(turn.timestamp);
    if (Number.isNaN(ts) || ts < sinceMs) continue;

    const usage = turn.message.usage;
    into.set(turn.key ?? `${filePath}:${turn.timestamp}`, {
      model: turn.message.model,
      timestamp: turn.timestamp,
      input: usage.input_tokens ?? 0,
      output: usage.output_tokens ?? 0,
      cacheCreate: usage.cache_creation_input_tokens ?? 0,
      cacheRead: usage.cache_read_input_tokens ?? 0,
    });
  }
  return into;
}

/** Price entries and roll them into one record per local hour and model. */
export function bucketEntries(
  entries: Iterable<TokenEntry>,
  rates: RateTable = MODEL_PRICING,
): UsageRecord[] {
  const buckets = new Map<string, {
    timestamp: string;
    model: string;
    inputTokens: number;
    outputTokens: number;
    cacheWriteTokens: number;
    cacheReadTokens: number;
    costUsd: number;
  }>();

  for (const e of entries) {
    const hour = startOfHour(new Date(e.timestamp)).toISOString();
    const key = `${hour}|${e.model}`;
    const bucket = buckets.get(key) ?? {
      timestamp: hour,
      model: e.model,
      inputTokens: 0,
      outputTokens: 0,
      cacheWriteTokens: 0,
      cacheReadTokens: 0,
      costUsd: 0,
    };

    bucket.inputTokens += e.input;
    bucket.outputTokens += e.output;
    bucket.cacheWriteTokens += e.cacheCreate;
    bucket.cacheReadTokens += e.cacheRead;
    bucket.costUsd += priceTokens(
      { inputTokens: e.input, outputTokens: e.output, cacheWriteTokens: e.cacheCreate, cacheReadTokens: e.cacheRead },
      resolvePricing(e.model, rates),
    );
    buckets.set(key, bucket);
  }

  return [...buckets.values()].sort((a, b) => a.timestamp.localeCompare(b.timestamp) || a.model.localeCompare(b.model));
}

async function listDir(dir: string): Promise<string[]> {
  try {
    return await fs.readdir(dir);
  } catch {
    return [];
  }
}

async function statIfRecent(file: string, cutoff: number): Promise<JsonlFileInfo | null> {
  try {
    const st = await fs.stat(file);
    return st.isFile() && st.mtimeMs > cutoff ? { path: file, mtimeMs: st.mtimeMs } : null;
  } catch {
    return null;
  }
}

/** <project>/*.jsonl and <project>/<session>/subagents/*.jsonl touched after `cutoff`. */
export async function findJsonlFiles(projectsDir: string, cutoff: number): Promise<JsonlFileInfo[]> {
  const files: JsonlFileInfo[] = [];

  for (const proj of await listDir(projectsDir)) {
    const projPath = path.join(projectsDir, proj);

    for (const entry of await listDir(projPath)) {
      const full = path.join(projPath, entry);

      if (entry.endsWith('.jsonl')) {
        const info = await statIfRecent(full, cutoff);
        if (info) files.push(info);
        continue;
      }

      const subDir = path.join(full, 'subagents');
      for (const sf of await listDir(subDir)) {
        if (!sf.endsWith('.jsonl')) continue;
        const info = await statIfRecent(path.join(subDir, sf), cutoff);
        if (info) files.push(info);
      }
    }
  }

  return files;
}

export class JsonlUsageSource implements UsageRecordSource {
  readonly name = 'claude-jsonl';
  private options: JsonlSourceOptions;

  constructor(options?: Partial<JsonlSourceOptions>) {
    this.options = {
      projectsDir: options?.projectsDir ?? defaultProjectsDir(),
      rates: options?.rates ?? MODEL_PRICING,
    };
  }

  async fetchUsage(since: Date, signal?: AbortSignal): Promise<UsageRecord[]> {
    const sinceMs = since.getTime();
    const files = await findJsonlFiles(this.options.projectsDir, sinceMs);
    const byMsgId = new Map<string, TokenEntry>();

    // Oldest first so a later file's copy of a message wins.
    files.sort((a, b) => a.mtimeMs - b.mtimeMs);

    for (const file of files) {
      signal?.throwIfAborted();
      let content: string;
      try {
        content = await fs.readFile(file.path, { encoding: 'utf-8', signal });
      } catch (err) {
        if (signal?.aborted) throw err;
        continue;
      }
      parseJsonlContent(content, file.path, sinceMs, byMsgId);
    }

    return bucketEntries(byMsgId.values(), this.options.rates);
  }
}

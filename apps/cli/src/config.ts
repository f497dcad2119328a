import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { ConfigError, DEFAULT_ENGINE_CONFIG, formatIssues, isLocalDate } from '@quotawatch/core';
import type { EngineConfig, LoggingConfig } from '@quotawatch/core';

export type SourceKind = 'jsonl' | 'ccusage';

export interface QuotawatchConfig {
  engine: EngineConfig & {
    refreshIntervalSec: number;
    tickMs: number;
  };
  source: {
    kind: SourceKind;
    projectsDir?: string;
    ccusageCommand: string;
  };
  logging: LoggingConfig;
  paths: {
    home: string;
    db: string;
    outbox: string;
  };
}

export type TomlValue = string | number | boolean | string[];
export type TomlDocument = Record<string, Record<string, TomlValue>>;

const defaults = DEFAULT_ENGINE_CONFIG;

const cutoffsSchema = (fallback: { warn: number; abort: number }) =>
  z
    .object({
      warn: z.number().finite().default(fallback.warn),
      abort: z.number().finite().default(fallback.abort),
    })
    .refine((c) => c.warn <= c.abort, 'warn must not exceed abort')
    .default({});

const positive = z.number().finite().positive();

const configSchema = z.object({
  engine: z
    .object({
      planMonthlyUsd: positive.default(defaults.planMonthlyUsd),
      weeklySpendBaselineUsd: positive.default(defaults.weeklySpendBaselineUsd),
      runRateDays: z.number().int().min(1).max(7).default(defaults.runRateDays),
      lookbackDays: z.number().int().min(8).max(90).default(defaults.lookbackDays),
      sourceTimeoutMs: z.number().int().positive().default(defaults.sourceTimeoutMs),
      minElapsedFraction: z.number().min(0).max(1).default(defaults.minElapsedFraction),
      scheduledReservePct: z.number().min(0).max(1).default(defaults.scheduledReservePct),
      defaultAnchorDate: z
        .string()
        .refine(isLocalDate, 'must be a YYYY-MM-DD calendar date')
        .default(defaults.defaultAnchor.anchorDate),
      defaultResetHour: z.number().int().min(0).max(23).default(defaults.defaultAnchor.resetHour),
      refreshIntervalSec: positive.default(60),
      tickMs: z.number().int().positive().default(1000),
    })
    .default({}),
  source: z
    .object({
      kind: z.enum(['jsonl', 'ccusage']).default('jsonl'),
      projectsDir: z.string().min(1).optional(),
      ccusageCommand: z.string().min(1).default('ccusage'),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
      json: z.boolean().default(false),
      file: z.string().min(1).optional(),
    })
    .default({}),
  paths: z
    .object({
      home: z.string().min(1).optional(),
      db: z.string().min(1).optional(),
      outbox: z.string().min(1).optional(),
    })
    .default({}),
  cutoffs: z
    .object({
      quota: cutoffsSchema(defaults.cutoffs.quota),
      projection: cutoffsSchema(defaults.cutoffs.projection),
      spend: cutoffsSchema(defaults.cutoffs.spend),
    })
    .default({}),
});

export function defaultHome(env: NodeJS.ProcessEnv = process.env): string {
  return env['QUOTAWATCH_HOME'] ?? path.join(env['HOME'] ?? '~', '.quotawatch');
}

function configPaths(env: NodeJS.ProcessEnv): string[] {
  return [
    path.join(process.cwd(), 'quotawatch.toml'),
    path.join(defaultHome(env), 'config.toml'),
  ];
}

function expandHome(p: string, env: NodeJS.ProcessEnv): string {
  return p.replace(/^~(?=$|\/)/, env['HOME'] ?? '~');
}

/**
 * Load config from TOML file or return defaults. The first existing file of
 * ./quotawatch.toml and <home>/config.toml wins.
 */
export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): QuotawatchConfig {
  const pathsToTry = configPath ? [configPath] : configPaths(env);

  for (const p of pathsToTry) {
    const resolved = expandHome(p, env);
    if (fs.existsSync(resolved)) {
      const content = fs.readFileSync(resolved, 'utf-8');
      return resolveConfig(parseToml(content), env, resolved);
    }
  }

  if (configPath) throw new ConfigError(`Config file not found: ${configPath}`);
  return resolveConfig({}, env);
}

/** Validate a parsed TOML document and fill in defaults. */
export function resolveConfig(
  doc: TomlDocument,
  env: NodeJS.ProcessEnv = process.env,
  origin: string = 'defaults',
): QuotawatchConfig {
  const cutoffs: Record<string, Record<string, TomlValue>> = {};
  const sections: Record<string, unknown> = {};

  for (const [name, values] of Object.entries(doc)) {
    if (name.startsWith('cutoffs.')) cutoffs[name.slice('cutoffs.'.length)] = values;
    else sections[name] = values;
  }
  if (Object.keys(cutoffs).length > 0) sections['cutoffs'] = cutoffs;

  const parsed = configSchema.safeParse(sections);
  if (!parsed.success) {
    throw new ConfigError(`Invalid config (${origin}): ${formatIssues(parsed.error).join('; ')}`);
  }

  const { engine, source, logging, paths, cutoffs: bands } = parsed.data;
  const { defaultAnchorDate, defaultResetHour, ...engineRest } = engine;
  const home = expandHome(paths.home ?? defaultHome(env), env);

  return {
    engine: {
      ...engineRest,
      cutoffs: bands,
      defaultAnchor: { anchorDate: defaultAnchorDate, resetHour: defaultResetHour },
    },
    source: {
      ...source,
      projectsDir: source.projectsDir ? expandHome(source.projectsDir, env) : undefined,
    },
    logging: {
      ...logging,
      file: logging.file ? expandHome(logging.file, env) : undefined,
    },
    paths: {
      home,
      db: paths.db ? expandHome(paths.db, env) : path.join(home, 'quotawatch.db'),
      outbox: paths.outbox ? expandHome(paths.outbox, env) : path.join(home, 'outbox'),
    },
  };
}

/**
 * Minimal TOML parser for our config structure: [section] and
 * [section.sub] headers, scalar values and string arrays.
 */
export function parseToml(content: string): TomlDocument {
  const doc: TomlDocument = {};
  let currentSection = '';

  const lines = content.split('\n');
  let i = 0;

  while (i < lines.length) {
    const line = stripComment(lines[i]).trim();
    i++;

    if (!line) continue;

    // Section header
    const sectionMatch = line.match(/^\[(.+)\]$/);
    if (sectionMatch) {
      currentSection = sectionMatch[1].trim();
      continue;
    }

    // Key-value pair
    const kvMatch = line.match(/^(\w+)\s*=\s*(.+)$/);
    if (!kvMatch || !currentSection) continue;

    const key = kvMatch[1];
    let rawValue = kvMatch[2].trim();

    // Multi-line arrays: value starts with '[' but doesn't end with ']'
    if (rawValue.startsWith('[') && !rawValue.endsWith(']')) {
      while (i < lines.length) {
        const nextLine = stripComment(lines[i]).trim();
        i++;
        rawValue += ' ' + nextLine;
        if (nextLine.endsWith(']')) break;
      }
    }

    const section = doc[currentSection] ?? {};
    section[camelCase(key)] = parseTomlValue(rawValue);
    doc[currentSection] = section;
  }

  return doc;
}

/** Drops a trailing `# comment` that is not inside a quoted string. */
function stripComment(line: string): string {
  let quoted = false;
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (ch === '"') quoted = !quoted;
    else if (ch === '#' && !quoted) return line.slice(0, i);
  }
  return line;
}

function parseTomlValue(raw: string): TomlValue {
  if (raw === 'true') return true;
  if (raw === 'false') return false;

  if (/^-?\d+(\.\d+)?$/.test(raw.replace(/_/g, ''))) return Number(raw.replace(/_/g, ''));

  // Array of strings
  if (raw.startsWith('[') && raw.endsWith(']')) {
    const inner = raw.slice(1, -1).trim();
    if (!inner) return [];
    return inner
      .split(',')
      .map((s) => unquote(s.trim()))
      .filter((s) => s.length > 0);
  }

  return unquote(raw);
}

function unquote(s: string): string {
  if (s.length >= 2 && s.startsWith('"') && s.endsWith('"')) return s.slice(1, -1);
  return s;
}

function camelCase(snakeCase: string): string {
  return snakeCase.replace(/_([a-z])/g, (_, c: string) => c.toUpperCase());
}

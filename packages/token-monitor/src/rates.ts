import type { RateTable, TokenPricing, UsageRecord } from '@quotawatch/core';

// ─── Model Pricing (cost per million tokens, USD) ─────────────

export const MODEL_PRICING: RateTable = {
  'claude-opus-4-6':            { input: 15,   output: 75,  cacheWrite: 18.75, cacheRead: 1.50 },
  'claude-opus-4-5':            { input: 15,   output: 75,  cacheWrite: 18.75, cacheRead: 1.50 },
  'claude-sonnet-4-6':          { input: 3,    output: 15,  cacheWrite: 3.75,  cacheRead: 0.30 },
  'claude-sonnet-4-5':          { input: 3,    output: 15,  cacheWrite: 3.75,  cacheRead: 0.30 },
  'claude-haiku-4-5':           { input: 0.8,  output: 4,   cacheWrite: 1.0,   cacheRead: 0.08 },
};

export const DEFAULT_PRICING: TokenPricing = { input: 3, output: 15, cacheWrite: 3.75, cacheRead: 0.30 };

const DATE_SUFFIX = /-\d{8}$/;

/**
 * Exact id first, then the id without its -YYYYMMDD release suffix, then the
 * same two with a `claude-` prefix, then the default rate.
 */
export function resolvePricing(
  model: string,
  table: RateTable = MODEL_PRICING,
  fallback: TokenPricing = DEFAULT_PRICING,
): TokenPricing {
  const candidates = [model, model.replace(DATE_SUFFIX, '')];
  if (!model.startsWith('claude-')) {
    candidates.push(`claude-${model}`, `claude-${model.replace(DATE_SUFFIX, '')}`);
  }
  for (const id of candidates) {
    const pricing = table[id];
    if (pricing) return pricing;
  }
  return fallback;
}

export function priceTokens(
  tokens: Pick<UsageRecord, 'inputTokens' | 'outputTokens' | 'cacheWriteTokens' | 'cacheReadTokens'>,
  pricing: TokenPricing,
): number {
  return (
    tokens.inputTokens * pricing.input +
    tokens.outputTokens * pricing.output +
    tokens.cacheWriteTokens * pricing.cacheWrite +
    tokens.cacheReadTokens * pricing.cacheRead
  ) / 1e6;
}

/** Source-supplied cost wins; otherwise price the tokens. */
export function recordCost(record: UsageRecord, table: RateTable = MODEL_PRICING): number {
  return record.costUsd ?? priceTokens(record, resolvePricing(record.model, table));
}

/** "claude-sonnet-4-5-20250929" -> "sonnet-4-5" */
export function shortModelName(model: string): string {
  return model.replace(/^claude-/, '').replace(DATE_SUFFIX, '');
}

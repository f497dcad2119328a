import type { CutoffDirection, GateDecision, Metric, RiskBand } from './models.js';
import { ConfigError } from './errors.js';

export interface GateConfig {
  warn: number;
  abort: number;
  direction: CutoffDirection;
}

const DEFAULT_CONFIG: GateConfig = {
  warn: 0.8,
  abort: 0.9,
  direction: 'ascending',
};

const GATE_FOR_BAND: Record<RiskBand, GateDecision> = {
  nominal: 'permit',
  elevated: 'warn',
  critical: 'deny',
  unknown: 'warn',
};

/**
 * Threshold/gate evaluator: maps a metric onto nominal / elevated / critical
 * using a warn and an abort cutoff, and answers "should a caller proceed?".
 *
 * Ascending: higher is worse (utilization). Descending: lower is worse
 * (efficiency against a baseline). Pure; the same value always yields the
 * same band.
 */
export class GateEvaluator {
  private config: GateConfig;

  constructor(config?: Partial<GateConfig>) {
    this.config = { ...DEFAULT_CONFIG, ...config };

    const { warn, abort, direction } = this.config;
    if (!Number.isFinite(warn) || !Number.isFinite(abort)) {
      throw new ConfigError(`Gate cutoffs must be finite (warn=${warn}, abort=${abort})`);
    }
    if (direction === 'ascending' && warn > abort) {
      throw new ConfigError(`Ascending gate needs warn <= abort (warn=${warn}, abort=${abort})`);
    }
    if (direction === 'descending' && warn < abort) {
      throw new ConfigError(`Descending gate needs warn >= abort (warn=${warn}, abort=${abort})`);
    }
  }

  get cutoffs(): Readonly<GateConfig> {
    return this.config;
  }

  band(value: number): RiskBand {
    if (Number.isNaN(value)) return 'unknown';
    const { warn, abort, direction } = this.config;

    if (direction === 'ascending') {
      if (value >= abort) return 'critical';
      if (value >= warn) return 'elevated';
      return 'nominal';
    }

    if (value <= abort) return 'critical';
    if (value < warn) return 'elevated';
    return 'nominal';
  }

  gate(value: number): GateDecision {
    return GATE_FOR_BAND[this.band(value)];
  }

  bandOf(metric: Metric<number>): RiskBand {
    return metric.status === 'ok' ? this.band(metric.value) : 'unknown';
  }
}

export function gateForBand(band: RiskBand): GateDecision {
  return GATE_FOR_BAND[band];
}

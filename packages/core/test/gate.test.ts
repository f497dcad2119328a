import { describe, it, expect } from 'vitest';
import { GateEvaluator, gateForBand } from '../src/gate.js';
import { ConfigError } from '../src/errors.js';
import { insufficientData, ok, uncalibrated } from '../src/models.js';

describe('GateEvaluator (ascending)', () => {
  const gate = new GateEvaluator({ warn: 0.8, abort: 0.9 });

  it('bands by the two cutoffs', () => {
    expect(gate.band(0.5)).toBe('nominal');
    expect(gate.band(0.8)).toBe('elevated');
    expect(gate.band(0.89)).toBe('elevated');
    expect(gate.band(0.9)).toBe('critical');
    expect(gate.band(3.0)).toBe('critical');
  });

  it('maps bands to gate decisions', () => {
    expect(gate.gate(0.5)).toBe('permit');
    expect(gate.gate(0.85)).toBe('warn');
    expect(gate.gate(1.2)).toBe('deny');
  });

  it('treats NaN as unknown', () => {
    expect(gate.band(Number.NaN)).toBe('unknown');
    expect(gate.gate(Number.NaN)).toBe('warn');
  });

  it('gives sentinel metrics an unknown band', () => {
    expect(gate.bandOf(uncalibrated())).toBe('unknown');
    expect(gate.bandOf(insufficientData('no days'))).toBe('unknown');
    expect(gateForBand(gate.bandOf(uncalibrated()))).toBe('warn');
    expect(gate.bandOf(ok(0.95))).toBe('critical');
  });

  it('is deterministic', () => {
    const values = [0.1, 0.8, 0.9, 1.5, 0.8, 0.1];
    expect(values.map((v) => gate.band(v))).toEqual(values.map((v) => gate.band(v)));
  });
});

describe('GateEvaluator (descending)', () => {
  const gate = new GateEvaluator({ warn: 15.5, abort: 12, direction: 'descending' });

  it('treats lower values as worse', () => {
    expect(gate.band(20)).toBe('nominal');
    expect(gate.band(15.5)).toBe('nominal');
    expect(gate.band(13)).toBe('elevated');
    expect(gate.band(12)).toBe('critical');
    expect(gate.band(4)).toBe('critical');
  });
});

describe('GateEvaluator validation', () => {
  it('rejects cutoffs in the wrong order', () => {
    expect(() => new GateEvaluator({ warn: 0.9, abort: 0.8 })).toThrow(ConfigError);
    expect(() => new GateEvaluator({ warn: 10, abort: 12, direction: 'descending' })).toThrow(ConfigError);
  });

  it('rejects non-finite cutoffs', () => {
    expect(() => new GateEvaluator({ warn: Number.NaN })).toThrow(ConfigError);
    expect(() => new GateEvaluator({ abort: Number.POSITIVE_INFINITY })).toThrow(ConfigError);
  });

  it('defaults to 0.8 / 0.9 ascending', () => {
    expect(new GateEvaluator().cutoffs).toEqual({ warn: 0.8, abort: 0.9, direction: 'ascending' });
  });
});

describe('band helpers', () => {
  it('gateForBand', () => {
    expect(gateForBand('nominal')).toBe('permit');
    expect(gateForBand('critical')).toBe('deny');
  });
});

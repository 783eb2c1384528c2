import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'url';
import { ConfigurationError, clearConfigCache, loadConfigFromYaml } from '@stratlab/utils';
import { DEFAULT_EVALUATION_CONFIG, loadEvaluationConfig } from '../../src/config.js';

describe('loadEvaluationConfig', () => {
  it('uses defaults when the section is absent', () => {
    expect(loadEvaluationConfig({})).toEqual(DEFAULT_EVALUATION_CONFIG);
    expect(DEFAULT_EVALUATION_CONFIG.backtest.simulator.maxBarsForward).toBe(72);
    expect(DEFAULT_EVALUATION_CONFIG.walkForward.windowDays).toBe(30);
    expect(DEFAULT_EVALUATION_CONFIG.selection.minTrades).toBe(50);
  });

  it('merges partial overrides with defaults', () => {
    const config = loadEvaluationConfig({
      evaluation: { symbol: 'EURUSD', backtest: { simulator: { pipSize: 0.0001 } } },
    });

    expect(config.symbol).toBe('EURUSD');
    expect(config.backtest.simulator).toEqual({ maxBarsForward: 72, pipSize: 0.0001 });
    expect(config.backtest.runner.horizonsDays).toEqual([30, 60]);
  });

  it('rejects selector weights that do not sum to 1', () => {
    expect(() =>
      loadEvaluationConfig({
        evaluation: {
          selection: {
            weights: {
              winRate: 0.5,
              profitFactor: 0.5,
              sharpeRatio: 0.5,
              expectancy: 0,
              maxDrawdown: 0,
            },
          },
        },
      })
    ).toThrow(ConfigurationError);
  });

  it('names the offending key', () => {
    expect(() => loadEvaluationConfig({ evaluation: { recentBars: -1 } })).toThrow(
      /evaluation\.recentBars/
    );
  });

  it('reads the shipped config.yaml as the defaults', () => {
    const path = fileURLToPath(new URL('../../../../config.yaml', import.meta.url));

    expect(loadEvaluationConfig(loadConfigFromYaml(path))).toEqual(DEFAULT_EVALUATION_CONFIG);
    clearConfigCache();
  });
});

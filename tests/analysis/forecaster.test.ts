import { describe, it, expect } from 'vitest';
import { CustomForecastModel } from '../../src/analysis/forecastModels';
import { Forecaster, accuracyOf, assertValidSeries } from '../../src/analysis/forecaster';
import { twoSidedZ } from '../../src/analysis/statistics';
import { createEngineConfig } from '../../src/config/config';
import { InsufficientHistoryError, InvalidSeriesError } from '../../src/utils/errors';
import { HOUR_MS, START, cpuSamples, hourlySeries } from '../helpers/samples';

const config = createEngineConfig();
const z = twoSidedZ(0.8);

const linear = (count: number) => Array.from({ length: count }, (_, i) => 10 + 0.5 * i);
const squareWave = Array.from({ length: 72 }, (_, i) => (i % 24 < 12 ? 60 : 40));

describe('Forecaster', () => {
  describe('selectModel', () => {
    it('should fall back to a linear trend below two seasonal periods', () => {
      const selection = new Forecaster(config).selectModel(20);

      expect(selection.model.type).toBe('naive-trend');
      expect(selection.fallbackReason).toBe('20 point(s) is less than the 48 needed for seasonal decomposition');
    });

    it('should use seasonal decomposition with enough history', () => {
      const selection = new Forecaster(config).selectModel(48);

      expect(selection.model.type).toBe('seasonal-decomposition');
      expect(selection.fallbackReason).toBeUndefined();
    });

    it('should prefer a custom model once its history is met', () => {
      const custom = new CustomForecastModel('flat', 5, () => ({ predict: () => 42, residualStd: 0 }));
      const forecaster = new Forecaster(config, custom);

      expect(forecaster.selectModel(5).model.type).toBe('custom');
      expect(forecaster.selectModel(4).model.type).toBe('naive-trend');
    });
  });

  describe('forecast', () => {
    it('should extend a linear series with bounds that widen with the step', () => {
      const run = new Forecaster(config).forecast('node-a', 'cpu_utilization', hourlySeries(linear(20)), 4);

      expect(run.modelType).toBe('naive-trend');
      expect(run.historySize).toBe(20);
      expect(run.intervalMs).toBe(HOUR_MS);
      expect(run.points).toHaveLength(4);
      expect(run.points.map(p => p.step)).toEqual([1, 2, 3, 4]);
      expect(run.points[0]?.forecast).toBeCloseTo(20, 6);
      expect(run.points[3]?.forecast).toBeCloseTo(21.5, 6);
      expect(run.points[0]?.timestamp.getTime()).toBe(START + 20 * HOUR_MS);

      // Residuals are ~0, so the minimum sigma of 0.1 sizes the bounds
      const first = run.points[0];
      const last = run.points[3];
      expect((first?.upperBound ?? 0) - (first?.lowerBound ?? 0)).toBeCloseTo(2 * z * 0.1, 6);
      expect((last?.upperBound ?? 0) - (last?.lowerBound ?? 0)).toBeCloseTo(2 * z * 0.1 * 2, 6);
      expect(first?.confidence).toBe(0.8);
    });

    it('should widen bounds at every step for a noisy series', () => {
      const noisy = Array.from({ length: 30 }, (_, i) => 40 + i * 0.3 + (i % 3 === 0 ? 2 : -1));
      const run = new Forecaster(config).forecast('node-a', 'memory_utilization', hourlySeries(noisy));
      const widths = run.points.map(p => p.upperBound - p.lowerBound);

      expect(run.points).toHaveLength(24);
      widths.slice(1).forEach((width, i) => expect(width).toBeGreaterThan(widths[i] ?? Infinity));
      run.points.forEach(p => {
        expect(p.lowerBound).toBeLessThanOrEqual(p.forecast);
        expect(p.forecast).toBeLessThanOrEqual(p.upperBound);
      });
    });

    it('should leave a single spike out of the fit', () => {
      const spiked = linear(30).map((value, i) => (i === 15 ? value + 60 : value));
      const run = new Forecaster(config).forecast('node-a', 'cpu_utilization', hourlySeries(spiked), 1);
      const first = run.points[0];

      expect(run.historySize).toBe(30);
      expect(run.outliersRemoved).toBe(1);
      expect(first?.timestamp.getTime()).toBe(START + 30 * HOUR_MS);
      expect(first?.forecast).toBeCloseTo(25, 6);
      expect((first?.upperBound ?? 0) - (first?.lowerBound ?? 0)).toBeCloseTo(2 * z * 0.1, 6);
    });

    it('should fit every point when outlier trimming is off', () => {
      const spiked = linear(30).map((value, i) => (i === 15 ? value + 60 : value));
      const run = new Forecaster(createEngineConfig({ forecastOutlierSigma: 0 })).forecast(
        'node-a',
        'cpu_utilization',
        hourlySeries(spiked),
        1
      );
      const first = run.points[0];

      expect(run.outliersRemoved).toBe(0);
      expect(run.residualStd).toBeGreaterThan(1);
      expect((first?.upperBound ?? 0) - (first?.lowerBound ?? 0)).toBeGreaterThan(2 * z);
    });

    it('should refuse a forecast when too few points survive trimming', () => {
      const narrow = createEngineConfig({ minHistoryForForecast: 6, forecastOutlierSigma: 0.5 });

      expect(() =>
        new Forecaster(narrow).forecast('node-a', 'cpu_utilization', hourlySeries([0, 0, 10, 10, 20, 20]))
      ).toThrow('Forecaster (after dropping 4 outlier(s)) needs at least 5 sample(s), got 2');
    });

    it('should tolerate irregular sampling', () => {
      const hours = [0, 1, 2, 4, 5, 6, 7, 8, 10, 11];
      const series = hours.map(h => ({ timestamp: new Date(START + h * HOUR_MS), value: 2 * h }));
      const run = new Forecaster(config).forecast('node-a', 'cpu_utilization', series, 1);

      expect(run.intervalMs).toBe(HOUR_MS);
      expect(run.points[0]?.timestamp.getTime()).toBe(START + 12 * HOUR_MS);
      expect(run.points[0]?.forecast).toBeCloseTo(24, 6);
    });

    it('should keep the daily shape with seasonal decomposition', () => {
      const run = new Forecaster(config).forecast('node-a', 'cpu_utilization', hourlySeries(squareWave));
      const high = run.points[0]?.forecast ?? 0;
      const low = run.points[12]?.forecast ?? 0;

      expect(run.modelType).toBe('seasonal-decomposition');
      expect(run.fallbackReason).toBeUndefined();
      expect(high - low).toBeCloseTo(20, 6);
      expect(high).toBeCloseTo(53.332, 3);
    });

    it('should use a custom model', () => {
      const custom = new CustomForecastModel('flat', 3, () => ({ predict: () => 42, residualStd: 0 }));
      const run = new Forecaster(config, custom).forecast('node-a', 'disk_utilization', hourlySeries(linear(10)), 3);

      expect(run.modelType).toBe('custom');
      expect(run.points.map(p => p.forecast)).toEqual([42, 42, 42]);
    });

    it('should forecast a resource from samples', () => {
      const samples = cpuSamples('node-b', [10, 11, 12, 13, 14, 15, 16, 17, 18, 19]);
      const run = new Forecaster(config).forecastResource(samples, 'cpu', 2);

      expect(run.node).toBe('node-b');
      expect(run.metric).toBe('cpu_utilization');
      expect(run.points[1]?.forecast).toBeCloseTo(21, 6);
    });

    it('should refuse short histories', () => {
      const forecaster = new Forecaster(config);

      expect(() => forecaster.forecast('node-a', 'cpu_utilization', hourlySeries(linear(9)))).toThrow(
        InsufficientHistoryError
      );
      expect(() => forecaster.forecast('node-a', 'cpu_utilization', hourlySeries(linear(9)))).toThrow(
        'Forecaster needs at least 10 sample(s), got 9'
      );
    });

    it('should reject duplicate, out-of-order and non-finite points', () => {
      const series = hourlySeries(linear(12));
      const duplicate = [...series.slice(0, 5), ...series.slice(4)];
      const reversed = [...series].reverse();
      const broken = series.map((p, i) => (i === 3 ? { ...p, value: NaN } : p));
      const forecaster = new Forecaster(config);

      expect(() => forecaster.forecast('node-a', 'cpu_utilization', duplicate)).toThrow(InvalidSeriesError);
      expect(() => forecaster.forecast('node-a', 'cpu_utilization', reversed)).toThrow(InvalidSeriesError);
      expect(() => assertValidSeries(broken)).toThrow('Point 3 has a non-finite value');
    });
  });

  describe('backtest', () => {
    it('should score a constant series perfectly', () => {
      const series = hourlySeries(Array.from({ length: 25 }, () => 50));
      const result = new Forecaster(config).backtest('node-a', 'cpu_utilization', series, 5);

      expect(result.trainingSize).toBe(20);
      expect(result.holdout).toBe(5);
      expect(result.mae).toBe(0);
      expect(result.rmse).toBe(0);
      expect(result.mape).toBe(0);
      expect(result.points.map(p => p.timestamp.getTime())).toEqual(series.slice(20).map(p => p.timestamp.getTime()));
      expect(result.actuals).toEqual([50, 50, 50, 50, 50]);
    });

    it('should trim a spike from the training window', () => {
      const spiked = linear(30).map((value, i) => (i === 5 ? value + 60 : value));
      const result = new Forecaster(config).backtest('node-a', 'cpu_utilization', hourlySeries(spiked), 5);

      expect(result.trainingSize).toBe(25);
      expect(result.mae).toBeCloseTo(0, 6);
    });

    it('should leave MAPE undefined when every actual is zero', () => {
      const series = hourlySeries(Array.from({ length: 15 }, () => 0));

      expect(new Forecaster(config).backtest('node-a', 'cpu_utilization', series, 5).mape).toBeNull();
    });

    it('should report non-negative errors for a noisy series', () => {
      const noisy = Array.from({ length: 30 }, (_, i) => 40 + i * 0.3 + (i % 4 === 0 ? 3 : -1));
      const result = new Forecaster(config).backtest('node-a', 'cpu_utilization', hourlySeries(noisy), 6);

      expect(result.mae).toBeGreaterThan(0);
      expect(result.rmse).toBeGreaterThanOrEqual(result.mae);
      expect(result.mape).toBeGreaterThan(0);
    });

    it('should need enough training points after the holdout', () => {
      expect(() => new Forecaster(config).backtest('node-a', 'cpu_utilization', hourlySeries(linear(12)), 5)).toThrow(
        'Backtest needs at least 15 sample(s), got 12'
      );
    });

    it('should reject a holdout that is not a positive integer', () => {
      expect(() => new Forecaster(config).backtest('node-a', 'cpu_utilization', hourlySeries(linear(20)), 0)).toThrow(
        RangeError
      );
    });
  });

  describe('accuracyOf', () => {
    it('should compute MAE, MAPE and RMSE', () => {
      const metrics = accuracyOf([10, 20], [12, 16]);

      expect(metrics.mae).toBe(3);
      expect(metrics.rmse).toBeCloseTo(Math.sqrt(10), 10);
      expect(metrics.mape).toBeCloseTo(20.8333, 4);
    });
  });
});

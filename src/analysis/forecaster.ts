import { getLogger } from '@fluidware-it/saddlebag';
import type { EngineConfig } from '../config/config';
import type {
  AccuracyMetrics,
  BacktestResult,
  ForecastPoint,
  ForecastRun,
  TimeSeriesPoint
} from '../types/forecast';
import { UTILIZATION_METRICS, utilizationOf, type MetricSample, type ResourceKind, type UtilizationMetric } from '../types/metrics';
import { InsufficientHistoryError, InvalidSeriesError } from '../utils/errors';
import { NaiveTrendModel, SeasonalDecompositionModel, type FittedModel, type ForecastModel } from './forecastModels';
import { mean, median, stdDev, twoSidedZ } from './statistics';

const logger = getLogger();

// Fewest points a fit may keep after outlier trimming
export const MIN_POINTS_AFTER_TRIM = 5;

export interface ModelSelection {
  model: ForecastModel;
  fallbackReason?: string | undefined;
}

interface ProjectionTarget {
  x: number;
  time: number;
}

interface PreparedSeries {
  origin: number;
  intervalMs: number;
  // Position of the last input point, trimmed or not
  lastX: number;
  xs: number[];
  ys: number[];
  outliersRemoved: number;
}

export function seriesFor(samples: readonly MetricSample[], resource: ResourceKind): TimeSeriesPoint[] {
  return samples.map(s => ({ timestamp: s.timestamp, value: utilizationOf(s, resource) }));
}

// Rejects duplicate, out-of-order or non-finite points
export function assertValidSeries(series: readonly TimeSeriesPoint[]): void {
  series.forEach((point, i) => {
    const time = point.timestamp.getTime();
    if (!Number.isFinite(time)) {
      throw new InvalidSeriesError(`Point ${i} has an invalid timestamp`);
    }
    if (!Number.isFinite(point.value)) {
      throw new InvalidSeriesError(`Point ${i} has a non-finite value`);
    }
    const previous = series[i - 1];
    if (!previous) return;
    const previousTime = previous.timestamp.getTime();
    if (time === previousTime) {
      throw new InvalidSeriesError(`Duplicate timestamp ${point.timestamp.toISOString()} at point ${i}`);
    }
    if (time < previousTime) {
      throw new InvalidSeriesError(`Timestamp ${point.timestamp.toISOString()} at point ${i} precedes the previous point`);
    }
  });
}

export function accuracyOf(predicted: readonly number[], actuals: readonly number[]): AccuracyMetrics {
  const n = Math.min(predicted.length, actuals.length);
  let absolute = 0;
  let squared = 0;
  let percentage = 0;
  let percentageCount = 0;

  for (let i = 0; i < n; i++) {
    const actual = actuals[i] ?? 0;
    const error = actual - (predicted[i] ?? 0);
    absolute += Math.abs(error);
    squared += error * error;
    if (actual !== 0) {
      percentage += Math.abs(error / actual);
      percentageCount++;
    }
  }

  return {
    mae: n === 0 ? 0 : absolute / n,
    mape: percentageCount === 0 ? null : (percentage / percentageCount) * 100,
    rmse: n === 0 ? 0 : Math.sqrt(squared / n)
  };
}

/**
 * Projects utilization series forward with confidence bounds that widen
 * with the horizon step. The model is picked from the history length:
 * a custom model when one is supplied and fits, seasonal decomposition
 * when two full periods are available, otherwise a linear trend with
 * the fallback reason recorded on the run. Outliers are left out of the
 * fit but still count towards the series' timing.
 */
export class Forecaster {
  private readonly seasonal: SeasonalDecompositionModel;
  private readonly naive = new NaiveTrendModel();
  private readonly z: number;

  constructor(
    private readonly config: EngineConfig,
    private readonly customModel?: ForecastModel | undefined
  ) {
    this.seasonal = new SeasonalDecompositionModel(config.seasonalPeriod);
    this.z = twoSidedZ(config.forecastConfidence);
  }

  selectModel(historySize: number): ModelSelection {
    if (this.customModel && historySize >= this.customModel.minHistory) {
      return { model: this.customModel };
    }
    const seasonalMinimum = Math.max(this.config.minHistoryForSeasonal, this.seasonal.minHistory);
    if (historySize >= seasonalMinimum) {
      return { model: this.seasonal };
    }
    return {
      model: this.naive,
      fallbackReason: `${historySize} point(s) is less than the ${seasonalMinimum} needed for seasonal decomposition`
    };
  }

  forecast(node: string, metric: UtilizationMetric, series: readonly TimeSeriesPoint[], horizon?: number): ForecastRun {
    const steps = horizon ?? this.config.forecastHorizonPoints;
    const prepared = this.prepare('Forecaster', series);
    if (prepared.outliersRemoved > 0) {
      logger.info(`Forecast ${node}/${metric} dropped ${prepared.outliersRemoved} outlier(s) before fitting`);
    }
    const { model, fallbackReason } = this.selectModel(prepared.ys.length);
    if (fallbackReason) {
      logger.info(`Forecast ${node}/${metric} uses ${model.name}: ${fallbackReason}`);
    }

    const fitted = model.fit(prepared.xs, prepared.ys);
    const lastX = prepared.lastX;
    const lastTime = series[series.length - 1]?.timestamp.getTime() ?? prepared.origin;
    const targets = Array.from({ length: steps }, (_, i) => ({
      x: lastX + i + 1,
      time: lastTime + (i + 1) * prepared.intervalMs
    }));
    const points = this.project(node, metric, model, fitted, targets);

    return {
      node,
      metric,
      modelType: model.type,
      fallbackReason,
      historySize: series.length,
      outliersRemoved: prepared.outliersRemoved,
      intervalMs: prepared.intervalMs,
      residualStd: fitted.residualStd,
      points
    };
  }

  forecastResource(samples: readonly MetricSample[], resource: ResourceKind, horizon?: number): ForecastRun {
    const node = samples[0]?.node ?? 'unknown';
    return this.forecast(node, UTILIZATION_METRICS[resource], seriesFor(samples, resource), horizon);
  }

  /**
   * Withholds the last `holdout` points, forecasts them at their real
   * timestamps and scores the forecast against the withheld actuals.
   */
  backtest(
    node: string,
    metric: UtilizationMetric,
    series: readonly TimeSeriesPoint[],
    holdout: number = this.config.forecastHorizonPoints
  ): BacktestResult {
    if (!Number.isInteger(holdout) || holdout < 1) {
      throw new RangeError(`Backtest holdout must be a positive integer, got ${holdout}`);
    }
    assertValidSeries(series);

    const trainingSize = series.length - holdout;
    const minimum = this.config.minHistoryForForecast;
    if (trainingSize < minimum) {
      throw new InsufficientHistoryError('Backtest', minimum + holdout, series.length);
    }

    const training = series.slice(0, trainingSize);
    const withheld = series.slice(trainingSize);
    const prepared = this.prepare('Backtest', training);
    const { model } = this.selectModel(prepared.ys.length);
    const fitted = model.fit(prepared.xs, prepared.ys);
    const targets = withheld.map(p => ({
      x: (p.timestamp.getTime() - prepared.origin) / prepared.intervalMs,
      time: p.timestamp.getTime()
    }));
    const points = this.project(node, metric, model, fitted, targets);
    const actuals = withheld.map(p => p.value);

    return {
      node,
      metric,
      modelType: model.type,
      holdout,
      trainingSize,
      points,
      actuals,
      ...accuracyOf(points.map(p => p.forecast), actuals)
    };
  }

  private prepare(component: string, series: readonly TimeSeriesPoint[]): PreparedSeries {
    assertValidSeries(series);
    if (series.length < this.config.minHistoryForForecast) {
      throw new InsufficientHistoryError(component, this.config.minHistoryForForecast, series.length);
    }

    const times = series.map(p => p.timestamp.getTime());
    const gaps = times.slice(1).map((t, i) => t - (times[i] ?? t));
    const intervalMs = median(gaps);
    const origin = times[0] ?? 0;
    const xs = times.map(t => (t - origin) / intervalMs);
    const ys = series.map(p => p.value);
    const keep = this.inliers(ys);
    const outliersRemoved = ys.length - keep.length;

    if (outliersRemoved > 0 && keep.length < MIN_POINTS_AFTER_TRIM) {
      throw new InsufficientHistoryError(
        `${component} (after dropping ${outliersRemoved} outlier(s))`,
        MIN_POINTS_AFTER_TRIM,
        keep.length
      );
    }

    return {
      origin,
      intervalMs,
      lastX: xs[xs.length - 1] ?? 0,
      xs: keep.map(i => xs[i] ?? 0),
      ys: keep.map(i => ys[i] ?? 0),
      outliersRemoved
    };
  }

  // Indexes of values within forecastOutlierSigma standard deviations of the mean; 0 keeps everything
  private inliers(ys: readonly number[]): number[] {
    const all = ys.map((_, i) => i);
    const limit = this.config.forecastOutlierSigma * stdDev(ys);
    if (limit <= 0) return all;
    const center = mean(ys);
    return all.filter(i => Math.abs((ys[i] ?? center) - center) <= limit);
  }

  private project(
    node: string,
    metric: UtilizationMetric,
    model: ForecastModel,
    fitted: FittedModel,
    targets: readonly ProjectionTarget[]
  ): ForecastPoint[] {
    const sigma = Math.max(Number.isFinite(fitted.residualStd) ? fitted.residualStd : 0, this.config.forecastMinSigma);

    return targets.map((target, i) => {
      const forecast = fitted.predict(target.x);
      if (!Number.isFinite(forecast)) {
        throw new Error(`${model.name} produced a non-finite forecast for ${node}/${metric}`);
      }
      const step = i + 1;
      const halfWidth = this.z * sigma * Math.sqrt(step);
      return {
        node,
        metric,
        timestamp: new Date(target.time),
        step,
        forecast,
        lowerBound: forecast - halfWidth,
        upperBound: forecast + halfWidth,
        confidence: this.config.forecastConfidence,
        modelType: model.type
      };
    });
  }
}

import type { ForecastModelType } from '../types/forecast';
import { linearRegression, mean } from './statistics';

/**
 * A model fitted on one series. `x` is time measured in sample intervals
 * from the first training point; `residualStd` is the in-sample residual
 * standard deviation used to size confidence bounds.
 */
export interface FittedModel {
  predict(x: number): number;
  readonly residualStd: number;
}

export interface ForecastModel {
  readonly type: ForecastModelType;
  readonly name: string;
  // Fewest training points the model accepts
  readonly minHistory: number;
  fit(xs: readonly number[], ys: readonly number[]): FittedModel;
}

function residualStd(residuals: readonly number[], parameters: number): number {
  if (residuals.length === 0) return 0;
  const dof = residuals.length > parameters ? residuals.length - parameters : residuals.length;
  const squares = residuals.reduce((acc, r) => acc + r * r, 0);
  return Math.sqrt(squares / dof);
}

export class NaiveTrendModel implements ForecastModel {
  readonly type = 'naive-trend' as const;
  readonly name = 'linear trend';
  readonly minHistory = 2;

  fit(xs: readonly number[], ys: readonly number[]): FittedModel {
    const { slope, intercept } = linearRegression(xs, ys);
    const predict = (x: number) => intercept + slope * x;
    const residuals = ys.map((y, i) => y - predict(xs[i] ?? 0));
    return { predict, residualStd: residualStd(residuals, 2) };
  }
}

/**
 * Additive decomposition: linear trend plus a per-phase seasonal offset.
 * Phase is the rounded interval index modulo the period, so irregular
 * sampling lands on the nearest slot.
 */
export class SeasonalDecompositionModel implements ForecastModel {
  readonly type = 'seasonal-decomposition' as const;
  readonly name: string;
  readonly minHistory: number;

  constructor(readonly period: number) {
    this.name = `seasonal decomposition (period ${period})`;
    this.minHistory = 2 * period;
  }

  private phaseOf(x: number): number {
    const slot = Math.round(x) % this.period;
    return slot < 0 ? slot + this.period : slot;
  }

  fit(xs: readonly number[], ys: readonly number[]): FittedModel {
    const trend = linearRegression(xs, ys);
    const trendAt = (x: number) => trend.intercept + trend.slope * x;

    const buckets: number[][] = Array.from({ length: this.period }, () => []);
    ys.forEach((y, i) => {
      const x = xs[i] ?? 0;
      buckets[this.phaseOf(x)]?.push(y - trendAt(x));
    });

    const rawSeasonal = buckets.map(bucket => (bucket.length > 0 ? mean(bucket) : 0));
    const offset = mean(rawSeasonal);
    const seasonal = rawSeasonal.map(s => s - offset);
    const seasonalAt = (x: number) => seasonal[this.phaseOf(x)] ?? 0;

    const predict = (x: number) => trendAt(x) + seasonalAt(x);
    const residuals = ys.map((y, i) => y - predict(xs[i] ?? 0));
    return { predict, residualStd: residualStd(residuals, 2 + this.period - 1) };
  }
}

export type FitFunction = (xs: readonly number[], ys: readonly number[]) => FittedModel;

// Caller-supplied model, used in place of the built-in ones when history allows
export class CustomForecastModel implements ForecastModel {
  readonly type = 'custom' as const;

  constructor(
    readonly name: string,
    readonly minHistory: number,
    private readonly fitFn: FitFunction
  ) {}

  fit(xs: readonly number[], ys: readonly number[]): FittedModel {
    return this.fitFn(xs, ys);
  }
}

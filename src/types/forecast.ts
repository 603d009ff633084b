import type { ResourceKind, UtilizationMetric } from './metrics';

export type ForecastModelType = 'seasonal-decomposition' | 'naive-trend' | 'custom';

export interface TimeSeriesPoint {
  timestamp: Date;
  value: number;
}

export interface ForecastPoint {
  node: string;
  metric: UtilizationMetric;
  timestamp: Date;
  step: number;
  forecast: number;
  lowerBound: number;
  upperBound: number;
  confidence: number;
  modelType: ForecastModelType;
}

export interface ForecastRun {
  node: string;
  metric: UtilizationMetric;
  modelType: ForecastModelType;
  // Set when a simpler model was used because history was too short
  fallbackReason?: string | undefined;
  historySize: number;
  // Points left out of the fit as outliers
  outliersRemoved: number;
  intervalMs: number;
  residualStd: number;
  points: ForecastPoint[];
}

export interface AccuracyMetrics {
  mae: number;
  // null when every withheld actual is zero
  mape: number | null;
  rmse: number;
}

export interface BacktestResult extends AccuracyMetrics {
  node: string;
  metric: UtilizationMetric;
  modelType: ForecastModelType;
  holdout: number;
  trainingSize: number;
  points: ForecastPoint[];
  actuals: number[];
}

export type ForecastOutcome =
  | {
      status: 'available';
      run: ForecastRun;
      backtest?: BacktestResult | undefined;
      // Why a requested backtest could not run
      backtestUnavailable?: string | undefined;
    }
  | { status: 'unavailable'; resource: ResourceKind; code: string; reason: string };

import { getLogger } from '@fluidware-it/saddlebag';
import type { EngineConfig } from '../config/config';
import type { ForecastOutcome, ForecastRun } from '../types/forecast';
import type { MetricSample, RawMetricSample, ResourceKind } from '../types/metrics';
import type { NodeReport } from '../types/report';
import { InsufficientHistoryError, isAnalysisError, type AnalysisError } from '../utils/errors';
import { detectAnomalies, scanAnomalies } from './anomalyDetector';
import { Forecaster, seriesFor } from './forecaster';
import { buildRecommendations } from './recommendationEngine';
import { classifySample } from './riskClassifier';
import { validateWindow } from './sampleValidator';
import { analyzeUtilization } from './utilizationAnalyzer';

const logger = getLogger();

export interface NodeAnalysisOptions {
  forecaster?: Forecaster | undefined;
  horizon?: number | undefined;
  // Run a backtest with this many withheld points next to each forecast
  backtestHoldout?: number | undefined;
}

// Errors a single resource's forecast may fail with without failing the node
function isForecastFailure(error: unknown): error is AnalysisError {
  return isAnalysisError(error) && (error.code === 'INSUFFICIENT_HISTORY' || error.code === 'INVALID_SERIES');
}

function forecastOutcome(
  samples: readonly MetricSample[],
  resource: ResourceKind,
  forecaster: Forecaster,
  options: NodeAnalysisOptions
): ForecastOutcome {
  let run: ForecastRun;
  try {
    run = forecaster.forecastResource(samples, resource, options.horizon);
  } catch (error) {
    if (!isForecastFailure(error)) throw error;
    logger.warn(`No ${resource} forecast for ${samples[0]?.node ?? 'node'}: ${error.message}`);
    return { status: 'unavailable', resource, code: error.code, reason: error.message };
  }

  if (options.backtestHoldout === undefined) return { status: 'available', run };
  try {
    const backtest = forecaster.backtest(run.node, run.metric, seriesFor(samples, resource), options.backtestHoldout);
    return { status: 'available', run, backtest };
  } catch (error) {
    if (!isForecastFailure(error)) throw error;
    return { status: 'available', run, backtestUnavailable: error.message };
  }
}

function unavailableForecasts(reason: string): Record<ResourceKind, ForecastOutcome> {
  const unavailable = (resource: ResourceKind): ForecastOutcome => ({
    status: 'unavailable',
    resource,
    code: 'INSUFFICIENT_HISTORY',
    reason
  });
  return { cpu: unavailable('cpu'), memory: unavailable('memory'), disk: unavailable('disk') };
}

/**
 * Runs the full analysis for one node over a pre-fetched window:
 * validation, risk classification of the latest sample, anomaly
 * detection, utilization analysis, forecasting and recommendations.
 * Invalid samples are excluded and counted on the analysis; a window
 * in which every sample is invalid fails with InsufficientHistoryError.
 */
export function analyzeNode(
  node: string,
  rawWindow: readonly RawMetricSample[],
  config: EngineConfig,
  options: NodeAnalysisOptions = {}
): NodeReport {
  const { samples, excluded } = validateWindow(node, rawWindow);
  if (excluded.length > 0) {
    logger.warn(`Excluded ${excluded.length} of ${rawWindow.length} sample(s) for ${node}`);
  }
  if (rawWindow.length > 0 && samples.length === 0) {
    throw new InsufficientHistoryError(`Analysis of ${node}`, 1, 0);
  }

  const latest = samples[samples.length - 1];
  const assessment = latest ? classifySample(latest, config) : null;
  const anomalies = latest ? detectAnomalies(samples.slice(0, -1), latest, config) : null;
  const anomalyEvents = scanAnomalies(samples, config);
  const analysis = analyzeUtilization(node, samples, config, excluded);

  const forecaster = options.forecaster ?? new Forecaster(config);
  const forecasts =
    samples.length === 0
      ? unavailableForecasts(`No valid samples for ${node}`)
      : {
          cpu: forecastOutcome(samples, 'cpu', forecaster, options),
          memory: forecastOutcome(samples, 'memory', forecaster, options),
          disk: forecastOutcome(samples, 'disk', forecaster, options)
        };

  const recommendations = assessment ? buildRecommendations({ analysis, assessment, anomalies, forecasts, config }) : [];

  return { node, latest: latest ?? null, analysis, assessment, anomalies, anomalyEvents, forecasts, recommendations };
}

import type { EngineConfig } from '../config/config';
import type { AnomalyCheck, AnomalyEvent, AnomalyReport, AnomalyVerdict } from '../types/anomaly';
import { RESOURCE_KINDS, utilizationOf, type MetricSample, type ResourceKind } from '../types/metrics';
import { mean, stdDev } from './statistics';

interface Baseline {
  mean: number;
  stdDev: number;
}

function baselineOf(values: readonly number[]): Baseline {
  return { mean: mean(values), stdDev: stdDev(values) };
}

function deviationOf(value: number, baseline: Baseline, epsilon: number): number {
  const distance = Math.abs(value - baseline.mean);
  if (baseline.stdDev > 0) return distance / baseline.stdDev;
  // Constant history: any departure beyond epsilon is unbounded in sigma terms
  return distance > epsilon ? Number.POSITIVE_INFINITY : 0;
}

function checkValue(resource: ResourceKind, value: number, baseline: Baseline, config: EngineConfig): AnomalyCheck {
  const deviation = deviationOf(value, baseline, config.anomalyEpsilon);
  const spread = config.anomalyKSigma * baseline.stdDev;
  return {
    status: deviation > config.anomalyKSigma ? 'anomalous' : 'normal',
    resource,
    value,
    mean: baseline.mean,
    stdDev: baseline.stdDev,
    deviation,
    expectedRange: [baseline.mean - spread, baseline.mean + spread]
  };
}

function trailingWindow(history: readonly MetricSample[], config: EngineConfig): readonly MetricSample[] {
  return history.slice(Math.max(0, history.length - config.anomalyWindowSize));
}

/**
 * Judges the newest sample against the trailing window of `history`
 * (which must not contain the newest sample). A window smaller than
 * anomalyMinHistory gives an indeterminate verdict for every resource.
 */
export function detectAnomalies(
  history: readonly MetricSample[],
  newest: MetricSample,
  config: EngineConfig
): AnomalyReport {
  const window = trailingWindow(history, config);

  const verdictFor = (resource: ResourceKind): AnomalyVerdict => {
    if (window.length < config.anomalyMinHistory) {
      return {
        status: 'indeterminate',
        resource,
        reason: 'insufficient-history',
        historySize: window.length,
        required: config.anomalyMinHistory
      };
    }
    const baseline = baselineOf(window.map(s => utilizationOf(s, resource)));
    return checkValue(resource, utilizationOf(newest, resource), baseline, config);
  };

  const verdicts: Record<ResourceKind, AnomalyVerdict> = {
    cpu: verdictFor('cpu'),
    memory: verdictFor('memory'),
    disk: verdictFor('disk')
  };

  const all = RESOURCE_KINDS.map(r => verdicts[r]);
  return {
    node: newest.node,
    timestamp: newest.timestamp,
    verdicts,
    anomalous: all.some(v => v.status === 'anomalous'),
    indeterminate: all.some(v => v.status === 'indeterminate')
  };
}

/**
 * Walks a whole window and reports every sample that deviates from its own
 * preceding trailing window. Deviations above anomalyKSigma are High,
 * those above anomalyWarnSigma are Medium.
 */
export function scanAnomalies(samples: readonly MetricSample[], config: EngineConfig): AnomalyEvent[] {
  const events: AnomalyEvent[] = [];

  for (let i = config.anomalyMinHistory; i < samples.length; i++) {
    const sample = samples[i];
    if (!sample) continue;
    const window = trailingWindow(samples.slice(0, i), config);

    for (const resource of RESOURCE_KINDS) {
      const baseline = baselineOf(window.map(s => utilizationOf(s, resource)));
      const value = utilizationOf(sample, resource);
      const deviation = deviationOf(value, baseline, config.anomalyEpsilon);
      if (deviation <= config.anomalyWarnSigma) continue;

      const spread = config.anomalyWarnSigma * baseline.stdDev;
      events.push({
        node: sample.node,
        timestamp: sample.timestamp,
        resource,
        value,
        deviation,
        warningBand: [baseline.mean - spread, baseline.mean + spread],
        severity: deviation > config.anomalyKSigma ? 'High' : 'Medium'
      });
    }
  }

  return events;
}

import type { EngineConfig } from '../config/config';
import type { UtilizationAnalysis } from '../types/analysis';
import type { AnomalyReport } from '../types/anomaly';
import type { ForecastOutcome, ForecastPoint } from '../types/forecast';
import { RESOURCE_KINDS, type ResourceKind } from '../types/metrics';
import {
  RecommendationSeverity,
  type CapacityRecommendation,
  type ForecastCrossing
} from '../types/recommendation';
import { RiskLevel, type RiskAssessment } from '../types/risk';
import { classifyUtilization, compareRiskLevels } from './riskClassifier';

const SEVERITY_ORDER: Record<RecommendationSeverity, number> = {
  [RecommendationSeverity.MEDIUM]: 0,
  [RecommendationSeverity.HIGH]: 1,
  [RecommendationSeverity.CRITICAL]: 2
};

const RESOURCE_LABELS: Record<ResourceKind, string> = {
  cpu: 'CPU',
  memory: 'Memory',
  disk: 'Disk'
};

export interface RecommendationInput {
  analysis: UtilizationAnalysis;
  assessment: RiskAssessment;
  anomalies: AnomalyReport | null;
  forecasts: Record<ResourceKind, ForecastOutcome>;
  config: EngineConfig;
}

export function formatDeviation(deviation: number): string {
  return Number.isFinite(deviation) ? `${deviation.toFixed(1)} sigma` : 'a break from a constant baseline';
}

function firstCrossing(points: readonly ForecastPoint[], above: RiskLevel, resource: ResourceKind, config: EngineConfig): ForecastCrossing | undefined {
  for (const point of points) {
    const level = classifyUtilization(point.forecast, config.thresholds[resource]);
    if (compareRiskLevels(level, above) > 0) {
      return { level, step: point.step, timestamp: point.timestamp, value: point.forecast };
    }
  }
  return undefined;
}

function anomalyDeviation(anomalies: AnomalyReport | null, resource: ResourceKind): number | undefined {
  const verdict = anomalies?.verdicts[resource];
  return verdict && verdict.status === 'anomalous' ? verdict.deviation : undefined;
}

function raiseForAnomaly(severity: RecommendationSeverity | undefined): RecommendationSeverity {
  if (severity === undefined) return RecommendationSeverity.MEDIUM;
  if (severity === RecommendationSeverity.MEDIUM) return RecommendationSeverity.HIGH;
  return severity;
}

function trendNote(analysis: UtilizationAnalysis, resource: ResourceKind): string {
  const trend = analysis.statistics?.[resource].trendPerHour;
  if (trend === undefined || Math.abs(trend) < 0.01) return '';
  return ` (trend ${trend > 0 ? '+' : ''}${trend.toFixed(2)} pts/h)`;
}

function recommendationFor(resource: ResourceKind, input: RecommendationInput): CapacityRecommendation | undefined {
  const { analysis, assessment, anomalies, forecasts, config } = input;
  const node = assessment.node;
  const label = RESOURCE_LABELS[resource];
  const currentRisk = assessment.resources[resource];
  const current = assessment.utilization[resource].toFixed(1);
  const outcome = forecasts[resource];
  const points = outcome.status === 'available' ? outcome.run.points : [];

  let severity: RecommendationSeverity | undefined;
  let crossing: ForecastCrossing | undefined;
  let earliest: ForecastCrossing | undefined;
  let message = '';
  let action = '';

  if (currentRisk === RiskLevel.CRITICAL) {
    severity = RecommendationSeverity.CRITICAL;
    message = `${label} on ${node} is at ${current}% (${currentRisk})${trendNote(analysis, resource)}`;
    action = 'Add capacity or migrate instances immediately';
  } else {
    const critical = firstCrossing(points, RiskLevel.WARNING, resource, config);
    const worse = firstCrossing(points, currentRisk, resource, config);
    crossing = critical ?? worse;
    earliest = worse;

    if (crossing) {
      severity = crossing.level === RiskLevel.CRITICAL ? RecommendationSeverity.HIGH : RecommendationSeverity.MEDIUM;
      message =
        `${label} on ${node} is forecast to reach ${crossing.value.toFixed(1)}% (${crossing.level}) ` +
        `at step ${crossing.step}, currently ${current}%`;
      action =
        severity === RecommendationSeverity.HIGH
          ? 'Plan a capacity increase before the forecast crossing'
          : 'Monitor trends and plan for future capacity needs';
    } else if (currentRisk === RiskLevel.WARNING) {
      severity = RecommendationSeverity.MEDIUM;
      message = `${label} on ${node} is at ${current}% (${currentRisk})${trendNote(analysis, resource)}`;
      action = 'Monitor closely and review placement of new instances';
    }
  }

  const deviation = anomalyDeviation(anomalies, resource);
  if (deviation !== undefined) {
    const note = Number.isFinite(deviation)
      ? `latest ${label.toLowerCase()} sample is ${formatDeviation(deviation)} from recent history`
      : `latest ${label.toLowerCase()} sample breaks a constant baseline`;
    if (severity === undefined) {
      message = `${label} on ${node}: ${note}`;
      action = 'Investigate the recent change in usage';
    } else {
      message = `${message}; ${note}`;
    }
    severity = raiseForAnomaly(severity);
  }

  if (severity === undefined) return undefined;
  return {
    node,
    resource,
    severity,
    currentRisk,
    crossing,
    firstCrossing: earliest,
    anomalous: deviation !== undefined,
    message,
    action
  };
}

function compareRecommendations(a: CapacityRecommendation, b: CapacityRecommendation): number {
  const bySeverity = SEVERITY_ORDER[b.severity] - SEVERITY_ORDER[a.severity];
  if (bySeverity !== 0) return bySeverity;

  const byRisk = compareRiskLevels(b.currentRisk, a.currentRisk);
  if (byRisk !== 0) return byRisk;

  const byCrossing =
    (a.firstCrossing?.step ?? Number.POSITIVE_INFINITY) - (b.firstCrossing?.step ?? Number.POSITIVE_INFINITY);
  if (byCrossing !== 0 && !Number.isNaN(byCrossing)) return byCrossing;

  return RESOURCE_KINDS.indexOf(a.resource) - RESOURCE_KINDS.indexOf(b.resource);
}

/**
 * Ranks capacity recommendations for one node. Ordering is by severity,
 * then current resource risk, then earliest forecast crossing, then the
 * fixed cpu/memory/disk order, so identical input gives identical output.
 */
export function buildRecommendations(input: RecommendationInput): CapacityRecommendation[] {
  const recommendations: CapacityRecommendation[] = [];
  for (const resource of RESOURCE_KINDS) {
    const recommendation = recommendationFor(resource, input);
    if (recommendation) recommendations.push(recommendation);
  }
  return recommendations.sort(compareRecommendations);
}

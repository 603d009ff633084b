import type { EngineConfig, ResourceThresholds } from '../config/config';
import { RESOURCE_KINDS, utilizationOf, type MetricSample, type ResourceKind } from '../types/metrics';
import { RiskLevel, type RiskAssessment, type UsageRisk } from '../types/risk';
import { MissingDataError } from '../utils/errors';

const RISK_ORDER: Record<RiskLevel, number> = {
  [RiskLevel.HEALTHY]: 0,
  [RiskLevel.WARNING]: 1,
  [RiskLevel.CRITICAL]: 2
};

const USAGE_RISK: Record<RiskLevel, UsageRisk> = {
  [RiskLevel.HEALTHY]: 'Low',
  [RiskLevel.WARNING]: 'Medium',
  [RiskLevel.CRITICAL]: 'High'
};

export function compareRiskLevels(a: RiskLevel, b: RiskLevel): number {
  return RISK_ORDER[a] - RISK_ORDER[b];
}

export function maxRiskLevel(levels: readonly RiskLevel[]): RiskLevel {
  return levels.reduce<RiskLevel>((worst, level) => (compareRiskLevels(level, worst) > 0 ? level : worst), RiskLevel.HEALTHY);
}

export function classifyUtilization(value: number, thresholds: ResourceThresholds): RiskLevel {
  if (value > thresholds.criticalPct) return RiskLevel.CRITICAL;
  if (value > thresholds.warningPct) return RiskLevel.WARNING;
  return RiskLevel.HEALTHY;
}

// Same cut-offs, in the Low/Medium/High vocabulary used for window averages
export function classifyUsage(value: number, thresholds: ResourceThresholds): UsageRisk {
  return USAGE_RISK[classifyUtilization(value, thresholds)];
}

export function maxUsageRisk(risks: readonly UsageRisk[]): UsageRisk {
  if (risks.includes('High')) return 'High';
  if (risks.includes('Medium')) return 'Medium';
  return 'Low';
}

export interface CurrentUtilization {
  node: string;
  timestamp?: Date | undefined;
  cpu?: number | undefined;
  memory?: number | undefined;
  disk?: number | undefined;
}

function requireValue(input: CurrentUtilization, resource: ResourceKind): number {
  const value = input[resource];
  if (value === undefined || !Number.isFinite(value)) {
    throw new MissingDataError(`${resource}_utilization`, `no current value for node "${input.node}"`);
  }
  return value;
}

/**
 * Classifies a node's current utilization. Uses only the values given,
 * never a historical average, and never substitutes a default for a
 * missing resource.
 */
export function classifyCurrent(input: CurrentUtilization, config: EngineConfig): RiskAssessment {
  const values = {
    cpu: requireValue(input, 'cpu'),
    memory: requireValue(input, 'memory'),
    disk: requireValue(input, 'disk')
  };

  const resources: Record<ResourceKind, RiskLevel> = {
    cpu: classifyUtilization(values.cpu, config.thresholds.cpu),
    memory: classifyUtilization(values.memory, config.thresholds.memory),
    disk: classifyUtilization(values.disk, config.thresholds.disk)
  };

  return {
    node: input.node,
    timestamp: input.timestamp,
    utilization: values,
    resources,
    overall: maxRiskLevel(RESOURCE_KINDS.map(r => resources[r])),
    dataQualityWarnings: []
  };
}

export function classifySample(sample: MetricSample, config: EngineConfig): RiskAssessment {
  const assessment = classifyCurrent(
    {
      node: sample.node,
      timestamp: sample.timestamp,
      cpu: utilizationOf(sample, 'cpu'),
      memory: utilizationOf(sample, 'memory'),
      disk: utilizationOf(sample, 'disk')
    },
    config
  );
  return {
    ...assessment,
    dataQualityWarnings: sample.dataQualityFlags.filter(flag => flag.reason === 'zero-total')
  };
}

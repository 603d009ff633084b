import type { EngineConfig } from '../config/config';
import type {
  AllocationMetrics,
  EfficiencyMetrics,
  MetricStatistics,
  ProvisioningDirection,
  UtilizationAnalysis
} from '../types/analysis';
import { RESOURCE_KINDS, utilizationOf, type ExcludedSample, type MetricSample, type ResourceKind } from '../types/metrics';
import type { UsageRisk } from '../types/risk';
import { classifyUsage, maxUsageRisk } from './riskClassifier';
import { linearRegression, mean, round, variance } from './statistics';

const MS_PER_HOUR = 3_600_000;

// A resource counts as persistently low when at least this share of samples sit below the band
const PERSISTENT_LOW_FRACTION = 0.5;

const RESOURCE_LABELS: Record<ResourceKind, string> = {
  cpu: 'CPU',
  memory: 'memory',
  disk: 'disk'
};

type GapSeverity = 'major' | 'minor';

interface TemplateContext {
  node: string;
  label: string;
  mean: string;
  low: number;
  high: number;
}

type Template = (ctx: TemplateContext) => string;

// Recommendation text keyed by (direction, severity); the resource fills the label
const TEMPLATES: Record<Exclude<ProvisioningDirection, 'balanced'>, Record<GapSeverity, Template>> = {
  'under-provisioned': {
    major: ctx =>
      `Consider adding ${ctx.label} capacity or migrating instances off ${ctx.node}: average ${ctx.label} utilization is ${ctx.mean}%`,
    minor: ctx => `Plan additional ${ctx.label} capacity for ${ctx.node}: average utilization ${ctx.mean}% is above the ${ctx.high}% target`
  },
  'over-provisioned': {
    major: ctx =>
      `Consider consolidating under-utilized node ${ctx.node}: average ${ctx.label} utilization is only ${ctx.mean}%`,
    minor: ctx => `${capitalize(ctx.label)} capacity on ${ctx.node} is under-utilized: average ${ctx.mean}% is below the ${ctx.low}% target`
  }
};

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

function balancedTemplate(node: string): string {
  return `Node ${node} capacity is well-balanced`;
}

function insufficientDataTemplate(node: string, count: number): string {
  return `Insufficient data to analyze ${node}: ${count} valid sample(s) in the window, at least 2 required`;
}

function statisticsOf(samples: readonly MetricSample[], resource: ResourceKind): MetricStatistics {
  const values = samples.map(s => utilizationOf(s, resource));
  const origin = samples[0]?.timestamp.getTime() ?? 0;
  const hours = samples.map(s => (s.timestamp.getTime() - origin) / MS_PER_HOUR);
  const v = variance(values);

  return {
    mean: mean(values),
    variance: v,
    stdDev: Math.sqrt(v),
    min: Math.min(...values),
    max: Math.max(...values),
    latest: values[values.length - 1] ?? 0,
    trendPerHour: linearRegression(hours, values).slope
  };
}

export function efficiencyOf(
  values: readonly number[],
  average: number,
  config: Pick<EngineConfig, 'efficiencyTargetLowPct' | 'efficiencyTargetHighPct'>
): EfficiencyMetrics {
  const low = config.efficiencyTargetLowPct;
  const high = config.efficiencyTargetHighPct;
  const lowFraction = values.length === 0 ? 0 : values.filter(v => v < low).length / values.length;

  if (average < low) {
    const score = average / low;
    const waste = lowFraction >= PERSISTENT_LOW_FRACTION ? 1 - score : 0;
    return { score, waste, direction: 'over-provisioned', lowFraction };
  }
  if (average > high) {
    return { score: high / average, waste: 0, direction: 'under-provisioned', lowFraction };
  }
  return { score: 1, waste: 0, direction: 'balanced', lowFraction };
}

function allocationOf(samples: readonly MetricSample[], resource: 'cpu' | 'memory'): AllocationMetrics | undefined {
  const shares: number[] = [];
  const utilizations: number[] = [];

  for (const sample of samples) {
    const allocated = resource === 'cpu' ? sample.totalInstanceVcpus : sample.totalInstanceMemoryMb;
    const total = resource === 'cpu' ? sample.vcpusTotal : sample.memoryTotalMb;
    if (allocated === undefined) continue;
    shares.push(total === 0 ? 0 : (allocated / total) * 100);
    utilizations.push(utilizationOf(sample, resource));
  }

  if (shares.length === 0) return undefined;
  const allocatedPct = mean(shares);
  return { allocatedPct, gapPct: mean(utilizations) - allocatedPct };
}

function gapSeverity(
  direction: Exclude<ProvisioningDirection, 'balanced'>,
  average: number,
  resource: ResourceKind,
  config: EngineConfig
): GapSeverity {
  if (direction === 'under-provisioned') {
    return average > config.thresholds[resource].criticalPct ? 'major' : 'minor';
  }
  return average < config.efficiencyTargetLowPct / 2 ? 'major' : 'minor';
}

function buildRecommendations(
  node: string,
  statistics: Record<ResourceKind, MetricStatistics>,
  efficiency: Record<ResourceKind, EfficiencyMetrics>,
  config: EngineConfig
): string[] {
  const recommendations: string[] = [];

  for (const resource of RESOURCE_KINDS) {
    const { direction } = efficiency[resource];
    if (direction === 'balanced') continue;

    const average = statistics[resource].mean;
    const template = TEMPLATES[direction][gapSeverity(direction, average, resource, config)];
    recommendations.push(
      template({
        node,
        label: RESOURCE_LABELS[resource],
        mean: average.toFixed(1),
        low: config.efficiencyTargetLowPct,
        high: config.efficiencyTargetHighPct
      })
    );
  }

  if (recommendations.length === 0) {
    recommendations.push(balancedTemplate(node));
  }
  return recommendations;
}

function insufficientAnalysis(node: string, samples: readonly MetricSample[], excluded: ExcludedSample[]): UtilizationAnalysis {
  const only = samples[0];
  return {
    node,
    sampleCount: samples.length,
    excludedCount: excluded.length,
    excluded,
    window: only ? { start: only.timestamp, end: only.timestamp } : null,
    insufficientData: true,
    statistics: null,
    efficiency: null,
    allocation: {},
    risk: null,
    meanInstances: null,
    recommendations: [insufficientDataTemplate(node, samples.length)]
  };
}

/**
 * Summarizes a node's validated window: per-resource statistics and trend,
 * efficiency against the target band, usage risk on the window mean, and
 * templated recommendations. Fewer than two samples yields an analysis
 * marked insufficientData with every statistic null.
 */
export function analyzeUtilization(
  node: string,
  samples: readonly MetricSample[],
  config: EngineConfig,
  excluded: ExcludedSample[] = []
): UtilizationAnalysis {
  const first = samples[0];
  const last = samples[samples.length - 1];
  if (samples.length < 2 || !first || !last) {
    return insufficientAnalysis(node, samples, excluded);
  }

  const statistics: Record<ResourceKind, MetricStatistics> = {
    cpu: statisticsOf(samples, 'cpu'),
    memory: statisticsOf(samples, 'memory'),
    disk: statisticsOf(samples, 'disk')
  };

  const efficiencyFor = (resource: ResourceKind): EfficiencyMetrics =>
    efficiencyOf(
      samples.map(s => utilizationOf(s, resource)),
      statistics[resource].mean,
      config
    );
  const efficiency: Record<ResourceKind, EfficiencyMetrics> = {
    cpu: efficiencyFor('cpu'),
    memory: efficiencyFor('memory'),
    disk: efficiencyFor('disk')
  };

  const resourceRisk: Record<ResourceKind, UsageRisk> = {
    cpu: classifyUsage(round(statistics.cpu.mean), config.thresholds.cpu),
    memory: classifyUsage(round(statistics.memory.mean), config.thresholds.memory),
    disk: classifyUsage(round(statistics.disk.mean), config.thresholds.disk)
  };

  const allocation: UtilizationAnalysis['allocation'] = {};
  const cpuAllocation = allocationOf(samples, 'cpu');
  const memoryAllocation = allocationOf(samples, 'memory');
  if (cpuAllocation) allocation.cpu = cpuAllocation;
  if (memoryAllocation) allocation.memory = memoryAllocation;

  return {
    node,
    sampleCount: samples.length,
    excludedCount: excluded.length,
    excluded,
    window: { start: first.timestamp, end: last.timestamp },
    insufficientData: false,
    statistics,
    efficiency,
    allocation,
    risk: {
      resources: resourceRisk,
      overall: maxUsageRisk(RESOURCE_KINDS.map(r => resourceRisk[r]))
    },
    meanInstances: mean(samples.map(s => s.instances)),
    recommendations: buildRecommendations(node, statistics, efficiency, config)
  };
}

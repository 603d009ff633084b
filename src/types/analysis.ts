import type { ExcludedSample, ResourceKind } from './metrics';
import type { UsageRisk } from './risk';

export interface MetricStatistics {
  mean: number;
  variance: number;
  stdDev: number;
  min: number;
  max: number;
  latest: number;
  // Least-squares slope, utilization points per hour
  trendPerHour: number;
}

export type ProvisioningDirection = 'under-provisioned' | 'over-provisioned' | 'balanced';

export interface EfficiencyMetrics {
  score: number;
  waste: number;
  direction: ProvisioningDirection;
  lowFraction: number;
}

export interface AllocationMetrics {
  // Allocated to instances as a share of node capacity
  allocatedPct: number;
  // Mean utilization minus mean allocation
  gapPct: number;
}

export interface UtilizationAnalysis {
  node: string;
  sampleCount: number;
  excludedCount: number;
  excluded: ExcludedSample[];
  window: { start: Date; end: Date } | null;
  insufficientData: boolean;
  statistics: Record<ResourceKind, MetricStatistics> | null;
  efficiency: Record<ResourceKind, EfficiencyMetrics> | null;
  allocation: Partial<Record<'cpu' | 'memory', AllocationMetrics>>;
  risk: { resources: Record<ResourceKind, UsageRisk>; overall: UsageRisk } | null;
  meanInstances: number | null;
  recommendations: string[];
}

import type { UtilizationAnalysis } from './analysis';
import type { AnomalyEvent, AnomalyReport } from './anomaly';
import type { ForecastOutcome } from './forecast';
import type { MetricSample, ResourceKind } from './metrics';
import type { CapacityRecommendation } from './recommendation';
import type { RiskAssessment } from './risk';

export interface NodeReport {
  node: string;
  latest: MetricSample | null;
  analysis: UtilizationAnalysis;
  assessment: RiskAssessment | null;
  anomalies: AnomalyReport | null;
  anomalyEvents: AnomalyEvent[];
  forecasts: Record<ResourceKind, ForecastOutcome>;
  recommendations: CapacityRecommendation[];
}

export interface FailedNode {
  node: string;
  code: string;
  reason: string;
}

export interface ClusterCapacity {
  totalNodes: number;
  totalInstances: number;
  totalVcpus: number;
  usedVcpus: number;
  availableVcpus: number;
  cpuUtilization: number;
  totalMemoryGb: number;
  usedMemoryGb: number;
  availableMemoryGb: number;
  memoryUtilization: number;
  totalDiskGb: number;
  usedDiskGb: number;
  availableDiskGb: number;
  diskUtilization: number;
}

export interface AnalysisPassReport {
  generatedAt: string;
  window: { start: string; end: string };
  cluster: ClusterCapacity;
  nodes: NodeReport[];
  failed: FailedNode[];
}

// Compute node utilization samples

export type ResourceKind = 'cpu' | 'memory' | 'disk';

export const RESOURCE_KINDS: readonly ResourceKind[] = ['cpu', 'memory', 'disk'];

export type UtilizationMetric = 'cpu_utilization' | 'memory_utilization' | 'disk_utilization';

export const UTILIZATION_METRICS: Record<ResourceKind, UtilizationMetric> = {
  cpu: 'cpu_utilization',
  memory: 'memory_utilization',
  disk: 'disk_utilization',
};

export type NodeState = 'up' | 'down' | 'unknown';
export type NodeStatus = 'enabled' | 'disabled' | 'unknown';

export type DataQualityReason = 'zero-total' | 'reported-utilization-mismatch';

export interface DataQualityFlag {
  resource: ResourceKind;
  reason: DataQualityReason;
  message: string;
}

export interface MetricSample {
  timestamp: Date;
  node: string;
  vcpusUsed: number;
  vcpusTotal: number;
  memoryUsedMb: number;
  memoryTotalMb: number;
  diskUsedGb: number;
  diskTotalGb: number;
  instances: number;
  // Capacity allocated to instances, when the collector reports it
  totalInstanceVcpus?: number | undefined;
  totalInstanceMemoryMb?: number | undefined;
  cpuUtilization: number;
  memoryUtilization: number;
  diskUtilization: number;
  hypervisorType: string;
  hypervisorVersion?: string | undefined;
  state: NodeState;
  status: NodeStatus;
  dataQualityFlags: DataQualityFlag[];
}

// Sample as read from the collector's CSV/JSON output, before validation
export type RawMetricSample = Record<string, unknown>;

export interface ExcludedSample {
  index: number;
  timestamp?: string | undefined;
  code: 'MISSING_DATA' | 'DATA_QUALITY';
  reason: string;
}

export interface ValidatedWindow {
  node: string;
  samples: MetricSample[];
  excluded: ExcludedSample[];
}

export function utilizationOf(sample: MetricSample, resource: ResourceKind): number {
  switch (resource) {
    case 'cpu':
      return sample.cpuUtilization;
    case 'memory':
      return sample.memoryUtilization;
    case 'disk':
      return sample.diskUtilization;
  }
}

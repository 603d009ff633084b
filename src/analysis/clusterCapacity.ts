import type { MetricSample } from '../types/metrics';
import type { ClusterCapacity } from '../types/report';
import { round } from './statistics';

function percentOf(used: number, total: number): number {
  return total === 0 ? 0 : round((used / total) * 100);
}

// Cluster-wide totals from each node's latest sample
export function summarizeClusterCapacity(latestSamples: readonly MetricSample[]): ClusterCapacity {
  const sum = (pick: (s: MetricSample) => number) => latestSamples.reduce((acc, s) => acc + pick(s), 0);

  const totalVcpus = sum(s => s.vcpusTotal);
  const usedVcpus = sum(s => s.vcpusUsed);
  const totalMemoryMb = sum(s => s.memoryTotalMb);
  const usedMemoryMb = sum(s => s.memoryUsedMb);
  const totalDiskGb = sum(s => s.diskTotalGb);
  const usedDiskGb = sum(s => s.diskUsedGb);

  return {
    totalNodes: latestSamples.length,
    totalInstances: sum(s => s.instances),
    totalVcpus,
    usedVcpus,
    availableVcpus: totalVcpus - usedVcpus,
    cpuUtilization: percentOf(usedVcpus, totalVcpus),
    totalMemoryGb: round(totalMemoryMb / 1024),
    usedMemoryGb: round(usedMemoryMb / 1024),
    availableMemoryGb: round((totalMemoryMb - usedMemoryMb) / 1024),
    memoryUtilization: percentOf(usedMemoryMb, totalMemoryMb),
    totalDiskGb,
    usedDiskGb,
    availableDiskGb: totalDiskGb - usedDiskGb,
    diskUtilization: percentOf(usedDiskGb, totalDiskGb)
  };
}

import { describe, it, expect } from 'vitest';
import { summarizeClusterCapacity } from '../../src/analysis/clusterCapacity';
import { sampleAt } from '../helpers/samples';

describe('clusterCapacity', () => {
  it('should total capacity across the latest samples', () => {
    const summary = summarizeClusterCapacity([
      sampleAt('node-a', 0, { cpu: 20, memory: 30, disk: 40 }),
      sampleAt('node-b', 0, { cpu: 50, memory: 60, disk: 10 })
    ]);

    expect(summary).toEqual({
      totalNodes: 2,
      totalInstances: 8,
      totalVcpus: 200,
      usedVcpus: 70,
      availableVcpus: 130,
      cpuUtilization: 35,
      totalMemoryGb: 1.95,
      usedMemoryGb: 0.88,
      availableMemoryGb: 1.07,
      memoryUtilization: 45,
      totalDiskGb: 2000,
      usedDiskGb: 500,
      availableDiskGb: 1500,
      diskUtilization: 25
    });
  });

  it('should report zero utilization for an empty cluster', () => {
    const summary = summarizeClusterCapacity([]);

    expect(summary.totalNodes).toBe(0);
    expect(summary.cpuUtilization).toBe(0);
    expect(summary.memoryUtilization).toBe(0);
    expect(summary.diskUtilization).toBe(0);
  });
});

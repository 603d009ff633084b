import { describe, it, expect } from 'vitest';
import { detectAnomalies, scanAnomalies } from '../../src/analysis/anomalyDetector';
import { createEngineConfig } from '../../src/config/config';
import { cpuSamples, sampleAt } from '../helpers/samples';

const config = createEngineConfig({ anomalyMinHistory: 3 });

describe('anomalyDetector', () => {
  describe('detectAnomalies', () => {
    it('should flag a jump far outside recent history', () => {
      const history = cpuSamples('node-a', [50, 55, 58]);
      const report = detectAnomalies(history, sampleAt('node-a', 3, { cpu: 90 }), config);
      const cpu = report.verdicts.cpu;

      expect(report.anomalous).toBe(true);
      expect(report.indeterminate).toBe(false);
      expect(cpu.status).toBe('anomalous');
      if (cpu.status === 'indeterminate') return;
      expect(cpu.mean).toBeCloseTo(54.3333, 4);
      expect(cpu.stdDev).toBeCloseTo(4.0415, 4);
      expect(cpu.deviation).toBeCloseTo(8.8252, 4);
      expect(report.verdicts.memory.status).toBe('normal');
    });

    it('should accept a value inside the expected range', () => {
      const report = detectAnomalies(cpuSamples('node-a', [50, 55, 58]), sampleAt('node-a', 3, { cpu: 56 }), config);

      expect(report.verdicts.cpu.status).toBe('normal');
      expect(report.anomalous).toBe(false);
    });

    it('should treat any change from a constant history as anomalous', () => {
      const history = cpuSamples('node-a', [50, 50, 50]);
      const report = detectAnomalies(history, sampleAt('node-a', 3, { cpu: 50, memory: 40 }), config);
      const memory = report.verdicts.memory;

      expect(report.verdicts.cpu.status).toBe('normal');
      expect(memory.status).toBe('anomalous');
      if (memory.status === 'indeterminate') return;
      expect(memory.deviation).toBe(Number.POSITIVE_INFINITY);
    });

    it('should be indeterminate with too little history', () => {
      const report = detectAnomalies(cpuSamples('node-a', [50, 55]), sampleAt('node-a', 2, { cpu: 99 }), config);

      expect(report.indeterminate).toBe(true);
      expect(report.anomalous).toBe(false);
      expect(report.verdicts.cpu).toEqual({
        status: 'indeterminate',
        resource: 'cpu',
        reason: 'insufficient-history',
        historySize: 2,
        required: 3
      });
    });

    it('should only look at the trailing window', () => {
      const windowed = createEngineConfig({ anomalyMinHistory: 3, anomalyWindowSize: 3 });
      const history = cpuSamples('node-a', [90, 90, 90, 20, 21, 22]);
      const report = detectAnomalies(history, sampleAt('node-a', 6, { cpu: 23 }), windowed);
      const cpu = report.verdicts.cpu;

      expect(cpu.status).toBe('normal');
      if (cpu.status === 'indeterminate') return;
      expect(cpu.mean).toBe(21);
      expect(cpu.deviation).toBe(2);
      expect(cpu.expectedRange).toEqual([18, 24]);
    });
  });

  describe('scanAnomalies', () => {
    it('should report High events beyond the anomaly threshold', () => {
      const events = scanAnomalies(cpuSamples('node-a', [50, 55, 58, 90, 56]), config);

      expect(events).toHaveLength(1);
      expect(events[0]?.resource).toBe('cpu');
      expect(events[0]?.value).toBe(90);
      expect(events[0]?.severity).toBe('High');
      expect(events[0]?.timestamp.toISOString()).toBe('2024-03-01T03:00:00.000Z');
      expect(events[0]?.warningBand[0]).toBeCloseTo(46.2504, 4);
      expect(events[0]?.warningBand[1]).toBeCloseTo(62.4162, 4);
    });

    it('should report Medium events between the warning and anomaly thresholds', () => {
      const events = scanAnomalies(cpuSamples('node-a', [50, 55, 58, 64]), config);

      expect(events.map(e => [e.resource, e.severity])).toEqual([['cpu', 'Medium']]);
      expect(events[0]?.deviation).toBeCloseTo(2.3919, 4);
    });

    it('should not report anything before minimum history', () => {
      expect(scanAnomalies(cpuSamples('node-a', [50, 99, 10]), config)).toEqual([]);
    });
  });
});

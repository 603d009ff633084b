import type { ResourceKind } from './metrics';

export interface IndeterminateVerdict {
  status: 'indeterminate';
  resource: ResourceKind;
  reason: 'insufficient-history';
  historySize: number;
  required: number;
}

export interface AnomalyCheck {
  status: 'normal' | 'anomalous';
  resource: ResourceKind;
  value: number;
  mean: number;
  stdDev: number;
  // |value - mean| / stdDev; Infinity when a constant history is broken
  deviation: number;
  expectedRange: [number, number];
}

export type AnomalyVerdict = IndeterminateVerdict | AnomalyCheck;

export interface AnomalyReport {
  node: string;
  timestamp: Date;
  verdicts: Record<ResourceKind, AnomalyVerdict>;
  anomalous: boolean;
  indeterminate: boolean;
}

export type AnomalySeverity = 'High' | 'Medium';

export interface AnomalyEvent {
  node: string;
  timestamp: Date;
  resource: ResourceKind;
  value: number;
  deviation: number;
  // mean +/- anomalyWarnSigma standard deviations of the preceding window
  warningBand: [number, number];
  severity: AnomalySeverity;
}

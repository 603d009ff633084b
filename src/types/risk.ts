import type { DataQualityFlag, ResourceKind } from './metrics';

export enum RiskLevel {
  HEALTHY = 'Healthy',
  WARNING = 'Warning',
  CRITICAL = 'Critical'
}

// Usage risk computed on window averages
export type UsageRisk = 'Low' | 'Medium' | 'High';

export interface RiskAssessment {
  node: string;
  timestamp?: Date | undefined;
  utilization: Record<ResourceKind, number>;
  resources: Record<ResourceKind, RiskLevel>;
  overall: RiskLevel;
  dataQualityWarnings: DataQualityFlag[];
}

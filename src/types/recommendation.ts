import type { ResourceKind } from './metrics';
import type { RiskLevel } from './risk';

export enum RecommendationSeverity {
  CRITICAL = 'Critical',
  HIGH = 'High',
  MEDIUM = 'Medium'
}

export interface ForecastCrossing {
  level: RiskLevel;
  step: number;
  timestamp: Date;
  value: number;
}

export interface CapacityRecommendation {
  node: string;
  resource: ResourceKind;
  severity: RecommendationSeverity;
  currentRisk: RiskLevel;
  // Crossing the message reports: into Critical when forecast, else into the next worse level
  crossing?: ForecastCrossing | undefined;
  // Earliest crossing into any worse level; used for ordering
  firstCrossing?: ForecastCrossing | undefined;
  anomalous: boolean;
  message: string;
  action: string;
}

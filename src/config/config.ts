import { z } from 'zod';
import type { ResourceKind } from '../types/metrics';
import { InvalidConfigurationError } from '../utils/errors';

export interface AppConfig {
  dataFile: string;
  windowHours: number;
}

export function getConfig(): AppConfig {
  return {
    dataFile: process.env.CAPACITY_DATA_FILE || './data/metrics.json',
    windowHours: parseInt(process.env.CAPACITY_WINDOW_HOURS || '168', 10),
  };
}

export interface ResourceThresholds {
  warningPct: number;
  criticalPct: number;
}

export interface EngineConfig {
  thresholds: Readonly<Record<ResourceKind, Readonly<ResourceThresholds>>>;
  anomalyKSigma: number;
  anomalyWarnSigma: number;
  anomalyMinHistory: number;
  anomalyWindowSize: number;
  anomalyEpsilon: number;
  efficiencyTargetLowPct: number;
  efficiencyTargetHighPct: number;
  forecastHorizonPoints: number;
  forecastConfidence: number;
  forecastMinSigma: number;
  forecastOutlierSigma: number;
  seasonalPeriod: number;
  minHistoryForSeasonal: number;
  minHistoryForForecast: number;
}

type Optional<T> = { [K in keyof T]?: T[K] | undefined };

export interface EngineConfigOverrides extends Optional<Omit<EngineConfig, 'thresholds'>> {
  thresholds?: Partial<Record<ResourceKind, Partial<ResourceThresholds>>> | undefined;
}

const DEFAULT_THRESHOLDS: ResourceThresholds = { warningPct: 60, criticalPct: 80 };

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  thresholds: {
    cpu: DEFAULT_THRESHOLDS,
    memory: DEFAULT_THRESHOLDS,
    disk: DEFAULT_THRESHOLDS,
  },
  anomalyKSigma: 3,
  anomalyWarnSigma: 2,
  anomalyMinHistory: 20,
  anomalyWindowSize: 24,
  anomalyEpsilon: 1e-9,
  efficiencyTargetLowPct: 20,
  efficiencyTargetHighPct: 70,
  forecastHorizonPoints: 24,
  forecastConfidence: 0.8,
  forecastMinSigma: 0.1,
  forecastOutlierSigma: 3,
  seasonalPeriod: 24,
  minHistoryForSeasonal: 48,
  minHistoryForForecast: 10,
};

const percentage = z.number().finite().min(0).max(100);

const thresholdsSchema = z
  .object({ warningPct: percentage, criticalPct: percentage })
  .refine(t => t.warningPct < t.criticalPct, { message: 'warning threshold must be below critical threshold' });

const engineConfigSchema = z
  .object({
    thresholds: z.object({ cpu: thresholdsSchema, memory: thresholdsSchema, disk: thresholdsSchema }),
    anomalyKSigma: z.number().finite().positive(),
    anomalyWarnSigma: z.number().finite().positive(),
    anomalyMinHistory: z.number().int().min(2),
    anomalyWindowSize: z.number().int().min(2),
    anomalyEpsilon: z.number().finite().nonnegative(),
    efficiencyTargetLowPct: percentage,
    efficiencyTargetHighPct: percentage,
    forecastHorizonPoints: z.number().int().positive(),
    forecastConfidence: z.number().gt(0).lt(1),
    forecastMinSigma: z.number().finite().positive(),
    forecastOutlierSigma: z.number().finite().nonnegative(),
    seasonalPeriod: z.number().int().min(2),
    minHistoryForSeasonal: z.number().int().positive(),
    minHistoryForForecast: z.number().int().min(3),
  })
  .superRefine((config, ctx) => {
    if (config.anomalyWarnSigma > config.anomalyKSigma) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['anomalyWarnSigma'], message: 'must not exceed anomalyKSigma' });
    }
    if (config.anomalyWindowSize < config.anomalyMinHistory) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['anomalyWindowSize'], message: 'must be at least anomalyMinHistory' });
    }
    if (config.efficiencyTargetLowPct >= config.efficiencyTargetHighPct) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['efficiencyTargetLowPct'], message: 'must be below efficiencyTargetHighPct' });
    }
    if (config.minHistoryForSeasonal < 2 * config.seasonalPeriod) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['minHistoryForSeasonal'],
        message: `must cover two seasonal periods (>= ${2 * config.seasonalPeriod})`,
      });
    }
  });

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message));
}

function deepFreeze(config: EngineConfig): EngineConfig {
  Object.values(config.thresholds).forEach(t => Object.freeze(t));
  Object.freeze(config.thresholds);
  return Object.freeze(config);
}

// Builds an immutable engine configuration; throws InvalidConfigurationError on any violated rule.
// An unset window or warn sigma follows the min history and k it is checked against.
export function createEngineConfig(overrides: EngineConfigOverrides = {}): EngineConfig {
  const { thresholds, ...rest } = overrides;
  const definedRest = Object.fromEntries(Object.entries(rest).filter(([, value]) => value !== undefined));
  const minHistory = rest.anomalyMinHistory ?? DEFAULT_ENGINE_CONFIG.anomalyMinHistory;
  const kSigma = rest.anomalyKSigma ?? DEFAULT_ENGINE_CONFIG.anomalyKSigma;
  const merged = {
    ...DEFAULT_ENGINE_CONFIG,
    anomalyWindowSize: Math.max(DEFAULT_ENGINE_CONFIG.anomalyWindowSize, minHistory),
    anomalyWarnSigma: Math.min(DEFAULT_ENGINE_CONFIG.anomalyWarnSigma, kSigma),
    ...definedRest,
    thresholds: {
      cpu: { ...DEFAULT_ENGINE_CONFIG.thresholds.cpu, ...thresholds?.cpu },
      memory: { ...DEFAULT_ENGINE_CONFIG.thresholds.memory, ...thresholds?.memory },
      disk: { ...DEFAULT_ENGINE_CONFIG.thresholds.disk, ...thresholds?.disk },
    },
  };

  const parsed = engineConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new InvalidConfigurationError(formatIssues(parsed.error));
  }
  return deepFreeze(parsed.data);
}

type Env = Record<string, string | undefined>;

function readNumber(env: Env, name: string, issues: string[]): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    issues.push(`${name}: "${raw}" is not a number`);
    return undefined;
  }
  return value;
}

function readThresholds(env: Env, prefix: string, issues: string[]): Partial<ResourceThresholds> {
  const result: Partial<ResourceThresholds> = {};
  const warningPct = readNumber(env, `${prefix}_WARNING_PCT`, issues);
  const criticalPct = readNumber(env, `${prefix}_CRITICAL_PCT`, issues);
  if (warningPct !== undefined) result.warningPct = warningPct;
  if (criticalPct !== undefined) result.criticalPct = criticalPct;
  return result;
}

export function loadEngineConfig(env: Env = process.env): EngineConfig {
  const issues: string[] = [];
  const overrides: EngineConfigOverrides = {
    thresholds: {
      cpu: readThresholds(env, 'CPU', issues),
      memory: readThresholds(env, 'MEMORY', issues),
      disk: readThresholds(env, 'DISK', issues),
    },
    anomalyKSigma: readNumber(env, 'ANOMALY_K_SIGMA', issues),
    anomalyWarnSigma: readNumber(env, 'ANOMALY_WARN_SIGMA', issues),
    anomalyMinHistory: readNumber(env, 'ANOMALY_MIN_HISTORY', issues),
    anomalyWindowSize: readNumber(env, 'ANOMALY_WINDOW_SIZE', issues),
    forecastHorizonPoints: readNumber(env, 'FORECAST_HORIZON_POINTS', issues),
    forecastConfidence: readNumber(env, 'FORECAST_CONFIDENCE', issues),
    forecastOutlierSigma: readNumber(env, 'FORECAST_OUTLIER_SIGMA', issues),
    seasonalPeriod: readNumber(env, 'SEASONAL_PERIOD', issues),
    minHistoryForSeasonal: readNumber(env, 'MIN_HISTORY_FOR_SEASONAL', issues),
    minHistoryForForecast: readNumber(env, 'MIN_HISTORY_FOR_FORECAST', issues),
  };

  if (issues.length > 0) {
    throw new InvalidConfigurationError(issues);
  }
  return createEngineConfig(overrides);
}

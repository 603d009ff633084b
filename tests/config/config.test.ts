import { afterEach, describe, it, expect, vi } from 'vitest';
import {
  DEFAULT_ENGINE_CONFIG,
  createEngineConfig,
  getConfig,
  loadEngineConfig
} from '../../src/config/config';
import { InvalidConfigurationError } from '../../src/utils/errors';

describe('config', () => {
  describe('createEngineConfig', () => {
    it('should return frozen defaults', () => {
      const config = createEngineConfig();

      expect(config).toEqual(DEFAULT_ENGINE_CONFIG);
      expect(Object.isFrozen(config)).toBe(true);
      expect(Object.isFrozen(config.thresholds.cpu)).toBe(true);
    });

    it('should merge partial threshold overrides', () => {
      const config = createEngineConfig({ thresholds: { cpu: { warningPct: 70 } } });

      expect(config.thresholds.cpu).toEqual({ warningPct: 70, criticalPct: 80 });
      expect(config.thresholds.memory).toEqual({ warningPct: 60, criticalPct: 80 });
    });

    it('should ignore undefined overrides', () => {
      expect(createEngineConfig({ anomalyKSigma: undefined }).anomalyKSigma).toBe(3);
    });

    it('should reject a warning threshold at or above critical', () => {
      const create = () => createEngineConfig({ thresholds: { cpu: { warningPct: 85, criticalPct: 80 } } });

      expect(create).toThrow(InvalidConfigurationError);
      expect(create).toThrow('thresholds.cpu: warning threshold must be below critical threshold');
    });

    it('should reject a confidence outside (0, 1)', () => {
      expect(() => createEngineConfig({ forecastConfidence: 1 })).toThrow('forecastConfidence');
    });

    it('should require two seasonal periods of history for seasonal forecasts', () => {
      expect(() => createEngineConfig({ minHistoryForSeasonal: 30 })).toThrow(
        'minHistoryForSeasonal: must cover two seasonal periods (>= 48)'
      );
    });

    it('should keep the warning sigma within the anomaly sigma', () => {
      expect(() => createEngineConfig({ anomalyWarnSigma: 4 })).toThrow('anomalyWarnSigma: must not exceed anomalyKSigma');
    });

    it('should widen the default anomaly window to the min history', () => {
      const config = createEngineConfig({ anomalyMinHistory: 30 });

      expect(config.anomalyWindowSize).toBe(30);
      expect(createEngineConfig({ anomalyMinHistory: 10 }).anomalyWindowSize).toBe(24);
    });

    it('should lower the default warning sigma to a smaller anomaly sigma', () => {
      expect(createEngineConfig({ anomalyKSigma: 1.5 }).anomalyWarnSigma).toBe(1.5);
      expect(createEngineConfig({ anomalyKSigma: 4 }).anomalyWarnSigma).toBe(2);
    });

    it('should still reject an explicit window below the min history', () => {
      expect(() => createEngineConfig({ anomalyMinHistory: 30, anomalyWindowSize: 24 })).toThrow(
        'anomalyWindowSize: must be at least anomalyMinHistory'
      );
    });

    it('should collect every issue', () => {
      let caught: unknown;
      try {
        createEngineConfig({ anomalyKSigma: -1, forecastHorizonPoints: 0 });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(InvalidConfigurationError);
      if (!(caught instanceof InvalidConfigurationError)) return;
      expect(caught.code).toBe('INVALID_CONFIGURATION');
      expect(caught.issues.some(issue => issue.startsWith('anomalyKSigma:'))).toBe(true);
      expect(caught.issues.some(issue => issue.startsWith('forecastHorizonPoints:'))).toBe(true);
    });
  });

  describe('loadEngineConfig', () => {
    it('should read overrides from the environment', () => {
      const config = loadEngineConfig({ CPU_WARNING_PCT: '70', FORECAST_CONFIDENCE: '0.9', ANOMALY_MIN_HISTORY: '' });

      expect(config.thresholds.cpu.warningPct).toBe(70);
      expect(config.forecastConfidence).toBe(0.9);
      expect(config.anomalyMinHistory).toBe(20);
    });

    it('should accept a larger min history or a smaller k on their own', () => {
      expect(loadEngineConfig({ ANOMALY_MIN_HISTORY: '30' }).anomalyWindowSize).toBe(30);
      expect(loadEngineConfig({ ANOMALY_K_SIGMA: '1.5' }).anomalyWarnSigma).toBe(1.5);
    });

    it('should read the anomaly window, warning sigma and outlier sigma', () => {
      const config = loadEngineConfig({ ANOMALY_WINDOW_SIZE: '48', ANOMALY_WARN_SIGMA: '2.5', FORECAST_OUTLIER_SIGMA: '0' });

      expect(config.anomalyWindowSize).toBe(48);
      expect(config.anomalyWarnSigma).toBe(2.5);
      expect(config.forecastOutlierSigma).toBe(0);
    });

    it('should fall back to defaults for an empty environment', () => {
      expect(loadEngineConfig({})).toEqual(DEFAULT_ENGINE_CONFIG);
    });

    it('should reject values that are not numbers', () => {
      expect(() => loadEngineConfig({ ANOMALY_K_SIGMA: 'abc' })).toThrow(
        'Invalid configuration: ANOMALY_K_SIGMA: "abc" is not a number'
      );
    });
  });

  describe('getConfig', () => {
    afterEach(() => {
      vi.unstubAllEnvs();
    });

    it('should read the data file and window from the environment', () => {
      vi.stubEnv('CAPACITY_DATA_FILE', '/tmp/samples.json');
      vi.stubEnv('CAPACITY_WINDOW_HOURS', '48');

      expect(getConfig()).toMatchObject({ dataFile: '/tmp/samples.json', windowHours: 48 });
    });
  });
});

import { describe, it, expect } from 'vitest';
import { parseArgs, type CliArgs } from '../../src/cli/parser';

describe('CLI Parser', () => {
  describe('parseArgs', () => {
    it('should return default values when no arguments provided', () => {
      const args = parseArgs([]);

      expect(args.file).toBeUndefined();
      expect(args.nodes).toEqual([]);
      expect(args.hours).toBeUndefined();
      expect(args.backtest).toBe(false);
      expect(args.json).toBe(false);
      expect(args.interval).toBeUndefined();
      expect(args.help).toBe(false);
    });

    it('should parse the samples file as first positional argument', () => {
      expect(parseArgs(['data/metrics.json']).file).toBe('data/metrics.json');
    });

    it('should collect repeated --node flags', () => {
      expect(parseArgs(['--node', 'compute-01', '-n', 'compute-02']).nodes).toEqual(['compute-01', 'compute-02']);
    });

    it('should parse --hours and --horizon', () => {
      const args = parseArgs(['--hours', '72', '--horizon=12']);

      expect(args.hours).toBe(72);
      expect(args.horizon).toBe(12);
    });

    it('should parse --backtest with and without a holdout', () => {
      expect(parseArgs(['--backtest'])).toMatchObject({ backtest: true, backtestHoldout: undefined });
      expect(parseArgs(['--backtest', '6', 'metrics.json'])).toMatchObject({
        backtest: true,
        backtestHoldout: 6,
        file: 'metrics.json'
      });
      expect(parseArgs(['--backtest', 'metrics.json'])).toMatchObject({ backtestHoldout: undefined, file: 'metrics.json' });
      expect(parseArgs(['--backtest=4']).backtestHoldout).toBe(4);
    });

    it('should reject an inline backtest holdout that is not a number', () => {
      expect(() => parseArgs(['--backtest=abc'])).toThrow('Option --backtest expects a positive number, got "abc"');
    });

    it('should parse --json and --interval', () => {
      const args = parseArgs(['--json', '--interval', '15']);

      expect(args.json).toBe(true);
      expect(args.interval).toBe(15);
    });

    it('should parse --help and -h', () => {
      expect(parseArgs(['--help']).help).toBe(true);
      expect(parseArgs(['-h']).help).toBe(true);
    });

    it('should reject bad numbers', () => {
      expect(() => parseArgs(['--hours', '-3'])).toThrow('Option --hours expects a positive number, got "-3"');
      expect(() => parseArgs(['--horizon', '2.5'])).toThrow('Option --horizon expects a whole number, got "2.5"');
      expect(() => parseArgs(['--hours'])).toThrow('Option --hours expects a positive number, got ""');
    });

    it('should reject unknown options', () => {
      expect(() => parseArgs(['--verbose'])).toThrow('Unknown option: --verbose');
    });

    it('should parse all options together', () => {
      const args = parseArgs(['metrics.jsonl', '-n', 'compute-01', '--hours', '24', '--backtest', '--json']);

      const expected: CliArgs = {
        file: 'metrics.jsonl',
        nodes: ['compute-01'],
        hours: 24,
        horizon: undefined,
        backtest: true,
        backtestHoldout: undefined,
        json: true,
        interval: undefined,
        help: false
      };
      expect(args).toEqual(expected);
    });
  });
});

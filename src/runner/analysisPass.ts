import { setTimeout as sleep } from 'timers/promises';
import { getLogger } from '@fluidware-it/saddlebag';
import { summarizeClusterCapacity } from '../analysis/clusterCapacity';
import { Forecaster } from '../analysis/forecaster';
import type { ForecastModel } from '../analysis/forecastModels';
import { analyzeNode } from '../analysis/nodeAnalysis';
import type { EngineConfig } from '../config/config';
import type { SampleStore } from '../store/sampleStore';
import type { MetricSample } from '../types/metrics';
import type { AnalysisPassReport, FailedNode, NodeReport } from '../types/report';
import { errorMessage, InsufficientHistoryError } from '../utils/errors';

const logger = getLogger();

const MS_PER_HOUR = 3_600_000;

export interface AnalysisPassOptions {
  config: EngineConfig;
  windowHours: number;
  nodes?: string[] | undefined;
  // Window end; defaults to the newest sample in the store
  end?: Date | undefined;
  horizon?: number | undefined;
  backtestHoldout?: number | undefined;
  customModel?: ForecastModel | undefined;
  signal?: AbortSignal | undefined;
}

/**
 * Fetches each node's window from the store and analyzes the nodes one
 * at a time. The signal is checked between nodes; an aborted pass
 * rejects with the signal's reason and returns no partial report.
 */
export async function runAnalysisPass(store: SampleStore, options: AnalysisPassOptions): Promise<AnalysisPassReport> {
  const end = options.end ?? (await store.latestTimestamp()) ?? new Date();
  const start = new Date(end.getTime() - options.windowHours * MS_PER_HOUR);
  const nodes = options.nodes ?? (await store.listNodes());
  const forecaster = new Forecaster(options.config, options.customModel);

  logger.info(`Analyzing ${nodes.length} node(s) from ${start.toISOString()} to ${end.toISOString()}`);

  const reports: NodeReport[] = [];
  const failed: FailedNode[] = [];

  for (const node of nodes) {
    options.signal?.throwIfAborted();
    const window = await store.getWindow(node, start, end);

    try {
      reports.push(
        analyzeNode(node, window, options.config, {
          forecaster,
          horizon: options.horizon,
          backtestHoldout: options.backtestHoldout
        })
      );
    } catch (error) {
      if (!(error instanceof InsufficientHistoryError)) throw error;
      logger.warn(`Skipping ${node}: ${error.message}`);
      failed.push({ node, code: error.code, reason: error.message });
    }
  }

  const latest = reports.map(r => r.latest).filter((s): s is MetricSample => s !== null);

  return {
    generatedAt: new Date().toISOString(),
    window: { start: start.toISOString(), end: end.toISOString() },
    cluster: summarizeClusterCapacity(latest),
    nodes: reports,
    failed
  };
}

/**
 * Re-runs `pass` every `intervalMs` until the signal aborts. A failing
 * pass is logged and the next one still runs.
 */
export async function scheduleAnalysisPasses(
  pass: () => Promise<void>,
  intervalMs: number,
  signal: AbortSignal
): Promise<void> {
  while (!signal.aborted) {
    try {
      await pass();
    } catch (error) {
      if (signal.aborted) break;
      logger.error(`Analysis pass failed: ${errorMessage(error)}`);
    }

    try {
      await sleep(intervalMs, undefined, { signal });
    } catch (error) {
      if (signal.aborted) break;
      throw error;
    }
  }
  logger.info('Analysis scheduler stopped');
}

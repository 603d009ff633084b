import * as dotenv from 'dotenv';
import { getLogger } from '@fluidware-it/saddlebag';
import { parseArgs, USAGE } from './cli/parser';
import { getConfig, loadEngineConfig } from './config/config';
import { runAnalysisPass, scheduleAnalysisPasses } from './runner/analysisPass';
import { JsonFileSampleStore } from './store/sampleStore';
import { formatPassReport } from './utils/reportFormatter';

dotenv.config();

const logger = getLogger();

async function main() {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    // eslint-disable-next-line no-console
    console.log(USAGE);
    return;
  }

  const appConfig = getConfig();
  // Invalid thresholds stop the process here, before any analysis runs
  const engineConfig = loadEngineConfig();
  const dataFile = args.file ?? appConfig.dataFile;

  logger.info('Starting capacity-forecaster');
  logger.info(`Samples: ${dataFile}`);

  const runPass = async () => {
    const report = await runAnalysisPass(new JsonFileSampleStore(dataFile), {
      config: engineConfig,
      windowHours: args.hours ?? appConfig.windowHours,
      nodes: args.nodes.length > 0 ? args.nodes : undefined,
      horizon: args.horizon,
      backtestHoldout: args.backtest ? (args.backtestHoldout ?? engineConfig.forecastHorizonPoints) : undefined,
    });

    // eslint-disable-next-line no-console
    console.log(args.json ? JSON.stringify(report, null, 2) : formatPassReport(report));
    logger.info(`Analysis complete: ${report.nodes.length} node(s) analyzed, ${report.failed.length} skipped`);
  };

  if (args.interval === undefined) {
    await runPass();
    return;
  }

  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());
  process.once('SIGTERM', () => controller.abort());
  logger.info(`Running an analysis pass every ${args.interval} minute(s)`);
  await scheduleAnalysisPasses(runPass, args.interval * 60_000, controller.signal);
}

main().catch((e: unknown) => {
  logger.error(e);
  process.exitCode = 1;
});

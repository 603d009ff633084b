import { formatDeviation } from '../analysis/recommendationEngine';
import type { UtilizationAnalysis } from '../types/analysis';
import type { AnomalyEvent, AnomalyReport } from '../types/anomaly';
import type { ForecastOutcome } from '../types/forecast';
import { RESOURCE_KINDS, type ResourceKind } from '../types/metrics';
import { RecommendationSeverity } from '../types/recommendation';
import type { AnalysisPassReport, ClusterCapacity, NodeReport } from '../types/report';
import type { RiskAssessment } from '../types/risk';

const RESOURCE_LABELS: Record<ResourceKind, string> = {
  cpu: 'CPU',
  memory: 'Memory',
  disk: 'Disk'
};

// Cap on anomaly events listed per node
const MAX_EVENTS = 10;

function pct(value: number): string {
  return `${value.toFixed(1)}%`;
}

function formatCluster(cluster: ClusterCapacity): string {
  const lines: string[] = [];
  lines.push('## Cluster Overview');
  lines.push('');
  lines.push(`**Nodes:** ${cluster.totalNodes}`);
  lines.push(`**Instances:** ${cluster.totalInstances}`);
  lines.push(`**CPU:** ${pct(cluster.cpuUtilization)} (${cluster.usedVcpus}/${cluster.totalVcpus} vCPUs)`);
  lines.push(
    `**Memory:** ${pct(cluster.memoryUtilization)} (${cluster.usedMemoryGb.toFixed(1)}/${cluster.totalMemoryGb.toFixed(1)} GB)`
  );
  lines.push(`**Disk:** ${pct(cluster.diskUtilization)} (${cluster.usedDiskGb}/${cluster.totalDiskGb} GB)`);
  return lines.join('\n');
}

function formatRisk(assessment: RiskAssessment | null): string[] {
  if (!assessment) return ['**Current risk:** unavailable (no valid samples)'];

  const lines = [`**Current risk:** ${assessment.overall}`];
  lines.push('');
  lines.push('| Resource | Current | Risk |');
  lines.push('|----------|---------|------|');
  RESOURCE_KINDS.forEach(r => {
    lines.push(`| ${RESOURCE_LABELS[r]} | ${pct(assessment.utilization[r])} | ${assessment.resources[r]} |`);
  });
  assessment.dataQualityWarnings.forEach(w => {
    lines.push('', `> Data quality: ${w.message}`);
  });
  return lines;
}

function formatStatistics(analysis: UtilizationAnalysis): string[] {
  const { statistics, efficiency, risk } = analysis;
  if (analysis.insufficientData || !statistics || !efficiency || !risk) {
    return [`**Window statistics:** insufficient data (${analysis.sampleCount} valid sample(s))`];
  }

  const lines = [`**Window risk (average):** ${risk.overall}`, ''];
  lines.push('| Resource | Mean | Std dev | Max | Trend/h | Efficiency | Waste | Risk |');
  lines.push('|----------|------|---------|-----|---------|------------|-------|------|');
  RESOURCE_KINDS.forEach(r => {
    const s = statistics[r];
    const e = efficiency[r];
    lines.push(
      `| ${RESOURCE_LABELS[r]} | ${pct(s.mean)} | ${s.stdDev.toFixed(2)} | ${pct(s.max)} | ${s.trendPerHour.toFixed(2)} | ` +
        `${e.score.toFixed(2)} (${e.direction}) | ${e.waste.toFixed(2)} | ${risk.resources[r]} |`
    );
  });
  return lines;
}

function formatAnomalies(anomalies: AnomalyReport | null, events: AnomalyEvent[]): string[] {
  if (!anomalies) return [];
  const lines: string[] = [];

  if (anomalies.indeterminate) {
    lines.push('**Latest sample anomalies:** indeterminate (insufficient history)');
  } else {
    const flagged = RESOURCE_KINDS.flatMap(r => {
      const verdict = anomalies.verdicts[r];
      return verdict.status === 'anomalous' ? [`${RESOURCE_LABELS[r]} ${formatDeviation(verdict.deviation)}`] : [];
    });
    lines.push(`**Latest sample anomalies:** ${flagged.length > 0 ? flagged.join(', ') : 'none'}`);
  }

  if (events.length > 0) {
    lines.push('');
    lines.push('| Time | Resource | Value | Warning band | Severity |');
    lines.push('|------|----------|-------|--------------|----------|');
    events.slice(0, MAX_EVENTS).forEach(e => {
      const [low, high] = e.warningBand;
      lines.push(
        `| ${e.timestamp.toISOString()} | ${RESOURCE_LABELS[e.resource]} | ${pct(e.value)} | ${low.toFixed(1)} - ${high.toFixed(1)} | ${e.severity} |`
      );
    });
    if (events.length > MAX_EVENTS) {
      lines.push('', `... and ${events.length - MAX_EVENTS} more anomalies`);
    }
  }
  return lines;
}

function formatForecast(resource: ResourceKind, outcome: ForecastOutcome): string {
  const label = RESOURCE_LABELS[resource];
  if (outcome.status === 'unavailable') {
    return `- ${label}: no forecast available (${outcome.reason})`;
  }

  const { run } = outcome;
  const last = run.points[run.points.length - 1];
  const peak = run.points.reduce((max, p) => Math.max(max, p.forecast), Number.NEGATIVE_INFINITY);
  let line = `- ${label}: ${run.modelType}`;
  if (last) {
    line +=
      `, peak ${pct(peak)}, step ${last.step} ${pct(last.forecast)} ` +
      `[${pct(last.lowerBound)} - ${pct(last.upperBound)} @ ${Math.round(last.confidence * 100)}%]`;
  }
  if (run.fallbackReason) {
    line += ` (fallback: ${run.fallbackReason})`;
  }
  if (run.outliersRemoved > 0) {
    line += ` (${run.outliersRemoved} outlier(s) left out of the fit)`;
  }
  if (outcome.backtest) {
    const { mae, mape, rmse, holdout } = outcome.backtest;
    line += `; backtest over ${holdout} point(s): MAE ${mae.toFixed(2)}, MAPE ${mape === null ? 'n/a' : pct(mape)}, RMSE ${rmse.toFixed(2)}`;
  } else if (outcome.backtestUnavailable) {
    line += `; backtest unavailable (${outcome.backtestUnavailable})`;
  }
  return line;
}

export function formatNodeReport(report: NodeReport): string {
  const lines: string[] = [];
  const { analysis } = report;

  lines.push(`### Node: ${report.node}`);
  lines.push('');
  lines.push(`**Samples:** ${analysis.sampleCount} valid, ${analysis.excludedCount} excluded`);
  lines.push('');
  lines.push(...formatRisk(report.assessment));
  lines.push('');
  lines.push(...formatStatistics(analysis));

  const anomalyLines = formatAnomalies(report.anomalies, report.anomalyEvents);
  if (anomalyLines.length > 0) {
    lines.push('', ...anomalyLines);
  }

  lines.push('', '**Forecasts:**');
  RESOURCE_KINDS.forEach(r => lines.push(formatForecast(r, report.forecasts[r])));

  lines.push('', '**Utilization notes:**');
  analysis.recommendations.forEach(text => lines.push(`- ${text}`));

  if (analysis.excluded.length > 0) {
    lines.push('', '**Excluded samples:**');
    analysis.excluded.forEach(e => lines.push(`- #${e.index} ${e.code}: ${e.reason}`));
  }

  return lines.join('\n');
}

function formatRecommendations(reports: NodeReport[]): string[] {
  const sections: { severity: RecommendationSeverity; title: string }[] = [
    { severity: RecommendationSeverity.CRITICAL, title: 'Critical' },
    { severity: RecommendationSeverity.HIGH, title: 'High' },
    { severity: RecommendationSeverity.MEDIUM, title: 'Medium' }
  ];
  const all = reports.flatMap(r => r.recommendations);
  const lines: string[] = [];

  for (const { severity, title } of sections) {
    const recommendations = all.filter(r => r.severity === severity);
    if (recommendations.length === 0) continue;
    lines.push('', `### ${title}`, '');
    recommendations.forEach(r => {
      lines.push(`- ${r.message}`);
      lines.push(`  Action: ${r.action}`);
    });
  }
  return lines;
}

export function formatPassReport(report: AnalysisPassReport): string {
  const lines: string[] = [];

  lines.push('# Capacity Analysis Report');
  lines.push('');
  lines.push(`**Generated:** ${report.generatedAt}`);
  lines.push(`**Window:** ${report.window.start} to ${report.window.end}`);
  lines.push('');
  lines.push('---');
  lines.push('');
  lines.push(formatCluster(report.cluster));

  const recommendationLines = formatRecommendations(report.nodes);
  lines.push('', '## Capacity Recommendations');
  if (recommendationLines.length > 0) {
    lines.push(...recommendationLines);
  } else {
    lines.push('', 'No capacity actions needed.');
  }

  if (report.nodes.length > 0) {
    lines.push('', '## Nodes');
    report.nodes.forEach(node => lines.push('', formatNodeReport(node)));
  }

  if (report.failed.length > 0) {
    lines.push('', '## Nodes Not Analyzed', '');
    report.failed.forEach(f => lines.push(`- ${f.node}: ${f.reason}`));
  }

  return lines.join('\n');
}

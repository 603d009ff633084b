import { z } from 'zod';
import type {
  DataQualityFlag,
  ExcludedSample,
  MetricSample,
  NodeState,
  NodeStatus,
  RawMetricSample,
  ResourceKind,
  ValidatedWindow
} from '../types/metrics';
import { DataQualityError, MissingDataError, isAnalysisError } from '../utils/errors';

// Reported utilization further than this from the recomputed value is flagged
const UTILIZATION_MISMATCH_TOLERANCE = 0.5;

const TIMEZONE_SUFFIX = /(Z|[+-]\d{2}:?\d{2})$/i;

// Collector timestamps without an offset are UTC
export function parseTimestamp(value: string | number | Date): Date {
  if (value instanceof Date) return new Date(value.getTime());
  if (typeof value === 'number') return new Date(value);
  const normalized = value.trim().replace(' ', 'T');
  return new Date(TIMEZONE_SUFFIX.test(normalized) ? normalized : `${normalized}Z`);
}

function numeric<T extends z.ZodTypeAny>(inner: T) {
  return z.union([z.number(), z.string().trim().min(1).transform(v => Number(v))]).pipe(inner);
}

const quantity = numeric(z.number().finite().nonnegative());
const count = numeric(z.number().finite().int().nonnegative());

const rawSampleSchema = z.object({
  timestamp: z
    .union([z.date(), z.number(), z.string().trim().min(1)])
    .transform(parseTimestamp)
    .refine(d => !Number.isNaN(d.getTime()), { message: 'not a valid timestamp' }),
  node: z.string().trim().min(1),
  vcpus_used: count,
  vcpus_total: count,
  memory_used_mb: quantity,
  memory_total_mb: quantity,
  disk_used_gb: quantity,
  disk_total_gb: quantity,
  instances: count,
  total_instance_vcpus: quantity.optional(),
  total_instance_memory_mb: quantity.optional(),
  cpu_utilization: quantity.optional(),
  memory_utilization: quantity.optional(),
  disk_utilization: quantity.optional(),
  hypervisor_type: z.string().optional(),
  hypervisor_version: z.union([z.string(), z.number()]).transform(String).optional(),
  state: z.string().optional(),
  status: z.string().optional()
});

type ParsedRawSample = z.infer<typeof rawSampleSchema>;

function toNodeState(value: string | undefined): NodeState {
  const normalized = value?.toLowerCase();
  return normalized === 'up' || normalized === 'down' ? normalized : 'unknown';
}

function toNodeStatus(value: string | undefined): NodeStatus {
  const normalized = value?.toLowerCase();
  return normalized === 'enabled' || normalized === 'disabled' ? normalized : 'unknown';
}

function raiseForIssue(issue: z.ZodIssue): never {
  const field = issue.path.join('.') || 'sample';
  if (issue.code === z.ZodIssueCode.too_small && issue.type === 'number') {
    throw new DataQualityError(`Field "${field}" is out of range: ${issue.message}`);
  }
  throw new MissingDataError(field, issue.message);
}

interface ResourceReading {
  resource: ResourceKind;
  used: number;
  total: number;
  reported: number | undefined;
  label: string;
}

function computeUtilization(reading: ResourceReading, flags: DataQualityFlag[]): number {
  if (reading.used > reading.total) {
    throw new DataQualityError(`${reading.label} used (${reading.used}) exceeds total (${reading.total})`);
  }

  if (reading.total === 0) {
    flags.push({
      resource: reading.resource,
      reason: 'zero-total',
      message: `${reading.label} total is 0; utilization reported as 0`
    });
    return 0;
  }

  const utilization = (reading.used * 100) / reading.total;
  if (reading.reported !== undefined && Math.abs(reading.reported - utilization) > UTILIZATION_MISMATCH_TOLERANCE) {
    flags.push({
      resource: reading.resource,
      reason: 'reported-utilization-mismatch',
      message: `${reading.label} utilization reported as ${reading.reported}% but used/total gives ${utilization.toFixed(2)}%`
    });
  }
  return utilization;
}

function buildSample(raw: ParsedRawSample): MetricSample {
  const flags: DataQualityFlag[] = [];
  const readings: ResourceReading[] = [
    { resource: 'cpu', used: raw.vcpus_used, total: raw.vcpus_total, reported: raw.cpu_utilization, label: 'vCPU' },
    { resource: 'memory', used: raw.memory_used_mb, total: raw.memory_total_mb, reported: raw.memory_utilization, label: 'Memory' },
    { resource: 'disk', used: raw.disk_used_gb, total: raw.disk_total_gb, reported: raw.disk_utilization, label: 'Disk' }
  ];
  const [cpuUtilization, memoryUtilization, diskUtilization] = readings.map(r => computeUtilization(r, flags));

  return {
    timestamp: raw.timestamp,
    node: raw.node,
    vcpusUsed: raw.vcpus_used,
    vcpusTotal: raw.vcpus_total,
    memoryUsedMb: raw.memory_used_mb,
    memoryTotalMb: raw.memory_total_mb,
    diskUsedGb: raw.disk_used_gb,
    diskTotalGb: raw.disk_total_gb,
    instances: raw.instances,
    totalInstanceVcpus: raw.total_instance_vcpus,
    totalInstanceMemoryMb: raw.total_instance_memory_mb,
    cpuUtilization: cpuUtilization ?? 0,
    memoryUtilization: memoryUtilization ?? 0,
    diskUtilization: diskUtilization ?? 0,
    hypervisorType: raw.hypervisor_type || 'unknown',
    hypervisorVersion: raw.hypervisor_version,
    state: toNodeState(raw.state),
    status: toNodeStatus(raw.status),
    dataQualityFlags: flags
  };
}

/**
 * Validates one raw collector record into a MetricSample.
 * Throws MissingDataError for absent or unparseable fields and
 * DataQualityError for negative values or used > total.
 */
export function parseSample(raw: RawMetricSample): MetricSample {
  const parsed = rawSampleSchema.safeParse(raw);
  if (!parsed.success) {
    const [first] = parsed.error.issues;
    if (first) raiseForIssue(first);
    throw new MissingDataError('sample');
  }
  return buildSample(parsed.data);
}

function describeTimestamp(raw: RawMetricSample): string | undefined {
  const value = raw['timestamp'];
  return typeof value === 'string' ? value : value instanceof Date ? value.toISOString() : undefined;
}

function exclusionFor(index: number, raw: RawMetricSample, error: unknown): ExcludedSample {
  if (error instanceof MissingDataError) {
    return { index, timestamp: describeTimestamp(raw), code: 'MISSING_DATA', reason: error.message };
  }
  if (error instanceof DataQualityError) {
    return { index, timestamp: describeTimestamp(raw), code: 'DATA_QUALITY', reason: error.message };
  }
  throw error;
}

/**
 * Validates a node's window. Invalid samples are excluded and recorded with
 * their position and reason; samples for another node, duplicate timestamps
 * and timestamps that go backwards are excluded as data-quality problems.
 */
export function validateWindow(node: string, rawSamples: readonly RawMetricSample[]): ValidatedWindow {
  const samples: MetricSample[] = [];
  const excluded: ExcludedSample[] = [];

  rawSamples.forEach((raw, index) => {
    let sample: MetricSample;
    try {
      sample = parseSample(raw);
    } catch (error) {
      if (!isAnalysisError(error)) throw error;
      excluded.push(exclusionFor(index, raw, error));
      return;
    }

    const timestamp = sample.timestamp.toISOString();
    if (sample.node !== node) {
      excluded.push({ index, timestamp, code: 'DATA_QUALITY', reason: `Sample belongs to node "${sample.node}"` });
      return;
    }

    const previous = samples[samples.length - 1];
    if (previous && sample.timestamp.getTime() === previous.timestamp.getTime()) {
      excluded.push({ index, timestamp, code: 'DATA_QUALITY', reason: 'Duplicate timestamp' });
      return;
    }
    if (previous && sample.timestamp.getTime() < previous.timestamp.getTime()) {
      excluded.push({ index, timestamp, code: 'DATA_QUALITY', reason: 'Timestamp earlier than the previous sample' });
      return;
    }

    samples.push(sample);
  });

  return { node, samples, excluded };
}

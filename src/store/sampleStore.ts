import { readFile } from 'fs/promises';
import type { RawMetricSample } from '../types/metrics';
import { parseTimestamp } from '../analysis/sampleValidator';

/**
 * Read side of the metric history. Windows come back in ascending
 * timestamp order; gaps between samples are allowed.
 */
export interface SampleStore {
  listNodes(): Promise<string[]>;
  getWindow(node: string, start: Date, end: Date): Promise<RawMetricSample[]>;
  latestTimestamp(): Promise<Date | undefined>;
}

function timeOf(raw: RawMetricSample): number | undefined {
  const value = raw['timestamp'];
  if (typeof value !== 'string' && typeof value !== 'number' && !(value instanceof Date)) return undefined;
  const time = parseTimestamp(value).getTime();
  return Number.isNaN(time) ? undefined : time;
}

function nodeOf(raw: RawMetricSample): string | undefined {
  const value = raw['node'];
  return typeof value === 'string' ? value : undefined;
}

// Records without a readable timestamp are kept at the end of a node's window so validation can report them
export class InMemorySampleStore implements SampleStore {
  constructor(private readonly records: readonly RawMetricSample[]) {}

  async listNodes(): Promise<string[]> {
    const nodes = new Set<string>();
    for (const record of this.records) {
      const node = nodeOf(record);
      if (node) nodes.add(node);
    }
    return [...nodes].sort();
  }

  async getWindow(node: string, start: Date, end: Date): Promise<RawMetricSample[]> {
    const from = start.getTime();
    const to = end.getTime();
    const timed: { time: number; record: RawMetricSample }[] = [];
    const untimed: RawMetricSample[] = [];

    for (const record of this.records) {
      if (nodeOf(record) !== node) continue;
      const time = timeOf(record);
      if (time === undefined) {
        untimed.push(record);
      } else if (time >= from && time <= to) {
        timed.push({ time, record });
      }
    }

    timed.sort((a, b) => a.time - b.time);
    return [...timed.map(t => t.record), ...untimed];
  }

  async latestTimestamp(): Promise<Date | undefined> {
    let latest: number | undefined;
    for (const record of this.records) {
      const time = timeOf(record);
      if (time !== undefined && (latest === undefined || time > latest)) latest = time;
    }
    return latest === undefined ? undefined : new Date(latest);
  }
}

function isRecord(value: unknown): value is RawMetricSample {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseSampleFile(content: string): RawMetricSample[] {
  const trimmed = content.trim();
  if (trimmed === '') return [];

  // A JSON array, or one JSON object per line
  const parsed: unknown[] = trimmed.startsWith('[')
    ? toArray(JSON.parse(trimmed))
    : trimmed
        .split('\n')
        .map(line => line.trim())
        .filter(line => line.length > 0)
        .map((line): unknown => JSON.parse(line));

  return parsed.map((value, i) => {
    if (!isRecord(value)) {
      throw new Error(`Sample ${i} is not an object`);
    }
    return value;
  });
}

function toArray(value: unknown): unknown[] {
  if (!Array.isArray(value)) {
    throw new Error('Sample file must contain a JSON array');
  }
  return value;
}

export class JsonFileSampleStore implements SampleStore {
  private loaded?: Promise<InMemorySampleStore>;

  constructor(private readonly filePath: string) {}

  private load(): Promise<InMemorySampleStore> {
    if (!this.loaded) {
      this.loaded = readFile(this.filePath, 'utf-8').then(content => new InMemorySampleStore(parseSampleFile(content)));
    }
    return this.loaded;
  }

  async listNodes(): Promise<string[]> {
    return (await this.load()).listNodes();
  }

  async getWindow(node: string, start: Date, end: Date): Promise<RawMetricSample[]> {
    return (await this.load()).getWindow(node, start, end);
  }

  async latestTimestamp(): Promise<Date | undefined> {
    return (await this.load()).latestTimestamp();
  }
}

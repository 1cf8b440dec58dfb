import { Histogram, ValueStats } from './types';

export function round(value: number, digits = 2): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export function mean(values: number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

export function median(values: number[]): number | null {
  if (values.length === 0) return null;
  const sorted = [...values].sort((a, b) => a - b);
  const middle = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[middle - 1] + sorted[middle]) / 2 : sorted[middle];
}

export function valueStats(values: number[]): ValueStats {
  if (values.length === 0) return { count: 0, avg: null, min: null, max: null };
  return {
    count: values.length,
    avg: mean(values),
    min: Math.min(...values),
    max: Math.max(...values),
  };
}

export function numbers(values: (number | null | undefined)[]): number[] {
  return values.filter((value): value is number => typeof value === 'number' && Number.isFinite(value));
}

/**
 * Equal-width bins over [min, max]. Every bin is half-open except the last,
 * which also takes max. A single distinct value gets the range [v - 0.5, v + 0.5].
 */
export function histogram(values: number[], bins: number): Histogram | null {
  if (values.length === 0 || bins < 1) return null;
  let low = Math.min(...values);
  let high = Math.max(...values);
  if (low === high) {
    low -= 0.5;
    high += 0.5;
  }

  const width = (high - low) / bins;
  const binEdges = Array.from({ length: bins + 1 }, (_, i) => (i === bins ? high : low + i * width));
  const counts = new Array<number>(bins).fill(0);
  for (const value of values) {
    const index = value === high ? bins - 1 : Math.min(bins - 1, Math.floor((value - low) / width));
    counts[index]++;
  }
  return { counts, binEdges };
}

export function groupBy<T>(items: T[], key: (item: T) => string): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    const k = key(item);
    const group = groups.get(k);
    if (group) group.push(item);
    else groups.set(k, [item]);
  }
  return groups;
}

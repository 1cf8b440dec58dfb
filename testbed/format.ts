import fs from 'fs/promises';
import path from 'path';
import { toCsvLine } from './csv';
import { Logger, logger } from './logger';
import { ParsedRows } from './parse';
import { writeJson } from './paths';
import { groupBy, histogram, mean, numbers, round } from './stats';
import { FormattedData, RegionMatrix } from './types';

export const HISTOGRAM_BINS = {
  bandwidth: 20,
  loss: 10,
  jitter: 10,
  latency: 15,
} as const;

export interface MatrixCell {
  source: string;
  target: string;
  value: number | null;
}

/**
 * Square matrix over the sorted union of sources and targets. Repeated pairs
 * are averaged; the diagonal stays empty.
 */
export function regionMatrix(cells: MatrixCell[]): RegionMatrix {
  const regions = [...new Set(cells.flatMap((cell) => [cell.source, cell.target]))].sort();
  const index = new Map(regions.map((region, i): [string, number] => [region, i]));
  const values: (number | null)[][] = regions.map(() => regions.map(() => null));

  const groups = groupBy(cells, (cell) => `${cell.source}\u0000${cell.target}`);
  for (const group of groups.values()) {
    const { source, target } = group[0];
    if (source === target) continue;
    const i = index.get(source);
    const j = index.get(target);
    if (i === undefined || j === undefined) continue;
    values[i][j] = mean(numbers(group.map((cell) => cell.value)));
  }
  return { regions, values };
}

/**
 * CSV with an unnamed index column: sources down the side, targets across the top.
 */
export function matrixToCsv(matrix: RegionMatrix, digits = 2): string {
  const lines = [toCsvLine(['', ...matrix.regions])];
  matrix.regions.forEach((region, i) => {
    lines.push(toCsvLine([region, ...matrix.values[i].map((value) => (value === null ? null : round(value, digits)))]));
  });
  return `${lines.join('\n')}\n`;
}

export function formatData(rows: ParsedRows, now: Date = new Date()): FormattedData {
  const p2pBandwidth = rows.p2p.map((row) => row.bandwidth_mbps);
  const udpBandwidth = rows.udp.map((row) => row.bandwidth_mbps);
  const udpLoss = numbers(rows.udp.map((row) => row.lost_percent));
  const udpJitter = numbers(rows.udp.map((row) => row.jitter_ms));
  const latency = numbers(rows.latency.map((row) => row.avg_latency_ms));

  return {
    timestamp: now.toISOString(),
    matrices: {
      p2p_bandwidth: regionMatrix(
        rows.p2p.map((row) => ({ source: row.source_region, target: row.target_region, value: row.bandwidth_mbps }))
      ),
      udp_bandwidth: regionMatrix(
        rows.udp.map((row) => ({ source: row.server_region, target: row.client_region, value: row.bandwidth_mbps }))
      ),
      udp_loss: regionMatrix(
        rows.udp.map((row) => ({ source: row.server_region, target: row.client_region, value: row.lost_percent }))
      ),
      latency: regionMatrix(
        rows.latency.map((row) => ({ source: row.source_region, target: row.target_region, value: row.avg_latency_ms }))
      ),
    },
    histograms: {
      p2p_bandwidth: histogram(p2pBandwidth, HISTOGRAM_BINS.bandwidth),
      udp_bandwidth: histogram(udpBandwidth, HISTOGRAM_BINS.bandwidth),
      udp_loss: histogram(udpLoss, HISTOGRAM_BINS.loss),
      udp_jitter: histogram(udpJitter, HISTOGRAM_BINS.jitter),
      latency: histogram(latency, HISTOGRAM_BINS.latency),
    },
  };
}

export const FORMATTED_FILE = 'formatted_data.json';

const MATRIX_FILES: [keyof FormattedData['matrices'], string][] = [
  ['p2p_bandwidth', 'p2p_bandwidth_matrix.csv'],
  ['udp_bandwidth', 'udp_bandwidth_matrix.csv'],
  ['udp_loss', 'udp_loss_matrix.csv'],
  ['latency', 'latency_matrix.csv'],
];

export async function writeFormattedData(data: FormattedData, outputDir: string, log: Logger = logger): Promise<string[]> {
  await fs.mkdir(outputDir, { recursive: true });
  const files: string[] = [];
  for (const [name, fileName] of MATRIX_FILES) {
    const matrix = data.matrices[name];
    if (matrix.regions.length === 0) continue;
    const filePath = path.join(outputDir, fileName);
    await fs.writeFile(filePath, matrixToCsv(matrix));
    files.push(filePath);
  }
  const formattedFile = path.join(outputDir, FORMATTED_FILE);
  await writeJson(formattedFile, data);
  files.push(formattedFile);
  log.info(`Formatted data written to ${formattedFile}`);
  return files;
}

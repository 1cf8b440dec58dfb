import axios, { AxiosInstance } from 'axios';
import { AwsCredentials } from './aws';
import { BenchmarkConfigInput } from './config';
import { JobView } from './jobs';
import { Sleep, sleep as defaultSleep } from './tools';

export interface RemoteRun {
  id: string;
  hasSummary: boolean;
  report: string | null;
}

export interface FollowOptions {
  intervalMs?: number;
  sleep?: Sleep;
}

/**
 * HTTP client for a dashboard started with `netbench dashboard`.
 */
export class DashboardClient {
  private readonly http: AxiosInstance;

  constructor(readonly baseUrl: string, timeoutMs = 10_000) {
    this.http = axios.create({ baseURL: baseUrl, timeout: timeoutMs });
  }

  async health(): Promise<{ status: string; activeJob: string | null }> {
    const { data } = await this.http.get<{ status: string; activeJob: string | null }>('/api/health');
    return data;
  }

  async submitRun(config: BenchmarkConfigInput, credentials?: AwsCredentials): Promise<string> {
    const { data } = await this.http.post<{ jobId: string }>('/api/runs', { config, credentials });
    return data.jobId;
  }

  async submitCleanup(credentials?: AwsCredentials): Promise<string> {
    const { data } = await this.http.post<{ jobId: string }>('/api/cleanup', { credentials });
    return data.jobId;
  }

  async job(id: string, offset = 0): Promise<JobView> {
    const { data } = await this.http.get<JobView>(`/api/jobs/${encodeURIComponent(id)}`, { params: { offset } });
    return data;
  }

  /**
   * Polls a job, handing each new output line to `onLine`, until it finishes.
   */
  async follow(id: string, onLine: (line: string) => void, { intervalMs = 2000, sleep = defaultSleep }: FollowOptions = {}): Promise<JobView> {
    let offset = 0;
    for (;;) {
      const view = await this.job(id, offset);
      view.lines.forEach(onLine);
      offset = view.nextOffset;
      if (view.status !== 'running') return view;
      await sleep(intervalMs);
    }
  }

  async listRuns(): Promise<RemoteRun[]> {
    const { data } = await this.http.get<{ runs: RemoteRun[] }>('/api/runs');
    return data.runs;
  }
}

export function describeRequestError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    const body: unknown = error.response?.data;
    if (body && typeof body === 'object' && 'error' in body && typeof body.error === 'string') {
      return `${error.response?.status ?? ''} ${body.error}`.trim();
    }
    return error.message;
  }
  return error instanceof Error ? error.message : String(error);
}

// Note: UNITS
// All bandwidths are in megabits per second (Mbps, 10^6 bits)
// All transfer sizes are in megabytes (MB, 10^6 bytes)
// All latencies and jitter are in milliseconds (ms)
// All tool timings are in milliseconds (ms)

export interface Timing {
  duration: number; // ms
}

// instance_info.json, as written for the test drivers
export interface RegionInstances {
  public_ips: string[];
  private_ips: string[];
  instance_ids?: string[];
}

export interface InstanceInfo {
  instances: Record<string, RegionInstances>;
}

export interface InstanceDescriptor {
  region: string;
  publicIp: string;
  privateIp: string;
  instanceId?: string;
}

// One side of a test: the address used plus a label for reports.
// The label is the region code, or `<region>_instance<n>` for intra-region tests.
export interface Endpoint {
  label: string;
  region: string;
  // address under test: public or private, as configured
  ip: string;
  // address ssh reaches the host on
  sshHost: string;
}

export interface TestPair {
  source: Endpoint;
  target: Endpoint;
}

export interface PingResult {
  packetsTransmitted: number | null;
  packetsReceived: number | null;
  packetLossPercent: number | null;
  minMs: number | null;
  avgMs: number | null;
  maxMs: number | null;
  mdevMs: number | null;
}

export interface LatencyTestFile {
  source_ip: string;
  source_region: string;
  target_ip: string;
  target_region: string;
  timestamp: string;
  ping_count: number;
  stats: PingResult;
  raw_output: string;
}

export type Iperf3Protocol = 'TCP' | 'UDP';

export type Iperf3Summary =
  | {
      status: 'success';
      protocol: 'TCP';
      bandwidthMbps: number;
      transferMB: number;
      durationSec: number;
      retransmits: number | null;
    }
  | {
      status: 'success';
      protocol: 'UDP';
      bandwidthMbps: number;
      transferMB: number;
      durationSec: number;
      jitterMs: number;
      lostPackets: number;
      packets: number;
      lostPercent: number;
    }
  | { status: 'error'; error: string }
  | { status: 'unknown'; error: string };

export interface Iperf3Interval {
  endSec: number;
  bandwidthMbps: number;
  retransmits: number | null;
  jitterMs: number | null;
  lostPercent: number | null;
}

export interface P2PTestRecord {
  timestamp: string;
  source_region: string;
  source_ip: string;
  target_region: string;
  target_ip: string;
  protocol: 'TCP';
  duration_sec: number;
  parallel_streams: number;
  sent_mbps: number;
  received_mbps: number;
  retransmits: number | null;
  result_file: string | null;
  error: string | null;
}

export interface P2PSummaryFile {
  timestamp: string;
  ip_type: 'public' | 'private';
  tests: P2PTestRecord[];
}

export interface UdpTestRecord {
  server_region: string;
  server_ip: string;
  client_region: string;
  client_ip: string;
  result_file: string | null;
  error: string | null;
}

export interface UdpSummaryFile {
  server_region: string;
  ip_type: 'public' | 'private';
  timestamp: string;
  results: UdpTestRecord[];
  ip_to_region_map: Record<string, string>;
}

export interface CollectedTest {
  file: string;
  source_region: string | null;
  target_region: string | null;
  timestamp: string | null;
  result: Iperf3Summary;
}

export interface CollectedLatencyTest {
  file: string;
  source_region: string;
  target_region: string;
  timestamp: string;
  status: 'success' | 'error';
  stats: PingResult | null;
  error?: string;
}

export interface CollectedResults {
  timestamp: string;
  point_to_point_tests: CollectedTest[];
  udp_multicast_tests: CollectedTest[];
  latency_tests: CollectedLatencyTest[];
}

// Tabular records, one per CSV row
export interface LatencyRow {
  source_region: string;
  target_region: string;
  min_latency_ms: number | null;
  avg_latency_ms: number | null;
  max_latency_ms: number | null;
  mdev_ms: number | null;
  packet_loss_percent: number | null;
  timestamp: string;
  file: string;
}

export interface P2PRow {
  source_region: string;
  target_region: string;
  protocol: Iperf3Protocol;
  bandwidth_mbps: number;
  transfer_mb: number;
  duration_sec: number;
  retransmits: number | null;
  jitter_ms: number | null;
  lost_packets: number | null;
  lost_percent: number | null;
  timestamp: string;
  file: string;
}

export interface UdpRow {
  server_region: string;
  client_region: string;
  protocol: Iperf3Protocol;
  bandwidth_mbps: number;
  transfer_mb: number;
  duration_sec: number;
  jitter_ms: number | null;
  lost_packets: number | null;
  packets: number | null;
  lost_percent: number | null;
  timestamp: string;
  file: string;
}

export interface ValueStats {
  count: number;
  avg: number | null;
  min: number | null;
  max: number | null;
}

export interface RegionPairStats {
  source_region: string;
  target_region: string;
  tests: number;
  avg_bandwidth_mbps?: number | null;
  avg_lost_percent?: number | null;
  avg_jitter_ms?: number | null;
  avg_latency_ms?: number | null;
}

export interface ResultsSummary {
  timestamp: string;
  point_to_point: {
    total_tests: number;
    successful_tests: number;
    bandwidth_mbps: ValueStats;
    region_pairs: RegionPairStats[];
  };
  udp_multicast: {
    total_tests: number;
    successful_tests: number;
    bandwidth_mbps: ValueStats;
    jitter_ms: ValueStats;
    lost_percent: ValueStats;
    region_pairs: RegionPairStats[];
  };
  latency: {
    total_tests: number;
    successful_tests: number;
    avg_latency_ms: ValueStats;
    packet_loss_percent: ValueStats;
    region_pairs: RegionPairStats[];
  };
}

export interface RegionMatrix {
  regions: string[];
  // values[i][j]: source regions[i] to target regions[j]; null on the diagonal and for untested pairs
  values: (number | null)[][];
}

export interface Histogram {
  counts: number[];
  binEdges: number[];
}

export interface FormattedData {
  timestamp: string;
  matrices: {
    p2p_bandwidth: RegionMatrix;
    udp_bandwidth: RegionMatrix;
    udp_loss: RegionMatrix;
    latency: RegionMatrix;
  };
  histograms: {
    p2p_bandwidth: Histogram | null;
    udp_bandwidth: Histogram | null;
    udp_loss: Histogram | null;
    udp_jitter: Histogram | null;
    latency: Histogram | null;
  };
}

export interface StageError {
  stage: string;
  error: string;
}

export interface RunResult {
  runId: string;
  runDir: string;
  durations: {
    total: Timing;
    stages: Record<string, Timing>;
  };
  errors: StageError[];
  reportPath?: string;
}

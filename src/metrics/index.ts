/**
 * Metrics Collection Module
 * Tracks tunnel statistics for monitoring and debugging
 */

export interface TunnelCounters {
  total: number;
  rejected: number;
  dialFailures: number;
  relayErrors: number;
}

export interface BandwidthMetrics {
  totalBytesUp: number;
  totalBytesDown: number;
}

export interface ProxyMetrics {
  startTime: number;
  uptime: number;
  tunnels: TunnelCounters;
  bandwidth: BandwidthMetrics;
  failureRate: number;
  errors: number;
  activeTunnels: number;
  peakTunnels: number;
}

// Metrics storage
const metrics = {
  startTime: Date.now(),
  tunnels: {
    total: 0,
    rejected: 0,
    dialFailures: 0,
    relayErrors: 0,
  },
  bandwidth: {
    totalBytesUp: 0,
    totalBytesDown: 0,
  },
  errors: 0,
  activeTunnels: 0,
  peakTunnels: 0,
};

/**
 * Record a new CONNECT request
 */
export function recordTunnel(): void {
  metrics.tunnels.total++;
}

/**
 * Record a CONNECT request refused before any tunnel was set up
 */
export function recordRejected(): void {
  metrics.tunnels.rejected++;
}

/**
 * Record a failed upstream dial
 */
export function recordDialFailure(): void {
  metrics.tunnels.dialFailures++;
}

/**
 * Record a relay that ended with a real error
 */
export function recordRelayError(): void {
  metrics.tunnels.relayErrors++;
}

/**
 * Record bytes relayed by one tunnel
 */
export function recordBandwidth(bytesUp: number, bytesDown: number): void {
  metrics.bandwidth.totalBytesUp += bytesUp;
  metrics.bandwidth.totalBytesDown += bytesDown;
}

/**
 * Record an error that is neither a dial nor a relay failure
 */
export function recordError(): void {
  metrics.errors++;
}

/**
 * Update active tunnel count
 */
export function updateTunnels(delta: number): void {
  metrics.activeTunnels += delta;
  if (metrics.activeTunnels > metrics.peakTunnels) {
    metrics.peakTunnels = metrics.activeTunnels;
  }
  if (metrics.activeTunnels < 0) {
    metrics.activeTunnels = 0;
  }
}

/**
 * Get current metrics
 */
export function getMetrics(): ProxyMetrics {
  const uptime = Date.now() - metrics.startTime;
  const failed = metrics.tunnels.dialFailures + metrics.tunnels.relayErrors;
  const failureRate = metrics.tunnels.total > 0
    ? (failed / metrics.tunnels.total) * 100
    : 0;

  return {
    startTime: metrics.startTime,
    uptime,
    tunnels: { ...metrics.tunnels },
    bandwidth: { ...metrics.bandwidth },
    failureRate,
    errors: metrics.errors,
    activeTunnels: metrics.activeTunnels,
    peakTunnels: metrics.peakTunnels,
  };
}

/**
 * Reset metrics (useful for testing)
 */
export function resetMetrics(): void {
  metrics.startTime = Date.now();
  metrics.tunnels.total = 0;
  metrics.tunnels.rejected = 0;
  metrics.tunnels.dialFailures = 0;
  metrics.tunnels.relayErrors = 0;
  metrics.bandwidth.totalBytesUp = 0;
  metrics.bandwidth.totalBytesDown = 0;
  metrics.errors = 0;
  metrics.activeTunnels = 0;
  metrics.peakTunnels = 0;
}

/**
 * Format bytes to human-readable string
 */
export function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 B';
  const k = 1024;
  const sizes = ['B', 'KB', 'MB', 'GB', 'TB'];
  const i = Math.min(sizes.length - 1, Math.floor(Math.log(Math.abs(bytes)) / Math.log(k)));
  return (bytes / Math.pow(k, i)).toFixed(2) + ' ' + sizes[i];
}

/**
 * Format duration to human-readable string
 */
export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);
  const days = Math.floor(hours / 24);

  if (days > 0) return `${days}d ${hours % 24}h ${minutes % 60}m`;
  if (hours > 0) return `${hours}h ${minutes % 60}m ${seconds % 60}s`;
  if (minutes > 0) return `${minutes}m ${seconds % 60}s`;
  return `${seconds}s`;
}

#!/usr/bin/env node
/**
 * connect-tunnel - HTTP CONNECT Tunnelling Proxy
 *
 * Answers CONNECT requests with raw TCP tunnels between the client and
 * the requested host:port.
 */

import { realpathSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import type { Server } from 'node:http';
import { getConfig, loadConfigFromEnv, updateConfig, type TunnelConfig } from './config/index.js';
import { setLogLevel } from './logger/index.js';
import { formatBytes, formatDuration, getMetrics, type ProxyMetrics } from './metrics/index.js';
import { createConnectProxy } from './proxy/index.js';

function printStatus(config: TunnelConfig): void {
  console.log(`
🎯 Tunnel Proxy Status:
   Listening:        ${config.bindAddress}:${config.httpProxyPort}

🔧 Tunnel Settings:
   Idle timeout:     ${config.idleTimeout > 0 ? formatDuration(config.idleTimeout) : '❌ disabled'}
   Dial timeout:     ${config.dialTimeout > 0 ? formatDuration(config.dialTimeout) : '❌ disabled'}
   200 after dial:   ${config.okWaitsForUpstream ? '✅' : '❌'}
   Buffer size:      ${formatBytes(config.bufferSize)}
   Buffer pool:      ${config.bufferPoolSize > 0 ? config.bufferPoolSize : '❌ unpooled'}
   Session logs:     ${config.logSessions ? `✅ ${config.sessionLogDir}` : '❌'}
`);
}

function printSummary(metrics: ProxyMetrics): void {
  console.log(`
📊 Tunnel Summary (${formatDuration(metrics.uptime)}):
   Tunnels:          ${metrics.tunnels.total} (peak ${metrics.peakTunnels} concurrent)
   Rejected:         ${metrics.tunnels.rejected}
   Dial failures:    ${metrics.tunnels.dialFailures}
   Relay errors:     ${metrics.tunnels.relayErrors}
   Sent upstream:    ${formatBytes(metrics.bandwidth.totalBytesUp)}
   Sent downstream:  ${formatBytes(metrics.bandwidth.totalBytesDown)}
`);
}

export interface TunnelServer {
  start(): void;
  stop(): Promise<void>;
  getConfig(): TunnelConfig;
  updateConfig(config: Partial<TunnelConfig>): void;
  getMetrics(): ProxyMetrics;
}

export function createTunnelServer(configOverrides?: Partial<TunnelConfig>): TunnelServer {
  let server: Server | null = null;

  if (configOverrides) {
    updateConfig(configOverrides);
  }

  return {
    start(): void {
      const config = getConfig();
      setLogLevel(config.logLevel);

      console.log('🚇 Starting CONNECT proxy...');
      server = createConnectProxy(config.httpProxyPort, config.bindAddress);

      printStatus(config);
      console.log('✅ connect-tunnel is ready!');
    },

    async stop(): Promise<void> {
      console.log('🛑 Stopping connect-tunnel...');

      const current = server;
      server = null;
      if (current) {
        await new Promise<void>((resolve) => {
          current.close(() => resolve());
          // Tunnels are long-lived; don't wait for them to drain
          current.closeAllConnections();
        });
      }

      printSummary(getMetrics());
      console.log('👋 connect-tunnel stopped');
    },

    getConfig,

    updateConfig(partial: Partial<TunnelConfig>): void {
      updateConfig(partial);
    },

    getMetrics,
  };
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(entry) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

// CLI entry point
if (isEntryPoint()) {
  let server: TunnelServer;
  try {
    server = createTunnelServer(loadConfigFromEnv());
  } catch (err) {
    console.error(`❌ ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }

  const shutdown = (): void => {
    server.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error(`❌ Shutdown failed: ${String(err)}`);
        process.exit(1);
      }
    );
  };

  // Handle graceful shutdown
  process.on('SIGINT', () => {
    console.log('\n');
    shutdown();
  });

  process.on('SIGTERM', shutdown);

  server.start();
}

export { getConfig, updateConfig, loadConfigFromEnv, type TunnelConfig } from './config/index.js';
export * from './tunnel/index.js';
export { createDialer, dialTcp, parseAuthority, withIdleTimeout, type DialerOptions } from './dialer/index.js';
export { createConnectProxy, createConnectHandler, type ConnectProxyOptions } from './proxy/index.js';
export { clean, hide } from './redact/index.js';

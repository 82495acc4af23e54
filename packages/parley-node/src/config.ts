/**
 * Node host configuration.
 *
 * Reads from environment variables (and a `.env` file in the working
 * directory) with defaults for a local push server and relay.
 */

import dotenv from 'dotenv';
import type { BackoffKind, DeliveryPolicy } from '@parley/service';

dotenv.config();

export interface ParleyNodeConfig {
  /** This device's peer ID (required). */
  peerId: string;
  /** Directory for the JSON record files. */
  dataDir: string;
  /** Base URL of the push notification server. */
  pushApiUrl: string;
  /** Application name registered with the push server. */
  pushAppName: string;
  /** Application key for the push server (required). */
  pushAppKey: string;
  /** Relay WebSocket URL for inbound traffic. */
  relayUrl: string;
  /** Log level (trace, debug, info, warn, error, fatal). */
  logLevel: string;
  /** Retry policy for accept/decline responses. */
  delivery: DeliveryPolicy;
  /** WebSocket keepalive ping interval (ms). */
  keepaliveInterval: number;
  /** Max reconnection delay for WebSocket (ms). */
  maxReconnectDelay: number;
}

function requireEnv(key: string): string {
  const value = process.env[key];
  if (!value) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

function intEnv(key: string, fallback: number): number {
  const raw = process.env[key];
  if (raw === undefined || raw === '') return fallback;
  const value = parseInt(raw, 10);
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`Invalid value for ${key}: ${raw}`);
  }
  return value;
}

function backoffEnv(key: string, fallback: BackoffKind): BackoffKind {
  const raw = process.env[key];
  if (raw === undefined || raw === '') return fallback;
  if (raw === 'fixed' || raw === 'linear') return raw;
  throw new Error(`Invalid value for ${key}: ${raw} (expected fixed or linear)`);
}

export function loadConfig(): ParleyNodeConfig {
  return {
    peerId: requireEnv('PEER_ID'),
    dataDir: process.env.DATA_DIR ?? './data',
    pushApiUrl: process.env.PUSH_API_URL ?? 'http://localhost:8801',
    pushAppName: process.env.PUSH_APP_NAME ?? 'parley',
    pushAppKey: requireEnv('PUSH_APP_KEY'),
    relayUrl: process.env.RELAY_URL ?? 'ws://localhost:8080/ws',
    logLevel: process.env.LOG_LEVEL ?? 'info',
    delivery: {
      maxAttempts: Math.max(1, intEnv('DELIVERY_MAX_ATTEMPTS', 3)),
      retryDelayMs: intEnv('DELIVERY_RETRY_DELAY', 2000),
      backoff: backoffEnv('DELIVERY_BACKOFF', 'fixed'),
    },
    keepaliveInterval: intEnv('KEEPALIVE_INTERVAL', 30000),
    maxReconnectDelay: intEnv('MAX_RECONNECT_DELAY', 60000),
  };
}

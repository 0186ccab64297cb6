/**
 * Top-level modelgate configuration.
 *
 * Assembled from defaults, an optional YAML file and the environment
 * (see core/config.ts). Only backends with a complete configuration
 * appear in `providers`, in the fixed family order.
 */

import type { ProviderConfig } from './provider.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface RetrySettings {
  /** Total attempts per call, first one included */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface AppConfig {
  server: {
    host: string;
    port: number;
  };

  database: {
    path: string;
  };

  /** Registered backends, in configuration order */
  providers: ProviderConfig[];

  generation: {
    /** Bound on one backend attempt */
    timeoutMs: number;
    retry: RetrySettings;
  };

  usage: {
    /** Write usage records after each call */
    track: boolean;
  };

  admin: {
    /** Bearer token for /api/admin/*; admin routes are closed without one */
    token: string | null;
  };

  logLevel: LogLevel;
}

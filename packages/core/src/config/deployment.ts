/**
 * Deployment configuration for the kitchen worker. Everything comes from
 * environment variables; the worker loads `.env` files with dotenv first.
 */

import type { LogLevel } from '../observability/logger';

export type DeploymentTarget = 'container' | 'local';

export interface DeploymentConfig {
  target: DeploymentTarget;
  database: {
    url: string;
    poolSize: number;
  };
  logLevel: LogLevel;
  /** Hubs the worker runs auto-bump for. */
  hubIds: string[];
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function detectTarget(env: NodeJS.ProcessEnv): DeploymentTarget {
  if (env.ECS_CONTAINER_METADATA_URI || env.KUBERNETES_SERVICE_HOST) return 'container';
  return 'local';
}

function parseHubIds(raw: string | undefined): string[] {
  if (!raw) return [];
  return [...new Set(raw.split(',').map((id) => id.trim()).filter(Boolean))];
}

function parsePoolSize(raw: string | undefined, target: DeploymentTarget): number {
  const parsed = raw ? parseInt(raw, 10) : NaN;
  if (Number.isInteger(parsed) && parsed > 0) return parsed;
  // Persistent container process: larger pool
  return target === 'container' ? 10 : 5;
}

let _config: DeploymentConfig | null = null;

export function getDeploymentConfig(env: NodeJS.ProcessEnv = process.env): DeploymentConfig {
  if (_config) return _config;

  const url = env.DATABASE_URL;
  if (!url) {
    throw new Error('DATABASE_URL environment variable is required');
  }
  const target = detectTarget(env);
  const logLevel = LOG_LEVELS.find((level) => level === env.LOG_LEVEL) ?? 'info';

  _config = {
    target,
    database: {
      url,
      poolSize: parsePoolSize(env.DB_POOL_MAX, target),
    },
    logLevel,
    hubIds: parseHubIds(env.KDS_HUB_IDS),
  };

  return _config;
}

/** Reset cached config (for testing) */
export function resetDeploymentConfig(): void {
  _config = null;
}

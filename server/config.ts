import path from 'node:path';
import type { ProcessTrustPolicy } from '../src/types.js';

export interface ServerConfig {
  port: number;
  host: string;
  production: boolean;
  logLevel: string;
  dataDir: string;
  trustPolicy: ProcessTrustPolicy;
  corsOrigin: string | false;
}

const TRUST_POLICIES: readonly ProcessTrustPolicy[] = ['first-connection', 'majority', 'all'];
const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function parsePort(value: string | undefined, fallback: number): number {
  const port = parseInt(value || '', 10);
  return Number.isInteger(port) && port > 0 && port < 65536 ? port : fallback;
}

function parseTrustPolicy(value: string | undefined): ProcessTrustPolicy {
  return TRUST_POLICIES.find(policy => policy === value) ?? 'first-connection';
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const production = env.NODE_ENV === 'production';
  const logLevel = env.LOG_LEVEL && LOG_LEVELS.includes(env.LOG_LEVEL) ? env.LOG_LEVEL : 'warn';

  return {
    port: parsePort(env.PORT, 3000),
    host: env.HOST || '0.0.0.0',
    production,
    logLevel,
    dataDir: path.resolve(env.NETLINEAGE_DATA_DIR || '.'),
    trustPolicy: parseTrustPolicy(env.NETLINEAGE_TRUST_POLICY),
    corsOrigin: production ? false : env.CORS_ORIGIN || 'http://localhost:5173',
  };
}

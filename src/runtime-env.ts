import { existsSync } from 'node:fs';
import { resolve } from 'node:path';

const ENV_FILE_CANDIDATES = [
  resolve(process.cwd(), '.env'),
  resolve(__dirname, '..', '.env'),
];

export const APP_CONFIG = Symbol('APP_CONFIG');

export interface AppConfig {
  port: number;
  seedSampleData: boolean;
  corsOrigin: boolean | string;
}

let envLoadAttempted = false;

/**
 * Loads the first `.env` found. Variables already present in the
 * environment are left alone.
 */
export function ensureRuntimeEnvLoaded(): void {
  if (envLoadAttempted) {
    return;
  }

  envLoadAttempted = true;

  const envFilePath = ENV_FILE_CANDIDATES.find((candidate) =>
    existsSync(candidate),
  );
  if (envFilePath) {
    process.loadEnvFile(envFilePath);
  }
}

export function readAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: parsePort(env.PORT),
    seedSampleData: env.SEED_SAMPLE_DATA?.trim().toLowerCase() !== 'false',
    corsOrigin: parseCorsOrigin(env.CORS_ORIGIN),
  };
}

function parsePort(value: string | undefined): number {
  if (!value || !value.trim()) {
    return 3000;
  }

  const port = Number(value);
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new Error(`PORT must be an integer between 1 and 65535, got '${value}'.`);
  }

  return port;
}

function parseCorsOrigin(value: string | undefined): boolean | string {
  const origin = value?.trim();
  if (!origin || origin.toLowerCase() === 'true') {
    return true;
  }

  if (origin.toLowerCase() === 'false') {
    return false;
  }

  return origin;
}

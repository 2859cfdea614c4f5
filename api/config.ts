import path from 'path';

export interface AppConfig {
  port: number;
  dataDir: string;
  corsOrigin: string;
  uploadLimitMb: number;
}

const DEFAULT_PORT = 5001;
const DEFAULT_UPLOAD_LIMIT_MB = 10;

function positiveNumber(name: string, raw: string | undefined, fallback: number) {
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    console.warn(`Invalid ${name} "${raw}", using ${fallback}`);
    return fallback;
  }
  return value;
}

/**
 * Builds the runtime configuration from environment variables.
 * Call after dotenv has populated process.env.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: positiveNumber('PORT', env.PORT, DEFAULT_PORT),
    dataDir: path.resolve(env.DATA_DIR || 'data'),
    corsOrigin: env.CORS_ORIGIN || '*',
    uploadLimitMb: positiveNumber('UPLOAD_LIMIT_MB', env.UPLOAD_LIMIT_MB, DEFAULT_UPLOAD_LIMIT_MB),
  };
}

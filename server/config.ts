export interface ServerConfig {
  port: number;
  host: string;
  nodeEnv: string;
  logLevel: string;
  rateLimitWindowMs: number;
  rateLimitMax: number;
  maxTextLength: number;
  maxUploadBytes: number;
  reportCacheTtlMs: number;
}

const readInt = (value: string | undefined, fallback: number): number => {
  if (!value) return fallback;
  const parsed = parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

/**
 * Reads the server configuration from the environment.
 * Called per use so that changes to process.env are picked up.
 */
export function getServerConfig(): ServerConfig {
  // Unset means production: stacks only reach clients when development is explicit
  const nodeEnv = process.env.NODE_ENV || 'production';

  return {
    port: readInt(process.env.PORT, 3001),
    host: process.env.HOST || '0.0.0.0',
    nodeEnv,
    logLevel: process.env.LOG_LEVEL || (nodeEnv === 'test' ? 'silent' : 'info'),
    rateLimitWindowMs: readInt(process.env.RATE_LIMIT_WINDOW_MS, 15 * 60 * 1000), // 15 minutes
    rateLimitMax: readInt(process.env.RATE_LIMIT_MAX, 100),
    maxTextLength: readInt(process.env.MAX_TEXT_LENGTH, 500000),
    maxUploadBytes: readInt(process.env.MAX_UPLOAD_BYTES, 5 * 1024 * 1024), // 5MB
    reportCacheTtlMs: readInt(process.env.REPORT_CACHE_TTL_MS, 24 * 60 * 60 * 1000), // 24 hours
  };
}

export const isDevelopment = (): boolean => getServerConfig().nodeEnv === 'development';

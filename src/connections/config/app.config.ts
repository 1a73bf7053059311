import dotenv from 'dotenv';

dotenv.config();

/**
 * Parse CORS origins from environment variable
 * Supports comma or space separated values
 */
const parseCorsOrigins = (): string[] => {
  const corsOrigins = process.env.CORS_ORIGINS || '';
  if (!corsOrigins) {
    return [];
  }

  return corsOrigins
    .split(/[,\s]+/)
    .map(origin => origin.trim())
    .filter(origin => origin.length > 0);
};

const parseInteger = (value: string | undefined, fallback: number): number => {
  const parsed = parseInt(value || '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

export const appConfig = {
  port: parseInteger(process.env.APP_PORT || process.env.PORT, 3000),
  nodeEnv: process.env.NODE_ENV || 'development',
  frontendUrl: process.env.FRONTEND_URL || 'http://localhost:5173',
  corsOrigins: parseCorsOrigins(),
  logLevel: (process.env.LOG_LEVEL || 'info').toLowerCase(),
  logDir: process.env.LOG_DIR || './logs',
  // size ("10MB") or period ("1 day"); retention like "30 days" or "12h"
  logRotation: process.env.LOG_ROTATION || '10MB',
  logRetention: process.env.LOG_RETENTION || '30 days',
};

export const searchConfig = {
  defaultPage: 1,
  defaultPageSize: parseInteger(process.env.SEARCH_DEFAULT_PAGE_SIZE, 50),
  maxPageSize: parseInteger(process.env.SEARCH_MAX_PAGE_SIZE, 200),
  bulkMaxIds: parseInteger(process.env.BULK_MAX_IDS, 500),
  suggestionMinQueryLength: 2,
  suggestionSearchPageSize: 10,
  suggestionLimit: 8,
};

export { parseInteger };

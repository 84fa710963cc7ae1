import dotenv from 'dotenv';

dotenv.config();

/**
 * Parse a comma-separated list of HTTP status codes, ignoring anything non-numeric
 */
function parseStatusCodes(value: string): number[] {
  return value
    .split(',')
    .map((code) => parseInt(code.trim(), 10))
    .filter((code) => Number.isInteger(code) && code > 0);
}

export const env = {
  // Server
  PORT: parseInt(process.env.PORT || '3001', 10),
  NODE_ENV: process.env.NODE_ENV || 'development',

  // CORS
  CLIENT_URL: process.env.CLIENT_URL || 'http://localhost:5173',

  // Fetching
  USER_AGENT: process.env.USER_AGENT || 'Mozilla/5.0 (compatible; Linkmap/1.0)',
  HTTP_TIMEOUT: parseInt(process.env.HTTP_TIMEOUT || '10000', 10), // 10s for GET and HEAD
  ALLOW_LOCAL_FILES: process.env.ALLOW_LOCAL_FILES === 'true', // Default false for the API

  // Crawl mode
  DEFAULT_SEED_URL: process.env.DEFAULT_SEED_URL || 'https://example.com',
  DEFAULT_MAX_DEPTH: parseInt(process.env.DEFAULT_MAX_DEPTH || '1', 10),

  // Audit mode
  ERROR_STATUS_CODES: parseStatusCodes(process.env.ERROR_STATUS_CODES || '404'),
  SCAN_PAGE_CONCURRENCY: parseInt(process.env.SCAN_PAGE_CONCURRENCY || '10', 10),
  SCAN_LINK_CONCURRENCY: parseInt(process.env.SCAN_LINK_CONCURRENCY || '20', 10),

  // CLI output
  OUTPUT_DIR: process.env.OUTPUT_DIR || '.',
} as const;

export default env;

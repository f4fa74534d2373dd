/**
 * Centralized Configuration
 *
 * All configuration values can be tuned via environment variables.
 * The extraction pipeline itself never reads this object: callers pass
 * the relevant slice (e.g. OCR languages) in explicitly.
 */

export interface Config {
  // Redis
  redisHost: string;
  redisPort: number;
  redisUrl: string;

  // Queue & Worker
  workerConcurrency: number;
  maxJobAttempts: number;
  backoffBaseMs: number;

  // Text acquisition
  ocrLanguages: ReadonlySet<string>;
  tesseractPath: string;
  ocrTimeoutMs: number;

  // Object Store
  objectStorePath: string;

  // Metrics
  metricsPort: number;
}

/**
 * Parse a tesseract-style language list ("fra+eng", "fra,eng") into a set.
 * Falls back to French and English when nothing usable is given.
 */
export function parseOcrLanguages(raw: string | undefined): ReadonlySet<string> {
  const languages = (raw ?? '')
    .split(/[+,\s]+/)
    .map((code) => code.trim().toLowerCase())
    .filter((code) => code.length > 0);

  return new Set(languages.length > 0 ? languages : ['fra', 'eng']);
}

export const config: Config = {
  // Redis
  redisHost: process.env.REDIS_HOST || 'redis',
  redisPort: parseInt(process.env.REDIS_PORT || '6379', 10),
  redisUrl: process.env.REDIS_URL || 'redis://redis:6379',

  // Queue & Worker
  workerConcurrency: parseInt(process.env.WORKER_CONCURRENCY || '4', 10),
  maxJobAttempts: parseInt(process.env.BULLMQ_DEFAULT_ATTEMPTS || '3', 10),
  backoffBaseMs: parseInt(process.env.BACKOFF_BASE_MS || '2000', 10),

  // Text acquisition
  ocrLanguages: parseOcrLanguages(process.env.OCR_LANGS),
  tesseractPath: process.env.TESSERACT_PATH || 'tesseract',
  ocrTimeoutMs: parseInt(process.env.OCR_TIMEOUT_MS || '120000', 10),

  // Object Store
  objectStorePath: process.env.OBJECT_STORE_PATH || '/object-store',

  // Metrics
  metricsPort: parseInt(process.env.METRICS_PORT || '9464', 10),
};

/**
 * BullMQ Queue Definitions
 *
 * Queue names, job interfaces, and queue factory functions.
 */

import { Queue, Worker, Job, ConnectionOptions } from 'bullmq';
import { config } from './config';
import { logger } from './logger';
import type { InvoiceExportRow } from './types';
import { queueDepthGauge } from './metrics';

// ============================================================================
// Queue Names
// ============================================================================

export const QUEUE_NAMES = {
  EXTRACT_INVOICE: 'extract_invoice',
  EXPORT_INVOICE_ROW: 'export_invoice_row',
} as const;

export type QueueName = (typeof QUEUE_NAMES)[keyof typeof QUEUE_NAMES];

// ============================================================================
// Job Payloads
// ============================================================================

/**
 * extract_invoice - one job per discovered attachment
 */
export interface ExtractInvoiceJob {
  event_type: 'invoice.available';
  correlation_id: string;
  batch_id: string;
  document_label: string;
  /** file:// URI (or plain path) of the downloaded attachment */
  raw_uri: string;
  /** Trusted client name from the submission, overrides the matched one */
  preferred_client_name?: string;
}

/**
 * export_invoice_row - one job per extracted record, consumed by the exporter
 */
export interface ExportInvoiceRowJob {
  event_type: 'invoice.extracted';
  correlation_id: string;
  batch_id: string;
  document_label: string;
  row: InvoiceExportRow;
}

// ============================================================================
// Redis Connection
// ============================================================================

export function getRedisConnection(): ConnectionOptions {
  const redisUrl = config.redisUrl;

  if (redisUrl && redisUrl.startsWith('redis://')) {
    try {
      const url = new URL(redisUrl);
      return {
        host: url.hostname,
        port: parseInt(url.port || '6379', 10),
        maxRetriesPerRequest: null, // Required for BullMQ
      };
    } catch {
      logger.warn('Invalid REDIS_URL, using REDIS_HOST/REDIS_PORT', { redisUrl });
    }
  }

  return {
    host: config.redisHost,
    port: config.redisPort,
    maxRetriesPerRequest: null,
  };
}

// ============================================================================
// Queue Factory
// ============================================================================

const defaultJobOptions = {
  attempts: config.maxJobAttempts,
  backoff: {
    type: 'exponential' as const,
    delay: config.backoffBaseMs,
  },
  removeOnComplete: 100, // Keep last 100 completed jobs
  removeOnFail: 1000, // Keep last 1000 failed jobs
};

export function createQueue<TData, TResult>(queueName: QueueName): Queue<TData, TResult> {
  return new Queue<TData, TResult>(queueName, {
    connection: getRedisConnection(),
    defaultJobOptions,
  });
}

// ============================================================================
// Worker Factory
// ============================================================================

export interface WorkerOptions {
  concurrency?: number;
}

export function createWorker<TData, TResult>(
  queueName: QueueName,
  processor: (job: Job<TData, TResult>) => Promise<TResult>,
  options: WorkerOptions = {}
): Worker<TData, TResult> {
  const concurrency = options.concurrency || config.workerConcurrency;
  const worker = new Worker<TData, TResult>(queueName, processor, {
    connection: getRedisConnection(),
    concurrency,
  });

  worker.on('completed', (job) => {
    logger.info('Job completed', {
      queue: queueName,
      jobId: job.id,
    });
  });

  worker.on('failed', (job, err) => {
    logger.error('Job failed', err, {
      queue: queueName,
      jobId: job?.id,
      attempts: job?.attemptsMade,
    });
  });

  worker.on('error', (err) => {
    logger.error('Worker error', err, { queue: queueName });
  });

  logger.info('Worker started', { queue: queueName, concurrency });

  return worker;
}

// ============================================================================
// Queue Metrics
// ============================================================================

export async function getQueueMetrics(queue: Queue): Promise<{
  waiting: number;
  active: number;
  completed: number;
  failed: number;
  delayed: number;
}> {
  const [waiting, active, completed, failed, delayed] = await Promise.all([
    queue.getWaitingCount(),
    queue.getActiveCount(),
    queue.getCompletedCount(),
    queue.getFailedCount(),
    queue.getDelayedCount(),
  ]);

  return { waiting, active, completed, failed, delayed };
}

/**
 * Report queue depth to the Prometheus gauge. -1 when Redis is unreachable.
 */
export async function reportQueueDepth(queue: Queue): Promise<void> {
  try {
    const m = await getQueueMetrics(queue);
    queueDepthGauge.set({ queue: queue.name }, m.waiting + m.active);
  } catch (err) {
    logger.warn('Queue depth unavailable', {
      queue: queue.name,
      error: err instanceof Error ? err.message : String(err),
    });
    queueDepthGauge.set({ queue: queue.name }, -1);
  }
}

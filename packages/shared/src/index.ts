/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContextAsync,
  runForDocument,
  type RequestContext,
} from './context';

// Logger
export { logger, describeError, type LogContext } from './logger';

// Config
export { config, parseOcrLanguages, type Config } from './config';

// Errors
export {
  InvoiceScanError,
  FatalConfigurationError,
  DocumentAcquisitionError,
  isFatalConfigurationError,
  type InvoiceScanErrorCode,
} from './errors';

// Types
export * from './types';

// Queues
export {
  QUEUE_NAMES,
  type QueueName,
  type ExtractInvoiceJob,
  type ExportInvoiceRowJob,
  getRedisConnection,
  createQueue,
  createWorker,
  getQueueMetrics,
  reportQueueDepth,
  type WorkerOptions,
} from './queues';

// Metrics
export {
  register,
  documentsProcessedCounter,
  matcherOutcomesCounter,
  extractionDurationHistogram,
  queueDepthGauge,
  jobDurationHistogram,
  jobsProcessedCounter,
  getMetrics,
  getMetricsContentType,
  serveMetrics,
} from './metrics';

// Schemas
export { validateInvoice, validateExportRow, type ValidationResult } from './schemas';

// Field extraction
export * from './extractors';

// Extraction pipeline
export * from './pipeline';

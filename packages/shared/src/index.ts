/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContext,
  runWithContextAsync,
  type RequestContext,
} from './context';

// Logger
export { logger, type LogContext } from './logger';

// Config
export { config, type Config } from './config';

// Types
export * from './types';

// Queues
export {
  QUEUE_NAMES,
  type QueueName,
  type QueueCounts,
  type ExtractDocumentJob,
  getRedisConnection,
  createQueue,
  createWorker,
  getQueueMetrics,
  type WorkerOptions,
} from './queues';

// Metrics
export {
  register,
  queueDepthGauge,
  queueMetricsGauge,
  jobDurationHistogram,
  jobsProcessedCounter,
  documentsProcessedCounter,
  pipelineStageDurationHistogram,
  labelMappingsCounter,
  qualityScoreHistogram,
  llmRequestsCounter,
  llmRequestDurationHistogram,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  dbQueryDurationHistogram,
  reportQueueMetrics,
  getMetrics,
  getMetricsContentType,
  serveMetrics,
} from './metrics';

// Schemas
export {
  compileSchema,
  formatSchemaErrors,
  validateExtractionRecord,
  type ValidationResult,
} from './schemas';

// Taxonomy (label -> canonical key tables)
export * from './taxonomy';

// Spreading
export * from './spreading';

// Accounting validation
export * from './validation';

// Ratios
export * from './ratios';

// Tables
export * from './tables';

// Agent analyzers
export * from './analyzers';

// Persistence
export {
  PgExtractionRepository,
  type ExtractionRepository,
  type NewDocument,
  type NewExtraction,
  type ProgressUpdate,
  type ListDocumentsQuery,
  type AuditAction,
  type AuditEntry,
} from './repository';

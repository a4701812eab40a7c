/**
 * Extraction API
 *
 * Upload financial documents, request extractions and read their results.
 */

import fs from 'fs';
import path from 'path';
import express, { type Express, type Request, type Response, type NextFunction } from 'express';
import { ulid } from 'ulid';
import { v4 as uuidv4, validate as isUuid } from 'uuid';
import {
  logger,
  config,
  runWithContext,
  getMetrics,
  getMetricsContentType,
  reportQueueMetrics,
  getAllAnalyzers,
  isAgentType,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  QUEUE_NAMES,
  type AgentType,
  type DocumentListResponse,
  type ExtractDocumentJob,
  type ExtractionRepository,
  type QueueCounts,
} from '@finspread/shared';
import {
  correlationIdOf,
  describeAgents,
  errorEnvelope,
  fileTypeFromFilename,
  parsePagination,
  queryString,
  sanitizeFilename,
} from './lib/requests';

export const DEFAULT_AGENT: AgentType = 'precision_specialist';

/** The part of the extract_document queue the API uses. */
export interface ExtractDocumentQueue extends QueueCounts {
  add(name: string, data: ExtractDocumentJob, opts: { jobId: string }): Promise<unknown>;
}

export interface AppDeps {
  repository: ExtractionRepository;
  queue: ExtractDocumentQueue;
  /** Connectivity probe for /health */
  checkDatabase: () => Promise<void>;
  uploadDir?: string;
}

function isPayloadTooLarge(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.too.large';
}

export function createApp(deps: AppDeps): Express {
  const app = express();
  const uploadDir = deps.uploadDir ?? config.uploadDir;

  // Middleware
  app.use(express.json());
  app.use(express.raw({ type: 'application/octet-stream', limit: config.maxUploadBytes }));

  // Correlation ID middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const header = req.headers['x-correlation-id'];
    const correlationId = typeof header === 'string' && header !== '' ? header : ulid();
    res.setHeader('X-Correlation-Id', correlationId);

    runWithContext({ correlationId }, () => {
      next();
    });
  });

  // Request timing middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();

    res.on('finish', () => {
      const duration = (Date.now() - start) / 1000;
      const routePath: unknown = req.route?.path;
      const labelPath = typeof routePath === 'string' ? routePath : req.path;

      httpRequestDurationHistogram.observe(
        { method: req.method, path: labelPath, status: res.statusCode.toString() },
        duration
      );
      httpRequestsCounter.inc({
        method: req.method,
        path: labelPath,
        status: res.statusCode.toString(),
      });

      logger.info('Request completed', {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: Math.round(duration * 1000),
      });
    });

    next();
  });

  // Health check
  app.get('/health', async (req: Request, res: Response) => {
    try {
      await deps.checkDatabase();

      res.json({
        status: 'healthy',
        service: 'extraction-api',
        database: 'connected',
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      res.status(503).json({
        status: 'unhealthy',
        service: 'extraction-api',
        database: 'disconnected',
        error: error instanceof Error ? error.message : 'Unknown error',
        timestamp: new Date().toISOString(),
      });
    }
  });

  // Metrics endpoint
  app.get('/metrics', async (req: Request, res: Response) => {
    try {
      await reportQueueMetrics([{ name: QUEUE_NAMES.EXTRACT_DOCUMENT, queue: deps.queue }]);
      res.setHeader('Content-Type', getMetricsContentType());
      res.send(await getMetrics());
    } catch (error) {
      logger.error('Failed to render metrics', error);
      res.status(500).end();
    }
  });

  /**
   * POST /documents?filename=...&uploaded_by=...&organization_id=...
   * Body is the raw file (application/octet-stream)
   */
  app.post('/documents', async (req: Request, res: Response) => {
    const correlationId = correlationIdOf(res);
    const filename = queryString(req.query, 'filename');

    if (!filename) {
      res.status(400).json(errorEnvelope('invalid_request', 'filename query parameter is required', correlationId));
      return;
    }

    const fileType = fileTypeFromFilename(filename);
    if (!fileType) {
      res
        .status(400)
        .json(
          errorEnvelope(
            'unsupported_file_type',
            `Unsupported file type: ${path.extname(filename) || 'none'}`,
            correlationId
          )
        );
      return;
    }

    const body: unknown = req.body;
    if (!Buffer.isBuffer(body) || body.length === 0) {
      res
        .status(400)
        .json(errorEnvelope('invalid_request', 'Request body must be the file as application/octet-stream', correlationId));
      return;
    }

    const documentId = uuidv4();
    const storagePath = path.join(uploadDir, `${documentId}_${sanitizeFilename(filename)}`);
    let stored = false;
    let saved = false;

    try {
      await fs.promises.mkdir(uploadDir, { recursive: true });
      await fs.promises.writeFile(storagePath, body);
      stored = true;

      const uploadedBy = queryString(req.query, 'uploaded_by') ?? null;
      const document = await deps.repository.saveDocument({
        document_id: documentId,
        filename,
        file_type: fileType,
        file_size_bytes: body.length,
        storage_path: storagePath,
        uploaded_by: uploadedBy,
        organization_id: queryString(req.query, 'organization_id') ?? null,
      });
      saved = true;

      await deps.repository.logAudit({
        user_id: uploadedBy,
        action: 'write',
        resource_type: 'document',
        resource_id: documentId,
        context: { filename, file_size_bytes: body.length },
      });

      res.status(201).json(document);
    } catch (error) {
      logger.error('Failed to store document', error, { document_id: documentId });
      if (stored && !saved) {
        // no row points at the file
        await fs.promises.rm(storagePath, { force: true }).catch((rmError: unknown) => {
          logger.warn('Failed to remove unsaved upload', {
            document_id: documentId,
            storage_path: storagePath,
            error: rmError instanceof Error ? rmError.message : String(rmError),
          });
        });
      }
      res.status(500).json(errorEnvelope('internal_error', 'Failed to store document', correlationId));
    }
  });

  /**
   * GET /documents?organization_id=...&limit=...&offset=...
   */
  app.get('/documents', async (req: Request, res: Response) => {
    const correlationId = correlationIdOf(res);
    const { limit, offset } = parsePagination(req.query);

    try {
      const items = await deps.repository.listDocuments({
        organizationId: queryString(req.query, 'organization_id'),
        limit,
        offset,
      });
      const response: DocumentListResponse = { items, limit, offset };
      res.json(response);
    } catch (error) {
      logger.error('Failed to list documents', error);
      res.status(500).json(errorEnvelope('internal_error', 'Failed to list documents', correlationId));
    }
  });

  /**
   * POST /extractions {document_id, agent_type?}
   * Creates the extraction and queues it; 202 with the extraction id.
   */
  app.post('/extractions', async (req: Request, res: Response) => {
    const correlationId = correlationIdOf(res);
    const body: unknown = req.body;
    const documentId =
      typeof body === 'object' && body !== null && 'document_id' in body ? body.document_id : undefined;
    const requestedAgent =
      typeof body === 'object' && body !== null && 'agent_type' in body ? body.agent_type : undefined;

    if (typeof documentId !== 'string' || !isUuid(documentId)) {
      res.status(400).json(errorEnvelope('invalid_request', 'document_id must be a UUID', correlationId));
      return;
    }

    let agentType: AgentType = DEFAULT_AGENT;
    if (requestedAgent !== undefined) {
      if (!isAgentType(requestedAgent)) {
        res
          .status(400)
          .json(errorEnvelope('invalid_request', `Unknown agent_type: ${String(requestedAgent)}`, correlationId));
        return;
      }
      agentType = requestedAgent;
    }

    try {
      const document = await deps.repository.getDocument(documentId);
      if (!document) {
        res.status(404).json(errorEnvelope('not_found', `Document ${documentId} not found`, correlationId));
        return;
      }

      const extractionId = uuidv4();
      const extraction = await deps.repository.createExtraction({
        extraction_id: extractionId,
        document_id: documentId,
        selected_agent: agentType,
      });

      const job: ExtractDocumentJob = {
        event_type: 'extraction.requested',
        correlation_id: correlationId,
        document_id: documentId,
        extraction_id: extractionId,
        file_path: document.storage_path,
        agent_type: agentType,
        requested_at: new Date().toISOString(),
      };

      try {
        await deps.queue.add('extract_document', job, { jobId: extractionId });
      } catch (error) {
        await deps.repository.markFailed(extractionId, ['Failed to queue extraction']);
        throw error;
      }

      logger.info('Extraction queued', { document_id: documentId, extraction_id: extractionId, agent_type: agentType });

      res.status(202).json({
        extraction_id: extractionId,
        document_id: documentId,
        status: extraction.status,
        selected_agent: agentType,
      });
    } catch (error) {
      logger.error('Failed to start extraction', error, { document_id: documentId });
      res.status(500).json(errorEnvelope('internal_error', 'Failed to start extraction', correlationId));
    }
  });

  /**
   * GET /extractions/:extraction_id
   * Progress while processing; the full record once finished.
   */
  app.get('/extractions/:extraction_id', async (req: Request, res: Response) => {
    const correlationId = correlationIdOf(res);
    const { extraction_id } = req.params;

    if (!isUuid(extraction_id)) {
      res.status(404).json(errorEnvelope('not_found', `Extraction ${extraction_id} not found`, correlationId));
      return;
    }

    try {
      const extraction = await deps.repository.getExtraction(extraction_id);
      if (!extraction) {
        res.status(404).json(errorEnvelope('not_found', `Extraction ${extraction_id} not found`, correlationId));
        return;
      }
      res.json(extraction);
    } catch (error) {
      logger.error('Failed to get extraction', error, { extraction_id });
      res.status(500).json(errorEnvelope('internal_error', 'Failed to retrieve extraction', correlationId));
    }
  });

  app.get('/agents', (req: Request, res: Response) => {
    res.json(describeAgents(getAllAnalyzers()));
  });

  app.use((req: Request, res: Response) => {
    res.status(404).json(errorEnvelope('not_found', `No route for ${req.method} ${req.path}`, correlationIdOf(res)));
  });

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const correlationId = correlationIdOf(res);
    if (isPayloadTooLarge(err)) {
      const maxMb = Math.round(config.maxUploadBytes / 1024 / 1024);
      res.status(413).json(errorEnvelope('payload_too_large', `File too large. Max: ${maxMb}MB.`, correlationId));
      return;
    }
    logger.error('Unhandled request error', err, { method: req.method, path: req.path });
    res.status(500).json(errorEnvelope('internal_error', 'Internal server error', correlationId));
  });

  return app;
}

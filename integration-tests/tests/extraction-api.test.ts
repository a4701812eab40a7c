/**
 * Extraction API served in-process, with an in-memory repository and queue
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import type { Server } from 'http';
import { getAllAnalyzers, type ExtractDocumentJob } from '@finspread/shared';
import { createApp, type ExtractDocumentQueue } from '../../services/extraction-api/src/app';
import {
  describeAgents,
  fileTypeFromFilename,
  parsePagination,
  queryString,
  sanitizeFilename,
} from '../../services/extraction-api/src/lib/requests';
import { InMemoryExtractionRepository } from './helpers';

type FetchResponse = Awaited<ReturnType<typeof fetch>>;

interface QueuedJob {
  name: string;
  data: ExtractDocumentJob;
  opts: { jobId: string };
}

class InMemoryQueue implements ExtractDocumentQueue {
  readonly jobs: QueuedJob[] = [];
  failAdds = false;

  async add(name: string, data: ExtractDocumentJob, opts: { jobId: string }): Promise<unknown> {
    if (this.failAdds) {
      throw new Error('queue unavailable');
    }
    this.jobs.push({ name, data, opts });
    return { id: opts.jobId };
  }

  async getWaitingCount(): Promise<number> {
    return this.jobs.length;
  }

  async getActiveCount(): Promise<number> {
    return 0;
  }

  async getCompletedCount(): Promise<number> {
    return 0;
  }

  async getFailedCount(): Promise<number> {
    return 0;
  }

  async getDelayedCount(): Promise<number> {
    return 0;
  }
}

function stringField(body: unknown, key: string): string {
  if (typeof body === 'object' && body !== null) {
    const value: unknown = Reflect.get(body, key);
    if (typeof value === 'string') return value;
  }
  throw new Error(`Response has no string field "${key}"`);
}

describe('Extraction API', () => {
  let repository: InMemoryExtractionRepository;
  let queue: InMemoryQueue;
  let uploadDir: string;
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    repository = new InMemoryExtractionRepository();
    queue = new InMemoryQueue();
    uploadDir = fs.mkdtempSync(path.join(os.tmpdir(), 'uploads-'));

    const app = createApp({ repository, queue, checkDatabase: async () => undefined, uploadDir });
    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    });

    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Server is not listening on a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
    fs.rmSync(uploadDir, { recursive: true, force: true });
  });

  async function upload(filename: string, body = 'fake pdf bytes'): Promise<FetchResponse> {
    return fetch(`${baseUrl}/documents?filename=${encodeURIComponent(filename)}&uploaded_by=analyst-1`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/octet-stream' },
      body,
    });
  }

  async function requestExtraction(payload: Record<string, unknown>): Promise<FetchResponse> {
    return fetch(`${baseUrl}/extractions`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(payload),
    });
  }

  it('should report health', async () => {
    const res = await fetch(`${baseUrl}/health`);

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      status: 'healthy',
      service: 'extraction-api',
      database: 'connected',
    });
  });

  it('should store an uploaded document under a sanitized name', async () => {
    const res = await upload('Q4 statements.pdf');

    expect(res.status).toBe(201);
    const body: unknown = await res.json();
    const documentId = stringField(body, 'document_id');
    const storagePath = stringField(body, 'storage_path');

    expect(body).toMatchObject({
      filename: 'Q4 statements.pdf',
      file_type: 'pdf',
      file_size_bytes: 14,
      uploaded_by: 'analyst-1',
      organization_id: null,
    });
    expect(storagePath).toBe(path.join(uploadDir, `${documentId}_Q4_statements.pdf`));
    expect(fs.readFileSync(storagePath, 'utf-8')).toBe('fake pdf bytes');
    expect(repository.audit).toContainEqual({
      user_id: 'analyst-1',
      action: 'write',
      resource_type: 'document',
      resource_id: documentId,
      context: { filename: 'Q4 statements.pdf', file_size_bytes: 14 },
    });
  });

  it('should reject uploads without a filename or with an unsupported type', async () => {
    const missing = await fetch(`${baseUrl}/documents`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/octet-stream' },
      body: 'x',
    });
    const unsupported = await upload('setup.exe');

    expect(missing.status).toBe(400);
    expect(await missing.json()).toMatchObject({
      error: { code: 'invalid_request', message: 'filename query parameter is required' },
    });
    expect(unsupported.status).toBe(400);
    expect(await unsupported.json()).toMatchObject({
      error: { code: 'unsupported_file_type', message: 'Unsupported file type: .exe' },
    });
  });

  it('should remove the stored file when the document cannot be saved', async () => {
    const before = fs.readdirSync(uploadDir).length;
    repository.failDocumentSaves = true;

    try {
      const res = await upload('rejected.pdf');
      expect(res.status).toBe(500);
      expect(await res.json()).toMatchObject({
        error: { code: 'internal_error', message: 'Failed to store document' },
      });
    } finally {
      repository.failDocumentSaves = false;
    }

    expect(fs.readdirSync(uploadDir)).toHaveLength(before);
    expect(fs.readdirSync(uploadDir).some((name) => name.endsWith('_rejected.pdf'))).toBe(false);
  });

  it('should queue an extraction with the default agent', async () => {
    const documentId = stringField(await (await upload('annual.pdf')).json(), 'document_id');

    const res = await requestExtraction({ document_id: documentId });

    expect(res.status).toBe(202);
    const body: unknown = await res.json();
    const extractionId = stringField(body, 'extraction_id');
    expect(body).toEqual({
      extraction_id: extractionId,
      document_id: documentId,
      status: 'processing',
      selected_agent: 'precision_specialist',
    });

    const job = queue.jobs[queue.jobs.length - 1];
    expect(job.name).toBe('extract_document');
    expect(job.opts).toEqual({ jobId: extractionId });
    expect(job.data).toMatchObject({
      event_type: 'extraction.requested',
      document_id: documentId,
      extraction_id: extractionId,
      agent_type: 'precision_specialist',
      file_path: path.join(uploadDir, `${documentId}_annual.pdf`),
    });
  });

  it('should return extraction progress by id', async () => {
    const documentId = stringField(await (await upload('q3.pdf')).json(), 'document_id');
    const extractionId = stringField(
      await (await requestExtraction({ document_id: documentId, agent_type: 'quant_mathematician' })).json(),
      'extraction_id'
    );

    const res = await fetch(`${baseUrl}/extractions/${extractionId}`);

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      extraction_id: extractionId,
      document_id: documentId,
      status: 'processing',
      current_stage: 'pending',
      progress: 0,
      selected_agent: 'quant_mathematician',
    });
  });

  it('should validate extraction requests', async () => {
    const documentId = stringField(await (await upload('q2.pdf')).json(), 'document_id');

    const badId = await requestExtraction({ document_id: 'not-a-uuid' });
    const badAgent = await requestExtraction({ document_id: documentId, agent_type: 'nope' });
    const absent = await requestExtraction({ document_id: '00000000-0000-4000-8000-000000000000' });

    expect(badId.status).toBe(400);
    expect(badAgent.status).toBe(400);
    expect(await badAgent.json()).toMatchObject({ error: { message: 'Unknown agent_type: nope' } });
    expect(absent.status).toBe(404);
  });

  it('should mark the extraction failed when it cannot be queued', async () => {
    const documentId = stringField(await (await upload('q1.pdf')).json(), 'document_id');
    queue.failAdds = true;

    try {
      const res = await requestExtraction({ document_id: documentId });
      expect(res.status).toBe(500);
    } finally {
      queue.failAdds = false;
    }

    const failed = Array.from(repository.extractions.values()).filter((e) => e.document_id === documentId);
    expect(failed).toHaveLength(1);
    expect(failed[0].status).toBe('failed');
    expect(failed[0].errors).toEqual(['Failed to queue extraction']);
  });

  it('should answer 404 for unknown extraction ids and routes', async () => {
    const notUuid = await fetch(`${baseUrl}/extractions/abc`);
    const missing = await fetch(`${baseUrl}/extractions/00000000-0000-4000-8000-000000000000`);
    const noRoute = await fetch(`${baseUrl}/nowhere`);

    expect(notUuid.status).toBe(404);
    expect(missing.status).toBe(404);
    expect(noRoute.status).toBe(404);
    expect(await noRoute.json()).toMatchObject({ error: { code: 'not_found', message: 'No route for GET /nowhere' } });
  });

  it('should echo the caller correlation id', async () => {
    const res = await fetch(`${baseUrl}/nowhere`, { headers: { 'X-Correlation-Id': 'test-correlation' } });

    expect(res.headers.get('x-correlation-id')).toBe('test-correlation');
    expect(await res.json()).toMatchObject({ error: { correlation_id: 'test-correlation' } });
  });

  it('should page the document list', async () => {
    const res = await fetch(`${baseUrl}/documents?limit=1&offset=0`);

    expect(res.status).toBe(200);
    const body: unknown = await res.json();
    expect(body).toMatchObject({ limit: 1, offset: 0 });
    expect(Reflect.get(Object(body), 'items')).toHaveLength(1);
  });

  it('should list the registered agents', async () => {
    const res = await fetch(`${baseUrl}/agents`);

    expect(await res.json()).toEqual(describeAgents(getAllAnalyzers()));
  });
});

describe('request helpers', () => {
  it('should map extensions to file types', () => {
    expect(fileTypeFromFilename('report.PDF')).toBe('pdf');
    expect(fileTypeFromFilename('scan.jpeg')).toBe('image');
    expect(fileTypeFromFilename('notes.txt')).toBeNull();
    expect(fileTypeFromFilename('README')).toBeNull();
  });

  it('should strip directories and unsafe characters from filenames', () => {
    expect(sanitizeFilename('../../etc/pass wd.pdf')).toBe('pass_wd.pdf');
    expect(sanitizeFilename('Q4 (final).pdf')).toBe('Q4__final_.pdf');
  });

  it('should read the first non-blank query value', () => {
    expect(queryString({ a: ['x', 'y'] }, 'a')).toBe('x');
    expect(queryString({ a: '  ' }, 'a')).toBeUndefined();
    expect(queryString({ a: ' v ' }, 'a')).toBe('v');
  });

  it('should default and cap pagination', () => {
    expect(parsePagination({})).toEqual({ limit: 50, offset: 0 });
    expect(parsePagination({ limit: '500', offset: '20' })).toEqual({ limit: 100, offset: 20 });
    expect(parsePagination({ limit: '0', offset: '-3' })).toEqual({ limit: 50, offset: 0 });
    expect(parsePagination({ limit: 'ten' })).toEqual({ limit: 50, offset: 0 });
  });

  it('should describe analyzers for the agents endpoint', () => {
    const [first] = describeAgents(getAllAnalyzers());
    expect(first).toEqual({
      id: 'precision_specialist',
      description: 'Model-backed document classification and statement table selection',
      strategy: 'llm',
      capabilities: ['document_classification', 'table_selection', 'structured_output'],
      cost_tier: 'high',
    });
  });
});

/**
 * Request Helpers
 *
 * Parsing and response shaping shared by the API routes.
 */

import path from 'path';
import type { Response } from 'express';
import {
  getCorrelationId,
  type AgentAnalyzer,
  type ErrorEnvelope,
  type FileType,
} from '@finspread/shared';

const FILE_TYPES_BY_EXTENSION: Readonly<Record<string, FileType>> = {
  '.pdf': 'pdf',
  '.docx': 'docx',
  '.xlsx': 'xlsx',
  '.csv': 'csv',
  '.png': 'image',
  '.jpg': 'image',
  '.jpeg': 'image',
  '.tiff': 'image',
};

export const DEFAULT_PAGE_LIMIT = 50;
export const MAX_PAGE_LIMIT = 100;

/** File type from the filename extension, or null when it is not accepted. */
export function fileTypeFromFilename(filename: string): FileType | null {
  const extension = path.extname(filename).toLowerCase();
  return FILE_TYPES_BY_EXTENSION[extension] ?? null;
}

/**
 * Strip any directory part and characters outside a conservative set, so the
 * stored name can never escape the upload directory.
 */
export function sanitizeFilename(filename: string): string {
  return path.basename(filename).replace(/[^A-Za-z0-9._-]/g, '_');
}

function firstString(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (Array.isArray(value) && typeof value[0] === 'string') return value[0];
  return undefined;
}

export function queryString(query: Record<string, unknown>, key: string): string | undefined {
  const value = firstString(query[key]);
  return value && value.trim() !== '' ? value.trim() : undefined;
}

export interface Pagination {
  limit: number;
  offset: number;
}

/** limit defaults to 50 and is capped at 100; offset defaults to 0. */
export function parsePagination(query: Record<string, unknown>): Pagination {
  const limit = parseInt(queryString(query, 'limit') ?? '', 10);
  const offset = parseInt(queryString(query, 'offset') ?? '', 10);
  return {
    limit: Number.isNaN(limit) || limit < 1 ? DEFAULT_PAGE_LIMIT : Math.min(limit, MAX_PAGE_LIMIT),
    offset: Number.isNaN(offset) || offset < 0 ? 0 : offset,
  };
}

export function correlationIdOf(res: Response): string {
  const header = res.getHeader('X-Correlation-Id');
  return typeof header === 'string' ? header : getCorrelationId();
}

export function errorEnvelope(code: string, message: string, correlationId: string): ErrorEnvelope {
  return { error: { code, message, correlation_id: correlationId } };
}

export interface AgentDescription {
  id: string;
  description: string;
  strategy: string;
  capabilities: readonly string[];
  cost_tier: string;
}

export function describeAgents(analyzers: readonly AgentAnalyzer[]): AgentDescription[] {
  return analyzers.map((a) => ({
    id: a.agentType,
    description: a.description,
    strategy: a.strategy,
    capabilities: a.capabilities,
    cost_tier: a.costTier,
  }));
}

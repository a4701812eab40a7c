/**
 * LLM Document Analysis
 *
 * Asks a chat model to classify a financial document and point at the
 * tables holding the income statement, balance sheet and cash flow
 * statement. The response is constrained by a JSON schema and validated
 * again with Ajv before use.
 */

import OpenAI from 'openai';
import { config } from '../config';
import { logger } from '../logger';
import { llmRequestDurationHistogram, llmRequestsCounter } from '../metrics';
import { compileSchema, formatSchemaErrors } from '../schemas';
import type { DocumentType, ExtractedTable, PageText, TableHints } from '../types';

const DOCUMENT_TYPES: readonly DocumentType[] = [
  '10-K',
  '10-Q',
  'annual_report',
  'rent_roll',
  'offering_memorandum',
  'term_sheet',
  'contract',
  'financial_statement',
  'other',
];

const nullableIndex = { type: ['integer', 'null'] } as const;

/**
 * JSON Schema for OpenAI Structured Outputs
 */
export const DOCUMENT_ANALYSIS_SCHEMA = {
  name: 'financial_document_analysis',
  strict: true,
  schema: {
    type: 'object',
    additionalProperties: false,
    required: ['document_type', 'table_hints', 'confidence', 'agent_notes'],
    properties: {
      document_type: { type: 'string', enum: DOCUMENT_TYPES },
      table_hints: {
        type: 'object',
        additionalProperties: false,
        required: ['income_statement', 'balance_sheet', 'cash_flow'],
        properties: {
          income_statement: nullableIndex,
          balance_sheet: nullableIndex,
          cash_flow: nullableIndex,
        },
      },
      confidence: { type: 'number' },
      agent_notes: { type: 'string' },
    },
  },
} as const;

export interface LlmDocumentAnalysis {
  document_type: DocumentType;
  table_hints: TableHints;
  confidence: number;
  agent_notes: string;
}

const validateAnalysis = compileSchema<LlmDocumentAnalysis>(DOCUMENT_ANALYSIS_SCHEMA.schema);

export const ANALYSIS_SYSTEM_PROMPT = `You are a senior financial analyst. You are given text and a table inventory extracted from a financial document.
Identify:
1. The document type.
2. Which table index holds the income statement, the balance sheet and the cash flow statement (null when absent).

Rules:
- Only point at tables listed in the inventory.
- Do not compute or invent figures.
- confidence is 0.0-1.0 and reflects how clearly the statements were identified.`;

const MAX_TEXT_CHARS = 30000;
const MAX_TABLE_CHARS = 20000;
const MAX_LABELS_PER_TABLE = 12;

const STATEMENT_KEYWORDS =
  /balance sheets?|statements? of (operations|income|cash flows|financial position)|income statements?|cash flows?/i;

/**
 * Pages that name a financial statement go first; the rest keep their order.
 */
export function prioritizePages(pages: readonly PageText[]): PageText[] {
  const statementPages = pages.filter((p) => STATEMENT_KEYWORDS.test(p.text));
  const otherPages = pages.filter((p) => !STATEMENT_KEYWORDS.test(p.text));
  return [...statementPages, ...otherPages];
}

export function formatPageTextWithLimit(pages: readonly PageText[], maxChars: number = MAX_TEXT_CHARS): string {
  let result = '';
  let included = 0;

  for (const page of prioritizePages(pages)) {
    const pageText = `--- Page ${page.pageNumber} ---\n${page.text}\n\n`;
    if (result.length + pageText.length > maxChars) {
      result += `\n[Document truncated - ${pages.length - included} additional pages not shown]\n`;
      break;
    }
    result += pageText;
    included++;
  }

  return result;
}

export function formatTableInventory(tables: readonly ExtractedTable[]): string {
  const lines = tables.map((table, index) => {
    const labels = table.rows
      .slice(0, MAX_LABELS_PER_TABLE)
      .map((row) => row[0] ?? '')
      .filter((label) => label.trim() !== '');
    return (
      `[${index}] page ${table.page_number}, columns: ${table.headers.join(' | ')}\n` +
      `    rows (${table.rows.length}): ${labels.join('; ')}`
    );
  });
  return lines.join('\n').slice(0, MAX_TABLE_CHARS);
}

export function buildAnalysisPrompt(pages: readonly PageText[], tables: readonly ExtractedTable[]): string {
  return `--- TEXT CONTENT ---
${formatPageTextWithLimit(pages)}

--- TABLE INVENTORY ---
${tables.length > 0 ? formatTableInventory(tables) : '(no tables detected)'}

--- INSTRUCTIONS ---
Return the document type and the statement table indices in the specified JSON format.`;
}

// ============================================================================
// Transport
// ============================================================================

export interface LlmCompletionRequest {
  model: string;
  apiKey: string;
  baseUrl?: string;
  timeoutMs: number;
  systemPrompt: string;
  userPrompt: string;
}

export interface LlmCompletion {
  content: string | null;
  requestId: string;
  totalTokens?: number;
}

/** Sends one structured-output chat request. */
export type LlmTransport = (request: LlmCompletionRequest) => Promise<LlmCompletion>;

export const openAiTransport: LlmTransport = async (request) => {
  const openai = new OpenAI({
    apiKey: request.apiKey,
    baseURL: request.baseUrl || undefined,
    timeout: request.timeoutMs,
    maxRetries: 0, // the pipeline never retries
  });

  const response = await openai.chat.completions.create({
    model: request.model,
    messages: [
      { role: 'system', content: request.systemPrompt },
      { role: 'user', content: request.userPrompt },
    ],
    response_format: {
      type: 'json_schema',
      json_schema: DOCUMENT_ANALYSIS_SCHEMA,
    },
    temperature: 0,
  });

  return {
    content: response.choices[0]?.message?.content ?? null,
    requestId: response.id || `req_${Date.now()}`,
    totalTokens: response.usage?.total_tokens,
  };
};

export interface LlmAnalysisOptions {
  apiKey: string;
  model?: string;
  timeoutMs?: number;
  transport?: LlmTransport;
}

/**
 * Run the analysis request and return the validated response. Throws when
 * the call fails or the response does not match the schema.
 */
export async function analyzeWithLlm(
  documentId: string,
  pages: readonly PageText[],
  tables: readonly ExtractedTable[],
  options: LlmAnalysisOptions
): Promise<LlmDocumentAnalysis> {
  const model = options.model || config.llmModel;
  const transport = options.transport ?? openAiTransport;
  const userPrompt = buildAnalysisPrompt(pages, tables);

  logger.info('Analyzing document with LLM', {
    model,
    document_id: documentId,
    page_count: pages.length,
    table_count: tables.length,
    prompt_length: userPrompt.length,
  });

  const startTime = Date.now();

  try {
    const completion = await transport({
      model,
      apiKey: options.apiKey,
      baseUrl: config.llmBaseUrl,
      timeoutMs: options.timeoutMs || config.llmRequestTimeoutMs,
      systemPrompt: ANALYSIS_SYSTEM_PROMPT,
      userPrompt,
    });

    if (!completion.content) {
      throw new Error('Empty response from LLM');
    }

    const parsed: unknown = JSON.parse(completion.content);
    if (!validateAnalysis(parsed)) {
      throw new Error(`LLM response failed schema validation: ${formatSchemaErrors(validateAnalysis).join('; ')}`);
    }

    llmRequestsCounter.inc({ model, status: 'success' });
    llmRequestDurationHistogram.observe({ model }, (Date.now() - startTime) / 1000);

    logger.info('LLM analysis complete', {
      model,
      request_id: completion.requestId,
      duration_ms: Date.now() - startTime,
      tokens_used: completion.totalTokens,
      document_type: parsed.document_type,
    });

    return parsed;
  } catch (error) {
    llmRequestsCounter.inc({ model, status: 'error' });
    llmRequestDurationHistogram.observe({ model }, (Date.now() - startTime) / 1000);
    throw error;
  }
}

/**
 * Agent Analyzer Types
 *
 * Each agent type gets one analyzer. An analyzer looks at the extracted
 * pages and tables and returns a uniform analysis: a document type guess,
 * table-index hints for the three statements, a confidence and notes.
 */

import type {
  AgentAnalysis,
  AgentType,
  DocumentType,
  ExtractedTable,
  PageText,
  TableHints,
} from '../types';

/**
 * - 'llm': ask a model, fall back to the heuristic when it is unavailable
 * - 'heuristic': keyword rules and fixed table hints
 */
export type AnalyzerStrategy = 'llm' | 'heuristic';

export type CostTier = 'low' | 'medium' | 'high';

export interface AnalyzerInput {
  documentId: string;
  pages: PageText[];
  tables: ExtractedTable[];
}

export interface AnalyzerContext {
  correlationId: string;
  /** OpenAI API key (falls back to config when omitted) */
  openaiApiKey?: string;
  model?: string;
  timeoutMs?: number;
}

export interface AgentAnalyzer {
  readonly agentType: AgentType;
  readonly description: string;
  readonly strategy: AnalyzerStrategy;
  readonly capabilities: readonly string[];
  readonly costTier: CostTier;

  analyze(input: AnalyzerInput, ctx: AnalyzerContext): Promise<AgentAnalysis>;
}

export interface HeuristicProfile {
  agentType: AgentType;
  description: string;
  capabilities: readonly string[];
  costTier: CostTier;
  /** Used when the keyword rules find nothing */
  defaultDocumentType: DocumentType;
  tableHints: TableHints;
  confidence: number;
  notes: string;
}

export type { AgentAnalysis, TableHints };

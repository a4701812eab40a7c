/**
 * Base Agent Analyzer
 *
 * Abstract base class routing to the LLM or heuristic analysis by strategy.
 * An LLM analyzer without an API key, or whose call fails, falls back to the
 * heuristic with zero confidence.
 */

import { config } from '../config';
import { logger } from '../logger';
import type { AgentAnalysis, AgentType, DocumentType, TableHints } from '../types';
import { detectDocumentType } from './document-type';
import { analyzeWithLlm, type LlmTransport } from './llm-analysis';
import type {
  AgentAnalyzer,
  AnalyzerContext,
  AnalyzerInput,
  AnalyzerStrategy,
  CostTier,
  HeuristicProfile,
} from './types';

const NO_HINTS: TableHints = Object.freeze({
  income_statement: null,
  balance_sheet: null,
  cash_flow: null,
});

function documentText(input: AnalyzerInput): string {
  return input.pages.map((p) => p.text).join('\n');
}

export abstract class BaseAnalyzer implements AgentAnalyzer {
  abstract readonly agentType: AgentType;
  abstract readonly description: string;
  abstract readonly strategy: AnalyzerStrategy;
  abstract readonly capabilities: readonly string[];
  abstract readonly costTier: CostTier;

  /** Document type used when the keyword rules find nothing. */
  protected defaultDocumentType(): DocumentType {
    return 'other';
  }

  async analyze(input: AnalyzerInput, ctx: AnalyzerContext): Promise<AgentAnalysis> {
    const startTime = Date.now();

    const analysis =
      this.strategy === 'llm'
        ? await this.analyzeWithFallback(input, ctx)
        : this.analyzeHeuristic(input);

    logger.info('Agent analysis complete', {
      agent_type: this.agentType,
      strategy: this.strategy,
      document_id: input.documentId,
      document_type: analysis.document_type,
      confidence: analysis.confidence,
      duration_ms: Date.now() - startTime,
    });

    return analysis;
  }

  protected detectType(input: AnalyzerInput): DocumentType {
    const detected = detectDocumentType(documentText(input));
    return detected === 'other' ? this.defaultDocumentType() : detected;
  }

  /**
   * Keyword document type with no table hints; subclasses override.
   */
  protected analyzeHeuristic(input: AnalyzerInput): AgentAnalysis {
    return {
      agent_type: this.agentType,
      document_type: this.detectType(input),
      table_hints: { ...NO_HINTS },
      confidence: 0,
      agent_notes: 'Heuristic analysis only.',
    };
  }

  protected async analyzeWithModel(
    _input: AnalyzerInput,
    _ctx: AnalyzerContext
  ): Promise<AgentAnalysis | null> {
    return null;
  }

  private async analyzeWithFallback(input: AnalyzerInput, ctx: AnalyzerContext): Promise<AgentAnalysis> {
    try {
      const analysis = await this.analyzeWithModel(input, ctx);
      if (analysis) return analysis;
      return this.fallback(input, 'No API key provided.');
    } catch (error) {
      logger.warn('LLM analysis failed, using heuristic fallback', {
        agent_type: this.agentType,
        document_id: input.documentId,
        error: error instanceof Error ? error.message : String(error),
      });
      return this.fallback(input, `Error: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  private fallback(input: AnalyzerInput, reason: string): AgentAnalysis {
    return {
      agent_type: this.agentType,
      document_type: this.detectType(input),
      table_hints: { ...NO_HINTS },
      confidence: 0,
      agent_notes: `Heuristic fallback used. ${reason}`,
    };
  }
}

/**
 * Analyzer backed by a chat model.
 */
export class LlmAnalyzer extends BaseAnalyzer {
  readonly strategy: AnalyzerStrategy = 'llm';
  readonly costTier: CostTier = 'high';

  constructor(
    readonly agentType: AgentType,
    readonly description: string,
    readonly capabilities: readonly string[],
    private readonly transport?: LlmTransport
  ) {
    super();
  }

  protected async analyzeWithModel(input: AnalyzerInput, ctx: AnalyzerContext): Promise<AgentAnalysis | null> {
    const apiKey = ctx.openaiApiKey ?? config.openaiApiKey;
    if (!apiKey) return null;

    const response = await analyzeWithLlm(input.documentId, input.pages, input.tables, {
      apiKey,
      model: ctx.model,
      timeoutMs: ctx.timeoutMs,
      transport: this.transport,
    });

    return {
      agent_type: this.agentType,
      document_type: response.document_type,
      table_hints: response.table_hints,
      confidence: Math.min(1, Math.max(0, response.confidence)),
      agent_notes: response.agent_notes,
    };
  }
}

/**
 * Analyzer returning a fixed profile: preset table hints, confidence and
 * notes, with the document type from the keyword rules.
 */
export class HeuristicAnalyzer extends BaseAnalyzer {
  readonly strategy: AnalyzerStrategy = 'heuristic';
  readonly agentType: AgentType;
  readonly description: string;
  readonly capabilities: readonly string[];
  readonly costTier: CostTier;

  constructor(private readonly profile: HeuristicProfile) {
    super();
    this.agentType = profile.agentType;
    this.description = profile.description;
    this.capabilities = profile.capabilities;
    this.costTier = profile.costTier;
  }

  protected defaultDocumentType(): DocumentType {
    return this.profile.defaultDocumentType;
  }

  protected analyzeHeuristic(input: AnalyzerInput): AgentAnalysis {
    return {
      agent_type: this.agentType,
      document_type: this.detectType(input),
      table_hints: { ...this.profile.tableHints },
      confidence: this.profile.confidence,
      agent_notes: this.profile.notes,
    };
  }
}

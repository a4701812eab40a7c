/**
 * Agent Analyzers Module
 *
 * Strategies:
 * - 'llm': model-backed with heuristic fallback (precision_specialist)
 * - 'heuristic': fixed profiles (context_archivist, quant_mathematician, trend_forecaster)
 */

export type {
  AgentAnalyzer,
  AnalyzerStrategy,
  AnalyzerInput,
  AnalyzerContext,
  CostTier,
  HeuristicProfile,
} from './types';

export { BaseAnalyzer, LlmAnalyzer, HeuristicAnalyzer } from './base-analyzer';

export {
  registerAnalyzer,
  getAnalyzerOrThrow,
  getRegisteredAgentTypes,
  getAllAnalyzers,
  clearAnalyzerRegistry,
} from './registry';

export { detectDocumentType } from './document-type';

export {
  DOCUMENT_ANALYSIS_SCHEMA,
  ANALYSIS_SYSTEM_PROMPT,
  analyzeWithLlm,
  buildAnalysisPrompt,
  formatPageTextWithLimit,
  formatTableInventory,
  prioritizePages,
  openAiTransport,
  type LlmTransport,
  type LlmCompletion,
  type LlmCompletionRequest,
  type LlmDocumentAnalysis,
  type LlmAnalysisOptions,
} from './llm-analysis';

export { PrecisionSpecialistAnalyzer, precisionSpecialistAnalyzer } from './precision-specialist';
export { ContextArchivistAnalyzer, contextArchivistAnalyzer } from './context-archivist';
export { QuantMathematicianAnalyzer, quantMathematicianAnalyzer } from './quant-mathematician';
export { TrendForecasterAnalyzer, trendForecasterAnalyzer } from './trend-forecaster';

// Import for registration
import { registerAnalyzer } from './registry';
import { precisionSpecialistAnalyzer } from './precision-specialist';
import { contextArchivistAnalyzer } from './context-archivist';
import { quantMathematicianAnalyzer } from './quant-mathematician';
import { trendForecasterAnalyzer } from './trend-forecaster';

/**
 * Register all built-in analyzers.
 * Call this at application startup.
 */
export function registerAllAnalyzers(): void {
  registerAnalyzer(precisionSpecialistAnalyzer);
  registerAnalyzer(contextArchivistAnalyzer);
  registerAnalyzer(quantMathematicianAnalyzer);
  registerAnalyzer(trendForecasterAnalyzer);
}

// Auto-register all analyzers on module load
registerAllAnalyzers();

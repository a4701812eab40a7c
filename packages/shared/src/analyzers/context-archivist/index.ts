/**
 * Context Archivist
 *
 * Long-document profile: assumes statements appear in the usual order.
 */

import { HeuristicAnalyzer } from '../base-analyzer';

export class ContextArchivistAnalyzer extends HeuristicAnalyzer {
  constructor() {
    super({
      agentType: 'context_archivist',
      description: 'Long-context reading of full annual reports',
      capabilities: ['long_context', 'document_classification'],
      costTier: 'medium',
      defaultDocumentType: 'annual_report',
      tableHints: { income_statement: 0, balance_sheet: 1, cash_flow: 2 },
      confidence: 0.95,
      notes: 'Context-aware extraction over the full document.',
    });
  }
}

export const contextArchivistAnalyzer = new ContextArchivistAnalyzer();

/**
 * Quant Mathematician
 */

import { HeuristicAnalyzer } from '../base-analyzer';

export class QuantMathematicianAnalyzer extends HeuristicAnalyzer {
  constructor() {
    super({
      agentType: 'quant_mathematician',
      description: 'Arithmetic-first extraction that leans on validation',
      capabilities: ['arithmetic_validation', 'document_classification'],
      costTier: 'low',
      defaultDocumentType: 'financial_statement',
      tableHints: { income_statement: 0, balance_sheet: 1, cash_flow: 2 },
      confidence: 0.96,
      notes: 'Mathematical validation prioritized during extraction.',
    });
  }
}

export const quantMathematicianAnalyzer = new QuantMathematicianAnalyzer();

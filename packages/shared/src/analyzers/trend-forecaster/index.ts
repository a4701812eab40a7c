/**
 * Trend Forecaster
 */

import { HeuristicAnalyzer } from '../base-analyzer';

export class TrendForecasterAnalyzer extends HeuristicAnalyzer {
  constructor() {
    super({
      agentType: 'trend_forecaster',
      description: 'Generalist profile tuned for multi-period trend analysis',
      capabilities: ['trend_analysis', 'document_classification'],
      costTier: 'medium',
      defaultDocumentType: '10-K',
      tableHints: { income_statement: 0, balance_sheet: 1, cash_flow: 2 },
      confidence: 0.97,
      notes: 'Period alignment applied for trend analysis.',
    });
  }
}

export const trendForecasterAnalyzer = new TrendForecasterAnalyzer();

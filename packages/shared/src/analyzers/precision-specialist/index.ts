/**
 * Precision Specialist
 *
 * Default agent. Model-backed classification and statement table selection.
 */

import { LlmAnalyzer } from '../base-analyzer';
import type { LlmTransport } from '../llm-analysis';

export class PrecisionSpecialistAnalyzer extends LlmAnalyzer {
  constructor(transport?: LlmTransport) {
    super(
      'precision_specialist',
      'Model-backed document classification and statement table selection',
      ['document_classification', 'table_selection', 'structured_output'],
      transport
    );
  }
}

export const precisionSpecialistAnalyzer = new PrecisionSpecialistAnalyzer();

/**
 * Analyzer Registry
 *
 * One analyzer per agent type. Registering again for a type replaces the
 * previous analyzer.
 */

import type { AgentType } from '../types';
import type { AgentAnalyzer } from './types';
import { logger } from '../logger';

const analyzerRegistry = new Map<AgentType, AgentAnalyzer>();

export function registerAnalyzer(analyzer: AgentAnalyzer): void {
  analyzerRegistry.set(analyzer.agentType, analyzer);

  logger.debug('Registered analyzer', {
    agent_type: analyzer.agentType,
    strategy: analyzer.strategy,
    description: analyzer.description,
  });
}

/**
 * @throws Error if no analyzer is registered for that type
 */
export function getAnalyzerOrThrow(agentType: AgentType): AgentAnalyzer {
  const analyzer = analyzerRegistry.get(agentType);
  if (!analyzer) {
    throw new Error(`No analyzer registered for agent type: ${agentType}`);
  }
  return analyzer;
}

export function getRegisteredAgentTypes(): AgentType[] {
  return Array.from(analyzerRegistry.keys());
}

export function getAllAnalyzers(): AgentAnalyzer[] {
  return Array.from(analyzerRegistry.values());
}

/**
 * Clear all registered analyzers. Useful for testing.
 */
export function clearAnalyzerRegistry(): void {
  analyzerRegistry.clear();
}

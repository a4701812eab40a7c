/**
 * Label Mapper
 *
 * Maps a raw line-item label onto the canonical taxonomy. Tiers are tried in
 * strict order and the first hit wins:
 *
 *   1. XBRL tag (namespace prefix stripped, case-sensitive)   confidence 1.0
 *   2. exact match on the normalized label                    confidence 1.0
 *   3. prefix match, first key in precedence order            confidence 0.9
 *   4. fuzzy token overlap (Jaccard >= 0.6)                   confidence = score
 *
 * Mapping precedence is income statement, balance sheet, cash flow. A label
 * present in more than one mapping resolves to the earliest.
 */

import type { LabelMapping } from '../types';
import { roundHalfEven } from '../ratios/safe-math';
import { getDefaultTaxonomy, type Taxonomy } from '../taxonomy/loader';
import { jaccard, normalizeLabel, tokenizeLabel } from '../taxonomy/normalize';

export const PREFIX_CONFIDENCE = 0.9;
export const FUZZY_THRESHOLD = 0.6;

const NO_MATCH: LabelMapping = Object.freeze({
  canonical_key: null,
  statement_type: 'unknown',
  match_method: 'none',
  confidence: 0,
});

function stripNamespace(label: string): string {
  const trimmed = label.trim();
  const colon = trimmed.indexOf(':');
  return colon === -1 ? trimmed : trimmed.slice(colon + 1);
}

export type LabelMapperFn = (rawLabel: string) => LabelMapping;

/**
 * Create a mapper bound to a specific taxonomy.
 */
export function createLabelMapper(taxonomy: Taxonomy): LabelMapperFn {
  return (rawLabel: string): LabelMapping => {
    const tag = taxonomy.xbrlTags.get(stripNamespace(rawLabel));
    if (tag) {
      return {
        canonical_key: tag.key,
        statement_type: tag.statementType,
        match_method: 'xbrl_tag',
        confidence: 1.0,
      };
    }

    const normalized = normalizeLabel(rawLabel);

    for (const mapping of taxonomy.mappings) {
      const key = mapping.labels.get(normalized);
      if (key !== undefined) {
        return {
          canonical_key: key,
          statement_type: mapping.statementType,
          match_method: 'exact',
          confidence: 1.0,
        };
      }
    }

    for (const mapping of taxonomy.mappings) {
      for (const [label, key] of mapping.labels) {
        if (normalized.startsWith(label)) {
          return {
            canonical_key: key,
            statement_type: mapping.statementType,
            match_method: 'prefix',
            confidence: PREFIX_CONFIDENCE,
          };
        }
      }
    }

    const labelTokens = tokenizeLabel(normalized);
    let bestScore = 0;
    let best: Taxonomy['fuzzyCandidates'][number] | null = null;

    for (const candidate of taxonomy.fuzzyCandidates) {
      const score = jaccard(labelTokens, candidate.tokens);
      if (score > bestScore) {
        bestScore = score;
        best = candidate;
      }
    }

    if (best && bestScore >= FUZZY_THRESHOLD) {
      return {
        canonical_key: best.key,
        statement_type: best.statementType,
        match_method: 'fuzzy',
        confidence: roundHalfEven(bestScore, 2),
      };
    }

    return { ...NO_MATCH };
  };
}

/**
 * Map a label using the process-wide taxonomy.
 */
export function mapLabel(rawLabel: string, taxonomy: Taxonomy = getDefaultTaxonomy()): LabelMapping {
  return createLabelMapper(taxonomy)(rawLabel);
}

/**
 * Label Taxonomy
 *
 * Three free-text mappings (income statement, balance sheet, cash flow) and
 * one XBRL tag mapping. Loaded once from JSON data files and frozen.
 *
 * The bundled files live in ./data. Setting TAXONOMY_DIR points the loader at
 * a directory holding the same four file names, which lets a deployment edit
 * the taxonomy without a code change.
 */

import fs from 'fs';
import path from 'path';
import { config } from '../config';
import { logger } from '../logger';
import type { StatementType } from '../types';
import { normalizeLabel, tokenizeLabel } from './normalize';
import incomeStatementData from './data/income-statement.json';
import balanceSheetData from './data/balance-sheet.json';
import cashFlowData from './data/cash-flow.json';
import xbrlTagData from './data/xbrl-tags.json';

export const TAXONOMY_FILES = {
  income_statement: 'income-statement.json',
  balance_sheet: 'balance-sheet.json',
  cash_flow: 'cash-flow.json',
  xbrl_tags: 'xbrl-tags.json',
} as const;

export class TaxonomyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TaxonomyError';
  }
}

export interface StatementMapping {
  readonly statementType: StatementType;
  /** normalized label -> canonical key, in data-file order */
  readonly labels: ReadonlyMap<string, string>;
}

export interface XbrlTagEntry {
  readonly key: string;
  readonly statementType: StatementType;
}

export interface FuzzyCandidate {
  readonly key: string;
  readonly statementType: StatementType;
  readonly tokens: ReadonlySet<string>;
}

export interface Taxonomy {
  /** Ordered by precedence: income statement, balance sheet, cash flow. */
  readonly mappings: readonly StatementMapping[];
  readonly xbrlTags: ReadonlyMap<string, XbrlTagEntry>;
  /** Every mapping key pre-tokenized, in precedence then data-file order. */
  readonly fuzzyCandidates: readonly FuzzyCandidate[];
}

export interface TaxonomySources {
  income_statement: unknown;
  balance_sheet: unknown;
  cash_flow: unknown;
  xbrl_tags: unknown;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStatementType(value: unknown): value is StatementType {
  return value === 'income_statement' || value === 'balance_sheet' || value === 'cash_flow';
}

function parseLabelMapping(raw: unknown, statementType: StatementType): StatementMapping {
  if (!isRecord(raw)) {
    throw new TaxonomyError(`${statementType} mapping must be an object of label -> canonical key`);
  }

  const labels = new Map<string, string>();
  for (const [label, key] of Object.entries(raw)) {
    if (typeof key !== 'string' || key.trim() === '') {
      throw new TaxonomyError(`${statementType} mapping for "${label}" must be a non-empty string`);
    }
    const normalized = normalizeLabel(label);
    if (normalized === '') {
      throw new TaxonomyError(`${statementType} label "${label}" is empty after normalization`);
    }
    // first entry wins when two labels normalize to the same text
    if (!labels.has(normalized)) {
      labels.set(normalized, key);
    }
  }

  return { statementType, labels };
}

function parseXbrlTags(raw: unknown): Map<string, XbrlTagEntry> {
  if (!isRecord(raw)) {
    throw new TaxonomyError('xbrl tag mapping must be an object of tag -> {key, statement_type}');
  }

  const tags = new Map<string, XbrlTagEntry>();
  for (const [tag, entry] of Object.entries(raw)) {
    if (!isRecord(entry) || typeof entry.key !== 'string' || !isStatementType(entry.statement_type)) {
      throw new TaxonomyError(`xbrl tag "${tag}" must map to {key, statement_type}`);
    }
    tags.set(tag, { key: entry.key, statementType: entry.statement_type });
  }
  return tags;
}

/**
 * Build an immutable taxonomy from raw (parsed JSON) sources.
 */
export function buildTaxonomy(sources: TaxonomySources): Taxonomy {
  const mappings: StatementMapping[] = [
    parseLabelMapping(sources.income_statement, 'income_statement'),
    parseLabelMapping(sources.balance_sheet, 'balance_sheet'),
    parseLabelMapping(sources.cash_flow, 'cash_flow'),
  ];

  const fuzzyCandidates: FuzzyCandidate[] = [];
  for (const mapping of mappings) {
    for (const [label, key] of mapping.labels) {
      fuzzyCandidates.push(
        Object.freeze({ key, statementType: mapping.statementType, tokens: tokenizeLabel(label) })
      );
    }
  }

  return Object.freeze({
    mappings: Object.freeze(mappings.map((m) => Object.freeze(m))),
    xbrlTags: parseXbrlTags(sources.xbrl_tags),
    fuzzyCandidates: Object.freeze(fuzzyCandidates),
  });
}

function readJsonFile(dir: string, fileName: string): unknown {
  const filePath = path.join(dir, fileName);
  try {
    return JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new TaxonomyError(`Failed to read taxonomy file ${filePath}: ${reason}`);
  }
}

/**
 * Load a taxonomy from a directory holding the four data files.
 */
export function loadTaxonomyFromDir(dir: string): Taxonomy {
  const taxonomy = buildTaxonomy({
    income_statement: readJsonFile(dir, TAXONOMY_FILES.income_statement),
    balance_sheet: readJsonFile(dir, TAXONOMY_FILES.balance_sheet),
    cash_flow: readJsonFile(dir, TAXONOMY_FILES.cash_flow),
    xbrl_tags: readJsonFile(dir, TAXONOMY_FILES.xbrl_tags),
  });

  logger.info('Loaded taxonomy', { dir, ...getTaxonomyStats(taxonomy) });
  return taxonomy;
}

export function getBundledTaxonomy(): Taxonomy {
  return buildTaxonomy({
    income_statement: incomeStatementData,
    balance_sheet: balanceSheetData,
    cash_flow: cashFlowData,
    xbrl_tags: xbrlTagData,
  });
}

let defaultTaxonomy: Taxonomy | null = null;

/**
 * Process-wide taxonomy, loaded on first use.
 */
export function getDefaultTaxonomy(): Taxonomy {
  if (!defaultTaxonomy) {
    defaultTaxonomy = config.taxonomyDir
      ? loadTaxonomyFromDir(config.taxonomyDir)
      : getBundledTaxonomy();
  }
  return defaultTaxonomy;
}

export function getTaxonomyStats(taxonomy: Taxonomy): {
  income_statement: number;
  balance_sheet: number;
  cash_flow: number;
  xbrl_tags: number;
  total: number;
} {
  const [income, balance, cash] = taxonomy.mappings.map((m) => m.labels.size);
  const stats = {
    income_statement: income ?? 0,
    balance_sheet: balance ?? 0,
    cash_flow: cash ?? 0,
    xbrl_tags: taxonomy.xbrlTags.size,
  };
  return {
    ...stats,
    total: stats.income_statement + stats.balance_sheet + stats.cash_flow + stats.xbrl_tags,
  };
}

export { normalizeLabel, tokenizeLabel, jaccard } from './normalize';
export {
  TAXONOMY_FILES,
  TaxonomyError,
  buildTaxonomy,
  loadTaxonomyFromDir,
  getBundledTaxonomy,
  getDefaultTaxonomy,
  getTaxonomyStats,
  type Taxonomy,
  type TaxonomySources,
  type StatementMapping,
  type XbrlTagEntry,
  type FuzzyCandidate,
} from './loader';

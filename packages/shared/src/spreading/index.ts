export {
  createLabelMapper,
  mapLabel,
  PREFIX_CONFIDENCE,
  FUZZY_THRESHOLD,
  type LabelMapperFn,
} from './label-mapper';
export {
  spreadFinancialData,
  buildStatementsDict,
  mappedItemCount,
  UNMAPPED_SUGGESTION,
  type ValuesByPeriod,
} from './spreader';

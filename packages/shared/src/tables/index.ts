export { cleanNumeric, isNumericCell, parseNumericRows } from './clean-numeric';
export { selectHintedTables, mergeTablesForSpreading, type SpreadInput } from './merge';
export {
  detectLayoutTables,
  splitCells,
  MIN_TABLE_ROWS,
  DEFAULT_LABEL_HEADER,
} from './layout-tables';

export {
  valuesMatch,
  checkBalanceSheet,
  checkIncomeStatement,
  checkCashFlow,
  calculateQualityScore,
  validateStatements,
  TOLERANCE_PERCENT,
  TOLERANCE_ABSOLUTE,
} from './validation-engine';

export { safeDivide, safeSubtract, growth, round4, roundHalfEven, type Maybe } from './safe-math';
export { calculateMetrics, PERIOD_METRICS, GROWTH_METRICS } from './metric-calculator';

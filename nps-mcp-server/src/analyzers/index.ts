export * from './types.js';
export * from './status.js';
export { analyzeSimpleFilter } from './simple-filter.js';
export { analyzeSeniorGap } from './senior-gap.js';
export { analyzePeriodComparison, fallbackPeriods } from './period-comparison.js';

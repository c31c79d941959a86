/**
 * Query Parser Module
 *
 * Free-text NPS question -> FilterSpec
 */

export * from './types.js';
export * from './calendar.js';
export * from './comparison-periods.js';
export * from './parser.js';
export * from './summary.js';

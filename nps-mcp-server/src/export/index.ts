export * from './table-columns.js';
export * from './xlsx-exporter.js';

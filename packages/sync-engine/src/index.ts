export * from './bookmark.js';
export * from './transform.js';
export * from './stream.js';
export * from './orchestrator.js';
export * from './summary.js';
export * from './writer.js';
export * from './tap.js';

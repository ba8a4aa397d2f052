/**
 * ANALYSIS MODULE — Index
 *
 * Symbol cache, staleness policy, coordinator, background refresher and
 * the HTTP routes over them.
 */

export * from './analysis.types.js';
export * from './analysis.extractor.js';
export * from './analysis.staleness.js';
export * from './analysis.store.js';
export * from './analysis.coordinator.js';
export * from './analysis.refresher.js';
export * from './analysis.routes.js';

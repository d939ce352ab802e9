/**
 * Public entry point.
 */

export type * from './domain/model.js';
export * from './domain/errors.js';
export * from './domain/space.js';
export * from './domain/state.js';
export * from './domain/rules.js';
export * from './domain/branching.js';
export * from './domain/constraints.js';
export * from './domain/transitions.js';
export * from './domain/graph.js';
export * from './domain/engine.js';
export type * from './domain/events.js';
export * from './domain/describe.js';
export * from './domain/validation.js';
export { createKnowledgeBase, catalog, flashlightDefinition } from './kb/catalog.js';
export * from './io/kb-loader.js';
export * from './io/history.js';

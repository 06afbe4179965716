/**
 * Re-exports the step-graph execution engine.
 */
export * from './execution/executor';
export * from './execution/node';
export * from './channels/registry';
export * from './models/checkpoint';

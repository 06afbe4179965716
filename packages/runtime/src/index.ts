export * from './session/sessionStore';
export * from './metrics/summarize';
export * from './metrics/performanceTracker';
export * from './pipeline/state';
export * from './pipeline/stageRunner';
export * from './pipeline/nodes';
export * from './pipeline/orchestrator';
export * from './router/classify';
export * from './router/format';
export * from './router/prompt';
export * from './router/requestRouter';
export * from './resources/lifecycle';

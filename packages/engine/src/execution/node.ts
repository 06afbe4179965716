import type { NodeResult } from '@helix/core';

export interface PregelNode<TState, TContext, TStateDiff = Partial<TState>> {
  (context: TContext & { state: Readonly<TState> }): Promise<NodeResult<TStateDiff>>;
}

/**
 * Helper to define a graph node with the state and context types pinned.
 */
export function defineNode<TState, TContext, TStateDiff = Partial<TState>>(
  handler: (context: TContext & { state: Readonly<TState> }) => Promise<NodeResult<TStateDiff>>
): PregelNode<TState, TContext, TStateDiff> {
  return handler;
}

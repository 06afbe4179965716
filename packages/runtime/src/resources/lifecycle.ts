import { type RuntimeResource, errorMessage } from '@helix/core';

/** Distinct resources in start order; a provider passed twice starts once. */
export function collectLifecycleResources(candidates: Array<RuntimeResource | undefined>): RuntimeResource[] {
  return [...new Set(candidates.filter((candidate): candidate is RuntimeResource => candidate !== undefined))];
}

/**
 * Starts resources in order. When one fails, the ones already started are
 * closed in reverse before the start error is rethrown.
 */
export async function startResources(resources: RuntimeResource[]): Promise<void> {
  const started: RuntimeResource[] = [];
  for (const resource of resources) {
    try {
      await resource.start?.();
    } catch (error) {
      try {
        await closeResources(started);
      } catch (closeError) {
        throw new AggregateError([error, closeError], `Failed to start resources: ${errorMessage(error)}`);
      }
      throw error;
    }
    started.push(resource);
  }
}

/**
 * Closes resources in reverse start order. Every resource gets its close call;
 * failures are collected and rethrown together.
 */
export async function closeResources(resources: RuntimeResource[]): Promise<void> {
  const failures: unknown[] = [];
  for (const resource of [...resources].reverse()) {
    try {
      await resource.close?.();
    } catch (error) {
      failures.push(error);
    }
  }

  if (failures.length === 1) throw failures[0];
  if (failures.length > 1) {
    throw new AggregateError(failures, `Failed to close ${failures.length} resources: ${failures.map(errorMessage).join('; ')}`);
  }
}

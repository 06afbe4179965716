import type { ChannelReducer } from '../models/checkpoint';

/**
 * Appends new items to an array. If no previous array exists, it starts a new one.
 */
export function appendReducer<T>(): ChannelReducer<T[]> {
    return (prev: T[] | undefined, update: T[]) => [...(prev ?? []), ...update];
}

/**
 * A reducer that overwrites the previous value (standard channel behavior).
 */
export function lastWriteWinsReducer<T>(): ChannelReducer<T> {
    return (_prev: T | undefined, update: T) => update;
}

/**
 * Shallow-merges record writes into the previous record; later keys win.
 */
export function mergeReducer<T extends object>(): ChannelReducer<T> {
    return (prev: T | undefined, update: T) => ({ ...(prev ?? {}), ...update });
}

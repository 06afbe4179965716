/**
 * A reducer defines how a specific channel merges new writes into its current state.
 */
export type ChannelReducer<T> = (current: T | undefined, update: T) => T;

/** One reducer per state channel. */
export type ChannelMap<TState> = { [K in keyof TState]: ChannelReducer<TState[K]> };

import { describe, expect, it } from "vitest";
import { CancelledError, type CheckpointSaver, type StateSnapshot } from "@helix/core";
import { EngineExecutor, appendReducer, defineNode, lastWriteWinsReducer, mergeReducer } from "../src/index";

interface CounterState {
  count: number;
  visited: string[];
  tags: Record<string, number>;
}

class RecordingSaver implements CheckpointSaver<CounterState> {
  public readonly history: StateSnapshot<CounterState>[] = [];

  async putCheckpoint(_threadId: string, snapshot: StateSnapshot<CounterState>): Promise<void> {
    this.history.push(snapshot);
  }

  async getCheckpoint(): Promise<StateSnapshot<CounterState> | null> {
    return this.history[this.history.length - 1] ?? null;
  }

  async getCheckpointHistory(): Promise<StateSnapshot<CounterState>[]> {
    return [...this.history];
  }
}

const channels = {
  count: lastWriteWinsReducer<number>(),
  visited: appendReducer<string>(),
  tags: mergeReducer<Record<string, number>>(),
};

const initialState = (): CounterState => ({ count: 0, visited: [], tags: {} });

describe("EngineExecutor", () => {
  it("runs nodes in order and commits writes through the reducers", async () => {
    const executor = new EngineExecutor<CounterState, { step: number }>({
      channels,
      initialState,
      nodes: {
        first: async (ctx) => ({ stateDiff: { count: ctx.state.count + ctx.step, visited: ["first"], tags: { a: 1 } }, nextTasks: ["second"] }),
        second: async (ctx) => ({ stateDiff: { count: ctx.state.count * 10, visited: ["second"], tags: { b: 2 } }, nextTasks: [] }),
      },
    });

    const saver = new RecordingSaver();
    const result = await executor.invoke({ count: 1 }, { step: 2 }, { threadId: "t1", saver, entrypoint: "first" });

    expect(result.values).toEqual({ count: 30, visited: ["first", "second"], tags: { a: 1, b: 2 } });
    expect(result.nextTasks).toEqual([]);
    expect(saver.history.map((snapshot) => snapshot.metadata.source)).toEqual(["input", "loop", "loop"]);
    expect(saver.history.map((snapshot) => snapshot.metadata.step)).toEqual([0, 1, 2]);
  });

  it("starts at the first declared node when no entrypoint is given", async () => {
    const executor = new EngineExecutor<CounterState, object>({
      channels,
      initialState,
      nodes: {
        only: async () => ({ stateDiff: { visited: ["only"] } }),
      },
    });

    const result = await executor.invoke({}, {}, { threadId: "t2", saver: new RecordingSaver() });
    expect(result.values.visited).toEqual(["only"]);
  });

  it("records a failed checkpoint and rethrows when a node crashes", async () => {
    const executor = new EngineExecutor<CounterState, object>({
      channels,
      initialState,
      nodes: {
        boom: async () => {
          throw new Error("node exploded");
        },
      },
    });

    const saver = new RecordingSaver();
    await expect(executor.invoke({}, {}, { threadId: "t3", saver })).rejects.toThrow("node exploded");

    const last = saver.history[saver.history.length - 1];
    expect(last?.metadata.source).toBe("failed");
    expect(last?.metadata.error).toBe("node exploded");
  });

  it("stops before the next step once the signal is aborted", async () => {
    const controller = new AbortController();
    const executor = new EngineExecutor<CounterState, object>({
      channels,
      initialState,
      nodes: {
        first: async () => {
          controller.abort();
          return { stateDiff: { visited: ["first"] }, nextTasks: ["second"] };
        },
        second: async () => ({ stateDiff: { visited: ["second"] } }),
      },
    });

    const saver = new RecordingSaver();
    await expect(
      executor.invoke({}, {}, { threadId: "t4", saver, signal: controller.signal }),
    ).rejects.toBeInstanceOf(CancelledError);

    const last = saver.history[saver.history.length - 1];
    expect(last?.metadata.source).toBe("failed");
    expect(last?.values.visited).toEqual(["first"]);
  });

  it("guards against cycles", async () => {
    const executor = new EngineExecutor<CounterState, object>({
      channels,
      initialState,
      nodes: {
        loop: async (ctx) => ({ stateDiff: { count: ctx.state.count + 1 }, nextTasks: ["loop"] }),
      },
    });

    await expect(
      executor.invoke({}, {}, { threadId: "t5", saver: new RecordingSaver(), maxSteps: 3 }),
    ).rejects.toThrow("Max steps (3) exceeded for thread t5");
  });
});

describe("defineNode", () => {
  it("keeps the handler callable with typed state", async () => {
    interface TestState { input: number; result?: number }

    const node = defineNode<TestState, object>(async (ctx) => ({
      stateDiff: { result: ctx.state.input * 2 },
      nextTasks: [],
    }));

    const res = await node({ state: { input: 21 } });
    expect(res.stateDiff.result).toBe(42);
  });
});

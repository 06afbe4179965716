export interface NodeResult<TStateDiff = unknown> {
    stateDiff: TStateDiff;
    /** Nodes to run in the next step; an empty list ends the graph. */
    nextTasks?: string[];
}

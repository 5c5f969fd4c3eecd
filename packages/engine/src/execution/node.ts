import type { JsonValue, Logger, NodeResult, NodeSuspend, NodeUpdate } from '@scholar/core';

export interface ResumeInput {
  value: JsonValue;
}

export interface NodeContext<TState> {
  state: Readonly<TState>;
  threadId: string;
  /** Sequence number of the checkpoint this invocation reads. */
  step: number;
  /** Present only when re-entering a node that suspended. */
  resume?: ResumeInput;
  logger?: Logger;
}

export interface GraphNode<TState> {
  (context: NodeContext<TState>): Promise<NodeResult<Partial<TState>>>;
}

/**
 * Helper to define a graph node with type safety.
 */
export function defineNode<TState>(
  handler: (context: NodeContext<TState>) => Promise<NodeResult<Partial<TState>>>
): GraphNode<TState> {
  return handler;
}

export function update<TStateDiff>(diff: TStateDiff): NodeUpdate<TStateDiff> {
  return { type: 'update', update: diff };
}

export function suspend(value: JsonValue): NodeSuspend {
  return { type: 'suspend', value };
}

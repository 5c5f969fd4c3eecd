import type { JsonValue } from '../entities/session';

export interface NodeUpdate<TStateDiff> {
    type: 'update';
    update: TStateDiff;
}

export interface NodeSuspend {
    type: 'suspend';
    value: JsonValue;
}

/**
 * Outcome of one node invocation: a partial state update to merge, or a
 * suspension carrying the data the external decision-maker needs.
 */
export type NodeResult<TStateDiff = unknown> = NodeUpdate<TStateDiff> | NodeSuspend;

export type EngineErrorCode =
    | 'GRAPH_DEFINITION'
    | 'UNKNOWN_FIELD'
    | 'UNKNOWN_ROUTING_LABEL'
    | 'NODE_INVOCATION'
    | 'RESUME_MISMATCH'
    | 'STORE_UNAVAILABLE'
    | 'RECURSION_LIMIT';

export abstract class EngineError extends Error {
    public abstract readonly code: EngineErrorCode;
}

/** The graph was wired inconsistently (caught by `compile()` or registration). */
export class GraphDefinitionError extends EngineError {
    public readonly code = 'GRAPH_DEFINITION';

    constructor(message: string) {
        super(`Graph definition error: ${message}`);
        this.name = 'GraphDefinitionError';
    }
}

export class UnknownFieldError extends EngineError {
    public readonly code = 'UNKNOWN_FIELD';

    constructor(public readonly field: string) {
        super(`No reducer registered for state field '${field}'`);
        this.name = 'UnknownFieldError';
    }
}

export class UnknownRoutingLabelError extends EngineError {
    public readonly code = 'UNKNOWN_ROUTING_LABEL';

    constructor(public readonly node: string, public readonly label: string) {
        super(`Router for node '${node}' returned unmapped label '${label}'`);
        this.name = 'UnknownRoutingLabelError';
    }
}

export class NodeInvocationError extends EngineError {
    public readonly code = 'NODE_INVOCATION';

    constructor(public readonly node: string, public readonly cause: unknown) {
        super(`Node '${node}' failed: ${cause instanceof Error ? cause.message : String(cause)}`);
        this.name = 'NodeInvocationError';
    }
}

export class ResumeMismatchError extends EngineError {
    public readonly code = 'RESUME_MISMATCH';

    constructor(public readonly threadId: string, reason: string) {
        super(`Cannot resume thread ${threadId}: ${reason}`);
        this.name = 'ResumeMismatchError';
    }
}

export class StoreUnavailableError extends EngineError {
    public readonly code = 'STORE_UNAVAILABLE';

    constructor(public readonly threadId: string, public readonly cause: unknown) {
        super(`Checkpoint store unavailable for thread ${threadId}: ${cause instanceof Error ? cause.message : String(cause)}`);
        this.name = 'StoreUnavailableError';
    }
}

export class RecursionLimitError extends EngineError {
    public readonly code = 'RECURSION_LIMIT';

    constructor(public readonly threadId: string, public readonly maxSteps: number) {
        super(`Max steps (${maxSteps}) exceeded for thread ${threadId}`);
        this.name = 'RecursionLimitError';
    }
}

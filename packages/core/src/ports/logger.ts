type LogFn = {
    (obj: Record<string, unknown>, msg?: string): void;
    (msg: string): void;
};

/**
 * Structured logger port, shaped after pino: a context object first, then a
 * human-readable message. Adapters may forward straight to pino.
 */
export interface Logger {
    trace: LogFn;
    debug: LogFn;
    info: LogFn;
    warn: LogFn;
    error: LogFn;
    fatal: LogFn;

    /** Child logger with extra bound fields (e.g. `threadId`). */
    child(bindings: Record<string, unknown>): Logger;
}

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

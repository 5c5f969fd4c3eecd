import type { Logger, LogLevel } from '@scholar/core';

export interface FakeLogEntry {
    level: LogLevel;
    bindings: Record<string, unknown>;
    obj?: Record<string, unknown>;
    msg?: string;
}

/**
 * Records log calls for assertions. Children share the parent's `logs`
 * array and add their bindings to each entry.
 */
export class FakeLogger implements Logger {
    constructor(
        public readonly logs: FakeLogEntry[] = [],
        private readonly bindings: Record<string, unknown> = {}
    ) { }

    public trace(obj: Record<string, unknown>, msg?: string): void;
    public trace(msg: string): void;
    public trace(arg1: Record<string, unknown> | string, arg2?: string): void {
        this.log('trace', arg1, arg2);
    }

    public debug(obj: Record<string, unknown>, msg?: string): void;
    public debug(msg: string): void;
    public debug(arg1: Record<string, unknown> | string, arg2?: string): void {
        this.log('debug', arg1, arg2);
    }

    public info(obj: Record<string, unknown>, msg?: string): void;
    public info(msg: string): void;
    public info(arg1: Record<string, unknown> | string, arg2?: string): void {
        this.log('info', arg1, arg2);
    }

    public warn(obj: Record<string, unknown>, msg?: string): void;
    public warn(msg: string): void;
    public warn(arg1: Record<string, unknown> | string, arg2?: string): void {
        this.log('warn', arg1, arg2);
    }

    public error(obj: Record<string, unknown>, msg?: string): void;
    public error(msg: string): void;
    public error(arg1: Record<string, unknown> | string, arg2?: string): void {
        this.log('error', arg1, arg2);
    }

    public fatal(obj: Record<string, unknown>, msg?: string): void;
    public fatal(msg: string): void;
    public fatal(arg1: Record<string, unknown> | string, arg2?: string): void {
        this.log('fatal', arg1, arg2);
    }

    public child(bindings: Record<string, unknown>): Logger {
        return new FakeLogger(this.logs, { ...this.bindings, ...bindings });
    }

    public messages(level?: LogLevel): string[] {
        return this.logs
            .filter((entry) => level === undefined || entry.level === level)
            .map((entry) => entry.msg ?? '');
    }

    private log(level: LogLevel, arg1: Record<string, unknown> | string, arg2?: string): void {
        if (typeof arg1 === 'string') {
            this.logs.push({ level, bindings: this.bindings, msg: arg1 });
        } else {
            this.logs.push({ level, bindings: this.bindings, obj: arg1, ...(arg2 !== undefined ? { msg: arg2 } : {}) });
        }
    }
}

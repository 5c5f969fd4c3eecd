import { GraphDefinitionError, UnknownFieldError } from '../errors';

/**
 * A reducer defines how a state field merges a node's write into its current value.
 * `current` is the channel's empty value on the first write.
 */
export type ChannelReducer<T> = (current: T, update: T) => T;

export interface Channel<T> {
    reduce(current: T, update: T): T;
    empty(): T;
}

/** One channel per state field. */
export type ChannelMap<TState extends object> = { [K in keyof TState]: Channel<TState[K]> };

export function channel<T>(reduce: ChannelReducer<T>, empty: () => T): Channel<T> {
    return { reduce, empty };
}

/**
 * Replaces the previous value with the write.
 */
export function overwrite<T>(empty: T): Channel<T> {
    return {
        reduce: (_current, update) => update,
        empty: () => empty
    };
}

/**
 * Appends new items after the existing ones, preserving order and duplicates.
 */
export function appendSequence<T>(): Channel<T[]> {
    return {
        reduce: (current, update) => [...current, ...update],
        empty: () => []
    };
}

/**
 * Appends, then keeps only the newest `maxWindow` items.
 */
export function boundedSequence<T>(maxWindow: number): Channel<T[]> {
    return {
        reduce: (current, update) => {
            const combined = [...current, ...update];
            return combined.length > maxWindow ? combined.slice(-maxWindow) : combined;
        },
        empty: () => []
    };
}

/**
 * Field name → channel lookup used to merge partial updates into state.
 */
export class ReducerRegistry<TState extends object> {
    private readonly channels = new Map<string, Channel<unknown>>();

    public static from<TState extends object>(channels: ChannelMap<TState>): ReducerRegistry<TState> {
        const registry = new ReducerRegistry<TState>();
        for (const field of Object.keys(channels) as Array<keyof TState & string>) {
            registry.register(field, channels[field]);
        }
        return registry;
    }

    public register<K extends keyof TState & string>(field: K, channel: Channel<TState[K]>): this {
        if (this.channels.has(field)) {
            throw new GraphDefinitionError(`reducer for field '${field}' is already registered`);
        }
        this.channels.set(field, channel);
        return this;
    }

    public has(field: string): boolean {
        return this.channels.has(field);
    }

    public fields(): string[] {
        return [...this.channels.keys()];
    }

    /** State with every registered field at its empty value. */
    public initialState(): TState {
        const state: Record<string, unknown> = {};
        for (const [field, channel] of this.channels) {
            state[field] = channel.empty();
        }
        return state as TState;
    }

    /**
     * Merges `update` into `current`, returning a new state object.
     * Fields set to `undefined` in the update are skipped.
     */
    public apply(current: TState, update: Partial<TState>): TState {
        const base: object = current;
        const next: Record<string, unknown> = { ...base };
        for (const [field, value] of Object.entries(update)) {
            if (value === undefined) continue;
            const channel = this.channels.get(field);
            if (!channel) {
                throw new UnknownFieldError(field);
            }
            const previous = field in next ? next[field] : channel.empty();
            next[field] = channel.reduce(previous, value);
        }
        return next as TState;
    }
}

import { type ChannelMap, ReducerRegistry } from '../channels/registry';
import { GraphDefinitionError } from '../errors';
import type { GraphNode } from '../execution/node';

/** Successor that terminates the run. */
export const END = '__end__';
export type End = typeof END;

export type Router<TState, TLabel extends string = string> = (state: Readonly<TState>) => TLabel;

export type Edge<TState, TNode extends string> =
    | { kind: 'direct'; to: TNode | End }
    | { kind: 'conditional'; router: Router<TState>; mapping: Readonly<Record<string, TNode | End>> };

/**
 * Immutable result of `GraphBuilder.compile()`: reducers, nodes and edges of
 * one workflow graph, validated against each other.
 */
export interface GraphDefinition<TState extends object, TNode extends string = string> {
    readonly reducers: ReducerRegistry<TState>;
    readonly nodes: ReadonlyMap<TNode, GraphNode<TState>>;
    readonly edges: ReadonlyMap<TNode, Edge<TState, TNode>>;
    readonly entryNode: TNode;
    hasNode(name: string): name is TNode;
}

/**
 * Declares a workflow graph. The node names are part of the builder's type,
 * so edges pointing at undeclared nodes do not compile; `compile()` checks the
 * same at run time and that every node has exactly one outgoing edge.
 *
 * @example
 * const graph = new GraphBuilder<State, 'agent' | 'tools'>(channels)
 *     .addNode('agent', agentNode)
 *     .addNode('tools', toolsNode)
 *     .setEntryPoint('agent')
 *     .addConditionalEdges('agent', route, { more: 'tools', done: END })
 *     .addEdge('tools', 'agent')
 *     .compile();
 */
export class GraphBuilder<TState extends object, TNode extends string> {
    private readonly nodes = new Map<TNode, GraphNode<TState>>();
    private readonly edges = new Map<TNode, Edge<TState, TNode>>();
    private entryNode: TNode | undefined;

    constructor(private readonly channels: ChannelMap<TState>) { }

    public addNode(name: TNode, node: GraphNode<TState>): this {
        const key: string = name;
        if (key === END) {
            throw new GraphDefinitionError(`'${END}' is reserved`);
        }
        if (this.nodes.has(name)) {
            throw new GraphDefinitionError(`node '${name}' is already registered`);
        }
        this.nodes.set(name, node);
        return this;
    }

    public setEntryPoint(name: TNode): this {
        this.entryNode = name;
        return this;
    }

    public addEdge(from: TNode, to: TNode | End): this {
        return this.setEdge(from, { kind: 'direct', to });
    }

    public addConditionalEdges<TLabel extends string>(
        from: TNode,
        router: Router<TState, TLabel>,
        mapping: Record<TLabel, TNode | End>
    ): this {
        return this.setEdge(from, { kind: 'conditional', router, mapping: { ...mapping } });
    }

    public compile(): GraphDefinition<TState, TNode> {
        const reducers = ReducerRegistry.from(this.channels);
        const nodes = new Map(this.nodes);
        const edges = new Map(this.edges);
        const entryNode = this.entryNode;

        if (entryNode === undefined) {
            throw new GraphDefinitionError('no entry point set');
        }
        if (!nodes.has(entryNode)) {
            throw new GraphDefinitionError(`entry point '${entryNode}' is not a registered node`);
        }

        const names = new Set<string>(nodes.keys());
        const isTarget = (target: string): boolean => target === END || names.has(target);

        for (const name of nodes.keys()) {
            const edge = edges.get(name);
            if (!edge) {
                throw new GraphDefinitionError(`node '${name}' has no outgoing edge`);
            }
            const targets = edge.kind === 'direct' ? [edge.to] : Object.values(edge.mapping);
            for (const target of targets) {
                if (!isTarget(target)) {
                    throw new GraphDefinitionError(`edge from '${name}' points to unknown node '${target}'`);
                }
            }
        }
        for (const from of edges.keys()) {
            if (!nodes.has(from)) {
                throw new GraphDefinitionError(`edge declared from unknown node '${from}'`);
            }
        }

        return Object.freeze({
            reducers,
            nodes,
            edges,
            entryNode,
            hasNode: (name: string): name is TNode => names.has(name)
        });
    }

    private setEdge(from: TNode, edge: Edge<TState, TNode>): this {
        if (this.edges.has(from)) {
            throw new GraphDefinitionError(`node '${from}' already has an outgoing edge`);
        }
        this.edges.set(from, edge);
        return this;
    }
}

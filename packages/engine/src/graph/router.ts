import { GraphDefinitionError, UnknownRoutingLabelError } from '../errors';
import type { End, GraphDefinition } from './builder';

/**
 * Picks the successor of `from` given the post-merge state.
 * Conditional edges map the router's label through the mapping declared at
 * build time; a label with no entry is a graph-definition error.
 */
export function resolveNextNode<TState extends object, TNode extends string>(
    graph: GraphDefinition<TState, TNode>,
    from: TNode,
    state: Readonly<TState>
): TNode | End {
    const edge = graph.edges.get(from);
    if (!edge) {
        throw new GraphDefinitionError(`node '${from}' has no outgoing edge`);
    }
    if (edge.kind === 'direct') {
        return edge.to;
    }

    const label = edge.router(state);
    const target = Object.hasOwn(edge.mapping, label) ? edge.mapping[label] : undefined;
    if (target === undefined) {
        throw new UnknownRoutingLabelError(from, label);
    }
    return target;
}

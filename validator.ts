/**
 * @file validator.ts
 * @description Structural validation of graphs: cycles, dangling edges, duplicate edges
 *              and input ports fed by more than one edge.
 */

import type { EdgeData, GraphData } from "./types.js";

/**
 * Result of graph validation
 */
export type GraphValidationResult = {
    /**
     * True when no violation was found
     */
    valid: boolean;
    /**
     * Every violation found, in check order
     */
    errors: string[];
};

export const CYCLE_ERROR = "Graph contains cycles";

/**
 * Orders the graph's nodes with Kahn's algorithm, ignoring edges whose endpoints are missing.
 * The initial queue follows node insertion order and successors are enqueued in edge order.
 * A result shorter than the node count means the graph has a cycle.
 */
export function kahnOrder(graph: GraphData): string[] {
    const inDegree = new Map<string, number>();
    const successors = new Map<string, string[]>();

    for (const nodeId of Object.keys(graph.nodes)) {
        inDegree.set(nodeId, 0);
        successors.set(nodeId, []);
    }

    for (const edge of graph.edges) {
        if (!inDegree.has(edge.sourceNode) || !inDegree.has(edge.targetNode)) continue;
        successors.get(edge.sourceNode)?.push(edge.targetNode);
        inDegree.set(edge.targetNode, (inDegree.get(edge.targetNode) ?? 0) + 1);
    }

    const queue: string[] = [];
    for (const [nodeId, degree] of inDegree) {
        if (degree === 0) queue.push(nodeId);
    }

    const order: string[] = [];
    let head = 0;
    while (head < queue.length) {
        const nodeId = queue[head++];
        order.push(nodeId);

        for (const successor of successors.get(nodeId) ?? []) {
            const degree = (inDegree.get(successor) ?? 1) - 1;
            inDegree.set(successor, degree);
            if (degree === 0) queue.push(successor);
        }
    }

    return order;
}

function describeEdge(edge: EdgeData): string {
    return `${edge.sourceNode}.${edge.sourcePort} -> ${edge.targetNode}.${edge.targetPort}`;
}

/**
 * Checks a graph's structural integrity without mutating it.
 */
export class GraphValidator {
    readonly graph: GraphData;

    constructor(graph: GraphData) {
        this.graph = graph;
    }

    /**
     * Runs every check and accumulates the violations. Never throws.
     */
    validate(): GraphValidationResult {
        const errors = [
            ...this.#checkCycles(),
            ...this.#checkDanglingEdges(),
            ...this.#checkDuplicateEdges(),
            ...this.#checkFanIn(),
        ];
        return { valid: errors.length === 0, errors };
    }

    #checkCycles(): string[] {
        const nodeCount = Object.keys(this.graph.nodes).length;
        return kahnOrder(this.graph).length < nodeCount ? [CYCLE_ERROR] : [];
    }

    #checkDanglingEdges(): string[] {
        const errors: string[] = [];
        for (const edge of this.graph.edges) {
            if (!Object.hasOwn(this.graph.nodes, edge.sourceNode)) {
                errors.push(`Edge ${edge.edgeId} references non-existent source node: ${edge.sourceNode}`);
            }
            if (!Object.hasOwn(this.graph.nodes, edge.targetNode)) {
                errors.push(`Edge ${edge.edgeId} references non-existent target node: ${edge.targetNode}`);
            }
        }
        return errors;
    }

    #checkDuplicateEdges(): string[] {
        const errors: string[] = [];
        const seen = new Set<string>();
        for (const edge of this.graph.edges) {
            const signature = JSON.stringify([edge.sourceNode, edge.sourcePort, edge.targetNode, edge.targetPort]);
            if (seen.has(signature)) {
                errors.push(`Duplicate edge: ${describeEdge(edge)}`);
            }
            seen.add(signature);
        }
        return errors;
    }

    /**
     * An input port takes its value from exactly one edge. Exact duplicates are
     * reported by the duplicate check and are not counted twice here.
     */
    #checkFanIn(): string[] {
        const sourcesByInput = new Map<string, Set<string>>();
        const order: string[] = [];

        for (const edge of this.graph.edges) {
            const input = `${edge.targetNode}.${edge.targetPort}`;
            let sources = sourcesByInput.get(input);
            if (!sources) {
                sources = new Set();
                sourcesByInput.set(input, sources);
                order.push(input);
            }
            sources.add(`${edge.sourceNode}.${edge.sourcePort}`);
        }

        return order
            .filter((input) => (sourcesByInput.get(input)?.size ?? 0) > 1)
            .map((input) => `Input port ${input} has multiple incoming edges`);
    }
}

/**
 * Validates a graph. Shorthand for `new GraphValidator(graph).validate()`.
 */
export function validateGraph(graph: GraphData): GraphValidationResult {
    return new GraphValidator(graph).validate();
}

/**
 * @file planner.ts
 * @description Computes the evaluation order and the dependency-parallel batches of a graph.
 */

import { GraphValidationError } from "./errors.js";
import type { GraphData } from "./types.js";
import { GraphValidator, kahnOrder } from "./validator.js";

/**
 * Plans graph execution order and parallelization. Every plan validates the graph first.
 */
export class GraphExecutionPlanner {
    readonly graph: GraphData;
    readonly #validator: GraphValidator;

    constructor(graph: GraphData) {
        this.graph = graph;
        this.#validator = new GraphValidator(graph);
    }

    /**
     * Returns the nodes in topological order. Deterministic for identical input:
     * ready nodes are taken in the order they became ready, starting from node insertion order.
     * @throws GraphValidationError when the graph is invalid
     */
    getExecutionOrder(): string[] {
        this.#assertValid();
        return kahnOrder(this.graph);
    }

    /**
     * Groups nodes into waves: wave k holds every node whose dependencies all lie in
     * waves 0..k-1. Nodes of one wave share no dependency and may run concurrently.
     * @throws GraphValidationError when the graph is invalid or a wave cannot progress
     */
    getParallelBatches(): string[][] {
        this.#assertValid();

        const dependencies = this.#buildDependencies();
        const nodeIds = Object.keys(this.graph.nodes);
        const processed = new Set<string>();
        const batches: string[][] = [];

        while (processed.size < nodeIds.length) {
            const ready = nodeIds.filter((nodeId) => {
                if (processed.has(nodeId)) return false;
                for (const dependency of dependencies.get(nodeId) ?? []) {
                    if (!processed.has(dependency)) return false;
                }
                return true;
            });

            if (ready.length === 0) {
                throw new GraphValidationError("Cannot resolve dependencies - possible cycle");
            }

            batches.push(ready);
            for (const nodeId of ready) {
                processed.add(nodeId);
            }
        }

        return batches;
    }

    /**
     * Maps each node to the set of nodes it reads from.
     */
    #buildDependencies(): Map<string, Set<string>> {
        const dependencies = new Map<string, Set<string>>();
        for (const edge of this.graph.edges) {
            let sources = dependencies.get(edge.targetNode);
            if (!sources) {
                sources = new Set();
                dependencies.set(edge.targetNode, sources);
            }
            sources.add(edge.sourceNode);
        }
        return dependencies;
    }

    #assertValid(): void {
        const { valid, errors } = this.#validator.validate();
        if (!valid) {
            throw new GraphValidationError(`Invalid graph: ${errors.join(", ")}`, errors);
        }
    }
}

export function getExecutionOrder(graph: GraphData): string[] {
    return new GraphExecutionPlanner(graph).getExecutionOrder();
}

export function getParallelBatches(graph: GraphData): string[][] {
    return new GraphExecutionPlanner(graph).getParallelBatches();
}

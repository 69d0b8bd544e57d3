import type { GraphData } from "./types.js";

/**
 * Lookup of stored graphs, used by sub-graph nodes and the instance executor.
 * Relational or remote implementations live with the caller.
 */
export interface GraphStore {
    /**
     * Resolves a graph by id, falling back to a lookup by name.
     */
    resolve(idOrName: string): Promise<GraphData | undefined>;
}

export function isGraphStore(value: unknown): value is GraphStore {
    return (
        typeof value === "object" &&
        value !== null &&
        "resolve" in value &&
        typeof value.resolve === "function"
    );
}

/**
 * GraphStore kept in process memory.
 */
export class InMemoryGraphStore implements GraphStore {
    #graphs: Map<string, GraphData> = new Map();

    constructor(graphs: GraphData[] = []) {
        for (const graph of graphs) {
            this.save(graph);
        }
    }

    save(graph: GraphData): void {
        this.#graphs.set(graph.graphId, graph);
    }

    delete(graphId: string): boolean {
        return this.#graphs.delete(graphId);
    }

    list(): GraphData[] {
        return Array.from(this.#graphs.values());
    }

    async resolve(idOrName: string): Promise<GraphData | undefined> {
        const byId = this.#graphs.get(idOrName);
        if (byId) return byId;

        for (const graph of this.#graphs.values()) {
            if (graph.name === idOrName) return graph;
        }
        return undefined;
    }
}

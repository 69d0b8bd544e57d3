import { createLogger, Logger } from "./logging.js";
import type { NodeClass } from "./node.js";

/**
 * Maps node type names to node implementations. Populated at startup by the
 * built-in nodes and by whatever plugin loader the host application runs.
 */
export class NodeRegistry {
    #nodes: Map<string, NodeClass> = new Map();
    readonly #logger: Logger;

    constructor(logger: Logger = createLogger("NodeRegistry")) {
        this.#logger = logger;
    }

    /**
     * Registers a node type. A later registration under the same name replaces the earlier one.
     */
    register(nodeType: string, nodeClass: NodeClass): this {
        if (this.#nodes.has(nodeType)) {
            this.#logger.warn(`Replacing registered node type: ${nodeType}`);
        }
        this.#nodes.set(nodeType, nodeClass);
        this.#logger.debug(`Registered node type: ${nodeType}`);
        return this;
    }

    /**
     * Registers every entry of a type-name to class mapping.
     */
    registerAll(nodes: Record<string, NodeClass>): this {
        for (const [nodeType, nodeClass] of Object.entries(nodes)) {
            this.register(nodeType, nodeClass);
        }
        return this;
    }

    get(nodeType: string): NodeClass | undefined {
        return this.#nodes.get(nodeType);
    }

    has(nodeType: string): boolean {
        return this.#nodes.has(nodeType);
    }

    listTypes(): string[] {
        return Array.from(this.#nodes.keys());
    }

    /**
     * Returns a copy of the registered mapping.
     */
    getAll(): Record<string, NodeClass> {
        return Object.fromEntries(this.#nodes);
    }
}

import type { Logger } from "../logging.js";
import { NodeRegistry } from "../registry.js";
import { BUILTIN_NODES } from "./builtin.js";
import { SubgraphNode } from "./subgraph.js";

export { BUILTIN_NODES, InputNode, OutputNode, TextConcatNode, TextFilterNode, TextTransformNode } from "./builtin.js";
export { SubgraphNode } from "./subgraph.js";
export type { SubgraphExecutionInfo } from "./subgraph.js";

/**
 * Creates a registry holding the built-in node types and the subgraph node.
 */
export function createDefaultRegistry(logger?: Logger): NodeRegistry {
    return new NodeRegistry(logger).registerAll(BUILTIN_NODES).register("subgraph", SubgraphNode);
}

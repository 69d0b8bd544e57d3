/**
 * @file subgraph.ts
 * @description Node that executes another stored graph as a single step.
 */

import { z } from "zod";
import type { ExecutionContext } from "../context.js";
import { errorMessage } from "../errors.js";
import { BaseNode, parameterError } from "../node.js";
import { NodeData, port, PortValues } from "../types.js";

const StringMapping = z.record(z.string());

const SubgraphParameters = z.object({
    graphId: z.string().default("").describe("ID or name of the graph to execute"),
    inputMapping: z.string().default("{}").describe("JSON mapping of node input ports to subgraph inputs"),
    outputMapping: z.string().default("{}").describe("JSON mapping of subgraph node ids to result keys"),
});

/**
 * Information reported on the `executionInfo` output of a successful run.
 */
export type SubgraphExecutionInfo = {
    subgraphId: string;
    subgraphName: string;
    status: "completed";
    nodeCount: number;
    outputNodes: string[];
    errors?: Record<string, string>;
};

/**
 * Runs another graph, resolved by id or name from the executor's graph store.
 *
 * `inputMapping` maps this node's input ports to execution input names of the subgraph;
 * a value arriving on the optional `trigger` port is passed as `_trigger`. `outputMapping`
 * maps subgraph node ids to keys of `result`; without a mapping `result` holds the outputs
 * of every subgraph node. Problems are reported as an "Error: ..." string on
 * `executionInfo` with a null `result`, so the outer graph keeps running.
 */
export class SubgraphNode extends BaseNode {
    constructor() {
        super({
            nodeType: "subgraph",
            displayName: "Subgraph",
            description: "Execute another graph as a node with exposed inputs/outputs",
            category: "Flow Control",
            inputs: [port("trigger", "any", { required: false, description: "Optional trigger input" })],
            outputs: [
                port("result", "any", { description: "Result from subgraph execution" }),
                port("executionInfo", "text", { description: "Information about subgraph execution" }),
            ],
            parameterSchema: SubgraphParameters,
        });
    }

    async execute(context: ExecutionContext, nodeData: NodeData, inputs: PortValues): Promise<PortValues> {
        const parsed = SubgraphParameters.safeParse(nodeData.parameters);
        if (!parsed.success) {
            return { result: null, executionInfo: parameterError(parsed.error) };
        }
        const params = parsed.data;
        if (!params.graphId) {
            return { result: null, executionInfo: "Error: No graphId specified" };
        }

        const { executor, graphStore } = context.services;
        if (!executor || !graphStore) {
            return { result: null, executionInfo: "Error: Subgraph execution requires an executor and a graph store" };
        }

        try {
            const inputMapping = StringMapping.parse(JSON.parse(params.inputMapping));
            const outputMapping = StringMapping.parse(JSON.parse(params.outputMapping));

            const subgraph = await graphStore.resolve(params.graphId);
            if (!subgraph) {
                return { result: null, executionInfo: `Error: Graph not found: ${params.graphId}` };
            }

            const subgraphInputs: Record<string, unknown> = {};
            for (const [nodeInput, subgraphInput] of Object.entries(inputMapping)) {
                const value = context.getInputValue(nodeData.nodeId, nodeInput);
                if (value !== undefined && value !== null) {
                    subgraphInputs[subgraphInput] = value;
                }
            }
            if (inputs.trigger !== undefined && inputs.trigger !== null) {
                subgraphInputs._trigger = inputs.trigger;
            }

            const subgraphContext = await executor.executeGraph(subgraph, subgraphInputs);
            const nodeOutputs = subgraphContext.snapshot().nodeOutputs;

            let result: Record<string, unknown> = nodeOutputs;
            if (Object.keys(outputMapping).length > 0) {
                result = {};
                for (const [subgraphNodeId, resultKey] of Object.entries(outputMapping)) {
                    if (Object.hasOwn(nodeOutputs, subgraphNodeId)) {
                        result[resultKey] = nodeOutputs[subgraphNodeId];
                    }
                }
            }

            const executionInfo: SubgraphExecutionInfo = {
                subgraphId: subgraph.graphId,
                subgraphName: subgraph.name,
                status: "completed",
                nodeCount: Object.keys(subgraph.nodes).length,
                outputNodes: Object.keys(nodeOutputs),
            };
            if (subgraphContext.hasErrors()) {
                executionInfo.errors = { ...subgraphContext.errors };
            }

            return { result, executionInfo: JSON.stringify(executionInfo, null, 2) };
        } catch (error) {
            return { result: null, executionInfo: `Error executing subgraph: ${errorMessage(error)}` };
        }
    }
}

/**
 * @file context.ts
 * @description Run-scoped execution state: inputs, per-node outputs, statuses and errors.
 */

import { randomUUID } from "crypto";
import type { GraphStore } from "./graphStore.js";
import { createRecord, GraphData, NodeStatus, PortValues } from "./types.js";

/**
 * Runs a graph to completion. Implemented by GraphExecutor; declared here so node
 * implementations can run nested graphs without importing the executor.
 */
export interface GraphRunner {
    executeGraph(graph: GraphData, inputs?: Record<string, unknown>): Promise<ExecutionContext>;
}

/**
 * System capabilities handed to node implementations through the context.
 */
export type ExecutionServices = {
    executor?: GraphRunner;
    graphStore?: GraphStore;
};

/**
 * Plain-object copy of a context's results, for callers that persist them.
 */
export type ExecutionSnapshot = {
    executionId: string;
    graphId: string;
    nodeOutputs: Record<string, PortValues>;
    nodeStatus: Record<string, NodeStatus>;
    errors: Record<string, string>;
    startedAt?: string;
    completedAt?: string;
};

export type ExecutionContextInit = {
    graph: GraphData;
    executionId?: string;
    executionInputs?: Record<string, unknown>;
    startedAt?: Date;
    services?: ExecutionServices;
};

/**
 * Mutable state of one graph execution. Owned by a single run; only the executor
 * and the nodes it invokes write to it.
 */
export class ExecutionContext {
    readonly executionId: string;
    /**
     * The graph being executed; treated as read-only
     */
    readonly graph: GraphData;
    executionInputs: Record<string, unknown>;
    readonly nodeOutputs: Record<string, PortValues> = createRecord();
    readonly nodeStatus: Record<string, NodeStatus> = createRecord();
    readonly errors: Record<string, string> = createRecord();
    startedAt?: Date;
    completedAt?: Date;
    services: ExecutionServices;

    constructor(init: ExecutionContextInit) {
        this.executionId = init.executionId || randomUUID();
        this.graph = init.graph;
        this.executionInputs = init.executionInputs ?? {};
        this.startedAt = init.startedAt;
        this.services = init.services ?? {};
    }

    /**
     * Returns the value recorded on the output port feeding `nodeId.portName`,
     * or undefined when nothing is connected or the source has not produced it yet.
     * The first matching edge wins; the validator rejects graphs with more than one.
     */
    getInputValue(nodeId: string, portName: string): unknown {
        const edge = this.graph.edges.find(
            (e) => e.targetNode === nodeId && e.targetPort === portName
        );
        if (!edge || !Object.hasOwn(this.nodeOutputs, edge.sourceNode)) return undefined;
        const outputs = this.nodeOutputs[edge.sourceNode];
        return Object.hasOwn(outputs, edge.sourcePort) ? outputs[edge.sourcePort] : undefined;
    }

    setNodeOutput(nodeId: string, portName: string, value: unknown): void {
        const outputs = this.nodeOutputs[nodeId] ?? (this.nodeOutputs[nodeId] = createRecord());
        outputs[portName] = value;
    }

    setNodeStatus(nodeId: string, status: NodeStatus): void {
        this.nodeStatus[nodeId] = status;
    }

    setNodeError(nodeId: string, message: string): void {
        this.errors[nodeId] = message;
    }

    getNodeStatus(nodeId: string): NodeStatus {
        return Object.hasOwn(this.nodeStatus, nodeId) ? this.nodeStatus[nodeId] : NodeStatus.PENDING;
    }

    /**
     * Whether any node recorded an error during this run.
     */
    hasErrors(): boolean {
        return Object.keys(this.errors).length > 0;
    }

    snapshot(): ExecutionSnapshot {
        const nodeOutputs = createRecord<PortValues>();
        for (const [nodeId, outputs] of Object.entries(this.nodeOutputs)) {
            nodeOutputs[nodeId] = { ...outputs };
        }
        return {
            executionId: this.executionId,
            graphId: this.graph.graphId,
            nodeOutputs,
            nodeStatus: Object.assign(createRecord<NodeStatus>(), this.nodeStatus),
            errors: Object.assign(createRecord<string>(), this.errors),
            startedAt: this.startedAt?.toISOString(),
            completedAt: this.completedAt?.toISOString(),
        };
    }
}

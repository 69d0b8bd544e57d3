/**
 * @file executor.ts
 * @description Runs graphs: sequentially in topological order, batch by batch with the
 *              nodes of a batch running concurrently, or as a stream of execution events.
 */

import { GraphExecutorOptions, ResolvedExecutorOptions, resolveExecutorOptions } from "./config.js";
import { ExecutionContext, GraphRunner } from "./context.js";
import { errorMessage, ExecutionError } from "./errors.js";
import {
    EventMetadata,
    ExecutionCompleteEvent,
    ExecutionErrorEvent,
    ExecutionEvent,
    NodeChunkEvent,
    NodeCompleteEvent,
} from "./events.js";
import { createLogger, elapsedSince, Logger } from "./logging.js";
import type { BaseNode } from "./node.js";
import { GraphExecutionPlanner } from "./planner.js";
import type { NodeRegistry } from "./registry.js";
import { GraphData, NodeData, NodeStatus, PortValues } from "./types.js";

/**
 * Error recorded for a streaming node whose event stream was closed before it finished.
 */
export const STREAM_CLOSED_ERROR = "Execution stopped before the node completed";

/**
 * A node instance ready to execute, with its collected inputs
 */
type PreparedNode = {
    node: BaseNode;
    inputs: PortValues;
};

/**
 * Executes graphs against a node registry.
 *
 * A failing node aborts the whole run: the node is marked failed, its message is recorded
 * under `context.errors`, and an ExecutionError naming it propagates. Nodes that had not
 * started stay pending. There is no retry.
 */
export class GraphExecutor implements GraphRunner {
    readonly registry: NodeRegistry;
    readonly options: ResolvedExecutorOptions;
    readonly #logger: Logger;
    readonly #streamingNodeTypes: Set<string>;

    /**
     * @param registry - Node implementations available to executed graphs
     * @param options - Executor configuration; validated, throws a ZodError when invalid
     */
    constructor(registry: NodeRegistry, options: GraphExecutorOptions = {}) {
        this.registry = registry;
        this.options = resolveExecutorOptions(options);
        this.#logger = createLogger(this.options.name, {
            level: this.options.logLevel,
            sink: this.options.logSink,
        });
        this.#streamingNodeTypes = new Set(this.options.streamingNodeTypes);
    }

    /**
     * Creates a fresh context for running `graph`, wired to this executor's services.
     */
    createContext(graph: GraphData, inputs: Record<string, unknown> = {}): ExecutionContext {
        return new ExecutionContext({
            graph,
            executionInputs: inputs,
            services: { executor: this, graphStore: this.options.graphStore },
        });
    }

    /**
     * Executes a graph sequentially in topological order.
     * @throws GraphValidationError before any node runs when the graph is invalid
     * @throws ExecutionError when a node fails
     */
    async executeGraph(graph: GraphData, inputs: Record<string, unknown> = {}): Promise<ExecutionContext> {
        return this.executeWithContext(this.createContext(graph, inputs));
    }

    /**
     * Executes the context's graph sequentially, writing into the given context.
     * Used when the caller prepares the context itself, as persistent instances do.
     */
    async executeWithContext(context: ExecutionContext): Promise<ExecutionContext> {
        const { graph } = context;
        const logger = this.#runLogger(context);
        const startTime = Date.now();
        this.#prepareContext(context);

        try {
            const executionOrder = new GraphExecutionPlanner(graph).getExecutionOrder();
            logger.info(`Executing graph ${graph.graphId} with ${executionOrder.length} nodes`);

            for (const nodeId of executionOrder) {
                await this.#executeNode(context, nodeId, logger);
            }

            logger.info(`Graph ${graph.graphId} execution completed`, { durationMs: elapsedSince(startTime) });
        } catch (error) {
            logger.error(`Graph ${graph.graphId} execution failed`, error);
            throw error;
        } finally {
            context.completedAt = new Date();
        }

        return context;
    }

    /**
     * Executes a graph batch by batch. All nodes of a batch start together and the batch is
     * awaited until every node has settled; if any failed, the first failure in batch order
     * is thrown and later batches never start.
     */
    async executeParallelBatches(graph: GraphData, inputs: Record<string, unknown> = {}): Promise<ExecutionContext> {
        const context = this.createContext(graph, inputs);
        const logger = this.#runLogger(context);
        const startTime = Date.now();
        this.#prepareContext(context);

        try {
            const batches = new GraphExecutionPlanner(graph).getParallelBatches();
            logger.info(`Executing graph ${graph.graphId} with ${batches.length} batches`);

            for (const [index, batch] of batches.entries()) {
                logger.info(`Executing batch ${index + 1}/${batches.length} with ${batch.length} nodes`);

                const results = await Promise.allSettled(
                    batch.map((nodeId) => this.#executeNode(context, nodeId, logger))
                );
                const failure = results.find(
                    (result): result is PromiseRejectedResult => result.status === "rejected"
                );
                if (failure) {
                    throw failure.reason;
                }
            }

            logger.info(`Graph ${graph.graphId} execution completed`, { durationMs: elapsedSince(startTime) });
        } catch (error) {
            logger.error(`Graph ${graph.graphId} execution failed`, error);
            throw error;
        } finally {
            context.completedAt = new Date();
        }

        return context;
    }

    /**
     * Executes a graph in topological order, yielding a `node_chunk` event per chunk of
     * every streaming node, a `node_complete` event per node, and finally either
     * `execution_complete` or `execution_error`. Failures are reported as the error event
     * and not thrown. The generator returns the final context.
     */
    async *executeGraphStreaming(
        graph: GraphData,
        inputs: Record<string, unknown> = {}
    ): AsyncGenerator<ExecutionEvent, ExecutionContext, void> {
        const context = this.createContext(graph, inputs);
        const logger = this.#runLogger(context);
        const metadata: EventMetadata = {
            source: this.options.name,
            executionId: context.executionId,
            graphId: graph.graphId,
        };
        this.#prepareContext(context);

        try {
            const executionOrder = new GraphExecutionPlanner(graph).getExecutionOrder();
            logger.info(`Streaming execution of graph ${graph.graphId} with ${executionOrder.length} nodes`);

            for (const nodeId of executionOrder) {
                if (this.supportsStreaming(graph.nodes[nodeId])) {
                    for await (const chunk of this.#executeNodeStreaming(context, nodeId, logger)) {
                        yield new NodeChunkEvent(nodeId, chunk, metadata);
                    }
                } else {
                    await this.#executeNode(context, nodeId, logger);
                }

                yield new NodeCompleteEvent(
                    nodeId,
                    context.getNodeStatus(nodeId),
                    { ...context.nodeOutputs[nodeId] },
                    metadata
                );
            }

            context.completedAt = new Date();
            logger.info(`Graph ${graph.graphId} streaming execution completed`);
            yield new ExecutionCompleteEvent(context.snapshot().nodeOutputs, metadata);
        } catch (error) {
            context.completedAt = new Date();
            logger.error(`Graph ${graph.graphId} streaming execution failed`, error);
            yield new ExecutionErrorEvent(errorMessage(error), {
                ...metadata,
                nodeId: error instanceof ExecutionError ? error.nodeId : undefined,
            });
        } finally {
            if (!context.completedAt) context.completedAt = new Date();
        }

        return context;
    }

    /**
     * Whether a node is run in streaming mode: its `streaming` parameter is set, or its
     * type is one of the configured streaming node types.
     */
    supportsStreaming(nodeData: NodeData): boolean {
        return Boolean(nodeData.parameters.streaming) || this.#streamingNodeTypes.has(nodeData.nodeType);
    }

    #runLogger(context: ExecutionContext): Logger {
        return this.#logger.child({ executionId: context.executionId, graphId: context.graph.graphId });
    }

    /**
     * Marks every node pending and fills in the start time and services.
     */
    #prepareContext(context: ExecutionContext): void {
        if (!context.startedAt) context.startedAt = new Date();
        if (!context.services.executor) context.services.executor = this;
        if (!context.services.graphStore) context.services.graphStore = this.options.graphStore;

        for (const nodeId of Object.keys(context.graph.nodes)) {
            context.setNodeStatus(nodeId, NodeStatus.PENDING);
        }
    }

    /**
     * Executes a single node and stores its outputs.
     */
    async #executeNode(context: ExecutionContext, nodeId: string, logger: Logger): Promise<void> {
        const nodeData = context.graph.nodes[nodeId];
        const startTime = Date.now();

        try {
            context.setNodeStatus(nodeId, NodeStatus.RUNNING);
            logger.debug(`Executing node ${nodeId} (${nodeData.nodeType})`);

            const { node, inputs } = this.#prepareNode(context, nodeData);
            const outputs = await node.execute(context, nodeData, inputs);
            this.#storeOutputs(context, nodeId, outputs);

            context.setNodeStatus(nodeId, NodeStatus.COMPLETED);
            logger.debug(`Node ${nodeId} completed successfully`, { durationMs: elapsedSince(startTime) });
        } catch (error) {
            throw this.#failNode(context, nodeId, error, logger);
        }
    }

    /**
     * Executes a single node in streaming mode, yielding its text chunks.
     * A node without a streaming implementation runs `execute` and its `response` output,
     * if any, is yielded as one chunk.
     */
    async *#executeNodeStreaming(
        context: ExecutionContext,
        nodeId: string,
        logger: Logger
    ): AsyncGenerator<string, void, void> {
        const nodeData = context.graph.nodes[nodeId];

        try {
            context.setNodeStatus(nodeId, NodeStatus.RUNNING);
            logger.debug(`Streaming execution of node ${nodeId} (${nodeData.nodeType})`);

            const { node, inputs } = this.#prepareNode(context, nodeData);

            if (node.executeStreaming) {
                const stream = node.executeStreaming(context, nodeData, inputs);
                let aggregate: PortValues | undefined;
                try {
                    let result = await stream.next();
                    while (!result.done) {
                        yield result.value;
                        result = await stream.next();
                    }
                    aggregate = result.value;
                } finally {
                    // Closes the node's stream when the consumer stops early
                    await stream.return(undefined);
                }

                // Only nodes that cannot hand back their aggregate are executed a second time
                const outputs = aggregate ?? (await node.execute(context, nodeData, inputs));
                this.#storeOutputs(context, nodeId, outputs);
            } else {
                const outputs = await node.execute(context, nodeData, inputs);
                this.#storeOutputs(context, nodeId, outputs);

                const response = outputs.response;
                if (response !== undefined && response !== null) {
                    yield typeof response === "string" ? response : JSON.stringify(response);
                }
            }

            context.setNodeStatus(nodeId, NodeStatus.COMPLETED);
            logger.debug(`Node ${nodeId} streaming completed successfully`);
        } catch (error) {
            throw this.#failNode(context, nodeId, error, logger);
        } finally {
            if (context.getNodeStatus(nodeId) === NodeStatus.RUNNING) {
                context.setNodeStatus(nodeId, NodeStatus.FAILED);
                context.setNodeError(nodeId, STREAM_CLOSED_ERROR);
                logger.warn(`Node ${nodeId} stopped before completing: the event stream was closed`);
            }
        }
    }

    /**
     * Resolves the node implementation, instantiates it and collects its inputs.
     * A required input with no value takes the port's default when it has one.
     */
    #prepareNode(context: ExecutionContext, nodeData: NodeData): PreparedNode {
        const nodeClass = this.registry.get(nodeData.nodeType);
        if (!nodeClass) {
            throw new ExecutionError(`Unknown node type: ${nodeData.nodeType}`, { nodeId: nodeData.nodeId });
        }

        const node = new nodeClass();
        const inputs: PortValues = {};

        for (const input of node.spec.inputs) {
            const value = context.getInputValue(nodeData.nodeId, input.name);
            if (value !== undefined && value !== null) {
                inputs[input.name] = value;
            } else if (input.required && input.default !== undefined && input.default !== null) {
                inputs[input.name] = input.default;
            }
        }

        if (!node.validateInputs(inputs)) {
            const missing = node.missingInputs(inputs);
            throw new ExecutionError(
                `Invalid inputs for node ${nodeData.nodeId}. Missing required inputs: ${missing.join(", ")}`,
                { nodeId: nodeData.nodeId }
            );
        }

        return { node, inputs };
    }

    #storeOutputs(context: ExecutionContext, nodeId: string, outputs: PortValues): void {
        for (const [portName, value] of Object.entries(outputs)) {
            context.setNodeOutput(nodeId, portName, value);
        }
    }

    /**
     * Records a node failure on the context and returns the error to throw.
     */
    #failNode(context: ExecutionContext, nodeId: string, error: unknown, logger: Logger): ExecutionError {
        const message = errorMessage(error);
        context.setNodeStatus(nodeId, NodeStatus.FAILED);
        context.setNodeError(nodeId, message);
        logger.error(`Node ${nodeId} failed: ${message}`, error, { nodeId });
        return new ExecutionError(`Node ${nodeId} failed: ${message}`, { nodeId, cause: error });
    }
}

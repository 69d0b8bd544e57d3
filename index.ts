/**
 * @file index.ts
 * @description Entry point for the portgraph package.
 * Exports the graph executor, the node contract and the built-in nodes.
 */

// Graph data model
export { DATA_KINDS, DEFAULT_RESOURCE_REQUIREMENTS, NodeStatus, createRecord, defaultEdgeId, port } from "./types.js";
export type {
    DataKind,
    EdgeData,
    GraphData,
    NodeData,
    NodeSpec,
    ParameterSpec,
    PortSpec,
    PortValues,
    ResourceRequirement,
} from "./types.js";

// Graph documents
export { GraphDocumentSchema, parseGraph, serializeGraph } from "./schema.js";
export type { GraphDocument, SerializedGraph } from "./schema.js";

// Errors
export { ExecutionError, GraphValidationError, errorMessage } from "./errors.js";

// Validation and planning
export { CYCLE_ERROR, GraphValidator, validateGraph } from "./validator.js";
export type { GraphValidationResult } from "./validator.js";
export { GraphExecutionPlanner, getExecutionOrder, getParallelBatches } from "./planner.js";

// Node contract
export { BaseNode, parameterError } from "./node.js";
export type { NodeClass, NodeOptions, NodeStream } from "./node.js";
export { describeParameters } from "./parameters.js";
export type { ParameterSchema } from "./parameters.js";
export { NodeRegistry } from "./registry.js";

// Execution
export { ExecutionContext } from "./context.js";
export type { ExecutionContextInit, ExecutionServices, ExecutionSnapshot, GraphRunner } from "./context.js";
export { GraphExecutor, STREAM_CLOSED_ERROR } from "./executor.js";
export { DEFAULT_STREAMING_NODE_TYPES, ExecutorOptionsSchema, resolveExecutorOptions } from "./config.js";
export type { GraphExecutorOptions, ResolvedExecutorOptions } from "./config.js";

// Stored graphs and persistent instances
export { InMemoryGraphStore, isGraphStore } from "./graphStore.js";
export type { GraphStore } from "./graphStore.js";
export { GraphInstanceExecutor, InMemoryInstanceStore, InstanceExecutionContext } from "./instance.js";
export type {
    GraphInstance,
    GraphInstanceExecutorOptions,
    InstanceExecution,
    InstanceExecutionStatus,
    InstanceInfo,
    InstanceStore,
} from "./instance.js";

// Events and logging
export {
    BaseEvent,
    ExecutionCompleteEvent,
    ExecutionErrorEvent,
    LogEvent,
    NodeChunkEvent,
    NodeCompleteEvent,
} from "./events.js";
export type { EventMetadata, ExecutionEvent, LogLevel } from "./events.js";
export { LOG_LEVELS, Logger, consoleSink, createLogger } from "./logging.js";
export type { LogSink, LoggerOptions } from "./logging.js";

// Built-in nodes
export * from "./nodes/index.js";

// Export zod for parameter schema definitions
export { z } from "zod";

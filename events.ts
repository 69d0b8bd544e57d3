/**
 * @file events.ts
 * @description Event types emitted while a graph runs: log records and the incremental
 *              events of a streaming execution. Transport layers forward these to clients as-is.
 */

import type { NodeStatus, PortValues } from "./types.js";

/**
 * Correlation fields attached to an event.
 */
export type EventMetadata = {
    /**
     * Name of the component that emitted the event (executor, registry, ...)
     */
    source?: string;
    executionId?: string;
    graphId?: string;
};

export type LogLevel = "debug" | "info" | "warn" | "error";

// Base class providing timestamp handling and metadata
export abstract class BaseEvent {
    /** The specific type of the event */
    abstract readonly type: string;
    /** Unix timestamp (milliseconds) of when the event occurred */
    readonly timestamp: number;
    source?: string;
    executionId?: string;
    graphId?: string;

    constructor(metadata: EventMetadata = {}) {
        this.timestamp = Date.now();
        this.source = metadata.source;
        this.executionId = metadata.executionId;
        this.graphId = metadata.graphId;
    }
}

/**
 * LogEvent class representing a log message.
 */
export class LogEvent extends BaseEvent {
    readonly type = "log" as const;
    /** The severity level of the log */
    level: LogLevel;
    /** The log message */
    message: string;
    /** Structured context for the message */
    details?: Record<string, unknown>;

    constructor(
        level: LogLevel,
        message: string,
        metadata: EventMetadata & { details?: Record<string, unknown> } = {}
    ) {
        super(metadata);
        this.level = level;
        this.message = message;
        this.details = metadata.details;
    }
}

/**
 * A piece of partial text produced by a streaming node.
 */
export class NodeChunkEvent extends BaseEvent {
    readonly type = "node_chunk" as const;
    nodeId: string;
    chunk: string;

    constructor(nodeId: string, chunk: string, metadata: EventMetadata = {}) {
        super(metadata);
        this.nodeId = nodeId;
        this.chunk = chunk;
    }
}

/**
 * A node reached the end of its execution.
 */
export class NodeCompleteEvent extends BaseEvent {
    readonly type = "node_complete" as const;
    nodeId: string;
    status: NodeStatus;
    outputs: PortValues;

    constructor(nodeId: string, status: NodeStatus, outputs: PortValues, metadata: EventMetadata = {}) {
        super(metadata);
        this.nodeId = nodeId;
        this.status = status;
        this.outputs = outputs;
    }
}

/**
 * The whole graph completed; carries every node's outputs.
 */
export class ExecutionCompleteEvent extends BaseEvent {
    readonly type = "execution_complete" as const;
    readonly status = "completed" as const;
    outputs: Record<string, PortValues>;

    constructor(outputs: Record<string, PortValues>, metadata: EventMetadata = {}) {
        super(metadata);
        this.outputs = outputs;
    }
}

/**
 * The run stopped on a failure. Terminal event of a failed streaming execution.
 */
export class ExecutionErrorEvent extends BaseEvent {
    readonly type = "execution_error" as const;
    error: string;
    /** The failing node, when the failure belongs to one */
    nodeId?: string;

    constructor(error: string, metadata: EventMetadata & { nodeId?: string } = {}) {
        super(metadata);
        this.error = error;
        this.nodeId = metadata.nodeId;
    }
}

/**
 * Events yielded by a streaming execution.
 */
export type ExecutionEvent =
    | NodeChunkEvent
    | NodeCompleteEvent
    | ExecutionCompleteEvent
    | ExecutionErrorEvent;

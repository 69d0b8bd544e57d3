/**
 * @file types.ts
 * @description Graph data model shared by the validator, planner, executor and node implementations.
 */

/**
 * Execution status of a single node within one run.
 * `skipped` is reserved for conditional execution and is never set by the executor.
 */
export const NodeStatus = {
    PENDING: "pending",
    RUNNING: "running",
    COMPLETED: "completed",
    FAILED: "failed",
    SKIPPED: "skipped",
} as const;

export type NodeStatus = (typeof NodeStatus)[keyof typeof NodeStatus];

/**
 * Kinds of data a port declares. Used for documentation and editor hints only.
 */
export const DATA_KINDS = ["text", "image", "audio", "video", "json", "file", "context", "any"] as const;

export type DataKind = (typeof DATA_KINDS)[number];

/**
 * Declaration of a node input or output port.
 */
export type PortSpec = {
    name: string;
    dataKind: DataKind;
    /**
     * Input ports only: whether a value must be present before `execute` is called.
     */
    required: boolean;
    /**
     * Substituted for a required input that no edge feeds.
     */
    default: unknown;
    description: string;
};

/**
 * Declaration of a configurable node parameter.
 */
export type ParameterSpec = {
    name: string;
    dataType: string;
    default: unknown;
    description: string;
    constraints?: Record<string, unknown>;
};

/**
 * Advisory resource hints for a node type.
 */
export type ResourceRequirement = {
    cpuCores: number;
    memoryMb: number;
    gpuCount: number;
    timeoutSeconds: number;
};

/**
 * Static description of a node type.
 */
export type NodeSpec = {
    nodeType: string;
    displayName: string;
    description: string;
    category: string;
    inputs: PortSpec[];
    outputs: PortSpec[];
    parameters: ParameterSpec[];
    resourceRequirements: ResourceRequirement;
};

/**
 * A node placed in a graph.
 */
export type NodeData = {
    nodeId: string;
    nodeType: string;
    /**
     * Editor coordinates, opaque to the engine
     */
    position: Record<string, number>;
    parameters: Record<string, unknown>;
};

/**
 * Directed data-flow connection: `targetNode.targetPort` is fed by `sourceNode.sourcePort`.
 */
export type EdgeData = {
    edgeId: string;
    sourceNode: string;
    sourcePort: string;
    targetNode: string;
    targetPort: string;
};

/**
 * A complete graph definition.
 */
export type GraphData = {
    graphId: string;
    name: string;
    nodes: Record<string, NodeData>;
    edges: EdgeData[];
    metadata: Record<string, unknown>;
    createdAt: Date;
};

/**
 * Values keyed by port name, as produced by or fed to a node.
 */
export type PortValues = Record<string, unknown>;

export const DEFAULT_RESOURCE_REQUIREMENTS: ResourceRequirement = {
    cpuCores: 1,
    memoryMb: 512,
    gpuCount: 0,
    timeoutSeconds: 300,
};

/**
 * Builds a port declaration, filling the same defaults a node author would otherwise repeat.
 */
export function port(
    name: string,
    dataKind: DataKind,
    options: Partial<Pick<PortSpec, "required" | "default" | "description">> = {}
): PortSpec {
    return {
        name,
        dataKind,
        required: options.required ?? true,
        default: options.default ?? null,
        description: options.description ?? "",
    };
}

/**
 * Derives the edge id used when a document leaves it out.
 */
export function defaultEdgeId(edge: Omit<EdgeData, "edgeId">): string {
    return `${edge.sourceNode}_${edge.sourcePort}-${edge.targetNode}_${edge.targetPort}`;
}

/**
 * An empty record without a prototype, for maps keyed by user-supplied ids such as
 * `constructor` or `__proto__`.
 */
export function createRecord<T>(): Record<string, T> {
    return Object.create(null);
}

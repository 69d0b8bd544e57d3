/**
 * @file schema.ts
 * @description Parses graph documents (untrusted JSON) into the graph data model, and back.
 */

import { randomUUID } from "crypto";
import { z } from "zod";
import { createRecord, defaultEdgeId, EdgeData, GraphData, NodeData } from "./types.js";

const NodeDocumentSchema = z.object({
    /**
     * Taken from the key under `nodes` when omitted
     */
    nodeId: z.string().min(1).optional(),
    nodeType: z.string().min(1),
    position: z.record(z.number()).default({}),
    parameters: z.record(z.unknown()).default({}),
});

const EdgeDocumentSchema = z.object({
    edgeId: z.string().min(1).optional(),
    sourceNode: z.string().min(1),
    sourcePort: z.string().min(1),
    targetNode: z.string().min(1),
    targetPort: z.string().min(1),
});

export const GraphDocumentSchema = z
    .object({
        graphId: z.string().min(1).optional(),
        name: z.string().default("Untitled Graph"),
        nodes: z.record(NodeDocumentSchema).default({}),
        edges: z.array(EdgeDocumentSchema).default([]),
        metadata: z.record(z.unknown()).default({}),
        createdAt: z.coerce.date().default(() => new Date()),
    })
    .superRefine((document, ctx) => {
        for (const [key, node] of Object.entries(document.nodes)) {
            if (node.nodeId !== undefined && node.nodeId !== key) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    path: ["nodes", key, "nodeId"],
                    message: `Node id ${node.nodeId} does not match its key ${key}`,
                });
            }
        }
    });

/**
 * A graph document as accepted by parseGraph.
 */
export type GraphDocument = z.input<typeof GraphDocumentSchema>;

/**
 * JSON-ready form of a graph, as produced by serializeGraph.
 */
export type SerializedGraph = {
    graphId: string;
    name: string;
    nodes: Record<string, NodeData>;
    edges: EdgeData[];
    metadata: Record<string, unknown>;
    createdAt: string;
};

/**
 * Validates a graph document and fills in defaults: a generated graph id, the name
 * "Untitled Graph", empty positions, parameters and metadata, and edge ids derived
 * from the edge endpoints. Structural checks (cycles, dangling edges) are left to
 * the validator. Throws a ZodError when the document is malformed.
 */
export function parseGraph(raw: unknown): GraphData {
    const document = GraphDocumentSchema.parse(raw);

    const nodes = createRecord<NodeData>();
    for (const [key, node] of Object.entries(document.nodes)) {
        nodes[key] = {
            nodeId: node.nodeId ?? key,
            nodeType: node.nodeType,
            position: node.position,
            parameters: node.parameters,
        };
    }

    const edges: EdgeData[] = document.edges.map((edge) => ({
        edgeId: edge.edgeId ?? defaultEdgeId(edge),
        sourceNode: edge.sourceNode,
        sourcePort: edge.sourcePort,
        targetNode: edge.targetNode,
        targetPort: edge.targetPort,
    }));

    return {
        graphId: document.graphId ?? randomUUID(),
        name: document.name,
        nodes,
        edges,
        metadata: document.metadata,
        createdAt: document.createdAt,
    };
}

/**
 * Returns a JSON-ready copy of a graph that parseGraph accepts.
 */
export function serializeGraph(graph: GraphData): SerializedGraph {
    const nodes = createRecord<NodeData>();
    for (const [key, node] of Object.entries(graph.nodes)) {
        nodes[key] = {
            nodeId: node.nodeId,
            nodeType: node.nodeType,
            position: { ...node.position },
            parameters: { ...node.parameters },
        };
    }

    return {
        graphId: graph.graphId,
        name: graph.name,
        nodes,
        edges: graph.edges.map((edge) => ({ ...edge })),
        metadata: { ...graph.metadata },
        createdAt: graph.createdAt.toISOString(),
    };
}

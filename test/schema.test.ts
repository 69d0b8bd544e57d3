import { ZodError } from "zod";
import { parseGraph, serializeGraph } from "../schema.js";
import { makeGraph, makeNode } from "./helpers.js";

describe("parseGraph", () => {
    it("should fill in defaults", () => {
        const graph = parseGraph({
            graphId: "g1",
            nodes: {
                a: { nodeType: "input" },
                b: { nodeId: "b", nodeType: "output", position: { x: 10, y: 20 }, parameters: { label: "Result" } },
            },
            edges: [{ sourceNode: "a", sourcePort: "output", targetNode: "b", targetPort: "input" }],
        });

        expect(graph.name).toBe("Untitled Graph");
        expect(graph.metadata).toEqual({});
        expect(graph.createdAt).toBeInstanceOf(Date);
        expect(graph.nodes).toEqual({
            a: { nodeId: "a", nodeType: "input", position: {}, parameters: {} },
            b: { nodeId: "b", nodeType: "output", position: { x: 10, y: 20 }, parameters: { label: "Result" } },
        });
        expect(graph.edges).toEqual([
            {
                edgeId: "a_output-b_input",
                sourceNode: "a",
                sourcePort: "output",
                targetNode: "b",
                targetPort: "input",
            },
        ]);
    });

    it("should generate a graph id when the document has none", () => {
        const graph = parseGraph({ name: "Fresh" });

        expect(graph.graphId).toMatch(/^[0-9a-f-]{36}$/);
        expect(graph.nodes).toEqual({});
        expect(graph.edges).toEqual([]);
    });

    it("should keep explicit edge ids and parse timestamps", () => {
        const graph = parseGraph({
            graphId: "g2",
            createdAt: "2024-05-06T07:08:09.000Z",
            edges: [{ edgeId: "e1", sourceNode: "a", sourcePort: "o", targetNode: "b", targetPort: "i" }],
        });

        expect(graph.edges[0].edgeId).toBe("e1");
        expect(graph.createdAt.toISOString()).toBe("2024-05-06T07:08:09.000Z");
    });

    it("should reject a node whose id differs from its key", () => {
        expect(() => parseGraph({ nodes: { a: { nodeId: "b", nodeType: "input" } } })).toThrow(
            "Node id b does not match its key a"
        );
    });

    it("should reject malformed documents", () => {
        expect(() => parseGraph({ nodes: { a: { position: {} } } })).toThrow(ZodError);
        expect(() => parseGraph({ edges: [{ sourceNode: "a" }] })).toThrow(ZodError);
        expect(() => parseGraph("not a graph")).toThrow(ZodError);
    });
});

describe("serializeGraph", () => {
    it("should produce a document that parses back to the same graph", () => {
        const graph = parseGraph({
            graphId: "g3",
            name: "Round",
            nodes: { a: { nodeType: "input", parameters: { value: "v" } } },
            metadata: { owner: "tests" },
            createdAt: "2024-01-01T00:00:00.000Z",
        });

        const document = serializeGraph(graph);

        expect(document.createdAt).toBe("2024-01-01T00:00:00.000Z");
        expect(parseGraph(JSON.parse(JSON.stringify(document)))).toEqual(graph);
    });

    it("should keep a node named __proto__", () => {
        const document = serializeGraph(makeGraph([makeNode("__proto__", "input")]));

        expect(Object.keys(document.nodes)).toEqual(["__proto__"]);
        expect(document.nodes["__proto__"]).toEqual({ nodeId: "__proto__", nodeType: "input", position: {}, parameters: {} });
    });
});

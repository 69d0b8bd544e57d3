import { ZodError } from "zod";
import { ExecutorOptionsSchema, resolveExecutorOptions } from "../config.js";
import { InMemoryGraphStore } from "../graphStore.js";

describe("resolveExecutorOptions", () => {
    it("should apply defaults", () => {
        expect(resolveExecutorOptions()).toEqual({
            name: "GraphExecutor",
            logLevel: "info",
            streamingNodeTypes: ["immutable_chat", "smart_chat"],
        });
    });

    it("should keep given options", () => {
        const graphStore = new InMemoryGraphStore();
        const logSink = () => undefined;

        const options = resolveExecutorOptions({
            name: "Worker",
            logLevel: "debug",
            streamingNodeTypes: [],
            graphStore,
            logSink,
        });

        expect(options).toEqual({ name: "Worker", logLevel: "debug", streamingNodeTypes: [], graphStore, logSink });
        expect(options.graphStore).toBe(graphStore);
    });

    it("should reject invalid options", () => {
        expect(() => ExecutorOptionsSchema.parse({ logLevel: "verbose" })).toThrow(ZodError);
        expect(() => ExecutorOptionsSchema.parse({ name: "" })).toThrow(ZodError);
        expect(ExecutorOptionsSchema.safeParse({ graphStore: {} }).success).toBe(false);
        expect(ExecutorOptionsSchema.safeParse({ logSink: "console" }).success).toBe(false);
    });
});

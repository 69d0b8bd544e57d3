/**
 * @file config.ts
 * @description Executor configuration, validated with zod.
 */

import { z } from "zod";
import { GraphStore, isGraphStore } from "./graphStore.js";
import type { LogSink } from "./logging.js";

/**
 * Node types streamed even when their `streaming` parameter is unset.
 */
export const DEFAULT_STREAMING_NODE_TYPES = ["immutable_chat", "smart_chat"];

export const ExecutorOptionsSchema = z.object({
    /**
     * Name used as the source of the executor's log events
     */
    name: z.string().min(1).default("GraphExecutor"),
    /**
     * Minimum level of emitted log events
     */
    logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
    streamingNodeTypes: z.array(z.string().min(1)).default(DEFAULT_STREAMING_NODE_TYPES),
    /**
     * Receives log events; the console when unset
     */
    logSink: z
        .custom<LogSink>((value) => typeof value === "function", { message: "logSink must be a function" })
        .optional(),
    /**
     * Graph lookup exposed to nodes that run other graphs
     */
    graphStore: z
        .custom<GraphStore>(isGraphStore, { message: "graphStore must implement resolve()" })
        .optional(),
});

/**
 * Options accepted by the GraphExecutor constructor.
 */
export type GraphExecutorOptions = z.input<typeof ExecutorOptionsSchema>;

/**
 * Options after defaults are applied.
 */
export type ResolvedExecutorOptions = z.output<typeof ExecutorOptionsSchema>;

/**
 * Applies defaults and validates executor options. Throws a ZodError on invalid input.
 */
export function resolveExecutorOptions(options: GraphExecutorOptions = {}): ResolvedExecutorOptions {
    return ExecutorOptionsSchema.parse(options);
}

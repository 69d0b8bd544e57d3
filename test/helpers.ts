import { setTimeout as sleep } from "timers/promises";
import { ExecutionContext } from "../context.js";
import type { ExecutionEvent, LogEvent } from "../events.js";
import { InstanceExecutionContext } from "../instance.js";
import type { LogSink } from "../logging.js";
import { BaseNode, NodeStream } from "../node.js";
import { defaultEdgeId, EdgeData, GraphData, NodeData, port, PortValues } from "../types.js";

export function makeNode(nodeId: string, nodeType: string, parameters: Record<string, unknown> = {}): NodeData {
    return { nodeId, nodeType, position: {}, parameters };
}

/**
 * Builds an edge from "node.port" endpoint strings.
 */
export function makeEdge(source: string, target: string, edgeId?: string): EdgeData {
    const [sourceNode, sourcePort] = source.split(".");
    const [targetNode, targetPort] = target.split(".");
    const endpoints = { sourceNode, sourcePort, targetNode, targetPort };
    return { edgeId: edgeId ?? defaultEdgeId(endpoints), ...endpoints };
}

export function makeGraph(nodes: NodeData[], edges: EdgeData[] = [], graphId = "g1", name = "Test Graph"): GraphData {
    return {
        graphId,
        name,
        nodes: Object.fromEntries(nodes.map((node) => [node.nodeId, node])),
        edges,
        metadata: {},
        createdAt: new Date(0),
    };
}

export function collectLogs(): { sink: LogSink; events: LogEvent[] } {
    const events: LogEvent[] = [];
    return { sink: (event) => events.push(event), events };
}

/**
 * Drains a streaming execution, keeping the generator's return value.
 */
export async function drain<R>(stream: AsyncGenerator<ExecutionEvent, R, void>): Promise<{ events: ExecutionEvent[]; result: R }> {
    const events: ExecutionEvent[] = [];
    let next = await stream.next();
    while (!next.done) {
        events.push(next.value);
        next = await stream.next();
    }
    return { events, result: next.value };
}

export class FailingNode extends BaseNode {
    constructor() {
        super({
            nodeType: "fail",
            displayName: "Fail",
            description: "Always throws",
            inputs: [port("in", "any", { required: false })],
            outputs: [port("out", "any")],
        });
    }

    async execute(): Promise<PortValues> {
        throw new Error("boom");
    }
}

/**
 * Streams the words of its input and hands back the aggregate itself.
 */
export class WordStreamNode extends BaseNode {
    constructor() {
        super({
            nodeType: "word_stream",
            displayName: "Word Stream",
            description: "Streams its input word by word",
            inputs: [port("text", "text")],
            outputs: [port("response", "text")],
        });
    }

    async *executeStreaming(_context: ExecutionContext, _nodeData: NodeData, inputs: PortValues): NodeStream {
        const words = String(inputs.text).split(" ");
        for (const word of words) {
            yield word;
        }
        return { response: words.join(" ") };
    }

    async execute(_context: ExecutionContext, _nodeData: NodeData, inputs: PortValues): Promise<PortValues> {
        return { response: `executed: ${String(inputs.text)}` };
    }
}

/**
 * Streams fixed chunks without returning outputs, so the executor falls back to execute.
 */
export class BareStreamNode extends BaseNode {
    constructor() {
        super({
            nodeType: "bare_stream",
            displayName: "Bare Stream",
            description: "Streams without an aggregate",
            outputs: [port("response", "text")],
        });
    }

    async *executeStreaming(): NodeStream {
        yield "a";
        yield "b";
        return undefined;
    }

    async execute(): Promise<PortValues> {
        return { response: "ab" };
    }
}

/**
 * Returns its input as `response`, with no streaming implementation.
 */
export class EchoResponseNode extends BaseNode {
    constructor() {
        super({
            nodeType: "echo_response",
            displayName: "Echo Response",
            description: "Echoes its input",
            inputs: [port("text", "text")],
            outputs: [port("response", "text")],
        });
    }

    async execute(_context: ExecutionContext, _nodeData: NodeData, inputs: PortValues): Promise<PortValues> {
        return { response: inputs.text };
    }
}

/**
 * Waits `ms` milliseconds, recording when each node starts and ends.
 */
export class DelayNode extends BaseNode {
    static events: string[] = [];

    constructor() {
        super({
            nodeType: "delay",
            displayName: "Delay",
            description: "Waits before completing",
            outputs: [port("done", "any")],
        });
    }

    async execute(_context: ExecutionContext, nodeData: NodeData): Promise<PortValues> {
        const ms = typeof nodeData.parameters.ms === "number" ? nodeData.parameters.ms : 10;
        DelayNode.events.push(`start:${nodeData.nodeId}`);
        await sleep(ms);
        DelayNode.events.push(`end:${nodeData.nodeId}`);
        return { done: true };
    }
}

/**
 * Counts its runs in instance state and reports the context key carried from the previous run.
 */
export class CounterNode extends BaseNode {
    constructor() {
        super({
            nodeType: "counter",
            displayName: "Counter",
            description: "Counts instance runs",
            outputs: [port("count", "any"), port("context_key", "text"), port("carried", "any")],
        });
    }

    async execute(context: ExecutionContext, nodeData: NodeData): Promise<PortValues> {
        if (!(context instanceof InstanceExecutionContext)) {
            throw new Error("counter requires an instance context");
        }
        const count = context.incrementInstanceCounter("runs");
        context.appendToInstanceList("visitors", context.executionInputs.visitor);
        return {
            count,
            context_key: `ctx-${count}`,
            carried: context.executionInputs[`_context_key_${nodeData.nodeId}`] ?? null,
        };
    }
}

/**
 * Streams fixed chunks, recording the run context and whether its stream was closed.
 */
export class ClosableStreamNode extends BaseNode {
    static closed = false;
    static context: ExecutionContext | undefined;

    constructor() {
        super({
            nodeType: "closable_stream",
            displayName: "Closable Stream",
            description: "Streams three chunks",
            outputs: [port("response", "text")],
        });
    }

    async *executeStreaming(context: ExecutionContext): NodeStream {
        ClosableStreamNode.context = context;
        try {
            yield "one";
            yield "two";
            yield "three";
            return { response: "one two three" };
        } finally {
            ClosableStreamNode.closed = true;
        }
    }

    async execute(): Promise<PortValues> {
        return { response: "one two three" };
    }
}

/**
 * Yields one chunk and then throws.
 */
export class BrokenStreamNode extends BaseNode {
    constructor() {
        super({
            nodeType: "broken_stream",
            displayName: "Broken Stream",
            description: "Fails mid-stream",
            outputs: [port("response", "text")],
        });
    }

    async *executeStreaming(): NodeStream {
        yield "partial";
        throw new Error("stream broke");
    }

    async execute(): Promise<PortValues> {
        return { response: "unused" };
    }
}

/**
 * Declares defaults on a required and an optional port and echoes what it received.
 */
export class DefaultInputNode extends BaseNode {
    constructor() {
        super({
            nodeType: "default_input",
            displayName: "Default Input",
            description: "Echoes its inputs",
            inputs: [
                port("text", "text", { default: "fallback" }),
                port("extra", "text", { required: false, default: "unused default" }),
            ],
            outputs: [port("text", "text"), port("extra", "text")],
        });
    }

    async execute(_context: ExecutionContext, _nodeData: NodeData, inputs: PortValues): Promise<PortValues> {
        return { text: inputs.text, extra: inputs.extra ?? null };
    }
}

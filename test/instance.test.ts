import { GraphExecutor } from "../executor.js";
import { InMemoryGraphStore } from "../graphStore.js";
import { GraphInstanceExecutor, InMemoryInstanceStore, InstanceExecutionContext } from "../instance.js";
import { createLogger } from "../logging.js";
import { createDefaultRegistry } from "../nodes/index.js";
import { CounterNode, FailingNode, makeGraph, makeNode } from "./helpers.js";

const counterGraph = makeGraph([makeNode("c", "counter")], [], "counter-graph", "Counter");
const brokenGraph = makeGraph([makeNode("f", "fail")], [], "broken-graph", "Broken");

function createInstanceExecutor(instanceStore = new InMemoryInstanceStore()): GraphInstanceExecutor {
    const silent = () => undefined;
    const registry = createDefaultRegistry(createLogger("NodeRegistry", { sink: silent }))
        .register("counter", CounterNode)
        .register("fail", FailingNode);
    const executor = new GraphExecutor(registry, {
        graphStore: new InMemoryGraphStore([counterGraph, brokenGraph]),
        logSink: silent,
    });
    return new GraphInstanceExecutor(executor, { instanceStore });
}

describe("GraphInstanceExecutor", () => {
    it("should require a graph store", () => {
        const executor = new GraphExecutor(createDefaultRegistry(createLogger("NodeRegistry", { sink: () => undefined })));

        expect(() => new GraphInstanceExecutor(executor)).toThrow("GraphInstanceExecutor requires a graph store");
    });

    it("should create instances of graphs found by name", async () => {
        const instances = createInstanceExecutor();

        const instanceId = await instances.createInstance("Counter");

        expect(instanceId).toMatch(/^gi_[0-9a-f]{8}$/);
        await expect(instances.getInstanceInfo(instanceId)).resolves.toMatchObject({
            instanceId,
            graphId: "counter-graph",
            name: "Instance of Counter",
            description: null,
            state: {},
            runCount: 0,
            lastExecuted: null,
            lastOutputs: null,
        });
    });

    it("should reject an unknown graph", async () => {
        await expect(createInstanceExecutor().createInstance("nope")).rejects.toThrow("Graph not found: nope");
    });

    it("should keep state across runs and carry context keys forward", async () => {
        const instances = createInstanceExecutor();
        const instanceId = await instances.createInstance("counter-graph", { name: "Visits", description: "Counts" });

        const first = await instances.executeInstance(instanceId, { visitor: "ann" });
        const second = await instances.executeInstance(instanceId, { visitor: "bob" });

        expect(first).toMatchObject({
            instanceId,
            inputs: { visitor: "ann" },
            outputs: { c: { count: 1, context_key: "ctx-1", carried: null } },
            nodeStatus: { c: "completed" },
            errors: {},
            status: "completed",
        });
        expect(second.outputs).toEqual({ c: { count: 2, context_key: "ctx-2", carried: "ctx-1" } });
        expect(second.inputs).toEqual({ visitor: "bob" });
        expect(second.completedAt).toBeInstanceOf(Date);

        const info = await instances.getInstanceInfo(instanceId);
        expect(info).toMatchObject({
            name: "Visits",
            description: "Counts",
            runCount: 2,
            state: { "counter:runs": 2, "list:visitors": ["ann", "bob"] },
            lastOutputs: { c: { count: 2, context_key: "ctx-2", carried: "ctx-1" } },
        });
        expect(typeof info?.lastExecuted).toBe("string");
        await expect(instances.listExecutions(instanceId)).resolves.toHaveLength(2);
    });

    it("should record a failed run and rethrow", async () => {
        const instances = createInstanceExecutor();
        const instanceId = await instances.createInstance("broken-graph");

        await expect(instances.executeInstance(instanceId)).rejects.toThrow("Node f failed: boom");

        const [execution] = await instances.listExecutions(instanceId);
        expect(execution).toMatchObject({
            instanceId,
            status: "failed",
            errors: { system: "Node f failed: boom" },
        });
        expect(execution.completedAt).toBeInstanceOf(Date);
        await expect(instances.getInstanceInfo(instanceId)).resolves.toMatchObject({ runCount: 0 });
    });

    it("should reset selected keys or everything", async () => {
        const instances = createInstanceExecutor();
        const instanceId = await instances.createInstance("Counter");
        await instances.executeInstance(instanceId, { visitor: "ann" });

        await expect(instances.resetInstance(instanceId, ["counter:runs"])).resolves.toBe(true);
        const partial = await instances.getInstanceInfo(instanceId);
        expect(partial?.state).toEqual({ "list:visitors": ["ann"] });
        expect(partial?.runCount).toBe(1);

        await expect(instances.resetInstance(instanceId)).resolves.toBe(true);
        const cleared = await instances.getInstanceInfo(instanceId);
        expect(cleared?.state).toEqual({});
        expect(cleared?.runCount).toBe(0);
        expect(cleared?.lastOutputs).toBeNull();

        const rerun = await instances.executeInstance(instanceId, { visitor: "cy" });
        expect(rerun.outputs.c).toEqual({ count: 1, context_key: "ctx-1", carried: null });
    });

    it("should soft delete instances", async () => {
        const store = new InMemoryInstanceStore();
        const instances = createInstanceExecutor(store);
        const instanceId = await instances.createInstance("Counter");

        await expect(instances.deleteInstance(instanceId)).resolves.toBe(true);

        await expect(instances.getInstanceInfo(instanceId)).resolves.toBeUndefined();
        await expect(instances.resetInstance(instanceId)).resolves.toBe(false);
        await expect(instances.executeInstance(instanceId)).rejects.toThrow(`Instance not found: ${instanceId}`);
        await expect(store.getInstance(instanceId)).resolves.toMatchObject({ isActive: false });
        await expect(instances.deleteInstance("gi_unknown")).resolves.toBe(false);
    });
});

describe("InstanceExecutionContext", () => {
    const instance = () => ({
        instanceId: "gi_00000000",
        graphId: "counter-graph",
        name: "Test",
        state: {},
        runCount: 0,
        createdAt: new Date(0),
        isActive: true,
    });

    it("should read and write instance state", () => {
        const context = new InstanceExecutionContext(instance(), { graph: counterGraph });

        expect(context.getInstanceState("missing", "fallback")).toBe("fallback");
        context.setInstanceState("mood", "calm");
        expect(context.getInstanceState("mood")).toBe("calm");
        expect(context.instance.state).toEqual({ mood: "calm" });
    });

    it("should keep counters and lists under prefixed keys", () => {
        const context = new InstanceExecutionContext(instance(), { graph: counterGraph });

        expect(context.incrementInstanceCounter()).toBe(1);
        expect(context.incrementInstanceCounter("default", 5)).toBe(6);
        expect(context.appendToInstanceList("items", "a")).toEqual(["a"]);
        expect(context.appendToInstanceList("items", "b")).toEqual(["a", "b"]);
        expect(context.instance.state).toEqual({ "counter:default": 6, "list:items": ["a", "b"] });
    });
});

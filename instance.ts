/**
 * @file instance.ts
 * @description Persistent graph instances: a graph bound to state that survives across runs.
 */

import { randomUUID } from "crypto";
import { ExecutionContext, ExecutionContextInit } from "./context.js";
import { errorMessage } from "./errors.js";
import type { GraphExecutor } from "./executor.js";
import type { GraphStore } from "./graphStore.js";
import { createLogger, Logger } from "./logging.js";
import { createRecord, NodeStatus, PortValues } from "./types.js";

/**
 * A graph bound to persistent state.
 */
export type GraphInstance = {
    instanceId: string;
    graphId: string;
    name: string;
    description?: string;
    state: Record<string, unknown>;
    runCount: number;
    createdAt: Date;
    lastExecuted?: Date;
    /**
     * Node outputs of the most recent successful run
     */
    lastOutputs?: Record<string, PortValues>;
    /**
     * False once the instance is deleted
     */
    isActive: boolean;
};

export type InstanceExecutionStatus = "running" | "completed" | "failed";

/**
 * Record of one run of an instance.
 */
export type InstanceExecution = {
    executionId: string;
    instanceId: string;
    inputs: Record<string, unknown>;
    outputs: Record<string, PortValues>;
    nodeStatus: Record<string, NodeStatus>;
    errors: Record<string, string>;
    status: InstanceExecutionStatus;
    startedAt: Date;
    completedAt?: Date;
};

/**
 * Serializable view of an instance.
 */
export type InstanceInfo = {
    instanceId: string;
    graphId: string;
    name: string;
    description: string | null;
    state: Record<string, unknown>;
    runCount: number;
    createdAt: string;
    lastExecuted: string | null;
    lastOutputs: Record<string, PortValues> | null;
};

/**
 * Storage for instances and their execution records.
 * Relational implementations live with the caller.
 */
export interface InstanceStore {
    saveInstance(instance: GraphInstance): Promise<void>;
    /**
     * Returns the instance whether or not it is active.
     */
    getInstance(instanceId: string): Promise<GraphInstance | undefined>;
    saveExecution(execution: InstanceExecution): Promise<void>;
    /**
     * Execution records of an instance, oldest first.
     */
    listExecutions(instanceId: string): Promise<InstanceExecution[]>;
}

/**
 * InstanceStore kept in process memory.
 */
export class InMemoryInstanceStore implements InstanceStore {
    #instances: Map<string, GraphInstance> = new Map();
    #executions: Map<string, InstanceExecution> = new Map();

    async saveInstance(instance: GraphInstance): Promise<void> {
        this.#instances.set(instance.instanceId, instance);
    }

    async getInstance(instanceId: string): Promise<GraphInstance | undefined> {
        return this.#instances.get(instanceId);
    }

    async saveExecution(execution: InstanceExecution): Promise<void> {
        this.#executions.set(execution.executionId, execution);
    }

    async listExecutions(instanceId: string): Promise<InstanceExecution[]> {
        return Array.from(this.#executions.values()).filter((execution) => execution.instanceId === instanceId);
    }
}

/**
 * Execution context giving node code access to the persistent state of the running instance.
 * State changes are saved with the instance when the run ends.
 */
export class InstanceExecutionContext extends ExecutionContext {
    readonly instance: GraphInstance;

    constructor(instance: GraphInstance, init: ExecutionContextInit) {
        super(init);
        this.instance = instance;
    }

    getInstanceState(key: string, defaultValue: unknown = undefined): unknown {
        return Object.hasOwn(this.instance.state, key) ? this.instance.state[key] : defaultValue;
    }

    setInstanceState(key: string, value: unknown): void {
        this.instance.state[key] = value;
    }

    /**
     * Adds `amount` to the counter stored under `counter:<key>` and returns the new value.
     */
    incrementInstanceCounter(key: string = "default", amount: number = 1): number {
        const stateKey = `counter:${key}`;
        const current = this.getInstanceState(stateKey, 0);
        const value = (typeof current === "number" ? current : 0) + amount;
        this.setInstanceState(stateKey, value);
        return value;
    }

    /**
     * Appends to the list stored under `list:<key>` and returns the updated list.
     */
    appendToInstanceList(key: string, item: unknown): unknown[] {
        const stateKey = `list:${key}`;
        const current = this.getInstanceState(stateKey, []);
        const list = Array.isArray(current) ? [...current, item] : [item];
        this.setInstanceState(stateKey, list);
        return list;
    }
}

export type GraphInstanceExecutorOptions = {
    /**
     * Where instance graphs are resolved; the executor's graph store when unset
     */
    graphStore?: GraphStore;
    instanceStore?: InstanceStore;
};

/**
 * Runs graph instances. Each run carries the previous run's conversation context keys
 * forward: a node output `context_key` from node N becomes the execution input
 * `_context_key_N` (or `context_id` becomes `_context_id_N`).
 */
export class GraphInstanceExecutor {
    readonly executor: GraphExecutor;
    readonly instanceStore: InstanceStore;
    readonly #graphStore: GraphStore;
    readonly #logger: Logger;

    constructor(executor: GraphExecutor, options: GraphInstanceExecutorOptions = {}) {
        const graphStore = options.graphStore ?? executor.options.graphStore;
        if (!graphStore) {
            throw new Error("GraphInstanceExecutor requires a graph store");
        }
        this.executor = executor;
        this.instanceStore = options.instanceStore ?? new InMemoryInstanceStore();
        this.#graphStore = graphStore;
        this.#logger = createLogger("GraphInstanceExecutor", {
            level: executor.options.logLevel,
            sink: executor.options.logSink,
        });
    }

    /**
     * Creates an instance of the graph with the given id or name and returns its id.
     */
    async createInstance(
        graphIdOrName: string,
        options: { name?: string; description?: string } = {}
    ): Promise<string> {
        const graph = await this.#graphStore.resolve(graphIdOrName);
        if (!graph) {
            throw new Error(`Graph not found: ${graphIdOrName}`);
        }

        const instanceId = `gi_${randomUUID().slice(0, 8)}`;
        await this.instanceStore.saveInstance({
            instanceId,
            graphId: graph.graphId,
            name: options.name || `Instance of ${graph.name}`,
            description: options.description,
            state: createRecord(),
            runCount: 0,
            createdAt: new Date(),
            isActive: true,
        });

        this.#logger.info(`Created graph instance ${instanceId} for graph ${graph.name}`);
        return instanceId;
    }

    /**
     * Runs an instance once. A failed run is recorded with `errors.system` and the error rethrown.
     */
    async executeInstance(instanceId: string, inputs: Record<string, unknown> = {}): Promise<InstanceExecution> {
        const instance = await this.#getActiveInstance(instanceId);
        if (!instance) {
            throw new Error(`Instance not found: ${instanceId}`);
        }

        const graph = await this.#graphStore.resolve(instance.graphId);
        if (!graph) {
            throw new Error(`Graph not found for instance: ${instanceId}`);
        }

        const execution: InstanceExecution = {
            executionId: randomUUID(),
            instanceId,
            inputs: { ...inputs },
            outputs: {},
            nodeStatus: {},
            errors: {},
            status: "running",
            startedAt: new Date(),
        };
        await this.instanceStore.saveExecution(execution);

        try {
            const context = new InstanceExecutionContext(instance, {
                graph,
                executionId: execution.executionId,
                executionInputs: { ...inputs, ...this.#carriedContextKeys(instance) },
                startedAt: new Date(),
            });

            this.#logger.info(`Executing instance ${instanceId}, run #${instance.runCount + 1}`);
            await this.executor.executeWithContext(context);

            const snapshot = context.snapshot();
            instance.runCount += 1;
            instance.lastExecuted = new Date();
            instance.lastOutputs = snapshot.nodeOutputs;

            execution.outputs = snapshot.nodeOutputs;
            execution.nodeStatus = snapshot.nodeStatus;
            execution.errors = snapshot.errors;
            execution.status = context.hasErrors() ? "failed" : "completed";
            execution.completedAt = new Date();

            await this.instanceStore.saveInstance(instance);
            await this.instanceStore.saveExecution(execution);

            this.#logger.info(`Instance ${instanceId} execution completed`);
            return execution;
        } catch (error) {
            execution.status = "failed";
            execution.errors = { system: errorMessage(error) };
            execution.completedAt = new Date();

            await this.instanceStore.saveInstance(instance);
            await this.instanceStore.saveExecution(execution);

            this.#logger.error(`Instance ${instanceId} execution failed`, error);
            throw error;
        }
    }

    async getInstanceInfo(instanceId: string): Promise<InstanceInfo | undefined> {
        const instance = await this.#getActiveInstance(instanceId);
        if (!instance) return undefined;

        return {
            instanceId: instance.instanceId,
            graphId: instance.graphId,
            name: instance.name,
            description: instance.description ?? null,
            state: { ...instance.state },
            runCount: instance.runCount,
            createdAt: instance.createdAt.toISOString(),
            lastExecuted: instance.lastExecuted?.toISOString() ?? null,
            lastOutputs: instance.lastOutputs ?? null,
        };
    }

    /**
     * Execution records of an active instance, oldest first.
     */
    async listExecutions(instanceId: string): Promise<InstanceExecution[]> {
        const instance = await this.#getActiveInstance(instanceId);
        return instance ? this.instanceStore.listExecutions(instanceId) : [];
    }

    /**
     * Clears the given state keys (stored names, such as `counter:visits`), or without keys
     * clears all state together with the run count and last outputs.
     * Returns false when the instance does not exist.
     */
    async resetInstance(instanceId: string, keys?: string[]): Promise<boolean> {
        const instance = await this.#getActiveInstance(instanceId);
        if (!instance) return false;

        if (keys === undefined) {
            instance.state = createRecord();
            instance.runCount = 0;
            instance.lastOutputs = undefined;
        } else {
            for (const key of keys) {
                delete instance.state[key];
            }
        }

        await this.instanceStore.saveInstance(instance);
        this.#logger.info(`Reset instance ${instanceId} state`);
        return true;
    }

    /**
     * Deactivates an instance. Its records stay in the store.
     */
    async deleteInstance(instanceId: string): Promise<boolean> {
        const instance = await this.instanceStore.getInstance(instanceId);
        if (!instance) return false;

        instance.isActive = false;
        await this.instanceStore.saveInstance(instance);
        this.#logger.info(`Deleted instance ${instanceId}`);
        return true;
    }

    async #getActiveInstance(instanceId: string): Promise<GraphInstance | undefined> {
        const instance = await this.instanceStore.getInstance(instanceId);
        return instance?.isActive ? instance : undefined;
    }

    #carriedContextKeys(instance: GraphInstance): Record<string, unknown> {
        const carried: Record<string, unknown> = {};
        if (!instance.lastOutputs || instance.runCount === 0) return carried;

        for (const [nodeId, outputs] of Object.entries(instance.lastOutputs)) {
            if (Object.hasOwn(outputs, "context_key")) {
                carried[`_context_key_${nodeId}`] = outputs.context_key;
            } else if (Object.hasOwn(outputs, "context_id")) {
                carried[`_context_id_${nodeId}`] = outputs.context_id;
            }
        }
        return carried;
    }
}

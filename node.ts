/**
 * @file node.ts
 * @description Defines the BaseNode class every node type extends.
 */

import type { ZodError } from "zod";
import type { ExecutionContext } from "./context.js";
import { describeParameters, ParameterSchema } from "./parameters.js";
import {
    DEFAULT_RESOURCE_REQUIREMENTS,
    NodeData,
    NodeSpec,
    ParameterSpec,
    PortSpec,
    PortValues,
    ResourceRequirement,
} from "./types.js";

/**
 * Configuration for a BaseNode instance.
 */
export type NodeOptions = {
    nodeType: string;
    displayName: string;
    description: string;
    /**
     * Palette grouping, "General" when unset
     */
    category?: string;
    inputs?: PortSpec[];
    outputs?: PortSpec[];
    /**
     * Explicit parameter declarations. When unset they are derived from `parameterSchema`.
     */
    parameters?: ParameterSpec[];
    /**
     * Zod schema the node parses its parameters with
     */
    parameterSchema?: ParameterSchema;
    resourceRequirements?: Partial<ResourceRequirement>;
};

/**
 * Streaming variant of `execute`: yields text chunks as they are produced and may
 * return the aggregate outputs once the stream ends. A stream that returns nothing
 * makes the executor call `execute` to obtain the outputs.
 */
export type NodeStream = AsyncGenerator<string, PortValues | undefined, void>;

/**
 * A unit of computation in a graph. The executor creates a fresh instance for each
 * node execution, so implementations keep no state between calls; anything that must
 * outlive a call belongs in the execution context or in external storage.
 *
 * Implementations report recoverable problems in their outputs (for example an
 * "Error: ..." string) and throw only for exceptional conditions, which fail the node.
 *
 * @example
 * ```ts
 * class ShoutNode extends BaseNode {
 *     constructor() {
 *         super({
 *             nodeType: "shout",
 *             displayName: "Shout",
 *             description: "Uppercases its input",
 *             inputs: [port("text", "text")],
 *             outputs: [port("output", "text")],
 *         });
 *     }
 *
 *     async execute(_context: ExecutionContext, _nodeData: NodeData, inputs: PortValues) {
 *         return { output: String(inputs.text).toUpperCase() };
 *     }
 * }
 * ```
 */
export abstract class BaseNode {
    readonly spec: NodeSpec;

    /**
     * Zod schema for this node's parameters, when it declares one.
     */
    readonly parameterSchema?: ParameterSchema;

    /**
     * Optional streaming execution; see {@link NodeStream}.
     */
    executeStreaming?(context: ExecutionContext, nodeData: NodeData, inputs: PortValues): NodeStream;

    constructor(options: NodeOptions) {
        this.parameterSchema = options.parameterSchema;
        this.spec = {
            nodeType: options.nodeType,
            displayName: options.displayName,
            description: options.description,
            category: options.category ?? "General",
            inputs: options.inputs ?? [],
            outputs: options.outputs ?? [],
            parameters:
                options.parameters ??
                (options.parameterSchema ? describeParameters(options.parameterSchema) : []),
            resourceRequirements: { ...DEFAULT_RESOURCE_REQUIREMENTS, ...options.resourceRequirements },
        };
    }

    /**
     * Runs the node logic and returns its outputs keyed by port name.
     * @param inputs - Values collected from connected ports, with defaults applied
     */
    abstract execute(context: ExecutionContext, nodeData: NodeData, inputs: PortValues): Promise<PortValues>;

    /**
     * True iff every required input port has a value.
     */
    validateInputs(inputs: PortValues): boolean {
        return this.missingInputs(inputs).length === 0;
    }

    /**
     * Names of required input ports absent from `inputs`.
     */
    missingInputs(inputs: PortValues): string[] {
        return this.spec.inputs
            .filter((input) => input.required && !(input.name in inputs))
            .map((input) => input.name);
    }

    /**
     * Advisory resource hints for running this node with the given parameters.
     */
    getResourceRequirements(_parameters: Record<string, unknown>): ResourceRequirement {
        return this.spec.resourceRequirements;
    }

    /**
     * Returns a formatted listing of the node's ports and parameters.
     */
    describe(): string {
        const { spec } = this;
        const lines = [];

        // Header
        lines.push("═".repeat(60));
        lines.push(`  ${spec.displayName} (${spec.nodeType})`);
        lines.push("═".repeat(60));

        lines.push("");
        lines.push(`Category: ${spec.category}`);
        if (spec.description) {
            lines.push("");
            lines.push("Description:");
            lines.push(`  ${spec.description}`);
        }

        lines.push("");
        lines.push("Inputs:");
        if (spec.inputs.length > 0) {
            for (const input of spec.inputs) {
                lines.push(`  ${this.#formatPort(input, true)}`);
            }
        } else {
            lines.push("  (none)");
        }

        lines.push("");
        lines.push("Outputs:");
        if (spec.outputs.length > 0) {
            for (const output of spec.outputs) {
                lines.push(`  ${this.#formatPort(output, false)}`);
            }
        } else {
            lines.push("  (none)");
        }

        if (spec.parameters.length > 0) {
            lines.push("");
            lines.push("Parameters:");
            for (const parameter of spec.parameters) {
                const defaultText =
                    parameter.default === null ? "" : ` = ${JSON.stringify(parameter.default)}`;
                const description = parameter.description ? ` - ${parameter.description}` : "";
                lines.push(`  ${parameter.name}: ${parameter.dataType}${defaultText}${description}`);
            }
        }

        lines.push("");
        lines.push("═".repeat(60));

        return lines.join("\n");
    }

    #formatPort(spec: PortSpec, isInput: boolean): string {
        const optional = isInput && !spec.required ? "?" : "";
        const description = spec.description ? ` - ${spec.description}` : "";
        return `${spec.name}${optional}: ${spec.dataKind}${description}`;
    }
}

/**
 * Soft-error text for parameters that failed their schema, one `path: message` per issue.
 */
export function parameterError(error: ZodError): string {
    const issues = error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
    );
    return `Error: Invalid parameters: ${issues.join("; ")}`;
}

/**
 * Constructor of a node implementation, as stored in the registry.
 */
export type NodeClass = new () => BaseNode;

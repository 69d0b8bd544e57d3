/**
 * @file builtin.ts
 * @description Built-in node types for providing input, processing text and capturing output.
 */

import { z } from "zod";
import type { ExecutionContext } from "../context.js";
import { BaseNode, NodeClass, parameterError } from "../node.js";
import { NodeData, port, PortValues } from "../types.js";

const InputParameters = z.object({
    label: z.string().default("").describe("Friendly name for this input, matched against execution inputs"),
    value: z.unknown().default("").describe("Value used when no execution input matches"),
    dataType: z.enum(["text", "json", "number"]).default("text").describe("How the value is converted"),
});

/**
 * Provides input data to the graph.
 *
 * The value is taken from the execution inputs by the node's label, then by its ordinal key
 * (`input_1`, `input_2`, ... over the sorted ids of all input nodes), then by its node id,
 * and finally from the `value` parameter.
 */
export class InputNode extends BaseNode {
    constructor() {
        super({
            nodeType: "input",
            displayName: "Input",
            description: "Provides input data to the graph",
            category: "Input/Output",
            outputs: [port("output", "any", { description: "Input data" })],
            parameterSchema: InputParameters,
        });
    }

    async execute(context: ExecutionContext, nodeData: NodeData): Promise<PortValues> {
        const parsed = InputParameters.safeParse(nodeData.parameters);
        if (!parsed.success) {
            return { output: parameterError(parsed.error) };
        }
        const params = parsed.data;
        const inputs = context.executionInputs;
        let value: unknown;

        const label = params.label.trim();
        if (label && Object.hasOwn(inputs, label)) {
            value = inputs[label];
        }

        if (value === undefined || value === null) {
            const ordinalKey = `input_${InputNode.ordinalOf(context, nodeData.nodeId)}`;
            if (Object.hasOwn(inputs, ordinalKey)) value = inputs[ordinalKey];
        }

        if ((value === undefined || value === null) && Object.hasOwn(inputs, nodeData.nodeId)) {
            value = inputs[nodeData.nodeId];
        }

        if (value === undefined || value === null) {
            value = params.value;
        }

        return { output: convertValue(value, params.dataType) };
    }

    /**
     * 1-based position of `nodeId` among the graph's input nodes, ordered by node id.
     */
    static ordinalOf(context: ExecutionContext, nodeId: string): number {
        const inputNodeIds = Object.values(context.graph.nodes)
            .filter((node) => node.nodeType === "input")
            .map((node) => node.nodeId)
            .sort();
        return inputNodeIds.indexOf(nodeId) + 1;
    }
}

function convertValue(value: unknown, dataType: "text" | "json" | "number"): unknown {
    if (dataType === "json" && typeof value === "string") {
        try {
            const parsed: unknown = JSON.parse(value);
            return parsed;
        } catch {
            // Not JSON; the raw string is passed on
            return value;
        }
    }

    if (dataType === "number") {
        const number = Number(value);
        return Number.isNaN(number) ? 0 : number;
    }

    return value;
}

function textOf(value: unknown): string {
    if (value === undefined || value === null) return "";
    return typeof value === "string" ? value : String(value);
}

const TextTransformParameters = z.object({
    operation: z
        .enum(["uppercase", "lowercase", "title", "strip", "reverse"])
        .default("uppercase")
        .describe("Transform operation"),
});

/**
 * Transforms text using one of a fixed set of operations.
 */
export class TextTransformNode extends BaseNode {
    constructor() {
        super({
            nodeType: "text_transform",
            displayName: "Text Transform",
            description: "Transform text using various operations",
            category: "Text Processing",
            inputs: [port("text", "text", { description: "Input text" })],
            outputs: [port("output", "text", { description: "Transformed text" })],
            parameterSchema: TextTransformParameters,
        });
    }

    async execute(_context: ExecutionContext, nodeData: NodeData, inputs: PortValues): Promise<PortValues> {
        const parsed = TextTransformParameters.safeParse(nodeData.parameters);
        const text = textOf(inputs.text);
        // Unknown operations leave the text unchanged
        if (!parsed.success) {
            return { output: text };
        }

        switch (parsed.data.operation) {
            case "uppercase":
                return { output: text.toUpperCase() };
            case "lowercase":
                return { output: text.toLowerCase() };
            case "title":
                return { output: toTitleCase(text) };
            case "strip":
                return { output: text.trim() };
            case "reverse":
                return { output: Array.from(text).reverse().join("") };
        }
    }
}

/**
 * Uppercases the first letter of every run of letters and lowercases the rest.
 */
function toTitleCase(text: string): string {
    return text
        .toLowerCase()
        .replace(/(^|[^\p{L}])(\p{L})/gu, (_match: string, before: string, letter: string) => before + letter.toUpperCase());
}

const TextFilterParameters = z.object({
    pattern: z.string().default("").describe("Regex pattern or string to match"),
    useRegex: z.boolean().default(true).describe("Use regex pattern matching"),
});

/**
 * Extracts the parts of a text matching a pattern and returns the remainder.
 * An invalid regular expression is matched as a plain string instead.
 */
export class TextFilterNode extends BaseNode {
    constructor() {
        super({
            nodeType: "text_filter",
            displayName: "Text Filter",
            description: "Filter text using regex or string patterns",
            category: "Text Processing",
            inputs: [port("text", "text", { description: "Input text" })],
            outputs: [
                port("matches", "text", { description: "Matching text, one match per line" }),
                port("filtered", "text", { description: "Text with matches removed" }),
            ],
            parameterSchema: TextFilterParameters,
        });
    }

    async execute(_context: ExecutionContext, nodeData: NodeData, inputs: PortValues): Promise<PortValues> {
        const parsed = TextFilterParameters.safeParse(nodeData.parameters);
        const text = textOf(inputs.text);
        if (!parsed.success) {
            return { matches: parameterError(parsed.error), filtered: text };
        }
        const { pattern, useRegex } = parsed.data;

        if (!pattern) {
            return { matches: "", filtered: text };
        }

        const regex = useRegex ? compilePattern(pattern) : undefined;
        if (regex) {
            const matches = Array.from(text.matchAll(regex), (match) => match[0]);
            return { matches: matches.join("\n"), filtered: text.replace(regex, "") };
        }

        if (text.includes(pattern)) {
            return { matches: pattern, filtered: text.split(pattern).join("") };
        }
        return { matches: "", filtered: text };
    }
}

function compilePattern(pattern: string): RegExp | undefined {
    try {
        return new RegExp(pattern, "g");
    } catch {
        return undefined;
    }
}

const TextConcatParameters = z.object({
    separator: z.string().default(" ").describe("Separator between texts"),
});

/**
 * Joins up to three texts, skipping empty ones.
 */
export class TextConcatNode extends BaseNode {
    constructor() {
        super({
            nodeType: "text_concat",
            displayName: "Text Concat",
            description: "Concatenate multiple text inputs",
            category: "Text Processing",
            inputs: [
                port("text1", "text", { description: "First text input" }),
                port("text2", "text", { required: false, description: "Second text input" }),
                port("text3", "text", { required: false, description: "Third text input" }),
            ],
            outputs: [port("output", "text", { description: "Concatenated text" })],
            parameterSchema: TextConcatParameters,
        });
    }

    async execute(_context: ExecutionContext, nodeData: NodeData, inputs: PortValues): Promise<PortValues> {
        const parsed = TextConcatParameters.safeParse(nodeData.parameters);
        if (!parsed.success) {
            return { output: parameterError(parsed.error) };
        }
        const { separator } = parsed.data;
        const texts = [inputs.text1, inputs.text2, inputs.text3].map(textOf).filter((text) => text !== "");
        return { output: texts.join(separator) };
    }
}

const OutputParameters = z.object({
    label: z.string().default("Output").describe("Label for the output"),
});

/**
 * Captures a value as a result of the graph.
 */
export class OutputNode extends BaseNode {
    constructor() {
        super({
            nodeType: "output",
            displayName: "Output",
            description: "Display output from the graph",
            category: "Input/Output",
            inputs: [port("input", "any", { description: "Data to output" })],
            outputs: [
                port("result", "any", { description: "Output result for capture" }),
                port("label", "text", { description: "Label for the output" }),
            ],
            parameterSchema: OutputParameters,
        });
    }

    async execute(_context: ExecutionContext, nodeData: NodeData, inputs: PortValues): Promise<PortValues> {
        const parsed = OutputParameters.safeParse(nodeData.parameters);
        return { result: inputs.input, label: parsed.success ? parsed.data.label : parameterError(parsed.error) };
    }
}

export const BUILTIN_NODES: Record<string, NodeClass> = {
    input: InputNode,
    text_transform: TextTransformNode,
    text_filter: TextFilterNode,
    text_concat: TextConcatNode,
    output: OutputNode,
};

/**
 * @file parameters.ts
 * @description Derives parameter declarations from a node's zod parameter schema, so the
 *              schema that parses parameters at run time is also what editors are shown.
 */

import { z } from "zod";
import type { ParameterSpec } from "./types.js";

/**
 * Schema shape accepted for node parameters
 */
export type ParameterSchema = z.ZodObject<z.ZodRawShape>;

/**
 * Information about a single parameter schema
 */
type ParameterInfo = {
    dataType: string;
    default: unknown;
    description?: string;
    constraints?: Record<string, unknown>;
};

/**
 * Extracts type, default, description and constraints from a parameter schema,
 * looking through optional, nullable and default wrappers.
 */
function extractParameterInfo(schema: z.ZodTypeAny): ParameterInfo {
    let current = schema;
    let defaultValue: unknown = null;
    let description = schema.description;

    for (;;) {
        if (current instanceof z.ZodDefault) {
            const value: unknown = current._def.defaultValue();
            defaultValue = value;
            current = current.removeDefault();
        } else if (current instanceof z.ZodOptional || current instanceof z.ZodNullable) {
            current = current.unwrap();
        } else {
            break;
        }
        description = description ?? current.description;
    }

    if (current instanceof z.ZodString) {
        return { dataType: "string", default: defaultValue, description };
    }

    if (current instanceof z.ZodNumber) {
        const constraints: Record<string, unknown> = {};
        if (current.minValue !== null) constraints.min = current.minValue;
        if (current.maxValue !== null) constraints.max = current.maxValue;
        return {
            dataType: "number",
            default: defaultValue,
            description,
            constraints: Object.keys(constraints).length > 0 ? constraints : undefined,
        };
    }

    if (current instanceof z.ZodBoolean) {
        return { dataType: "boolean", default: defaultValue, description };
    }

    if (current instanceof z.ZodEnum) {
        const options: unknown[] = current.options;
        return { dataType: "select", default: defaultValue, description, constraints: { options } };
    }

    if (current instanceof z.ZodArray) {
        return { dataType: "array", default: defaultValue, description };
    }

    if (current instanceof z.ZodObject || current instanceof z.ZodRecord) {
        return { dataType: "object", default: defaultValue, description };
    }

    return { dataType: "any", default: defaultValue, description };
}

/**
 * Lists the parameters declared by a zod object schema, in declaration order.
 */
export function describeParameters(schema: ParameterSchema): ParameterSpec[] {
    return Object.entries(schema.shape).map(([name, fieldSchema]) => {
        const info = extractParameterInfo(fieldSchema);
        const spec: ParameterSpec = {
            name,
            dataType: info.dataType,
            default: info.default,
            description: info.description ?? "",
        };
        if (info.constraints) spec.constraints = info.constraints;
        return spec;
    });
}

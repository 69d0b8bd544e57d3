/**
 * Raised when a graph fails structural validation. No node has run when this is thrown.
 */
export class GraphValidationError extends Error {
    /**
     * Individual validation messages, in the order they were found
     */
    readonly errors: string[];

    constructor(message: string, errors: string[] = []) {
        super(message);
        this.name = "GraphValidationError";
        this.errors = errors;
    }
}

/**
 * Raised when a run aborts: unknown node type, missing required inputs, or a node throwing.
 */
export class ExecutionError extends Error {
    /**
     * The node that failed, when the failure belongs to one
     */
    readonly nodeId?: string;

    constructor(message: string, options: { nodeId?: string; cause?: unknown } = {}) {
        super(message, { cause: options.cause });
        this.name = "ExecutionError";
        this.nodeId = options.nodeId;
    }
}

/**
 * Returns the message of an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

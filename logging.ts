/**
 * @file logging.ts
 * @description Leveled logger producing LogEvent records and handing them to a sink.
 */

import { errorMessage } from "./errors.js";
import { EventMetadata, LogEvent, LogLevel } from "./events.js";

/**
 * Receives every log event that passes the logger's level threshold.
 */
export type LogSink = (event: LogEvent) => void;

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

/**
 * Writes log events through the global console, one line per event.
 */
export const consoleSink: LogSink = (event) => {
    const prefix = event.source ? `[${event.source}] ` : "";
    const line = `${prefix}${event.message}`;
    const console = globalThis.console;
    if (event.details === undefined) {
        console[event.level](line);
    } else {
        console[event.level](line, event.details);
    }
};

export type LoggerOptions = {
    level?: LogLevel;
    sink?: LogSink;
    metadata?: EventMetadata;
};

/**
 * Logger bound to a source name, a minimum level and a sink.
 */
export class Logger {
    readonly source: string;
    readonly level: LogLevel;
    readonly #sink: LogSink;
    readonly #metadata: EventMetadata;

    constructor(source: string, options: LoggerOptions = {}) {
        this.source = source;
        this.level = options.level ?? "info";
        this.#sink = options.sink ?? consoleSink;
        this.#metadata = options.metadata ?? {};
    }

    /**
     * Returns a logger sharing this one's sink and level, with extra correlation fields.
     */
    child(metadata: EventMetadata): Logger {
        return new Logger(this.source, {
            level: this.level,
            sink: this.#sink,
            metadata: { ...this.#metadata, ...metadata },
        });
    }

    isEnabled(level: LogLevel): boolean {
        return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.level);
    }

    debug(message: string, details?: Record<string, unknown>): void {
        this.log("debug", message, details);
    }

    info(message: string, details?: Record<string, unknown>): void {
        this.log("info", message, details);
    }

    warn(message: string, details?: Record<string, unknown>): void {
        this.log("warn", message, details);
    }

    /**
     * Logs an error message; an Error's name and message are added to the details.
     */
    error(message: string, error?: unknown, details: Record<string, unknown> = {}): void {
        if (error instanceof Error) {
            this.log("error", message, { ...details, error: { name: error.name, message: error.message } });
        } else if (error !== undefined) {
            this.log("error", message, { ...details, error: errorMessage(error) });
        } else {
            this.log("error", message, details);
        }
    }

    log(level: LogLevel, message: string, details?: Record<string, unknown>): void {
        if (!this.isEnabled(level)) return;
        this.#sink(
            new LogEvent(level, message, {
                ...this.#metadata,
                source: this.source,
                details,
            })
        );
    }
}

/**
 * Creates a logger for the named component.
 */
export function createLogger(source: string, options: LoggerOptions = {}): Logger {
    return new Logger(source, options);
}

/**
 * Milliseconds elapsed since `startTime`, rounded to two decimals.
 */
export function elapsedSince(startTime: number): number {
    return Math.round((Date.now() - startTime) * 100) / 100;
}

/**
 * Logger Types and Interfaces
 *
 * Defines the core abstractions for the multi-transport logger.
 */

/**
 * Log levels in order of severity
 * Following Winston convention: error < warn < info < debug
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Component identifiers for structured logging
 * Mirrors ErrorScope, with one entry per pipeline step of the serializer
 */
export enum StagefileLogComponent {
    CONFIG = 'config',
    RESOLVER = 'resolver',
    ENCODER = 'encoder',
    SERIALIZER = 'serializer',
    CLI = 'cli',
}

/**
 * Structured log entry
 * All logs are converted to this format before being sent to transports
 */
export interface LogEntry {
    /** Log level */
    level: LogLevel;
    /** Primary log message */
    message: string;
    /** ISO timestamp */
    timestamp: string;
    /** Component that generated the log */
    component: StagefileLogComponent;
    /** Optional structured context data */
    context?: Record<string, unknown> | undefined;
}

/**
 * Logger type
 * All logger implementations must implement this shape.
 */
export type Logger = {
    debug(message: string, context?: Record<string, unknown>): void;

    info(message: string, context?: Record<string, unknown>): void;

    warn(message: string, context?: Record<string, unknown>): void;

    error(message: string, context?: Record<string, unknown>): void;

    /**
     * Create a child logger with a different component
     * Shares the same transports and level but uses a different component identifier
     */
    createChild(component: StagefileLogComponent): Logger;

    /**
     * Set the log level dynamically
     * Affects this logger and all child loggers created from it (shared level reference)
     */
    setLevel(level: LogLevel): void;

    getLevel(): LogLevel;

    /**
     * Cleanup resources and close transports
     */
    destroy(): Promise<void>;
};

/**
 * Base transport interface
 * All transport implementations must implement this interface
 */
export type LoggerTransport = {
    /**
     * Write a log entry to the transport
     */
    write(entry: LogEntry): void | Promise<void>;

    /**
     * Cleanup resources when logger is destroyed
     */
    destroy?(): void | Promise<void>;
};

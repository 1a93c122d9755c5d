/**
 * Stagefile Logger
 *
 * Main logger implementation with multi-transport support.
 * Supports structured logging and component-based categorization.
 */

import type {
    Logger,
    LoggerTransport,
    LogEntry,
    LogLevel,
    StagefileLogComponent,
} from './types.js';

export interface StagefileLoggerConfig {
    /** Minimum log level to record */
    level: LogLevel;
    /** Component identifier */
    component: StagefileLogComponent;
    /** Transport instances */
    transports: LoggerTransport[];
    /** Shared level holder; child loggers pass their parent's so setLevel reaches all of them */
    levelRef?: { current: LogLevel };
}

/**
 * StagefileLogger - Multi-transport logger with structured logging
 */
export class StagefileLogger implements Logger {
    private levelRef: { current: LogLevel };
    private component: StagefileLogComponent;
    private transports: LoggerTransport[];

    // Following Winston convention: lower number = more severe
    private static readonly LEVELS: Record<LogLevel, number> = {
        error: 0,
        warn: 1,
        info: 2,
        debug: 3,
    };

    constructor(config: StagefileLoggerConfig) {
        this.levelRef = config.levelRef ?? { current: config.level };
        this.component = config.component;
        this.transports = config.transports;
    }

    debug(message: string, context?: Record<string, unknown>): void {
        if (this.shouldLog('debug')) {
            this.log('debug', message, context);
        }
    }

    info(message: string, context?: Record<string, unknown>): void {
        if (this.shouldLog('info')) {
            this.log('info', message, context);
        }
    }

    warn(message: string, context?: Record<string, unknown>): void {
        if (this.shouldLog('warn')) {
            this.log('warn', message, context);
        }
    }

    error(message: string, context?: Record<string, unknown>): void {
        if (this.shouldLog('error')) {
            this.log('error', message, context);
        }
    }

    private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
        const entry: LogEntry = {
            level,
            message,
            timestamp: new Date().toISOString(),
            component: this.component,
            context,
        };

        for (const transport of this.transports) {
            try {
                const pending = transport.write(entry);
                if (pending instanceof Promise) {
                    pending.catch((error: unknown) => {
                        console.error('Logger transport error:', error);
                    });
                }
            } catch (error) {
                // A failing transport must not break the caller
                console.error('Logger transport error:', error);
            }
        }
    }

    /**
     * Winston convention: log if level number <= configured level number
     */
    private shouldLog(level: LogLevel): boolean {
        return StagefileLogger.LEVELS[level] <= StagefileLogger.LEVELS[this.levelRef.current];
    }

    createChild(component: StagefileLogComponent): StagefileLogger {
        return new StagefileLogger({
            level: this.levelRef.current,
            component,
            transports: this.transports,
            levelRef: this.levelRef,
        });
    }

    setLevel(level: LogLevel): void {
        this.levelRef.current = level;
    }

    getLevel(): LogLevel {
        return this.levelRef.current;
    }

    async destroy(): Promise<void> {
        for (const transport of this.transports) {
            if (transport.destroy) {
                try {
                    await transport.destroy();
                } catch (error) {
                    console.error('Error destroying transport:', error);
                }
            }
        }
    }
}

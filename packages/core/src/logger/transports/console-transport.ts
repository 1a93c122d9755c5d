/**
 * Console Transport
 *
 * Logs to stdout/stderr with optional color support.
 * Uses chalk for color formatting.
 */

import chalk from 'chalk';
import type { LoggerTransport, LogEntry, LogLevel } from '../types.js';

export interface ConsoleTransportConfig {
    colorize?: boolean;
    /** Send every level to stderr, keeping stdout free for rendered output */
    stderrOnly?: boolean;
}

/**
 * Console transport for terminal output
 */
export class ConsoleTransport implements LoggerTransport {
    private colorize: boolean;
    private stderrOnly: boolean;

    constructor(config: ConsoleTransportConfig = {}) {
        this.colorize = config.colorize ?? true;
        this.stderrOnly = config.stderrOnly ?? false;
    }

    write(entry: LogEntry): void {
        const timestamp = new Date(entry.timestamp).toLocaleTimeString();
        const levelLabel = `[${entry.level.toUpperCase()}]`;

        let message = `${timestamp} ${levelLabel} [${entry.component}] ${entry.message}`;

        if (this.colorize) {
            message = this.getColorForLevel(entry.level)(message);
        }

        if (entry.context && Object.keys(entry.context).length > 0) {
            message += '\n' + JSON.stringify(entry.context, null, 2);
        }

        if (this.stderrOnly || entry.level === 'error' || entry.level === 'warn') {
            console.error(message);
        } else {
            console.log(message);
        }
    }

    private getColorForLevel(level: LogLevel): (text: string) => string {
        switch (level) {
            case 'debug':
                return chalk.gray;
            case 'info':
                return chalk.cyan;
            case 'warn':
                return chalk.yellow;
            case 'error':
                return chalk.red;
        }
    }
}

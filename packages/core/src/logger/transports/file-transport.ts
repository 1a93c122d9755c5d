/**
 * File Transport
 *
 * Appends JSON lines to a file with size-based rotation.
 * Keeps a configurable number of rotated log files.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { LoggerTransport, LogEntry } from '../types.js';

export interface FileTransportConfig {
    /** Absolute path to log file */
    path: string;
    /** Max file size in bytes before rotation (default: 10MB) */
    maxSize?: number;
    /** Max number of rotated files to keep (default: 5) */
    maxFiles?: number;
}

export class FileTransport implements LoggerTransport {
    private filePath: string;
    private maxSize: number;
    private maxFiles: number;
    private writeStream: fs.WriteStream | null = null;
    private currentSize: number = 0;
    private isRotating: boolean = false;
    private pendingLogs: string[] = [];
    private rotation: Promise<void> | null = null;

    constructor(config: FileTransportConfig) {
        this.filePath = config.path;
        this.maxSize = config.maxSize ?? 10 * 1024 * 1024;
        this.maxFiles = config.maxFiles ?? 5;

        const dir = path.dirname(this.filePath);
        if (!fs.existsSync(dir)) {
            fs.mkdirSync(dir, { recursive: true });
        }

        if (fs.existsSync(this.filePath)) {
            this.currentSize = fs.statSync(this.filePath).size;
        }

        this.writeStream = this.createWriteStream();
    }

    private createWriteStream(): fs.WriteStream {
        const stream = fs.createWriteStream(this.filePath, {
            flags: 'a',
            encoding: 'utf8',
        });

        stream.on('error', (error) => {
            console.error('FileTransport write stream error:', error);
        });

        return stream;
    }

    write(entry: LogEntry): void {
        const line = JSON.stringify(entry) + '\n';
        const lineSize = Buffer.byteLength(line, 'utf8');

        // Buffer while rotating so nothing is lost
        if (!this.writeStream || this.isRotating) {
            this.pendingLogs.push(line);
            return;
        }

        if (this.currentSize + lineSize > this.maxSize) {
            this.pendingLogs.push(line);
            this.rotation = this.rotate()
                .catch((error: unknown) => {
                    console.error('FileTransport rotation error:', error);
                })
                .finally(() => {
                    this.rotation = null;
                });
            return;
        }

        this.writeStream.write(line);
        this.currentSize += lineSize;
    }

    /**
     * Renames the current file to .1, shifts older files up (.1 -> .2, etc.),
     * drops the oldest beyond maxFiles, then flushes buffered lines
     */
    private async rotate(): Promise<void> {
        if (this.isRotating) {
            return;
        }

        this.isRotating = true;

        try {
            const stream = this.writeStream;
            if (stream) {
                await new Promise<void>((resolve) => {
                    stream.end(() => resolve());
                });
                this.writeStream = null;
            }

            await fs.promises.rm(`${this.filePath}.${this.maxFiles}`, { force: true });

            for (let i = this.maxFiles - 1; i >= 1; i--) {
                await this.renameIfExists(`${this.filePath}.${i}`, `${this.filePath}.${i + 1}`);
            }
            await this.renameIfExists(this.filePath, `${this.filePath}.1`);

            this.currentSize = 0;
            this.writeStream = this.createWriteStream();
        } finally {
            this.isRotating = false;
        }

        await this.flushPendingLogs();
    }

    private async renameIfExists(from: string, to: string): Promise<void> {
        if (fs.existsSync(from)) {
            await fs.promises.rename(from, to);
        }
    }

    private async flushPendingLogs(): Promise<void> {
        while (this.writeStream) {
            const line = this.pendingLogs.shift();
            if (line === undefined) {
                return;
            }
            const lineSize = Buffer.byteLength(line, 'utf8');

            if (this.currentSize + lineSize > this.maxSize && this.currentSize > 0) {
                this.pendingLogs.unshift(line);
                await this.rotate();
                return;
            }

            this.writeStream.write(line);
            this.currentSize += lineSize;
        }
    }

    getFilePath(): string {
        return this.filePath;
    }

    /**
     * Waits for an in-flight rotation, so buffered lines land before the stream closes
     */
    async destroy(): Promise<void> {
        while (this.rotation) {
            await this.rotation;
        }
        const stream = this.writeStream;
        this.writeStream = null;
        if (stream) {
            await new Promise<void>((resolve) => {
                stream.end(() => resolve());
            });
        }
    }
}

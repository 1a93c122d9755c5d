import type { Writable } from 'node:stream';
import { finished } from 'node:stream/promises';

/**
 * Destination for rendered directives. Writes are synchronous; a sink that
 * cannot accept a chunk throws, and the error reaches the serializer's caller unchanged.
 */
export interface DirectiveSink {
    write(chunk: string): void;
}

/**
 * Accumulates output in memory. Used to publish a Dockerfile only after
 * the whole description rendered without error.
 */
export class BufferSink implements DirectiveSink {
    private chunks: string[] = [];

    write(chunk: string): void {
        this.chunks.push(chunk);
    }

    toString(): string {
        return this.chunks.join('');
    }

    get isEmpty(): boolean {
        return this.chunks.length === 0;
    }
}

/**
 * Forwards chunks to a Node.js writable (a file stream, a socket).
 * Backpressure is left to the stream's own buffering.
 *
 * A failed write surfaces on the stream asynchronously; the first such error is
 * thrown from the next `write`, and `finish()` rejects with it.
 */
export class StreamSink implements DirectiveSink {
    private failure: Error | null = null;

    constructor(private readonly stream: Writable) {
        stream.on('error', (error) => {
            this.failure ??= error;
        });
    }

    write(chunk: string): void {
        this.throwIfFailed();
        if (this.stream.destroyed || this.stream.writableEnded) {
            throw new Error('Cannot write to a closed stream');
        }
        this.stream.write(chunk, 'utf8');
    }

    /**
     * End the stream and wait until everything written has been flushed
     */
    async finish(): Promise<void> {
        this.throwIfFailed();
        this.stream.end();
        try {
            await finished(this.stream);
        } catch (error) {
            throw this.failure ?? error;
        }
    }

    private throwIfFailed(): void {
        const failure = this.failure ?? this.stream.errored;
        if (failure) {
            throw failure;
        }
    }
}

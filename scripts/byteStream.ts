// SPDX-FileCopyrightText: 2024 IEXEC BLOCKCHAIN TECH <contact@iex.ec>
// SPDX-License-Identifier: Apache-2.0

import * as fs from 'fs';

const LF = 0x0a;
const CHUNK_SIZE = 64 * 1024;
const MAX_CHUNK_SIZE = 16 * 1024 * 1024;

/**
 * Seekable byte stream opened for reading and writing. Reads and writes
 * share one cursor.
 */
export interface ByteStream {
    /**
     * Read up to and including the next `\n`. Returns an empty buffer at
     * end of stream.
     */
    readLine(): Buffer;
    /** Read everything from the cursor to end of stream. */
    readRest(): Buffer;
    /** Move the cursor back to the first byte. */
    rewind(): void;
    /** Drop every byte from the cursor onward. */
    truncate(): void;
    write(bytes: Buffer): void;
}

/**
 * In-memory stream, mostly useful to run the rewriter without a file.
 */
export class MemoryByteStream implements ByteStream {
    private content: Buffer;
    private position = 0;

    constructor(content: Buffer | string = Buffer.alloc(0)) {
        this.content = typeof content === 'string' ? Buffer.from(content, 'utf8') : content;
    }

    public get bytes(): Buffer {
        return this.content;
    }

    public readLine(): Buffer {
        const newline = this.content.indexOf(LF, this.position);
        const end = newline === -1 ? this.content.length : newline + 1;
        const line = this.content.subarray(this.position, end);
        this.position = end;
        return line;
    }

    public readRest(): Buffer {
        const rest = this.content.subarray(this.position);
        this.position = this.content.length;
        return rest;
    }

    public rewind(): void {
        this.position = 0;
    }

    public truncate(): void {
        this.content = this.content.subarray(0, this.position);
    }

    public write(bytes: Buffer): void {
        const end = this.position + bytes.length;
        // Never write into the current buffer: lines handed out earlier are views on it.
        const next = Buffer.alloc(Math.max(end, this.content.length));
        this.content.copy(next);
        bytes.copy(next, this.position);
        this.content = next;
        this.position = end;
    }

    public toString(): string {
        return this.content.toString('utf8');
    }
}

/**
 * Stream over a file descriptor opened `r+`, using synchronous fs calls.
 * Reads are buffered ahead in chunks; writes go straight to the file.
 */
export class FileByteStream implements ByteStream {
    private readonly fd: number;
    // Bytes read from disk but not yet consumed, starting at `position`.
    private pending: Buffer = Buffer.alloc(0);
    private position = 0;
    private endOfFile = false;
    private closed = false;

    constructor(fd: number) {
        this.fd = fd;
    }

    public static open(filepath: string): FileByteStream {
        return new FileByteStream(fs.openSync(filepath, 'r+'));
    }

    public readLine(): Buffer {
        let newline = this.pending.indexOf(LF);
        while (newline === -1 && !this.endOfFile) {
            const searched = this.pending.length;
            // Grow geometrically so a long line is copied a bounded number of times.
            this.fill(Math.max(CHUNK_SIZE, this.pending.length));
            newline = this.pending.indexOf(LF, searched);
        }
        return this.consume(newline === -1 ? this.pending.length : newline + 1);
    }

    public readRest(): Buffer {
        const chunks = [this.consume(this.pending.length)];
        let chunk = this.readChunk(CHUNK_SIZE);
        while (chunk.length > 0) {
            chunks.push(chunk);
            this.position += chunk.length;
            chunk = this.readChunk(Math.min(chunk.length * 2, MAX_CHUNK_SIZE));
        }
        this.endOfFile = true;
        return Buffer.concat(chunks);
    }

    public rewind(): void {
        this.seek(0);
    }

    public truncate(): void {
        fs.ftruncateSync(this.fd, this.position);
        this.pending = Buffer.alloc(0);
        this.endOfFile = true;
    }

    public write(bytes: Buffer): void {
        let written = 0;
        while (written < bytes.length) {
            written += fs.writeSync(
                this.fd,
                bytes,
                written,
                bytes.length - written,
                this.position + written,
            );
        }
        this.seek(this.position + written);
    }

    public close(): void {
        if (this.closed) {
            return;
        }
        this.closed = true;
        fs.closeSync(this.fd);
    }

    private seek(position: number): void {
        this.position = position;
        this.pending = Buffer.alloc(0);
        this.endOfFile = false;
    }

    /**
     * Append up to `size` bytes from disk to `pending`.
     */
    private fill(size: number): void {
        const chunk = this.readChunk(size);
        if (chunk.length === 0) {
            this.endOfFile = true;
            return;
        }
        this.pending = Buffer.concat([this.pending, chunk]);
    }

    /**
     * Read up to `size` bytes following `pending`, without consuming them.
     * @returns an empty buffer at end of file
     */
    private readChunk(size: number): Buffer {
        const chunk = Buffer.alloc(size);
        const bytesRead = fs.readSync(this.fd, chunk, 0, size, this.position + this.pending.length);
        return chunk.subarray(0, bytesRead);
    }

    private consume(length: number): Buffer {
        const bytes = this.pending.subarray(0, length);
        this.pending = this.pending.subarray(length);
        this.position += length;
        return bytes;
    }
}

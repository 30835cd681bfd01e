/**
 * Stream Transport
 *
 * Wraps a Node Duplex (net.Socket, SerialPort) as a ByteTransport.
 * Incoming chunks are buffered until the bridge loop reads them; the
 * stream is paused while the buffer is above the high-water mark.
 */

import * as net from "node:net";
import { type Duplex } from "node:stream";
import type { ByteTransport } from "./types.js";

/** Default inbound buffer limit before the stream is paused: 64 KiB */
const DEFAULT_HIGH_WATER_MARK = 64 * 1024;

/** How long close() waits for queued writes to flush before destroying the stream. */
const CLOSE_GRACE_MS = 5000;

export interface StreamTransportOptions {
    /** Whether the stream is already connected. Default: true. Sockets pass false and wait for "connect". */
    connected?: boolean;
    /** Inbound buffer limit in bytes. Default: 64 KiB. */
    highWaterMark?: number;
}

export class StreamTransport implements ByteTransport {
    private readonly stream: Duplex;
    private readonly highWaterMark: number;
    private chunks: Buffer[] = [];
    private _available = 0;
    private _ended = false;
    private _error: Error | null = null;
    private _connected: boolean;
    private _closed = false;
    private handlers: Array<() => void> = [];

    constructor(stream: Duplex, options: StreamTransportOptions = {}) {
        this.stream = stream;
        this.highWaterMark = options.highWaterMark ?? DEFAULT_HIGH_WATER_MARK;
        this._connected = options.connected ?? true;

        stream.on("data", (chunk: Buffer) => {
            this.chunks.push(chunk);
            this._available += chunk.length;
            if (this._available >= this.highWaterMark) {
                stream.pause();
            }
            this.notify();
        });

        stream.on("connect", () => {
            this._connected = true;
            this.notify();
        });

        stream.on("drain", () => this.notify());

        stream.on("end", () => {
            this._ended = true;
            this.notify();
        });

        stream.on("close", () => {
            this._ended = true;
            this._connected = false;
            this.notify();
        });

        stream.on("error", (err: Error) => {
            // Keep the first error; later ones are usually consequences of it
            if (this._error === null) {
                this._error = err;
            }
            this.notify();
        });
    }

    get available(): number {
        return this._available;
    }

    get ended(): boolean {
        return this._ended;
    }

    get error(): Error | null {
        return this._error;
    }

    get connected(): boolean {
        return this._connected && !this._closed;
    }

    get writable(): boolean {
        return this.connected
            && this._error === null
            && !this.stream.destroyed
            && !this.stream.writableNeedDrain;
    }

    read(max: number): Buffer {
        if (this._available === 0 || max <= 0) {
            return Buffer.alloc(0);
        }

        const all = this.chunks.length === 1 ? this.chunks[0] : Buffer.concat(this.chunks);
        const out = all.subarray(0, max);
        const rest = all.subarray(out.length);

        this.chunks = rest.length > 0 ? [rest] : [];
        this._available = rest.length;

        if (!this._closed && this.stream.isPaused() && this._available < this.highWaterMark) {
            this.stream.resume();
        }

        return out;
    }

    write(data: Buffer): number {
        if (this._closed || this.stream.destroyed) {
            throw new Error("Transport closed");
        }
        if (this._error) {
            throw this._error;
        }
        this.stream.write(data);
        return data.length;
    }

    close(): void {
        if (this._closed) return;
        this._closed = true;

        if (this.stream.destroyed) return;

        if (this.stream.writableLength > 0 && this._error === null) {
            // Let what was already written reach the peer
            const timer = setTimeout(() => this.stream.destroy(), CLOSE_GRACE_MS);
            timer.unref();
            this.stream.once("finish", () => {
                clearTimeout(timer);
                this.stream.destroy();
            });
            this.stream.end();
        } else {
            this.stream.destroy();
        }
    }

    onActivity(handler: () => void): void {
        this.handlers.push(handler);
    }

    private notify(): void {
        for (const handler of this.handlers) {
            handler();
        }
    }
}

/**
 * Start a TCP connection and wrap it as a StreamTransport.
 * Returns immediately; the transport turns connected (or reports an error)
 * once the connect attempt settles.
 */
export function connectTcp(host: string, port: number): StreamTransport {
    const socket = net.connect({ host, port });
    socket.setNoDelay(true);
    return new StreamTransport(socket, { connected: false });
}

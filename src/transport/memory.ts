/**
 * In-Memory Transport
 *
 * A ByteTransport with no real I/O, driven by the test. Bytes handed to
 * feed() become readable; everything the bridge writes is collected in
 * `written`.
 *
 * **Synchronous delivery.** feed(), end(), fail() and connect() invoke the
 * activity handlers before returning, unlike a real stream whose events
 * arrive on a later tick.
 *
 * Usage:
 *   const serial = new MemoryTransport();
 *   serial.feed("surface_1: Waiting for final GPS fix\n");
 *   serial.end();
 */

import type { ByteTransport } from "./types.js";

export interface MemoryTransportOptions {
    /** Whether the transport starts connected. Default: true. */
    connected?: boolean;
}

export class MemoryTransport implements ByteTransport {
    private inbound: Buffer = Buffer.alloc(0);
    private outbound: Buffer[] = [];
    private _ended = false;
    private _error: Error | null = null;
    private _connected: boolean;
    private _closed = false;
    private handlers: Array<() => void> = [];

    /** When set, write() accepts at most this many bytes per call. */
    writeLimit: number | null = null;
    /** When false, the transport reports itself as not writable (a full send buffer). */
    acceptingWrites = true;
    /** Number of close() calls that actually released the transport. */
    closeCount = 0;

    constructor(options: MemoryTransportOptions = {}) {
        this._connected = options.connected ?? true;
    }

    get available(): number {
        return this.inbound.length;
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
        return this.connected && this._error === null && this.acceptingWrites;
    }

    get closed(): boolean {
        return this._closed;
    }

    /** Everything written so far, concatenated. */
    get written(): Buffer {
        return Buffer.concat(this.outbound);
    }

    read(max: number): Buffer {
        const out = this.inbound.subarray(0, Math.max(0, max));
        this.inbound = this.inbound.subarray(out.length);
        return out;
    }

    write(data: Buffer): number {
        if (this._closed) {
            throw new Error("Transport closed");
        }
        if (this._error) {
            throw this._error;
        }
        const n = this.writeLimit === null ? data.length : Math.min(this.writeLimit, data.length);
        this.outbound.push(Buffer.from(data.subarray(0, n)));
        return n;
    }

    close(): void {
        if (this._closed) return;
        this._closed = true;
        this.closeCount++;
    }

    onActivity(handler: () => void): void {
        this.handlers.push(handler);
    }

    // ─── Test controls ──────────────────────────────────────────────

    /** Make bytes readable, as if they had arrived from the peer. */
    feed(data: Buffer | string): void {
        const bytes = typeof data === "string" ? Buffer.from(data, "latin1") : data;
        this.inbound = Buffer.concat([this.inbound, bytes]);
        this.notify();
    }

    /** Simulate the peer closing its side. */
    end(): void {
        this._ended = true;
        this.notify();
    }

    /** Simulate an exceptional condition on the stream. */
    fail(err: Error): void {
        this._error = err;
        this.notify();
    }

    /** Complete a pending connect. */
    connect(): void {
        this._connected = true;
        this.notify();
    }

    private notify(): void {
        for (const handler of this.handlers) {
            handler();
        }
    }
}

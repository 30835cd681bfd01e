/**
 * Transport Layer Types
 *
 * The endpoints never touch a net.Socket or SerialPort directly; they go
 * through a ByteTransport. Implemented by StreamTransport (any Node Duplex:
 * TCP sockets and serial ports) and MemoryTransport (tests).
 *
 * A ByteTransport is pull-based: the underlying stream buffers what it
 * receives, and the bridge loop decides when to read it. Readiness is
 * derived from the fields below (see poller.ts).
 */

/** A bidirectional byte stream with observable readiness. */
export interface ByteTransport {
    /** Bytes received and not yet read. */
    readonly available: number;
    /** The peer closed its side. Once the buffered bytes are read, read() returns empty. */
    readonly ended: boolean;
    /** Exceptional condition reported by the stream, if any. */
    readonly error: Error | null;
    /** Whether the connection is established (a TCP connect may still be in flight). */
    readonly connected: boolean;
    /** Connected, not closed, and below the write high-water mark. */
    readonly writable: boolean;
    /** Take up to `max` buffered bytes. Returns an empty buffer when nothing is buffered. */
    read(max: number): Buffer;
    /** Queue bytes for writing. Returns the number of bytes accepted; throws on a dead transport. */
    write(data: Buffer): number;
    /** Release the underlying stream. Idempotent. */
    close(): void;
    /** Called whenever readiness may have changed (data, drain, connect, end, close, error). */
    onActivity(handler: () => void): void;
}

import type { ByteTransport } from "./transport/types.js";

/**
 * Why an endpoint operation moved no data.
 *
 * - "eof"    : the peer closed its side (zero-length read)
 * - "closed" : the endpoint was already closed
 * - "io"     : the transport threw
 * - "stalled": the transport accepted zero bytes
 */
export type IoErrorKind = "eof" | "closed" | "io" | "stalled";

export interface ReadResult {
    bytes: Buffer;
    error: IoErrorKind | null;
}

export interface SendResult {
    sent: number;
    error: IoErrorKind | null;
}

export const EMPTY: Buffer = Buffer.alloc(0);

/**
 * One side of the bridge, as the loop sees it.
 *
 * `readable` and `writable` are capabilities: whether the endpoint wants
 * input or has output to push. The poller combines them with the state of
 * the transport to decide what is actually ready.
 */
export interface Endpoint {
    readonly name: string;
    readonly isOpen: boolean;
    readonly readable: boolean;
    readonly writable: boolean;
    /** The transport currently owned, or null while closed. */
    readonly transport: ByteTransport | null;
}

import { EventEmitter } from "node:events";
import type { Logger } from "pino";
import { ByteQueue } from "./byte-queue.js";
import { systemClock, type Clock } from "./clock.js";
import { EMPTY, type Endpoint, type ReadResult, type SendResult } from "./endpoint.js";
import { toError } from "./errors.js";
import { RateLimiter } from "./rate-limiter.js";
import { connectTcp } from "./transport/stream.js";
import type { ByteTransport } from "./transport/types.js";

/** Well-known RUDICS port on a Dockserver. */
export const DEFAULT_RUDICS_PORT = 6565;

export type DisconnectReason =
    | "trigger-off"
    | "idle-timeout"
    | "max-open-time"
    | "remote-closed"
    | "error"
    | "shutdown";

export type OpenResult = "opened" | "already-open" | "blocked" | "failed";

/** Creates the transport for one connection attempt. */
export type Connector = (host: string, port: number) => ByteTransport;

/** Reasons after which queued bytes are kept for the next connection. */
const KEEP_QUEUED: ReadonlySet<DisconnectReason> = new Set<DisconnectReason>(["error", "max-open-time"]);

export interface RudicsClientOptions {
    /** Dockserver host. */
    host: string;
    /** Dockserver RUDICS port. Default: 6565. */
    port?: number;
    /** Seconds to wait after a close before the next connect attempt. */
    reconnectDelaySeconds: number;
    /** Minimum seconds between a close and the next open, whatever the delay. */
    reconnectSpacingSeconds: number;
    /** Throttle output to this baud rate. Unset: unthrottled. */
    baudRateLimit?: number;
    clock?: Clock;
    /** Default: connectTcp. */
    connector?: Connector;
    logger: Logger;
}

/**
 * The network side of the bridge: a RUDICS client connection to a
 * Dockserver.
 *
 * Physically the client is either open (it owns a transport, whose TCP
 * connect may still be in flight) or closed. A closed client refuses to
 * open again before `nextAllowedOpenTime`; every close pushes that time
 * out, never back.
 *
 * Output sits in an outbound queue and leaves through the rate limiter.
 * A failed write or read closes the connection; the owner decides whether
 * to reconnect.
 *
 * Events:
 * - "open": a connect attempt started
 * - "connect": the TCP connection is established
 * - "blocked" (until: number): open() refused until the given time
 * - "disconnect" (reason: DisconnectReason, err?: Error): the connection was released
 */
export class RudicsClient extends EventEmitter implements Endpoint {
    readonly name: string;
    readonly host: string;
    readonly port: number;

    private readonly backoffSeconds: number;
    private readonly spacingSeconds: number;
    private readonly clock: Clock;
    private readonly connector: Connector;
    private readonly logger: Logger;
    private readonly limiter: RateLimiter;
    private readonly outbound = new ByteQueue();

    private _transport: ByteTransport | null = null;
    private _lastOpenTime: number | null = null;
    private _lastCloseTime: number | null = null;
    private _nextAllowedOpenTime = 0;

    constructor(options: RudicsClientOptions) {
        super();
        this.host = options.host;
        this.port = options.port ?? DEFAULT_RUDICS_PORT;
        this.name = `${this.host}:${this.port}`;
        this.spacingSeconds = options.reconnectSpacingSeconds;
        this.backoffSeconds = Math.max(options.reconnectDelaySeconds, this.spacingSeconds);
        this.clock = options.clock ?? systemClock;
        this.connector = options.connector ?? connectTcp;
        this.logger = options.logger;
        this.limiter = new RateLimiter(options.baudRateLimit);
    }

    get transport(): ByteTransport | null {
        return this._transport;
    }

    get isOpen(): boolean {
        return this._transport !== null;
    }

    get readable(): boolean {
        return this.isOpen;
    }

    /** Open, with output queued and the rate limiter ready to release it. */
    get writable(): boolean {
        return this.isOpen && this.outbound.length > 0 && this.limiter.ready(this.clock.now());
    }

    /** Bytes queued for the Dockserver. */
    get pending(): number {
        return this.outbound.length;
    }

    get lastOpenTime(): number | null {
        return this._lastOpenTime;
    }

    get lastCloseTime(): number | null {
        return this._lastCloseTime;
    }

    get nextAllowedOpenTime(): number {
        return this._nextAllowedOpenTime;
    }

    /** When the rate limiter next allows a release. */
    get nextSendTime(): number {
        return this.limiter.nextSendTime;
    }

    /** Closed, and not yet allowed to open again. */
    isBlocked(now: number = this.clock.now()): boolean {
        return !this.isOpen && now < this._nextAllowedOpenTime;
    }

    /** Queue bytes for the Dockserver. They wait here while the connection is down. */
    enqueueOut(bytes: Buffer): void {
        this.outbound.push(bytes);
    }

    /** Start a connection, unless one exists or the backoff has not run out. */
    open(): OpenResult {
        if (this._transport !== null) {
            return "already-open";
        }

        const now = this.clock.now();
        if (now < this._nextAllowedOpenTime) {
            this.logger.debug(
                { dockserver: this.name, retryIn: this._nextAllowedOpenTime - now },
                "Connect deferred until backoff expires",
            );
            this.emit("blocked", this._nextAllowedOpenTime);
            return "blocked";
        }

        let transport: ByteTransport;
        try {
            transport = this.connector(this.host, this.port);
        } catch (err) {
            this._lastCloseTime = now;
            this.applyBackoff(now, this.backoffSeconds);
            this.logger.error(
                { dockserver: this.name, err: toError(err), retryIn: this.backoffSeconds },
                "Unable to connect",
            );
            this.emit("disconnect", "error", toError(err));
            return "failed";
        }

        this._transport = transport;
        this._lastOpenTime = now;

        let announced = false;
        transport.onActivity(() => {
            if (!announced && transport.connected && this._transport === transport) {
                announced = true;
                this.logger.info({ dockserver: this.name }, "Connected");
                this.emit("connect");
            }
        });

        this.logger.info({ dockserver: this.name }, "Connecting");
        this.emit("open");
        return "opened";
    }

    /**
     * Release the connection. A no-op when already closed.
     *
     * The next open is pushed out to at least `now + backoffSeconds`, and
     * never less than the reconnect spacing, whatever the caller passes.
     * An off-trigger close first hands the queued tail to the transport,
     * unthrottled, so the glider's last lines reach the Dockserver; the
     * transport flushes it before releasing the socket.
     * Whatever is still queued is dropped unless the close was caused by an error or
     * the maximum open time, in which case it waits for the next connection.
     */
    close(reason: DisconnectReason = "shutdown", backoffSeconds: number = this.backoffSeconds, err?: Error): void {
        const transport = this._transport;
        if (transport === null) return;
        this._transport = null;

        const now = this.clock.now();
        if (reason === "trigger-off") {
            this.flush(transport);
        }
        try {
            transport.close();
        } catch (closeErr) {
            this.logger.error({ dockserver: this.name, err: toError(closeErr) }, "Error closing connection");
        }

        this._lastCloseTime = now;
        this.applyBackoff(now, Math.max(backoffSeconds, this.spacingSeconds));

        if (!KEEP_QUEUED.has(reason) && this.outbound.length > 0) {
            const dropped = this.outbound.clear();
            this.logger.info({ dockserver: this.name, dropped }, "Dropped unsent output");
        }

        this.logger.info(
            { dockserver: this.name, reason, retryIn: this._nextAllowedOpenTime - now },
            "Closed connection",
        );
        this.emit("disconnect", reason, err);
    }

    /** Close because the transport failed. */
    fail(err: Error): void {
        if (!this.isOpen) return;
        this.logger.warn({ dockserver: this.name, err }, "Connection failed");
        this.close("error", this.backoffSeconds, err);
    }

    /** Release whatever the rate limiter allows from the outbound queue. */
    send(): SendResult {
        const transport = this._transport;
        if (transport === null) {
            return { sent: 0, error: "closed" };
        }

        const now = this.clock.now();
        const n = this.limiter.allowance(now, this.outbound.length);
        if (n === 0) {
            return { sent: 0, error: null };
        }

        let m: number;
        try {
            m = transport.write(this.outbound.peek(n));
        } catch (err) {
            this.fail(toError(err));
            return { sent: 0, error: "io" };
        }

        if (m <= 0) {
            this.fail(new Error("Connection accepted no bytes"));
            return { sent: 0, error: "stalled" };
        }

        this.outbound.consume(m);
        this.limiter.record(now, m);
        this.logger.trace({ dockserver: this.name, sent: m, queued: this.outbound.length }, "Sent");
        return { sent: m, error: null };
    }

    /** Read up to `maxBytes` from the Dockserver. An empty read means it hung up. */
    recv(maxBytes: number): ReadResult {
        const transport = this._transport;
        if (transport === null) {
            return { bytes: EMPTY, error: "closed" };
        }

        let bytes: Buffer;
        try {
            bytes = transport.read(maxBytes);
        } catch (err) {
            this.fail(toError(err));
            return { bytes: EMPTY, error: "io" };
        }

        if (bytes.length === 0) {
            this.close("remote-closed");
            return { bytes: EMPTY, error: "eof" };
        }

        return { bytes, error: null };
    }

    private flush(transport: ByteTransport): void {
        const queued = this.outbound.length;
        if (queued === 0 || !transport.connected) return;
        try {
            const n = transport.write(this.outbound.peek(queued));
            this.outbound.consume(n);
            this.logger.debug({ dockserver: this.name, flushed: n }, "Flushed output before close");
        } catch (err) {
            this.logger.warn({ dockserver: this.name, err: toError(err) }, "Flush before close failed");
        }
    }

    private applyBackoff(now: number, seconds: number): void {
        this._nextAllowedOpenTime = Math.max(this._nextAllowedOpenTime, now + seconds);
    }
}

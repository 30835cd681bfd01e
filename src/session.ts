import { EventEmitter } from "node:events";
import type { Logger } from "pino";
import { systemClock, type Clock } from "./clock.js";
import type { ReadResult, SendResult } from "./endpoint.js";
import { ConfigError } from "./errors.js";
import type { DisconnectReason, RudicsClient } from "./rudics.js";
import type { TriggerSet } from "./triggers.js";

export type ConnectionState = "connected" | "disconnected";

/** Longest line kept for trigger matching; a longer line keeps its tail. */
const MAX_LINE_BYTES = 64 * 1024;

export interface SessionOptions {
    triggers: TriggerSet;
    /** Close an open connection after this long without traffic. */
    idleTimeoutSeconds: number;
    /** Close a connection that has been open this long, then reopen it. */
    maxOpenTimeSeconds: number;
    /** Backoff after a close forced by maxOpenTimeSeconds. */
    maxOpenTimeDelaySeconds: number;
    /** "connected" starts wanting the connection open. Default: "connected". */
    initialConnectionState?: ConnectionState;
    /** Line terminator for trigger matching; one character. Default: "\n". */
    lineTerminator?: string;
    clock?: Clock;
    logger: Logger;
}

/**
 * Decides when the RUDICS connection should be up.
 *
 * `desiredOpen` is the session's intent and is independent of the client's
 * physical state: the session may want the connection open while the
 * client waits out a backoff. Every serial byte goes through put(); whole
 * lines are searched for the off-pattern while open is wanted and for the
 * on-pattern otherwise.
 *
 * Idle time is measured from the later of the last traffic in either
 * direction and the last connection open.
 *
 * Events:
 * - "trigger" (direction: "on" | "off", line: string): a trigger line flipped the intent
 * - "state" (desiredOpen: boolean): the intent changed
 * - "idle-timeout": an idle connection was closed
 * - "max-open-time": a connection was recycled for being open too long
 */
export class SessionController extends EventEmitter {
    private readonly client: RudicsClient;
    private readonly triggers: TriggerSet;
    private readonly idleTimeoutSeconds: number;
    private readonly maxOpenTimeSeconds: number;
    private readonly maxOpenTimeDelaySeconds: number;
    private readonly terminator: number;
    private readonly clock: Clock;
    private readonly logger: Logger;

    private _desiredOpen: boolean;
    private _lastActivityTime: number | null = null;
    private line: Buffer = Buffer.alloc(MAX_LINE_BYTES);
    private lineLength = 0;

    constructor(client: RudicsClient, options: SessionOptions) {
        super();
        const terminator = options.lineTerminator ?? "\n";
        if (terminator.length !== 1 || terminator.charCodeAt(0) > 0xff) {
            throw new ConfigError(`Line terminator must be a single byte, got ${JSON.stringify(terminator)}`);
        }

        this.client = client;
        this.triggers = options.triggers;
        this.idleTimeoutSeconds = options.idleTimeoutSeconds;
        this.maxOpenTimeSeconds = options.maxOpenTimeSeconds;
        this.maxOpenTimeDelaySeconds = options.maxOpenTimeDelaySeconds;
        this.terminator = terminator.charCodeAt(0);
        this.clock = options.clock ?? systemClock;
        this.logger = options.logger;
        this._desiredOpen = (options.initialConnectionState ?? "connected") === "connected";

        client.on("disconnect", (reason: DisconnectReason) => {
            if (reason === "error") {
                // Retry once the backoff allows it
                this.setDesiredOpen(true);
            } else if (reason === "remote-closed") {
                this.setDesiredOpen(false);
            }
        });
    }

    /** The network endpoint this session drives. */
    get network(): RudicsClient {
        return this.client;
    }

    get desiredOpen(): boolean {
        return this._desiredOpen;
    }

    get lastActivityTime(): number | null {
        return this._lastActivityTime;
    }

    /** Output is waiting for a connection the session still wants. */
    get hasQueuedOutput(): boolean {
        return this._desiredOpen && this.client.pending > 0;
    }

    /** Feed one byte read from the serial line. */
    put(byte: number): void {
        this._lastActivityTime = this.clock.now();

        if (this._desiredOpen) {
            this.client.enqueueOut(Buffer.of(byte));
        }

        this.appendToLine(byte);
        if (byte !== this.terminator) return;

        const line = Buffer.from(this.line.subarray(0, this.lineLength));
        this.lineLength = 0;

        if (this._desiredOpen) {
            if (this.triggers.matches("off", line)) {
                this.logger.info({ line: printable(line) }, "Off trigger matched");
                this.setDesiredOpen(false);
                this.emit("trigger", "off", printable(line));
                this.client.close("trigger-off");
            }
        } else if (this.triggers.matches("on", line)) {
            this.logger.info({ line: printable(line) }, "On trigger matched");
            this.setDesiredOpen(true);
            this.emit("trigger", "on", printable(line));
            this.client.open();
        }
    }

    /**
     * Per-pass housekeeping: reopen a wanted connection once the backoff
     * allows it, and recycle a connection past its maximum open time.
     */
    service(): void {
        const now = this.clock.now();

        if (this.client.isOpen) {
            const opened = this.client.lastOpenTime;
            if (opened !== null && now - opened >= this.maxOpenTimeSeconds) {
                this.logger.warn({ openFor: now - opened }, "Connection reached maximum open time");
                this.emit("max-open-time");
                this.client.close("max-open-time", this.maxOpenTimeDelaySeconds);
            }
            return;
        }

        if (this._desiredOpen && now >= this.client.nextAllowedOpenTime) {
            this.client.open();
        }
    }

    /**
     * Seconds the loop may block before something time-gated needs
     * attention: the idle budget (at least 1s), the next rate-limited send,
     * the end of a reconnect backoff, or the maximum open time.
     */
    timeout(): number {
        const now = this.clock.now();
        const ref = this.idleReference();
        let wait = Math.max(1, this.idleTimeoutSeconds - (ref === null ? 0 : now - ref));

        if (this.client.isOpen) {
            if (this.client.pending > 0 && this.client.nextSendTime > now) {
                wait = Math.min(wait, this.client.nextSendTime - now);
            }
            const opened = this.client.lastOpenTime;
            if (opened !== null) {
                wait = Math.min(wait, Math.max(0, opened + this.maxOpenTimeSeconds - now));
            }
        } else if (this._desiredOpen && this.client.nextAllowedOpenTime > now) {
            wait = Math.min(wait, this.client.nextAllowedOpenTime - now);
        }

        return wait;
    }

    /** Called when a wait ended with nothing ready. Closes a connection that has gone idle. */
    timedOut(): void {
        if (!this.client.isOpen) return;

        const now = this.clock.now();
        const ref = this.idleReference();
        if (ref !== null && now - ref < this.idleTimeoutSeconds) return;

        this.logger.info({ idleTimeoutSeconds: this.idleTimeoutSeconds }, "Idle timeout");
        this.setDesiredOpen(false);
        this.emit("idle-timeout");
        this.client.close("idle-timeout");
        this._lastActivityTime = now;
    }

    /** Push queued output to the Dockserver. */
    sendToNetwork(): SendResult {
        return this.client.send();
    }

    /** Read from the Dockserver; received bytes count as activity. */
    receiveFromNetwork(maxBytes: number): ReadResult {
        const result = this.client.recv(maxBytes);
        if (result.bytes.length > 0) {
            this._lastActivityTime = this.clock.now();
        }
        return result;
    }

    /** The network transport reported an exceptional condition. */
    networkException(err: Error): void {
        this.client.fail(err);
    }

    /** Release the connection for good. */
    shutdown(): void {
        this.setDesiredOpen(false);
        this.client.close("shutdown");
    }

    private idleReference(): number | null {
        const activity = this._lastActivityTime;
        const opened = this.client.lastOpenTime;
        if (activity === null) return opened;
        if (opened === null) return activity;
        return Math.max(activity, opened);
    }

    private setDesiredOpen(value: boolean): void {
        if (this._desiredOpen === value) return;
        this._desiredOpen = value;
        this.logger.debug({ desiredOpen: value }, "Session intent changed");
        this.emit("state", value);
    }

    private appendToLine(byte: number): void {
        if (this.lineLength === this.line.length) {
            // Keep the newer half of an over-long line
            const keep = this.line.length >> 1;
            this.line.copyWithin(0, this.line.length - keep);
            this.lineLength = keep;
        }
        this.line[this.lineLength++] = byte;
    }
}

function printable(line: Buffer): string {
    return line.toString("latin1").trimEnd();
}

import type { Logger } from "pino";
import { type Bridge, type BridgeStatus } from "../bridge.js";
import type { TrafficCapture } from "../capture.js";
import { anyReady, Poller, readinessOf } from "../poller.js";
import type { SerialEndpoint } from "../serial.js";
import type { SessionController } from "../session.js";

/** Bytes fed from the serial line into the session per pass. */
const DEFAULT_SERIAL_READ_CHUNK = 1;

/** Bytes taken from the Dockserver per pass: 8 KiB */
const DEFAULT_NETWORK_READ_CHUNK = 8 * 1024;

export interface SerialRudicsBridgeOptions {
    serial: SerialEndpoint;
    session: SessionController;
    logger: Logger;
    /** Record every chunk read from either side. */
    capture?: TrafficCapture;
    /** Default: 1. */
    serialReadChunk?: number;
    /** Default: 8 KiB. */
    networkReadChunk?: number;
}

/**
 * Pump bytes between a serial line and a Dockserver.
 *
 * One pass of the loop:
 * 1. let the session reopen or recycle the connection
 * 2. compute readiness of both endpoints; if nothing is ready, wait for
 *    transport activity, bounded by the session's timeout
 * 3. a wait that times out with nothing ready goes to session.timedOut()
 * 4. exceptional conditions close the affected endpoint and end the pass
 * 5. writes: one serial byte, one rate-limited network send
 * 6. reads: serial bytes go through session.put(); Dockserver bytes are
 *    queued for the serial line as they are
 *
 * The loop ends once the serial line is closed and nothing is left queued
 * for a connection the session still wants.
 */
export class SerialRudicsBridge implements Bridge {
    private readonly serial: SerialEndpoint;
    private readonly session: SessionController;
    private readonly logger: Logger;
    private readonly capture: TrafficCapture | null;
    private readonly serialReadChunk: number;
    private readonly networkReadChunk: number;
    private readonly poller = new Poller();

    private _status: BridgeStatus = "stopped";
    private stopping = false;
    private finished: Promise<void> | null = null;

    constructor(options: SerialRudicsBridgeOptions) {
        this.serial = options.serial;
        this.session = options.session;
        this.logger = options.logger;
        this.capture = options.capture ?? null;
        this.serialReadChunk = options.serialReadChunk ?? DEFAULT_SERIAL_READ_CHUNK;
        this.networkReadChunk = options.networkReadChunk ?? DEFAULT_NETWORK_READ_CHUNK;
    }

    get status(): BridgeStatus {
        return this._status;
    }

    async run(): Promise<void> {
        if (this._status === "running") {
            throw new Error("Bridge already running");
        }

        this._status = "running";
        this.stopping = false;

        let resolveFinished: () => void = () => {};
        this.finished = new Promise<void>((resolve) => {
            resolveFinished = resolve;
        });

        this.logger.info(
            { serial: this.serial.name, dockserver: this.session.network.name },
            "Bridge started",
        );

        try {
            while (!this.stopping && !this.done()) {
                await this.pass();
            }
            this._status = "stopped";
            this.logger.info("Bridge finished");
        } catch (err) {
            this._status = "error";
            throw err;
        } finally {
            this.serial.close();
            this.session.shutdown();
            this.capture?.close();
            resolveFinished();
        }
    }

    async stop(): Promise<void> {
        if (this._status !== "running" || this.finished === null) return;
        this.stopping = true;
        this.poller.signal();
        await this.finished;
    }

    /** Serial gone and nothing left for a wanted connection. */
    private done(): boolean {
        return !this.serial.isOpen && !this.session.hasQueuedOutput;
    }

    private async pass(): Promise<void> {
        const serial = this.serial;
        const session = this.session;
        const network = session.network;

        session.service();

        for (const transport of [serial.transport, network.transport]) {
            if (transport !== null) this.poller.watch(transport);
        }

        let woken = true;
        if (anyReady(readinessOf(serial)) || anyReady(readinessOf(network))) {
            await this.poller.yield();
        } else {
            woken = await this.poller.wait(session.timeout());
        }
        if (this.stopping) return;

        const serialReady = readinessOf(serial);
        const networkReady = readinessOf(network);
        const networkTransport = network.transport;

        if (!anyReady(serialReady) && !anyReady(networkReady)) {
            if (!woken) session.timedOut();
            return;
        }

        // Exceptions resolve before any data moves
        if (serialReady.except || networkReady.except) {
            if (serialReady.except) {
                this.logger.warn({ err: serial.transport?.error }, "Exception on serial line");
                serial.close();
            }
            if (networkReady.except) {
                session.networkException(networkTransport?.error ?? new Error("Exception on RUDICS connection"));
            }
            return;
        }

        if (serialReady.write) {
            const { error } = serial.sendOne();
            if (error === "stalled") {
                this.logger.trace({ serial: serial.name }, "Serial line took no bytes");
            }
        }
        if (networkReady.write) {
            const { error } = session.sendToNetwork();
            if (error !== null) {
                this.logger.debug({ dockserver: network.name, error }, "Send to Dockserver failed");
            }
        }

        if (serialReady.read && serial.isOpen) {
            const { bytes, error } = serial.drainRead(this.serialReadChunk);
            if (error !== null) {
                this.logger.debug({ serial: serial.name, error }, "Serial input ended");
            } else {
                this.capture?.record("SERIAL", bytes);
                for (const byte of bytes) {
                    session.put(byte);
                }
            }
        }

        // Skip if a trigger closed or replaced the connection during this pass
        if (networkReady.read && networkTransport !== null && network.transport === networkTransport) {
            const { bytes, error } = session.receiveFromNetwork(this.networkReadChunk);
            if (error !== null) {
                this.logger.debug({ dockserver: network.name, error }, "Dockserver input ended");
            } else {
                this.capture?.record("RUDICS", bytes);
                serial.enqueueOut(bytes);
            }
        }
    }
}

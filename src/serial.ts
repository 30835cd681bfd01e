import type { Logger } from "pino";
import { SerialPort } from "serialport";
import { ByteQueue } from "./byte-queue.js";
import { EMPTY, type Endpoint, type ReadResult, type SendResult } from "./endpoint.js";
import { SetupError, toError } from "./errors.js";
import { StreamTransport } from "./transport/stream.js";
import type { ByteTransport } from "./transport/types.js";

export type Parity = "none" | "odd" | "even" | "mark" | "space";
export type DataBits = 5 | 6 | 7 | 8;
export type StopBits = 1 | 1.5 | 2;

export interface SerialPortOptions {
    /** Device path, e.g. /dev/ttyUSB0. */
    path: string;
    baudRate: number;
    parity: Parity;
    dataBits: DataBits;
    stopBits: StopBits;
}

/**
 * The glider side of the bridge: a serial line (or anything that behaves
 * like one).
 *
 * Output is pushed one byte per sendOne() call so a real line is never
 * overrun. Transport failures are logged and turn into a close; nothing
 * here throws into the loop.
 */
export class SerialEndpoint implements Endpoint {
    readonly name: string;
    private readonly logger: Logger;
    private _transport: ByteTransport | null;
    private readonly outbound = new ByteQueue();

    constructor(name: string, transport: ByteTransport, logger: Logger) {
        this.name = name;
        this._transport = transport;
        this.logger = logger;
    }

    get transport(): ByteTransport | null {
        return this._transport;
    }

    get isOpen(): boolean {
        return this._transport !== null;
    }

    /** Open and willing to accept input. */
    get readable(): boolean {
        return this.isOpen;
    }

    /** Open with output waiting. */
    get writable(): boolean {
        return this.isOpen && this.outbound.length > 0;
    }

    /** Bytes waiting to be written to the line. */
    get pending(): number {
        return this.outbound.length;
    }

    /** Append bytes to the outbound buffer. Dropped once the endpoint is closed. */
    enqueueOut(bytes: Buffer): void {
        if (!this.isOpen) {
            this.logger.debug({ port: this.name, dropped: bytes.length }, "Serial closed, dropping output");
            return;
        }
        this.outbound.push(bytes);
    }

    /**
     * Read up to `maxBytes` from the line. A zero-length read means the
     * line went away and closes the endpoint.
     */
    drainRead(maxBytes: number): ReadResult {
        const transport = this._transport;
        if (transport === null) {
            return { bytes: EMPTY, error: "closed" };
        }

        let bytes: Buffer;
        try {
            bytes = transport.read(maxBytes);
        } catch (err) {
            this.logger.error({ port: this.name, err: toError(err) }, "Unexpected error reading serial port");
            this.close();
            return { bytes: EMPTY, error: "io" };
        }

        if (bytes.length === 0) {
            this.logger.info({ port: this.name }, "Serial port reached EOF");
            this.close();
            return { bytes: EMPTY, error: "eof" };
        }

        return { bytes, error: null };
    }

    /** Write the front byte of the outbound buffer. */
    sendOne(): SendResult {
        const transport = this._transport;
        if (transport === null) {
            return { sent: 0, error: "closed" };
        }
        if (this.outbound.length === 0) {
            return { sent: 0, error: null };
        }

        let n: number;
        try {
            n = transport.write(this.outbound.peek(1));
        } catch (err) {
            this.logger.error({ port: this.name, err: toError(err) }, "Unexpected error writing serial port");
            this.close();
            return { sent: 0, error: "io" };
        }

        if (n <= 0) {
            return { sent: 0, error: "stalled" };
        }

        this.outbound.consume(n);
        return { sent: n, error: null };
    }

    /** Release the transport. Safe to call any number of times. */
    close(): void {
        const transport = this._transport;
        if (transport === null) return;
        this._transport = null;

        try {
            transport.close();
            this.logger.info({ port: this.name }, "Closed serial port");
        } catch (err) {
            this.logger.error({ port: this.name, err: toError(err) }, "Error closing serial port");
        }
    }
}

/**
 * Open a serial device and wrap it as a SerialEndpoint.
 *
 * Throws SetupError when the device cannot be opened.
 */
export async function openSerialPort(options: SerialPortOptions, logger: Logger): Promise<SerialEndpoint> {
    let port: SerialPort;
    try {
        const candidate = new SerialPort({
            path: options.path,
            baudRate: options.baudRate,
            parity: options.parity,
            dataBits: options.dataBits,
            stopBits: options.stopBits,
            autoOpen: false,
        });

        await new Promise<void>((resolve, reject) => {
            candidate.open((err) => (err ? reject(err) : resolve()));
        });
        port = candidate;
    } catch (err) {
        throw new SetupError(`Unable to open serial port ${options.path}: ${toError(err).message}`, { cause: err });
    }

    logger.info(
        {
            port: options.path,
            baudRate: options.baudRate,
            parity: options.parity,
            dataBits: options.dataBits,
            stopBits: options.stopBits,
        },
        "Opened serial port",
    );

    return new SerialEndpoint(options.path, new StreamTransport(port), logger);
}

import * as fs from "node:fs";
import type { Logger } from "pino";
import { toError } from "./errors.js";

/** Which side a captured chunk was read from. */
export type TrafficSource = "SERIAL" | "RUDICS";

const NEWLINE = Buffer.from("\n");

/**
 * Binary record of the traffic crossing the bridge.
 *
 * Each chunk read from either side is appended as
 * `<SOURCE> <length> : <raw bytes>\n`. The file is truncated on open.
 * A write failure stops the capture; the bridge keeps running.
 */
export class TrafficCapture {
    readonly path: string;
    private readonly logger: Logger;
    private fd: number | null;

    constructor(path: string, logger: Logger) {
        this.path = path;
        this.logger = logger;
        this.fd = fs.openSync(path, "w");
        logger.info({ capture: path }, "Capturing traffic");
    }

    get active(): boolean {
        return this.fd !== null;
    }

    record(source: TrafficSource, bytes: Buffer): void {
        if (this.fd === null) return;
        const header = Buffer.from(`${source} ${bytes.length} : `, "latin1");
        try {
            fs.writeSync(this.fd, Buffer.concat([header, bytes, NEWLINE]));
        } catch (err) {
            this.logger.error({ capture: this.path, err: toError(err) }, "Capture write failed, capture stopped");
            this.close();
        }
    }

    close(): void {
        if (this.fd === null) return;
        const fd = this.fd;
        this.fd = null;
        try {
            fs.closeSync(fd);
        } catch (err) {
            this.logger.error({ capture: this.path, err: toError(err) }, "Error closing capture file");
        }
    }
}

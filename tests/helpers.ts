/**
 * Shared test infrastructure.
 */

import * as fs from "node:fs";
import * as net from "node:net";
import * as os from "node:os";
import * as path from "node:path";
import pino, { type Logger } from "pino";
import { createSilentLogger } from "../src/logger.js";
import { MemoryTransport } from "../src/transport/memory.js";
import type { Connector } from "../src/rudics.js";

export const logger = createSilentLogger();

/** A debug-level logger keeping every record as a parsed object. */
export function recordingLogger(): { logger: Logger; records: Array<Record<string, unknown>> } {
    const records: Array<Record<string, unknown>> = [];
    const logger = pino({ level: "debug" }, {
        write(line: string) {
            const parsed: unknown = JSON.parse(line);
            if (parsed !== null && typeof parsed === "object" && !Array.isArray(parsed)) {
                records.push({ ...parsed });
            }
        },
    });
    return { logger, records };
}

export const delay = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

/** Let pending stream events fire. */
export const tick = () => new Promise<void>((r) => setImmediate(r));

export function tmpDir(prefix: string): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

/** Poll `condition` until it holds, failing after `timeoutMs`. */
export async function waitFor(condition: () => boolean, timeoutMs = 2000, label = "condition"): Promise<void> {
    const deadline = Date.now() + timeoutMs;
    while (!condition()) {
        if (Date.now() > deadline) {
            throw new Error(`Timed out waiting for ${label}`);
        }
        await delay(5);
    }
}

/** A connector handing out MemoryTransports, keeping each one for inspection. */
export function memoryConnector(options: { connected?: boolean } = {}): {
    connector: Connector;
    transports: MemoryTransport[];
    calls: Array<{ host: string; port: number }>;
} {
    const transports: MemoryTransport[] = [];
    const calls: Array<{ host: string; port: number }> = [];
    const connector: Connector = (host, port) => {
        calls.push({ host, port });
        const transport = new MemoryTransport({ connected: options.connected ?? true });
        transports.push(transport);
        return transport;
    };
    return { connector, transports, calls };
}

export interface TestServer {
    port: number;
    sockets: net.Socket[];
    /** Everything received, across all connections. */
    received(): Buffer;
    close(): Promise<void>;
}

/** A Dockserver stand-in on an ephemeral localhost port. */
export async function startServer(onConnection?: (socket: net.Socket) => void): Promise<TestServer> {
    const chunks: Buffer[] = [];
    const sockets: net.Socket[] = [];

    const server = net.createServer((socket) => {
        sockets.push(socket);
        socket.on("data", (chunk: Buffer) => chunks.push(chunk));
        socket.on("error", () => { /* peer reset */ });
        onConnection?.(socket);
    });

    await new Promise<void>((resolve, reject) => {
        server.once("error", reject);
        server.listen(0, "127.0.0.1", () => {
            server.removeListener("error", reject);
            resolve();
        });
    });

    const address = server.address();
    if (address === null || typeof address === "string") {
        throw new Error("Server has no TCP address");
    }

    return {
        port: address.port,
        sockets,
        received: () => Buffer.concat(chunks),
        close: () =>
            new Promise<void>((resolve) => {
                for (const socket of sockets) socket.destroy();
                server.close(() => resolve());
            }),
    };
}

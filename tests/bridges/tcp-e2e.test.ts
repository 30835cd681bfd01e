import { describe, it, afterEach } from "node:test";
import assert from "node:assert/strict";
import { SerialRudicsBridge } from "../../src/bridges/serial-rudics.js";
import { RudicsClient, type DisconnectReason, type RudicsClientOptions } from "../../src/rudics.js";
import { SerialEndpoint } from "../../src/serial.js";
import { SessionController } from "../../src/session.js";
import { MemoryTransport } from "../../src/transport/memory.js";
import { TriggerSet } from "../../src/triggers.js";
import { logger, startServer, waitFor, type TestServer } from "../helpers.js";

function setup(port: number, clientOptions: Partial<RudicsClientOptions> = {}) {
    const serialTransport = new MemoryTransport();
    const serial = new SerialEndpoint("/dev/ttyTEST", serialTransport, logger);
    const client = new RudicsClient({
        host: "127.0.0.1",
        port,
        reconnectDelaySeconds: 0,
        reconnectSpacingSeconds: 0,
        logger,
        ...clientOptions,
    });
    const session = new SessionController(client, {
        triggers: TriggerSet.defaults(),
        idleTimeoutSeconds: 3600,
        maxOpenTimeSeconds: 86400,
        maxOpenTimeDelaySeconds: 1800,
        initialConnectionState: "connected",
        logger,
    });
    const bridge = new SerialRudicsBridge({ serial, session, logger });
    return { serialTransport, client, bridge };
}

describe("Serial to Dockserver over TCP", () => {
    const cleanup: Array<() => Promise<void>> = [];

    afterEach(async () => {
        for (const fn of cleanup.reverse()) await fn();
        cleanup.length = 0;
    });

    function track(server: TestServer, bridge: SerialRudicsBridge, done: Promise<void>): void {
        cleanup.push(() => server.close());
        cleanup.push(async () => {
            await bridge.stop();
            await done;
        });
    }

    it("delivers serial bytes to the Dockserver in order", async () => {
        const server = await startServer();
        const { serialTransport, bridge } = setup(server.port);
        track(server, bridge, bridge.run());

        serialTransport.feed("12345");
        await waitFor(() => server.received().toString() === "12345", 2000, "Dockserver receive");
        assert.equal(server.sockets.length, 1);
    });

    it("delivers Dockserver bytes to the serial line", async () => {
        const server = await startServer((socket) => socket.write("login: "));
        const { serialTransport, bridge } = setup(server.port);
        track(server, bridge, bridge.run());

        await waitFor(() => serialTransport.written.toString() === "login: ", 2000, "serial output");
    });

    it("keeps retrying a refused connection", async () => {
        const probe = await startServer();
        const port = probe.port;
        await probe.close();

        const { client, bridge } = setup(port, { reconnectDelaySeconds: 0.05 });
        const reasons: DisconnectReason[] = [];
        client.on("disconnect", (reason: DisconnectReason) => reasons.push(reason));
        const done = bridge.run();
        cleanup.push(async () => {
            await bridge.stop();
            await done;
        });

        await waitFor(() => reasons.length >= 2, 3000, "two failed attempts");
        assert.deepEqual(reasons.slice(0, 2), ["error", "error"]);
    });

    it("throttles output to the RUDICS baud rate", async () => {
        const server = await startServer();
        const { serialTransport, bridge } = setup(server.port, { baudRateLimit: 9600 });
        track(server, bridge, bridge.run());

        const started = Date.now();
        serialTransport.feed(Buffer.alloc(100, 0x55));
        await waitFor(() => server.received().length === 100, 5000, "throttled send");

        // 100 bytes at 9600 baud need at least 99 byte-times after the first
        assert.ok(Date.now() - started >= 90, `took ${Date.now() - started}ms`);
    });
});

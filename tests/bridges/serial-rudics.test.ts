import { describe, it, afterEach } from "node:test";
import assert from "node:assert/strict";
import * as fs from "node:fs";
import * as path from "node:path";
import { SerialRudicsBridge } from "../../src/bridges/serial-rudics.js";
import { TrafficCapture } from "../../src/capture.js";
import { RudicsClient, type DisconnectReason, type RudicsClientOptions } from "../../src/rudics.js";
import { SerialEndpoint } from "../../src/serial.js";
import { SessionController, type SessionOptions } from "../../src/session.js";
import { MemoryTransport } from "../../src/transport/memory.js";
import { TriggerSet } from "../../src/triggers.js";
import type { Logger } from "pino";
import { logger, memoryConnector, recordingLogger, tmpDir, waitFor } from "../helpers.js";

const ON_LINE = "behavior surface_3: SUBSTATE 1 ->2 : Picking iridium or freewave\n";
const OFF_LINE = "surface_3: Waiting for final GPS fix\n";

interface SetupOptions {
    session?: Partial<SessionOptions>;
    client?: Partial<RudicsClientOptions>;
    capture?: TrafficCapture;
    bridgeLogger?: Logger;
}

function setup(options: SetupOptions = {}) {
    const serialTransport = new MemoryTransport();
    const serial = new SerialEndpoint("/dev/ttyTEST", serialTransport, logger);
    const net = memoryConnector();
    const client = new RudicsClient({
        host: "dockserver.test",
        reconnectDelaySeconds: 0,
        reconnectSpacingSeconds: 0,
        connector: net.connector,
        logger,
        ...options.client,
    });
    const session = new SessionController(client, {
        triggers: TriggerSet.defaults(),
        idleTimeoutSeconds: 3600,
        maxOpenTimeSeconds: 86400,
        maxOpenTimeDelaySeconds: 1800,
        initialConnectionState: "connected",
        logger,
        ...options.session,
    });
    const bridge = new SerialRudicsBridge({
        serial,
        session,
        logger: options.bridgeLogger ?? logger,
        capture: options.capture,
    });
    return { serialTransport, serial, client, session, bridge, ...net };
}

describe("SerialRudicsBridge", () => {
    const running: SerialRudicsBridge[] = [];
    let dir: string | undefined;

    afterEach(async () => {
        for (const bridge of running) await bridge.stop();
        running.length = 0;
        if (dir) fs.rmSync(dir, { recursive: true, force: true });
        dir = undefined;
    });

    function start(bridge: SerialRudicsBridge): Promise<void> {
        running.push(bridge);
        return bridge.run();
    }

    it("forwards serial bytes to the Dockserver in order", async () => {
        const { serialTransport, bridge, transports } = setup();
        serialTransport.feed("hello");
        serialTransport.end();

        await start(bridge);

        assert.equal(transports.length, 1);
        assert.equal(transports[0].written.toString(), "hello");
        assert.equal(transports[0].closed, true);
        assert.equal(serialTransport.closed, true);
        assert.equal(bridge.status, "stopped");
    });

    it("forwards Dockserver bytes to the serial line", async () => {
        const { serialTransport, bridge, transports } = setup();
        const done = start(bridge);

        await waitFor(() => transports.length === 1, 2000, "connect");
        transports[0].feed("login: ");
        await waitFor(() => serialTransport.written.toString() === "login: ", 2000, "serial output");

        await bridge.stop();
        await done;
    });

    it("disconnects on the off-trigger after delivering the whole trigger line", async () => {
        const { serialTransport, session, bridge, transports } = setup();
        serialTransport.feed("abc\n" + OFF_LINE);
        serialTransport.end();

        await start(bridge);

        assert.equal(session.desiredOpen, false);
        assert.equal(transports.length, 1);
        assert.equal(transports[0].written.toString(), "abc\n" + OFF_LINE);
        assert.equal(transports[0].closed, true);
    });

    it("connects on the on-trigger and forwards what follows", async () => {
        const { serialTransport, bridge, transports } = setup({ session: { initialConnectionState: "disconnected" } });
        serialTransport.feed(ON_LINE + "payload\n");
        serialTransport.end();

        await start(bridge);

        assert.equal(transports.length, 1);
        assert.equal(transports[0].written.toString(), "payload\n");
    });

    it("reconnects after a network failure and keeps forwarding", async () => {
        const { serialTransport, client, bridge, transports } = setup();
        const disconnects: DisconnectReason[] = [];
        client.on("disconnect", (reason: DisconnectReason) => disconnects.push(reason));
        const done = start(bridge);

        serialTransport.feed("ab");
        await waitFor(() => transports.length === 1 && transports[0].written.toString() === "ab", 2000, "first send");

        transports[0].fail(new Error("ECONNRESET"));
        await waitFor(() => transports.length === 2, 2000, "reconnect");

        serialTransport.feed("cd");
        await waitFor(() => transports[1].written.toString() === "cd", 2000, "second send");
        assert.deepEqual(disconnects, ["error"]);
        assert.equal(transports[0].closed, true);

        await bridge.stop();
        await done;
    });

    it("delivers a throttled backlog before the off-trigger close", async () => {
        // 50 baud lets a few bytes out per second; the serial side is read far faster
        const { serialTransport, client, bridge, transports } = setup({ client: { baudRateLimit: 50 } });
        serialTransport.feed("x".repeat(20) + "\n" + OFF_LINE);
        serialTransport.end();

        await start(bridge);

        assert.ok(client.nextSendTime > 0);

        assert.equal(transports[0].written.toString(), "x".repeat(20) + "\n" + OFF_LINE);
    });

    it("waits out a serial line that takes no bytes", async () => {
        const { serialTransport, serial, bridge, transports } = setup();
        serialTransport.writeLimit = 0;
        const done = start(bridge);

        await waitFor(() => transports.length === 1, 2000, "connect");
        transports[0].feed("ok");
        await waitFor(() => serial.pending === 2, 2000, "queued for serial");
        assert.equal(serial.isOpen, true);
        assert.equal(serialTransport.written.length, 0);

        serialTransport.writeLimit = null;
        await waitFor(() => serialTransport.written.toString() === "ok", 2000, "serial output");

        await bridge.stop();
        await done;
    });

    it("logs why serial input ended", async () => {
        const { logger: bridgeLogger, records } = recordingLogger();
        const { serialTransport, bridge } = setup({ bridgeLogger });
        serialTransport.end();

        await start(bridge);

        const ended = records.filter((r) => r.msg === "Serial input ended");
        assert.equal(ended.length, 1);
        assert.equal(ended[0].error, "eof");
        assert.equal(ended[0].serial, "/dev/ttyTEST");
    });

    it("stays disconnected after the Dockserver hangs up", async () => {
        const { session, client, bridge, transports } = setup();
        const done = start(bridge);

        await waitFor(() => transports.length === 1, 2000, "connect");
        transports[0].end();
        await waitFor(() => !client.isOpen, 2000, "hang up");
        assert.equal(session.desiredOpen, false);

        await bridge.stop();
        await done;
        assert.equal(transports.length, 1);
    });

    it("closes an idle connection after the idle timeout", async () => {
        const { session, client, bridge, transports } = setup({ session: { idleTimeoutSeconds: 1 } });
        let idle = 0;
        session.on("idle-timeout", () => idle++);

        const started = Date.now();
        const done = start(bridge);
        await waitFor(() => transports.length === 1, 2000, "connect");
        await waitFor(() => !client.isOpen, 3000, "idle close");

        assert.ok(Date.now() - started >= 900);
        assert.equal(idle, 1);
        assert.equal(session.desiredOpen, false);

        await bridge.stop();
        await done;
    });

    it("finishes when the serial line fails", async () => {
        const { serialTransport, bridge, transports } = setup();
        const done = start(bridge);

        await waitFor(() => transports.length === 1, 2000, "connect");
        serialTransport.fail(new Error("EIO"));
        await done;

        assert.equal(serialTransport.closed, true);
        assert.equal(transports[0].closed, true);
    });

    it("stops on request and releases both sides", async () => {
        const { serialTransport, bridge, transports } = setup();
        const done = start(bridge);
        await waitFor(() => transports.length === 1, 2000, "connect");

        assert.equal(bridge.status, "running");
        await bridge.stop();
        await done;

        assert.equal(bridge.status, "stopped");
        assert.equal(serialTransport.closed, true);
        assert.equal(transports[0].closed, true);
    });

    it("refuses to run twice at once", async () => {
        const { bridge } = setup();
        const done = start(bridge);

        await assert.rejects(bridge.run(), /Bridge already running/);

        await bridge.stop();
        await done;
    });

    it("captures serial and Dockserver traffic", async () => {
        const base = tmpDir("bridge-capture-");
        dir = base;
        const file = path.join(base, "traffic.cap");
        const capture = new TrafficCapture(file, logger);
        const { serialTransport, bridge, transports } = setup({ capture });
        const done = start(bridge);

        await waitFor(() => transports.length === 1, 2000, "connect");
        transports[0].feed("ok");
        await waitFor(() => serialTransport.written.toString() === "ok", 2000, "serial output");

        serialTransport.feed("hi");
        serialTransport.end();
        await done;

        assert.equal(capture.active, false);
        assert.equal(fs.readFileSync(file, "latin1"), "RUDICS 2 : ok\nSERIAL 1 : h\nSERIAL 1 : i\n");
    });
});

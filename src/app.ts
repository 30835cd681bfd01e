import type { Logger } from "pino";
import { SerialRudicsBridge } from "./bridges/serial-rudics.js";
import { TrafficCapture } from "./capture.js";
import { systemClock, type Clock } from "./clock.js";
import type { Config } from "./config.js";
import { SetupError } from "./errors.js";
import { createChildLogger } from "./logger.js";
import { RudicsClient, type Connector } from "./rudics.js";
import { openSerialPort, type SerialEndpoint, type SerialPortOptions } from "./serial.js";
import { SessionController } from "./session.js";
import { TriggerSet } from "./triggers.js";

/** Seams for replacing the real device and network in tests. */
export interface BridgeDependencies {
    openSerial?: (options: SerialPortOptions, logger: Logger) => Promise<SerialEndpoint>;
    connector?: Connector;
    clock?: Clock;
}

/** Build the RUDICS client and the session that drives it. */
export function createSession(config: Config, logger: Logger, deps: BridgeDependencies = {}): SessionController {
    const clock = deps.clock ?? systemClock;
    const triggers = TriggerSet.compile(config.session.onTriggerPatterns, config.session.offTriggerPatterns);

    const client = new RudicsClient({
        host: config.rudics.host,
        port: config.rudics.port,
        reconnectDelaySeconds: config.session.reconnectDelaySeconds,
        reconnectSpacingSeconds: config.session.reconnectSpacingSeconds,
        baudRateLimit: config.rudics.baudRateLimit,
        clock,
        connector: deps.connector,
        logger: createChildLogger(logger, "rudics"),
    });

    return new SessionController(client, {
        triggers,
        idleTimeoutSeconds: config.session.idleTimeoutSeconds,
        maxOpenTimeSeconds: config.session.maxOpenTimeSeconds,
        maxOpenTimeDelaySeconds: config.session.maxOpenTimeDelaySeconds,
        initialConnectionState: config.session.initialConnectionState,
        lineTerminator: config.session.lineTerminator,
        clock,
        logger: createChildLogger(logger, "session"),
    });
}

/**
 * Open the serial device and assemble a ready-to-run bridge.
 *
 * Throws SetupError when the device or the capture file cannot be opened.
 */
export async function createBridge(
    config: Config,
    logger: Logger,
    deps: BridgeDependencies = {},
): Promise<SerialRudicsBridge> {
    const session = createSession(config, logger, deps);
    const openSerial = deps.openSerial ?? openSerialPort;
    const serial = await openSerial(config.serial, createChildLogger(logger, "serial"));

    let capture: TrafficCapture | undefined;
    if (config.capture) {
        try {
            capture = new TrafficCapture(config.capture, createChildLogger(logger, "capture"));
        } catch (err) {
            serial.close();
            throw new SetupError(`Unable to open capture file ${config.capture}`, { cause: err });
        }
    }

    return new SerialRudicsBridge({
        serial,
        session,
        capture,
        serialReadChunk: config.session.serialReadChunk,
        logger: createChildLogger(logger, "bridge"),
    });
}

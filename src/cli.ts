import { Command, InvalidArgumentError } from "commander";
import * as fs from "node:fs";
import { createBridge, type BridgeDependencies } from "./app.js";
import type { SerialRudicsBridge } from "./bridges/serial-rudics.js";
import { loadConfig, type Config } from "./config.js";
import { ConfigError, SetupError, toError } from "./errors.js";
import { createRootLogger } from "./logger.js";

function resolveVersion(): string {
    const packageJson: unknown = JSON.parse(fs.readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
    if (packageJson !== null && typeof packageJson === "object" && "version" in packageJson) {
        return typeof packageJson.version === "string" ? packageJson.version : "0.0.0";
    }
    return "0.0.0";
}

export interface CliOptions {
    config?: string;
    serial?: string;
    baudRate?: number;
    parity?: string;
    dataBits?: number;
    stopBits?: number;
    host?: string;
    port?: number;
    rudicsBaudRate?: number;
    idleTimeout?: number;
    reconnectDelay?: number;
    reconnectSpacing?: number;
    maxOpenTime?: number;
    maxOpenTimeDelay?: number;
    initialState?: string;
    triggerOn: string[];
    triggerOff: string[];
    logLevel?: string;
    logFormat?: string;
    logFile?: string;
    verbose?: boolean;
    capture?: string;
}

function parseNumber(value: string): number {
    const n = Number(value);
    if (value.trim() === "" || !Number.isFinite(n)) {
        throw new InvalidArgumentError(`Not a number: ${value}`);
    }
    return n;
}

// Collect repeated option values into an array
function collectMultiple(value: string, previous: string[]): string[] {
    return previous.concat([value]);
}

/** Map command-line flags onto the configuration tree. Unset flags leave the lower layers alone. */
export function toOverrides(options: CliOptions): Record<string, unknown> {
    return {
        serial: {
            path: options.serial,
            baudRate: options.baudRate,
            parity: options.parity,
            dataBits: options.dataBits,
            stopBits: options.stopBits,
        },
        rudics: {
            host: options.host,
            port: options.port,
            baudRateLimit: options.rudicsBaudRate,
        },
        session: {
            idleTimeoutSeconds: options.idleTimeout,
            reconnectDelaySeconds: options.reconnectDelay,
            reconnectSpacingSeconds: options.reconnectSpacing,
            maxOpenTimeSeconds: options.maxOpenTime,
            maxOpenTimeDelaySeconds: options.maxOpenTimeDelay,
            initialConnectionState: options.initialState,
            onTriggerPatterns: options.triggerOn.length > 0 ? options.triggerOn : undefined,
            offTriggerPatterns: options.triggerOff.length > 0 ? options.triggerOff : undefined,
        },
        log: {
            level: options.verbose ? "debug" : options.logLevel,
            format: options.logFormat,
            file: options.logFile,
        },
        capture: options.capture,
    };
}

/**
 * Load the configuration, open the device and run the bridge until the
 * serial line closes or a signal arrives. Returns the process exit code.
 */
export async function runCommand(options: CliOptions, deps: BridgeDependencies = {}): Promise<number> {
    let config: Config;
    try {
        config = loadConfig({ file: options.config, overrides: toOverrides(options) });
    } catch (err) {
        if (err instanceof ConfigError) {
            console.error(err.message);
            return 1;
        }
        throw err;
    }

    const logger = createRootLogger(config.log);
    logger.info({ serial: config.serial.path, dockserver: `${config.rudics.host}:${config.rudics.port}` }, "Starting");

    let bridge: SerialRudicsBridge;
    try {
        bridge = await createBridge(config, logger, deps);
    } catch (err) {
        if (err instanceof SetupError) {
            logger.fatal({ err }, err.message);
            return 1;
        }
        throw err;
    }

    const onSignal = (signal: NodeJS.Signals) => {
        logger.info({ signal }, "Stopping");
        bridge.stop().catch((err: unknown) => {
            logger.error({ err: toError(err) }, "Error while stopping");
        });
    };
    process.once("SIGINT", onSignal);
    process.once("SIGTERM", onSignal);

    try {
        await bridge.run();
        return 0;
    } catch (err) {
        logger.fatal({ err: toError(err) }, "Bridge failed");
        return 1;
    } finally {
        process.off("SIGINT", onSignal);
        process.off("SIGTERM", onSignal);
    }
}

export function createCli(): Command {
    const program = new Command();

    program
        .name("serial2rudics")
        .description("Bridge a glider serial line to a Dockserver RUDICS port, connecting while the glider is surfaced")
        .version(resolveVersion(), "-v, --version", "output the version number")
        .option("-c, --config <file>", "JSON configuration file")
        .option("--serial <path>", "serial device connected to the glider")
        .option("--baud-rate <n>", "serial port baud rate (default: 115200)", parseNumber)
        .option("--parity <parity>", "serial parity: none, odd, even, mark, space")
        .option("--data-bits <n>", "serial data bits: 5-8", parseNumber)
        .option("--stop-bits <n>", "serial stop bits: 1, 1.5, 2", parseNumber)
        .option("--host <host>", "Dockserver host with a RUDICS listener")
        .option("--port <port>", "Dockserver RUDICS port (default: 6565)", parseNumber)
        .option("--rudics-baud-rate <n>", "throttle output to the Dockserver to this baud rate", parseNumber)
        .option("--idle-timeout <seconds>", "drop the connection after this long without traffic", parseNumber)
        .option("--reconnect-delay <seconds>", "wait between connection attempts", parseNumber)
        .option("--reconnect-spacing <seconds>", "minimum gap between a close and the next open", parseNumber)
        .option("--max-open-time <seconds>", "recycle a connection open this long", parseNumber)
        .option("--max-open-time-delay <seconds>", "wait after a recycled connection before reopening", parseNumber)
        .option("--initial-state <state>", "connected or disconnected at startup")
        .option("--trigger-on <pattern>", "connect after a line matching this pattern (repeatable)", collectMultiple, [])
        .option("--trigger-off <pattern>", "disconnect after a line matching this pattern (repeatable)", collectMultiple, [])
        .option("--log-level <level>", "trace, debug, info, warn, error, fatal, silent")
        .option("--log-format <format>", "pretty or json")
        .option("--log-file <file>", "append JSON logs to this file")
        .option("--verbose", "shorthand for --log-level debug")
        .option("--capture <file>", "record all traffic to this file")
        .action(async (options: CliOptions) => {
            process.exitCode = await runCommand(options);
        });

    return program;
}

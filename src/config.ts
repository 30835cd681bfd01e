import * as fs from "node:fs";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ConfigError } from "./errors.js";
import { DEFAULT_RUDICS_PORT } from "./rudics.js";
import { compilePatterns, DEFAULT_OFF_PATTERNS, DEFAULT_ON_PATTERNS } from "./triggers.js";

/** Baud rates a serial line (and the RUDICS throttle) may be set to. */
export const STANDARD_BAUD_RATES: readonly number[] = [
    50, 75, 110, 134, 150, 200, 300, 600, 1200, 1800, 2400, 4800, 9600, 19200, 38400,
    57600, 115200, 230400, 460800, 500000, 576000, 921600, 1000000, 1152000, 1500000,
    2000000, 2500000, 3000000, 3500000, 4000000,
];

const SerialSchema = Type.Object({
    path: Type.String({ minLength: 1, description: "Serial device path" }),
    baudRate: Type.Integer({ minimum: 1 }),
    parity: Type.Union([
        Type.Literal("none"),
        Type.Literal("odd"),
        Type.Literal("even"),
        Type.Literal("mark"),
        Type.Literal("space"),
    ]),
    dataBits: Type.Union([Type.Literal(5), Type.Literal(6), Type.Literal(7), Type.Literal(8)]),
    stopBits: Type.Union([Type.Literal(1), Type.Literal(1.5), Type.Literal(2)]),
});

const RudicsSchema = Type.Object({
    host: Type.String({ minLength: 1, description: "Dockserver host with a RUDICS listener" }),
    port: Type.Integer({ minimum: 1, maximum: 65535 }),
    baudRateLimit: Type.Optional(Type.Integer({ minimum: 1, description: "Throttle output to this baud rate" })),
});

const SessionSchema = Type.Object({
    idleTimeoutSeconds: Type.Number({ exclusiveMinimum: 0 }),
    reconnectDelaySeconds: Type.Number({ minimum: 0 }),
    reconnectSpacingSeconds: Type.Number({ minimum: 0 }),
    maxOpenTimeSeconds: Type.Number({ exclusiveMinimum: 0 }),
    maxOpenTimeDelaySeconds: Type.Number({ minimum: 0 }),
    initialConnectionState: Type.Union([Type.Literal("connected"), Type.Literal("disconnected")]),
    lineTerminator: Type.String({ minLength: 1, maxLength: 1 }),
    onTriggerPatterns: Type.Array(Type.String({ minLength: 1 }), { minItems: 1 }),
    offTriggerPatterns: Type.Array(Type.String({ minLength: 1 }), { minItems: 1 }),
    serialReadChunk: Type.Integer({ minimum: 1 }),
});

const LogSchema = Type.Object({
    level: Type.Union([
        Type.Literal("trace"),
        Type.Literal("debug"),
        Type.Literal("info"),
        Type.Literal("warn"),
        Type.Literal("error"),
        Type.Literal("fatal"),
        Type.Literal("silent"),
    ]),
    format: Type.Union([Type.Literal("pretty"), Type.Literal("json")]),
    file: Type.Optional(Type.String({ minLength: 1 })),
});

export const ConfigSchema = Type.Object({
    serial: SerialSchema,
    rudics: RudicsSchema,
    session: SessionSchema,
    log: LogSchema,
    capture: Type.Optional(Type.String({ minLength: 1, description: "Binary traffic capture file" })),
});

export type Config = Static<typeof ConfigSchema>;

type DeepPartial<T> = {
    [K in keyof T]?: T[K] extends readonly unknown[] ? T[K] : T[K] extends object ? DeepPartial<T[K]> : T[K];
};

export type ConfigOverrides = DeepPartial<Config>;

/** Everything but the device path and the Dockserver host has a default. */
export const DEFAULT_CONFIG: ConfigOverrides = {
    serial: {
        baudRate: 115200,
        parity: "none",
        dataBits: 8,
        stopBits: 1,
    },
    rudics: {
        port: DEFAULT_RUDICS_PORT,
    },
    session: {
        idleTimeoutSeconds: 3600,
        reconnectDelaySeconds: 120,
        reconnectSpacingSeconds: 10,
        maxOpenTimeSeconds: 86400,
        maxOpenTimeDelaySeconds: 1800,
        initialConnectionState: "connected",
        lineTerminator: "\n",
        onTriggerPatterns: [...DEFAULT_ON_PATTERNS],
        offTriggerPatterns: [...DEFAULT_OFF_PATTERNS],
        serialReadChunk: 1,
    },
    log: {
        level: "info",
        format: "pretty",
    },
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return value !== null && typeof value === "object" && !Array.isArray(value);
}

function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = { ...target };

    for (const [key, value] of Object.entries(source)) {
        if (value === undefined) continue;
        const current = result[key];
        result[key] = isPlainObject(value) && isPlainObject(current) ? deepMerge(current, value) : value;
    }

    return result;
}

/** Read a JSON configuration file. */
export function loadConfigFile(path: string): Record<string, unknown> {
    let content: string;
    try {
        content = fs.readFileSync(path, "utf-8");
    } catch (err) {
        throw new ConfigError(`Unable to read config file ${path}`, { cause: err });
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(content);
    } catch (err) {
        throw new ConfigError(`Invalid JSON in config file ${path}`, { cause: err });
    }

    if (!isPlainObject(parsed)) {
        throw new ConfigError(`Config file ${path} must contain a JSON object`);
    }
    return parsed;
}

/**
 * Check a merged configuration and narrow it to Config.
 * Throws ConfigError listing every problem found.
 */
export function validateConfig(value: unknown): Config {
    if (!Value.Check(ConfigSchema, value)) {
        const problems = [...Value.Errors(ConfigSchema, value)].map((e) => `${e.path || "/"}: ${e.message}`);
        throw new ConfigError(`Invalid configuration: ${problems.join("; ")}`);
    }

    if (!STANDARD_BAUD_RATES.includes(value.serial.baudRate)) {
        throw new ConfigError(`Unsupported serial baud rate ${value.serial.baudRate}`);
    }
    const limit = value.rudics.baudRateLimit;
    if (limit !== undefined && !STANDARD_BAUD_RATES.includes(limit)) {
        throw new ConfigError(`Unsupported RUDICS baud rate ${limit}`);
    }

    // Fail at startup, not on the first trigger line
    compilePatterns(value.session.onTriggerPatterns);
    compilePatterns(value.session.offTriggerPatterns);

    return value;
}

export interface LoadConfigOptions {
    /** JSON config file, applied over the defaults. */
    file?: string;
    /** Applied last, e.g. from command-line flags. Checked like the rest. */
    overrides?: ConfigOverrides | Record<string, unknown>;
}

/** Priority: overrides > file > defaults. */
export function loadConfig(options: LoadConfigOptions = {}): Config {
    let merged = deepMerge({}, DEFAULT_CONFIG);
    if (options.file) {
        merged = deepMerge(merged, loadConfigFile(options.file));
    }
    if (options.overrides) {
        merged = deepMerge(merged, options.overrides);
    }
    return validateConfig(merged);
}

import pino, { type Logger } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";
export type LogFormat = "pretty" | "json";

export interface LogConfig {
    level: LogLevel;
    format: LogFormat;
    /** Append JSON lines to this file instead of writing to stdout. */
    file?: string;
}

export function createRootLogger(config: LogConfig): Logger {
    if (config.file) {
        return pino(
            { level: config.level },
            pino.destination({ dest: config.file, mkdir: true, append: true, sync: true }),
        );
    }

    const transport =
        config.format === "pretty"
            ? {
                target: "pino-pretty",
                options: {
                    colorize: true,
                    singleLine: true,
                    ignore: "pid,hostname",
                },
            }
            : undefined;

    return pino({
        level: config.level,
        transport,
    });
}

export function createChildLogger(parent: Logger, name: string): Logger {
    return parent.child({ name });
}

/** A logger that drops everything. */
export function createSilentLogger(): Logger {
    return pino({ level: "silent" });
}

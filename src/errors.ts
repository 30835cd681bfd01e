/** A configuration value is missing, malformed or out of range. Fatal for the run. */
export class ConfigError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "ConfigError";
    }
}

/** A device or socket needed at startup could not be created. Fatal for the run. */
export class SetupError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "SetupError";
    }
}

/** Render an unknown thrown value as an Error. */
export function toError(err: unknown): Error {
    return err instanceof Error ? err : new Error(String(err));
}

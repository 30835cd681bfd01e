import { ConfigError } from "./errors.js";

export type TriggerDirection = "on" | "off";

/** Connect when the glider starts its surface dialog, or when it aborts the mission. */
export const DEFAULT_ON_PATTERNS: readonly string[] = [
    String.raw`behavior\s+surface_[0-9]+:\s+SUBSTATE\s+[0-9]+\s+->[0-9]+\s+:\s+Picking\s+iridium\s+or\s+freewave`,
    String.raw`:\s+abort_the_mission`,
];

/** Disconnect once the glider waits for its final GPS fix before diving. */
export const DEFAULT_OFF_PATTERNS: readonly string[] = [
    String.raw`surface_[0-9]+:\s+.*Waiting\s+for\s+final\s+GPS\s+fix`,
];

/**
 * Compile one or more patterns into a single case-insensitive matcher.
 * Several patterns are tried as an alternation, in order.
 *
 * Throws ConfigError naming the first pattern that does not compile.
 */
export function compilePatterns(patterns: readonly string[]): RegExp {
    if (patterns.length === 0) {
        throw new ConfigError("At least one trigger pattern is required");
    }

    for (const pattern of patterns) {
        try {
            new RegExp(pattern, "i");
        } catch (err) {
            const reason = err instanceof Error ? err.message : String(err);
            throw new ConfigError(`Invalid trigger pattern "${pattern}": ${reason}`, { cause: err });
        }
    }

    const source = patterns.length === 1
        ? patterns[0]
        : patterns.map((p) => `(?:${p})`).join("|");
    return new RegExp(source, "i");
}

/**
 * The pair of matchers that switch the network leg on and off.
 *
 * Lines are searched, not matched whole: a pattern may hit anywhere in the
 * line, terminator included. Bytes are mapped 1:1 to characters (latin1) so
 * arbitrary binary on the serial line cannot break the search.
 */
export class TriggerSet {
    readonly on: RegExp;
    readonly off: RegExp;

    constructor(on: RegExp, off: RegExp) {
        this.on = on;
        this.off = off;
    }

    static compile(onPatterns: readonly string[], offPatterns: readonly string[]): TriggerSet {
        return new TriggerSet(compilePatterns(onPatterns), compilePatterns(offPatterns));
    }

    static defaults(): TriggerSet {
        return TriggerSet.compile(DEFAULT_ON_PATTERNS, DEFAULT_OFF_PATTERNS);
    }

    /** Whether `line` contains a match for the given direction's pattern. */
    matches(direction: TriggerDirection, line: Buffer): boolean {
        const re = direction === "on" ? this.on : this.off;
        return re.test(line.toString("latin1"));
    }
}

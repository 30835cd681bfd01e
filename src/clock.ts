/**
 * Time source for every time-gated decision in the bridge.
 * All values are seconds since the epoch, as floating point.
 */
export interface Clock {
    now(): number;
}

export const systemClock: Clock = {
    now: () => Date.now() / 1000,
};

/** A clock that only moves when told to. Used by tests. */
export class ManualClock implements Clock {
    private t: number;

    constructor(start = 0) {
        this.t = start;
    }

    now(): number {
        return this.t;
    }

    /** Move the clock forward by `seconds`. */
    advance(seconds: number): void {
        this.t += seconds;
    }

    set(t: number): void {
        this.t = t;
    }
}

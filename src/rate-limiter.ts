/** Bits on the wire per byte with 8N1 framing: start + 8 data + stop. */
export const BITS_PER_BYTE = 9;

/**
 * Throttles releases from an outbound buffer to an average byte rate
 * derived from a baud rate.
 *
 * The limiter has no timer of its own. Each call to allowance() is one
 * opportunity to release a chunk, sized by the time elapsed since the last
 * release, so the bridge loop's polling cadence is the clock. A release is
 * refused until `nextSendTime`, one byte-time after the previous one.
 *
 * Without a baud rate the limiter is transparent: the whole queue may go
 * out on every call.
 */
export class RateLimiter {
    /** Seconds needed to put one byte on the wire, or null when unthrottled. */
    readonly secondsPerByte: number | null;
    private _lastSendTime: number | null = null;
    private _nextSendTime = 0;

    constructor(baudRate?: number) {
        this.secondsPerByte = baudRate === undefined || baudRate < 1 ? null : BITS_PER_BYTE / baudRate;
    }

    get limited(): boolean {
        return this.secondsPerByte !== null;
    }

    get bytesPerSecond(): number {
        return this.secondsPerByte === null ? Infinity : 1 / this.secondsPerByte;
    }

    get lastSendTime(): number | null {
        return this._lastSendTime;
    }

    get nextSendTime(): number {
        return this._nextSendTime;
    }

    /** Whether a release may happen at `now`. */
    ready(now: number): boolean {
        return this.secondsPerByte === null || now >= this._nextSendTime;
    }

    /** Number of bytes (at most `queued`) that may be released at `now`. */
    allowance(now: number, queued: number): number {
        if (queued <= 0) return 0;
        if (this.secondsPerByte === null) return queued;
        if (now < this._nextSendTime) return 0;

        const elapsed = this._lastSendTime === null ? this.secondsPerByte : now - this._lastSendTime;
        // Tolerate float noise at exact byte-time multiples
        const n = Math.floor(elapsed / this.secondsPerByte + 1e-9);
        return Math.max(0, Math.min(n, queued));
    }

    /** Record that `sent` bytes went out at `now`. */
    record(now: number, sent: number): void {
        if (sent <= 0 || this.secondsPerByte === null) return;
        this._lastSendTime = now;
        this._nextSendTime = now + this.secondsPerByte;
    }
}

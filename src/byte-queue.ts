import { EMPTY } from "./endpoint.js";

/**
 * FIFO of bytes built from appended chunks.
 *
 * Appending never copies the existing contents; peek() merges only as many
 * leading chunks as it needs, so a queue fed one byte at a time stays cheap.
 */
export class ByteQueue {
    private chunks: Buffer[] = [];
    private _length = 0;

    get length(): number {
        return this._length;
    }

    push(bytes: Buffer): void {
        if (bytes.length === 0) return;
        this.chunks.push(Buffer.from(bytes));
        this._length += bytes.length;
    }

    /** The first `max` bytes (fewer if the queue is shorter), without removing them. */
    peek(max: number): Buffer {
        if (this.chunks.length === 0 || max <= 0) {
            return EMPTY;
        }

        const first = this.chunks[0];
        if (first.length >= max || this.chunks.length === 1) {
            return first.subarray(0, max);
        }

        let size = 0;
        let count = 0;
        while (count < this.chunks.length && size < max) {
            size += this.chunks[count].length;
            count++;
        }
        const merged = Buffer.concat(this.chunks.slice(0, count), size);
        this.chunks.splice(0, count, merged);
        return merged.subarray(0, max);
    }

    /** Drop `n` bytes from the front. */
    consume(n: number): void {
        let remaining = Math.min(n, this._length);
        while (remaining > 0) {
            const first = this.chunks[0];
            if (first.length <= remaining) {
                this.chunks.shift();
                remaining -= first.length;
                this._length -= first.length;
            } else {
                this.chunks[0] = first.subarray(remaining);
                this._length -= remaining;
                remaining = 0;
            }
        }
    }

    /** Empty the queue. Returns the number of bytes dropped. */
    clear(): number {
        const dropped = this._length;
        this.chunks = [];
        this._length = 0;
        return dropped;
    }
}

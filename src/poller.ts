import type { Endpoint } from "./endpoint.js";
import type { ByteTransport } from "./transport/types.js";

/** setTimeout cannot wait longer than this. */
const MAX_TIMER_MS = 2 ** 31 - 1;

export interface Readiness {
    read: boolean;
    write: boolean;
    except: boolean;
}

const NOT_READY: Readiness = { read: false, write: false, except: false };

/**
 * What an endpoint can do right now.
 *
 * - read: it wants input and the transport holds bytes or has seen EOF
 * - write: it has output and the transport can take more
 * - except: the transport reported an error
 */
export function readinessOf(endpoint: Endpoint): Readiness {
    const transport = endpoint.transport;
    if (!endpoint.isOpen || transport === null) {
        return NOT_READY;
    }
    return {
        read: endpoint.readable && (transport.available > 0 || transport.ended),
        write: endpoint.writable && transport.writable,
        except: transport.error !== null,
    };
}

export function anyReady(readiness: Readiness): boolean {
    return readiness.read || readiness.write || readiness.except;
}

/**
 * Bounded readiness wait over a set of transports.
 *
 * Transports are registered with watch(); any activity they report ends
 * the current wait early. Activity seen while no wait is in progress is
 * remembered, so the next wait returns at once.
 */
export class Poller {
    private watched = new WeakSet<ByteTransport>();
    private wake: (() => void) | null = null;
    private pending = false;

    /** Register a transport. Watching the same transport twice is a no-op. */
    watch(transport: ByteTransport): void {
        if (this.watched.has(transport)) return;
        this.watched.add(transport);
        transport.onActivity(() => this.signal());
    }

    /** End the current wait (or the next one) early. */
    signal(): void {
        if (this.wake) {
            this.wake();
        } else {
            this.pending = true;
        }
    }

    /**
     * Wait until a watched transport reports activity or `timeoutSeconds`
     * elapse. Resolves true when woken by activity, false on timeout.
     */
    wait(timeoutSeconds: number): Promise<boolean> {
        if (this.pending) {
            this.pending = false;
            return Promise.resolve(true);
        }

        const ms = Math.min(MAX_TIMER_MS, Math.max(0, Math.ceil(timeoutSeconds * 1000)));
        return new Promise<boolean>((resolve) => {
            const timer = setTimeout(() => {
                this.wake = null;
                resolve(false);
            }, ms);
            this.wake = () => {
                clearTimeout(timer);
                this.wake = null;
                resolve(true);
            };
        });
    }

    /** Give pending I/O callbacks a turn without blocking. */
    yield(): Promise<void> {
        this.pending = false;
        return new Promise<void>((resolve) => setImmediate(resolve));
    }
}

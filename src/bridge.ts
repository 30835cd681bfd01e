export type BridgeStatus = "running" | "stopped" | "error";

/**
 * Bridge interface: a bidirectional pump between a device-side endpoint
 * and a network-side endpoint.
 *
 * run() owns both endpoints for as long as it runs and releases them on
 * every exit path, including a thrown error.
 */
export interface Bridge {
    /** Pump data until the bridge finishes or is stopped. */
    run(): Promise<void>;

    /** Ask a running bridge to finish; resolves once it has. */
    stop(): Promise<void>;

    /** Current bridge status. */
    get status(): BridgeStatus;
}

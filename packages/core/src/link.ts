import { randomUUID } from "crypto";
import type { WireLink } from "@pgweave/shared/executor/interface.js";
import { Logger } from "./logger.js";

export type LinkState = "idle" | "lent" | "closed";

/**
 * Pool-side bookkeeping around one wire link. Only the pool moves `state`;
 * the lessee's Connection sets `busy` around each statement and calls
 * `teardown()` when a statement was abandoned mid-flight.
 */
export class PooledLink {
    readonly id = randomUUID();
    state: LinkState = "idle";
    busy = false;
    /** Statements sent over this link, counted by Connection. */
    statements = 0;
    private tainted = false;
    private closing: Promise<void> | null = null;

    constructor(readonly wire: WireLink) {}

    /** False once the link errored, was torn down, or was closed. Never becomes true again. */
    get reusable(): boolean {
        return this.state !== "closed" && !this.tainted && !this.wire.broken;
    }

    /**
     * Marks the link unusable and starts closing it. The in-flight statement,
     * if any, dies with the socket; the server aborts any open transaction.
     */
    teardown(): Promise<void> {
        this.tainted = true;
        return this.close();
    }

    /** Idempotent; resolves once the socket is closed. Never rejects. */
    close(): Promise<void> {
        this.state = "closed";
        this.closing ??= this.wire.close().catch((error: unknown) => {
            Logger.warn("error while closing connection", { connection: this.id, error });
        });
        return this.closing;
    }
}

import { z } from "zod";
import type { Notification, WireResult } from "@pgweave/shared/executor/interface.js";
import { compile } from "./compiler.js";
import { CallOptions, withDeadline } from "./deadline.js";
import {
    CancelledError,
    CardinalityError,
    ConnectionBusyError,
    IllegalStateError,
    ListenerNotFoundError,
    PgweaveError,
    WireError,
} from "./errors.js";
import { quoteIdentifier } from "./identifiers.js";
import type { PooledLink } from "./link.js";
import { Logger } from "./logger.js";
import { RecordShape, mapRow, mapRows, mapValue } from "./mapper.js";
import { Template, literal } from "./template.js";
import { Transaction, TransactionOptions, runTransaction } from "./transaction.js";

export type QueryOptions = CallOptions;

export type Listener<T> = (
    connection: Connection,
    processId: number,
    channel: string,
    payload: T
) => void | Promise<void>;

export interface ConnectionDefaults {
    statementTimeoutMs?: number | undefined;
}

/**
 * A lease on one pooled link. Obtained from `pool.acquire()` and valid only
 * inside the acquire callback.
 *
 * One statement runs at a time: starting a second statement before the
 * first resolved fails with ConnectionBusyError.
 */
export class Connection {
    private released = false;
    private readonly listeners = new Map<string, Map<Listener<never>, () => void>>();

    constructor(private readonly link: PooledLink, private readonly defaults: ConnectionDefaults = {}) {}

    get id(): string {
        return this.link.id;
    }

    /** True while the lease is active and the link has not failed. */
    get healthy(): boolean {
        return !this.released && this.link.reusable;
    }

    /**
     * Executes a command and returns the number of affected rows
     * (0 for statements that report none).
     */
    async execute(query: Template, options?: QueryOptions): Promise<number> {
        const result = await this.send(query, options);
        return result.rowCount ?? 0;
    }

    async fetch<S extends RecordShape>(shape: S, query: Template, options?: QueryOptions): Promise<z.infer<S>[]> {
        const result = await this.send(query, options);
        return mapRows(result.rows, shape);
    }

    /**
     * Returns the only row of the result, or null when there is none.
     * More than one row is a CardinalityError.
     */
    async fetchrow<S extends RecordShape>(
        shape: S,
        query: Template,
        options?: QueryOptions
    ): Promise<z.infer<S> | null> {
        const { rows } = await this.send(query, options);
        const [first] = rows;
        if (first === undefined) return null;
        if (rows.length > 1) {
            throw new CardinalityError(`fetchrow expected at most one row, got ${rows.length}`);
        }
        return mapRow(first, shape, 0);
    }

    /**
     * Returns the single value of a one-row, one-column result.
     */
    async fetchval<T extends z.ZodTypeAny>(schema: T, query: Template, options?: QueryOptions): Promise<z.infer<T>> {
        const { rows, columns } = await this.send(query, options);
        const [row] = rows;
        if (row === undefined || rows.length !== 1) {
            throw new CardinalityError(`fetchval expected exactly one row, got ${rows.length}`);
        }
        const [column] = columns;
        if (column === undefined || columns.length !== 1) {
            throw new CardinalityError(`fetchval expected exactly one column, got ${columns.length}`);
        }
        return mapValue(row[column] ?? null, schema, { rowIndex: 0, column, field: "value" });
    }

    /**
     * Runs `fn` inside BEGIN ... COMMIT. Any error thrown by `fn` rolls the
     * transaction back and is re-thrown unchanged.
     */
    transaction<T>(fn: (tx: Transaction) => Promise<T>, options?: TransactionOptions): Promise<T> {
        return runTransaction(this, fn, options);
    }

    /**
     * Cursors only live inside a transaction; use `tx.cursor()`.
     */
    cursor(): never {
        throw new IllegalStateError("Cursors require a transaction: use connection.transaction((tx) => tx.cursor(...))");
    }

    /**
     * Subscribes to NOTIFY on `channel`. Payloads are validated against
     * `schema` before `callback` runs; invalid payloads and failing callbacks
     * are logged and dropped.
     */
    async addListener<T extends z.ZodTypeAny>(
        channel: string,
        schema: T,
        callback: Listener<z.infer<T>>
    ): Promise<void> {
        const existing = this.listeners.get(channel);
        if (existing?.has(callback)) return;

        let byCallback = existing;
        if (byCallback === undefined) {
            await this.execute(literal(`LISTEN ${quoteIdentifier(channel)}`));
            byCallback = new Map();
            this.listeners.set(channel, byCallback);
        }
        const unsubscribe = this.link.wire.onNotification((notification) => {
            if (notification.channel === channel) {
                this.dispatch(notification, schema, callback);
            }
        });
        byCallback.set(callback, unsubscribe);
    }

    async removeListener<T>(channel: string, callback: Listener<T>): Promise<void> {
        const byCallback = this.listeners.get(channel);
        const unsubscribe = byCallback?.get(callback);
        if (byCallback === undefined || unsubscribe === undefined) {
            throw new ListenerNotFoundError(channel);
        }
        unsubscribe();
        byCallback.delete(callback);
        if (byCallback.size === 0) {
            this.listeners.delete(channel);
            await this.execute(literal(`UNLISTEN ${quoteIdentifier(channel)}`));
        }
    }

    /**
     * Compiles and sends one statement. Exposed for Transaction and Cursor.
     * @internal
     */
    async send(query: Template, options: QueryOptions = {}): Promise<WireResult> {
        this.assertUsable();
        const statement = compile(query);
        if (this.link.busy) {
            throw new ConnectionBusyError();
        }
        if (options.signal?.aborted) {
            throw new CancelledError("statement", options.signal.reason);
        }

        const timeoutMs = options.timeoutMs ?? this.defaults.statementTimeoutMs;
        Logger.debug("sending statement", {
            connection: this.link.id,
            text: statement.text,
            params: statement.params.length,
        });

        this.link.busy = true;
        this.link.statements += 1;
        try {
            return await withDeadline(
                this.link.wire.send(statement.text, statement.params),
                "statement",
                { timeoutMs, signal: options.signal },
                () => {
                    Logger.warn("abandoning in-flight statement, closing connection", { connection: this.link.id });
                    void this.link.teardown();
                }
            );
        } catch (error) {
            if (error instanceof PgweaveError) throw error;
            throw new WireError(error);
        } finally {
            this.link.busy = false;
        }
    }

    /**
     * Ends the lease: drops listeners and makes this handle unusable.
     * Never throws; a link that cannot be reset is torn down instead.
     * @internal
     */
    async detach(): Promise<void> {
        if (this.released) return;
        if (this.link.busy) {
            // A statement was left running without being awaited
            Logger.warn("lease ended with a statement in flight, discarding connection", { connection: this.link.id });
            await this.link.teardown();
        }
        if (this.listeners.size > 0) {
            for (const byCallback of this.listeners.values()) {
                for (const unsubscribe of byCallback.values()) unsubscribe();
            }
            this.listeners.clear();
            if (this.link.reusable && !this.link.busy) {
                try {
                    await this.send(literal("UNLISTEN *"));
                } catch (error) {
                    Logger.warn("could not reset listeners, discarding connection", { connection: this.link.id, error });
                    await this.link.teardown();
                }
            }
        }
        this.released = true;
    }

    /**
     * Tears the link down so the pool discards it on release.
     * @internal
     */
    poison(): Promise<void> {
        return this.link.teardown();
    }

    private dispatch<T extends z.ZodTypeAny>(
        notification: Notification,
        schema: T,
        callback: Listener<z.infer<T>>
    ): void {
        let payload: z.infer<T>;
        try {
            payload = mapValue(notification.payload, schema, {
                rowIndex: 0,
                column: "payload",
                field: notification.channel,
            });
        } catch (error) {
            Logger.warn("dropping notification with invalid payload", { channel: notification.channel, error });
            return;
        }
        void Promise.resolve()
            .then(() => callback(this, notification.processId, notification.channel, payload))
            .catch((error: unknown) => {
                Logger.error("notification listener failed", { channel: notification.channel, error });
            });
    }

    private assertUsable(): void {
        if (this.released) {
            throw new IllegalStateError("Connection was released back to the pool");
        }
        if (!this.link.reusable) {
            throw new IllegalStateError("Connection is closed or broken");
        }
    }
}

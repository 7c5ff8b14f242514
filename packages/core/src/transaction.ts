import { z } from "zod";
import type { Connection, QueryOptions } from "./connection.js";
import { CursorFactory, CursorOptions } from "./cursor.js";
import { ConfigurationError, IllegalStateError, TransactionClosedError } from "./errors.js";
import { quoteIdentifier } from "./identifiers.js";
import { Logger } from "./logger.js";
import type { RecordShape } from "./mapper.js";
import { Template, literal } from "./template.js";

export const TransactionOptionsSchema = z.object({
    isolation: z.enum(["read committed", "repeatable read", "serializable"]).optional(),
    readOnly: z.boolean().optional(),
    deferrable: z.boolean().optional(),
}).strict();

export type TransactionOptions = z.infer<typeof TransactionOptionsSchema>;

export type TransactionStatus = "started" | "marked_for_rollback" | "committed" | "rolled_back";

/**
 * A unit of work on one connection.
 *
 * Query methods proxy to the connection and refuse to run once the
 * transaction left the `started` status. Exactly one terminal statement
 * (COMMIT or ROLLBACK, RELEASE or ROLLBACK TO for a savepoint) is sent
 * per transaction.
 */
export class Transaction {
    private currentStatus: TransactionStatus = "started";
    private child: Transaction | null = null;
    private savepoints = 0;

    constructor(
        private readonly connection: Connection,
        /** Set for nested transactions. */
        readonly savepoint: string | null = null
    ) {}

    get status(): TransactionStatus {
        return this.currentStatus;
    }

    async execute(query: Template, options?: QueryOptions): Promise<number> {
        this.checkStatus();
        return this.connection.execute(query, options);
    }

    async fetch<S extends RecordShape>(shape: S, query: Template, options?: QueryOptions): Promise<z.infer<S>[]> {
        this.checkStatus();
        return this.connection.fetch(shape, query, options);
    }

    async fetchrow<S extends RecordShape>(
        shape: S,
        query: Template,
        options?: QueryOptions
    ): Promise<z.infer<S> | null> {
        this.checkStatus();
        return this.connection.fetchrow(shape, query, options);
    }

    async fetchval<T extends z.ZodTypeAny>(schema: T, query: Template, options?: QueryOptions): Promise<z.infer<T>> {
        this.checkStatus();
        return this.connection.fetchval(schema, query, options);
    }

    /**
     * Declares a server-side cursor for `query`. Await `.open()` for manual
     * paging or iterate with `for await`.
     */
    cursor<S extends RecordShape>(shape: S, query: Template, options?: CursorOptions): CursorFactory<S> {
        this.checkStatus();
        return new CursorFactory(this, shape, query, options);
    }

    /**
     * Runs `fn` inside a savepoint. An error thrown by `fn` rolls back to the
     * savepoint and is re-thrown; this transaction stays usable.
     */
    async transaction<T>(fn: (tx: Transaction) => Promise<T>): Promise<T> {
        this.checkStatus();
        if (this.child !== null) {
            throw new IllegalStateError("A savepoint is already open on this transaction");
        }
        this.savepoints += 1;
        const name = `${this.savepoint ?? "pgweave_sp"}_${this.savepoints}`;
        await this.connection.execute(literal(`SAVEPOINT ${quoteIdentifier(name)}`));

        const child = new Transaction(this.connection, name);
        this.child = child;
        try {
            return await runScope(child, fn);
        } finally {
            this.child = null;
        }
    }

    async commit(): Promise<void> {
        this.checkStatus();
        this.checkNoChild();
        this.currentStatus = "committed";
        const statement = this.savepoint === null
            ? "COMMIT"
            : `RELEASE SAVEPOINT ${quoteIdentifier(this.savepoint)}`;
        try {
            await this.connection.execute(literal(statement));
        } catch (error) {
            // The server aborted the transaction; nothing left to roll back
            this.currentStatus = "rolled_back";
            throw error;
        }
    }

    async rollback(): Promise<void> {
        if (this.currentStatus !== "started" && this.currentStatus !== "marked_for_rollback") {
            throw new TransactionClosedError(this.currentStatus);
        }
        this.checkNoChild();
        this.currentStatus = "rolled_back";
        if (!this.connection.healthy) {
            // The link is gone and took the transaction with it
            return;
        }
        const statement = this.savepoint === null
            ? "ROLLBACK"
            : `ROLLBACK TO SAVEPOINT ${quoteIdentifier(this.savepoint)}`;
        try {
            await this.connection.execute(literal(statement));
        } catch (error) {
            Logger.error("rollback failed, discarding connection", { connection: this.connection.id, error });
            await this.connection.poison();
            throw error;
        }
    }

    /**
     * Makes the transaction unusable. The rollback is sent when the scope exits.
     */
    markForRollback(): void {
        this.checkStatus();
        this.checkNoChild();
        this.currentStatus = "marked_for_rollback";
    }

    /** @internal */
    async finish(): Promise<void> {
        if (this.currentStatus === "started") {
            await this.commit();
        } else if (this.currentStatus === "marked_for_rollback") {
            await this.rollback();
        }
    }

    /**
     * Rolls back if still open. Failures are logged, never thrown, so the
     * caller's own error is the one that propagates.
     * @internal
     */
    async abandon(): Promise<void> {
        this.child = null;
        if (this.currentStatus !== "started" && this.currentStatus !== "marked_for_rollback") return;
        try {
            await this.rollback();
        } catch (error) {
            Logger.warn("rollback after error failed", { connection: this.connection.id, error });
        }
    }

    private checkStatus(): void {
        if (this.currentStatus !== "started") {
            throw new TransactionClosedError(this.currentStatus);
        }
    }

    private checkNoChild(): void {
        if (this.child !== null) {
            throw new IllegalStateError("Cannot end a transaction while one of its savepoints is open");
        }
    }
}

export function beginStatement(options: TransactionOptions = {}): string {
    const parsed = TransactionOptionsSchema.safeParse(options);
    if (!parsed.success) {
        throw new ConfigurationError(
            `Invalid transaction options: ${parsed.error.issues.map((i) => i.message).join("; ")}`
        );
    }
    const { isolation, readOnly, deferrable } = parsed.data;
    const parts = ["BEGIN"];
    if (isolation !== undefined) parts.push(`ISOLATION LEVEL ${isolation.toUpperCase()}`);
    if (readOnly !== undefined) parts.push(readOnly ? "READ ONLY" : "READ WRITE");
    if (deferrable !== undefined) parts.push(deferrable ? "DEFERRABLE" : "NOT DEFERRABLE");
    return parts.join(" ");
}

/** @internal Use `connection.transaction()`. */
export async function runTransaction<T>(
    connection: Connection,
    fn: (tx: Transaction) => Promise<T>,
    options?: TransactionOptions
): Promise<T> {
    const begin = beginStatement(options);
    await connection.execute(literal(begin));
    return runScope(new Transaction(connection), fn);
}

async function runScope<T>(tx: Transaction, fn: (tx: Transaction) => Promise<T>): Promise<T> {
    let result: T;
    try {
        result = await fn(tx);
    } catch (error) {
        await tx.abandon();
        throw error;
    }
    await tx.finish();
    return result;
}

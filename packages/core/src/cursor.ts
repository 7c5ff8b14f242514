import { z } from "zod";
import { ConfigurationError, IllegalStateError } from "./errors.js";
import type { RecordShape } from "./mapper.js";
import { Template, literal } from "./template.js";
import type { Transaction } from "./transaction.js";

export interface CursorOptions {
    /** Rows fetched per round trip when iterating. Defaults to 50. */
    prefetch?: number;
}

const DEFAULT_PREFETCH = 50;
let cursorCounter = 0;

function checkCount(n: number, what: string): number {
    if (!Number.isSafeInteger(n) || n < 1) {
        throw new ConfigurationError(`${what} must be a positive integer, got ${n}`);
    }
    return n;
}

/**
 * An open server-side cursor. Rows are mapped into `shape` as they arrive.
 */
export class Cursor<S extends RecordShape> {
    private closed = false;

    constructor(
        private readonly tx: Transaction,
        readonly name: string,
        private readonly shape: S
    ) {}

    async fetch(n: number): Promise<z.infer<S>[]> {
        this.assertOpen();
        checkCount(n, "fetch count");
        return this.tx.fetch(this.shape, literal(`FETCH FORWARD ${n} FROM ${this.name}`));
    }

    async fetchrow(): Promise<z.infer<S> | null> {
        const [row] = await this.fetch(1);
        return row ?? null;
    }

    /** Skips up to `n` rows and returns how many were skipped. */
    async forward(n: number): Promise<number> {
        this.assertOpen();
        checkCount(n, "forward count");
        return this.tx.execute(literal(`MOVE FORWARD ${n} FROM ${this.name}`));
    }

    async close(): Promise<void> {
        if (this.closed) return;
        this.closed = true;
        await this.tx.execute(literal(`CLOSE ${this.name}`));
    }

    private assertOpen(): void {
        if (this.closed) {
            throw new IllegalStateError(`Cursor ${this.name} is closed`);
        }
    }
}

/**
 * Returned by `tx.cursor()`. Either open a cursor explicitly or iterate:
 *
 * ```typescript
 * for await (const student of tx.cursor(Student, sql`SELECT * FROM students`)) { ... }
 * ```
 */
export class CursorFactory<S extends RecordShape> implements AsyncIterable<z.infer<S>> {
    private readonly prefetch: number;

    constructor(
        private readonly tx: Transaction,
        private readonly shape: S,
        private readonly query: Template,
        options: CursorOptions = {}
    ) {
        this.prefetch = checkCount(options.prefetch ?? DEFAULT_PREFETCH, "prefetch");
    }

    async open(): Promise<Cursor<S>> {
        cursorCounter += 1;
        const name = `pgweave_cursor_${cursorCounter}`;
        await this.tx.execute(
            new Template([`DECLARE ${name} NO SCROLL CURSOR FOR `, ""], [this.query])
        );
        return new Cursor(this.tx, name, this.shape);
    }

    async *[Symbol.asyncIterator](): AsyncGenerator<z.infer<S>, void, undefined> {
        const cursor = await this.open();
        let failed = false;
        try {
            for (;;) {
                const batch = await cursor.fetch(this.prefetch);
                yield* batch;
                if (batch.length < this.prefetch) return;
            }
        } catch (error) {
            failed = true;
            throw error;
        } finally {
            // After a failed FETCH or once the transaction ended, the server owns cleanup
            if (!failed && this.tx.status === "started") {
                await cursor.close();
            }
        }
    }
}

import { describe, it, expect } from "vitest";
import { z } from "zod";
import type { Row } from "@pgweave/shared/executor/interface.js";
import { ConfigurationError, IllegalStateError, TransactionClosedError } from "../../src/errors.js";
import { sql } from "../../src/template.js";
import { FakeDriver, result } from "../support/fake-wire.js";
import { lease } from "../support/lease.js";

const Id = z.object({ id: z.number() });

/** Answers FETCH and MOVE as if the cursor ran over `total` rows with ids 1..total. */
function serveRows(driver: FakeDriver, total: number): void {
    let position = 0;
    driver.respond = (text) => {
        const fetch = /^FETCH FORWARD (\d+) FROM /.exec(text);
        if (fetch) {
            const rows: Row[] = [];
            for (let i = 0; i < Number(fetch[1]) && position < total; i++) {
                position += 1;
                rows.push({ id: position });
            }
            return result(rows, ["id"]);
        }
        const move = /^MOVE FORWARD (\d+) FROM /.exec(text);
        if (move) {
            const skipped = Math.min(Number(move[1]), total - position);
            position += skipped;
            return result([], [], skipped);
        }
        return result([], [], 0);
    };
}

function cursorName(driver: FakeDriver): string {
    const declare = driver.texts().find((text) => text.startsWith("DECLARE "));
    const name = declare?.split(" ")[1];
    if (name === undefined) throw new Error("no cursor was declared");
    return name;
}

describe("Transaction.cursor", () => {
    it("should fetch in batches until a short batch and then close", async () => {
        const { driver, connection } = await lease();
        serveRows(driver, 5);
        const ids: number[] = [];

        await connection.transaction(async (tx) => {
            for await (const row of tx.cursor(Id, sql`SELECT id FROM students WHERE gpa > ${3.0}`, { prefetch: 2 })) {
                ids.push(row.id);
            }
        });

        const name = cursorName(driver);
        expect(ids).toEqual([1, 2, 3, 4, 5]);
        expect(driver.texts()).toEqual([
            "BEGIN",
            `DECLARE ${name} NO SCROLL CURSOR FOR SELECT id FROM students WHERE gpa > $1`,
            `FETCH FORWARD 2 FROM ${name}`,
            `FETCH FORWARD 2 FROM ${name}`,
            `FETCH FORWARD 2 FROM ${name}`,
            `CLOSE ${name}`,
            "COMMIT",
        ]);
        expect(driver.statements[1]?.params).toEqual([3.0]);
    });

    it("should prefetch 50 rows by default", async () => {
        const { driver, connection } = await lease();
        serveRows(driver, 3);
        let count = 0;

        await connection.transaction(async (tx) => {
            for await (const _row of tx.cursor(Id, sql`SELECT id FROM students`)) {
                count += 1;
            }
        });

        expect(count).toBe(3);
        expect(driver.texts()).toContain(`FETCH FORWARD 50 FROM ${cursorName(driver)}`);
    });

    it("should close the cursor when iteration stops early", async () => {
        const { driver, connection } = await lease();
        serveRows(driver, 10);

        await connection.transaction(async (tx) => {
            for await (const row of tx.cursor(Id, sql`SELECT id FROM students`, { prefetch: 4 })) {
                if (row.id === 2) break;
            }
        });

        const name = cursorName(driver);
        expect(driver.texts().slice(2)).toEqual([`FETCH FORWARD 4 FROM ${name}`, `CLOSE ${name}`, "COMMIT"]);
    });

    it("should page manually with fetch, forward and fetchrow", async () => {
        const { driver, connection } = await lease();
        serveRows(driver, 5);

        await connection.transaction(async (tx) => {
            const cursor = await tx.cursor(Id, sql`SELECT id FROM students`).open();

            expect(await cursor.fetch(2)).toEqual([{ id: 1 }, { id: 2 }]);
            expect(await cursor.forward(2)).toBe(2);
            expect(await cursor.fetchrow()).toEqual({ id: 5 });
            expect(await cursor.fetchrow()).toBeNull();

            await cursor.close();
            await cursor.close();
            await expect(cursor.fetch(1)).rejects.toThrow(new IllegalStateError(`Cursor ${cursor.name} is closed`));
        });

        const name = cursorName(driver);
        expect(driver.texts().filter((text) => text === `CLOSE ${name}`)).toHaveLength(1);
        expect(driver.texts()).toContain(`MOVE FORWARD 2 FROM ${name}`);
    });

    it("should give every cursor its own name", async () => {
        const { driver, connection } = await lease();

        await connection.transaction(async (tx) => {
            const first = await tx.cursor(Id, sql`SELECT id FROM students`).open();
            const second = await tx.cursor(Id, sql`SELECT id FROM courses`).open();

            expect(first.name).not.toBe(second.name);
        });

        expect(driver.texts().filter((text) => text.startsWith("DECLARE "))).toHaveLength(2);
    });

    it("should reject non-positive counts", async () => {
        const { connection } = await lease();

        await connection.transaction(async (tx) => {
            expect(() => tx.cursor(Id, sql`SELECT id FROM students`, { prefetch: 0 })).toThrow(
                new ConfigurationError("prefetch must be a positive integer, got 0")
            );
            const cursor = await tx.cursor(Id, sql`SELECT id FROM students`).open();
            await expect(cursor.fetch(1.5)).rejects.toBeInstanceOf(ConfigurationError);
            await expect(cursor.forward(-1)).rejects.toThrow("forward count must be a positive integer, got -1");
        });
    });

    it("should refuse to open a cursor on a transaction that is no longer started", async () => {
        const { connection } = await lease();

        await connection.transaction(async (tx) => {
            tx.markForRollback();
            expect(() => tx.cursor(Id, sql`SELECT id FROM students`)).toThrow(TransactionClosedError);
        });
    });
});

import { z } from "zod";
import type { Row, WireValue } from "@pgweave/shared/executor/interface.js";
import { MappingError } from "./errors.js";

/**
 * A record shape is a zod object schema: its keys are matched to column names
 * (exact, case-sensitive) and each key's schema is the field's declared type.
 *
 * @example
 * ```typescript
 * const Student = z.object({
 *     id: z.number().int(),
 *     full_name: z.string(),
 *     last_seen_at: z.date().nullable(),
 * });
 * ```
 */
export type RecordShape = z.AnyZodObject;

export interface ValueContext {
    rowIndex: number;
    column: string;
    field: string;
}

const MIN_SAFE = BigInt(Number.MIN_SAFE_INTEGER);
const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);

export function mapRows<S extends RecordShape>(rows: readonly Row[], shape: S): z.infer<S>[] {
    return rows.map((row, i) => mapRow(row, shape, i));
}

/**
 * Maps one row into `shape`. Columns that are not part of the shape are ignored.
 */
export function mapRow<S extends RecordShape>(row: Row, shape: S, rowIndex: number): z.infer<S> {
    const fields: Record<string, z.ZodTypeAny> = shape.shape;
    const picked: Record<string, unknown> = {};
    for (const [field, schema] of Object.entries(fields)) {
        if (Object.prototype.hasOwnProperty.call(row, field)) {
            picked[field] = widen(row[field] ?? null, schema);
        }
    }

    const result = shape.safeParse(picked);
    if (result.success) return result.data;

    const issue = result.error.issues[0];
    const field = typeof issue?.path[0] === "string" ? issue.path[0] : "*";
    if (field !== "*" && !(field in picked)) {
        throw new MappingError(rowIndex, field, field, "missing column");
    }
    throw new MappingError(rowIndex, field, field, describeIssue(picked[field], issue));
}

/**
 * Validates a single wire value against `schema` with the same coercion
 * rules as record fields.
 */
export function mapValue<T extends z.ZodTypeAny>(value: WireValue, schema: T, context: ValueContext): z.infer<T> {
    const result = schema.safeParse(widen(value, schema));
    if (result.success) return result.data;
    throw new MappingError(
        context.rowIndex,
        context.column,
        context.field,
        describeIssue(value, result.error.issues[0])
    );
}

/**
 * Integer widening: bigint into a number field when it fits without loss,
 * integral number into a bigint field. Everything else is left to the schema.
 */
function widen(value: WireValue, schema: z.ZodTypeAny): unknown {
    const base = baseType(schema);
    if (typeof value === "bigint" && base instanceof z.ZodNumber) {
        return value >= MIN_SAFE && value <= MAX_SAFE ? Number(value) : value;
    }
    if (typeof value === "number" && base instanceof z.ZodBigInt && Number.isInteger(value)) {
        return BigInt(value);
    }
    return value;
}

function baseType(schema: z.ZodTypeAny): z.ZodTypeAny {
    let current = schema;
    for (;;) {
        if (current instanceof z.ZodOptional || current instanceof z.ZodNullable) {
            current = current.unwrap();
        } else if (current instanceof z.ZodDefault) {
            current = current.removeDefault();
        } else if (current instanceof z.ZodEffects) {
            current = current.innerType();
        } else {
            return current;
        }
    }
}

function describeIssue(value: unknown, issue: z.ZodIssue | undefined): string {
    if (value === null) return "null value for non-nullable field";
    return issue?.message ?? "invalid value";
}

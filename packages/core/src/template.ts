/**
 * A query template: trusted literal SQL segments interleaved with slots.
 *
 * Slot values are never spliced into the SQL text. Scalars become positional
 * parameters; nested Templates are flattened into the parent when compiled.
 *
 * @example
 * ```typescript
 * const limit = sql`LIMIT ${10}`;
 * const query = sql`SELECT * FROM students WHERE major = ${major} ${limit}`;
 * ```
 */
export class Template {
    /**
     * The arrays are kept as given. Use the `sql` tag rather than calling this
     * directly; the compiler rejects templates whose segment and slot counts disagree.
     */
    constructor(readonly strings: readonly string[], readonly values: readonly unknown[]) {}

    get isEmpty(): boolean {
        return this.values.length === 0 && this.strings.every((s) => s === "");
    }
}

export type Slot =
    | { kind: "scalar"; value: unknown }
    | { kind: "template"; template: Template }
    | { kind: "invalid"; received: string };

const EMPTY = new Template([""], []);

export function sql(strings: TemplateStringsArray, ...values: unknown[]): Template {
    return new Template(strings, values);
}

/** The empty template. Splicing it anywhere leaves the statement unchanged. */
sql.empty = EMPTY;

/**
 * Joins templates with a separator template (default `, `). An empty list
 * yields the empty template.
 */
sql.join = function join(parts: readonly Template[], separator: Template = sql`, `): Template {
    if (parts.length === 0) return EMPTY;
    const values: Template[] = [];
    parts.forEach((part, i) => {
        if (i > 0) values.push(separator);
        values.push(part);
    });
    return new Template(new Array<string>(values.length + 1).fill(""), values);
};

export function classifySlot(value: unknown): Slot {
    if (value instanceof Template) return { kind: "template", template: value };
    if (isScalar(value, new Set())) return { kind: "scalar", value };
    return { kind: "invalid", received: describeValue(value) };
}

function isScalar(value: unknown, seen: Set<object>): boolean {
    if (value === null) return true;
    if (typeof value !== "object") {
        return typeof value === "boolean" || typeof value === "number" ||
            typeof value === "bigint" || typeof value === "string";
    }
    if (value instanceof Date || value instanceof Uint8Array) return true;
    if (seen.has(value)) return false;

    if (Array.isArray(value)) {
        seen.add(value);
        const ok = value.every((item) => isScalar(item, seen));
        seen.delete(value);
        return ok;
    }

    const proto: unknown = Object.getPrototypeOf(value);
    if (proto !== Object.prototype && proto !== null) return false;
    seen.add(value);
    const ok = Object.values(value).every((item) => isScalar(item, seen));
    seen.delete(value);
    return ok;
}

export function describeValue(value: unknown): string {
    if (value === null) return "null";
    if (Array.isArray(value)) return "array";
    if (typeof value === "object") {
        const proto: unknown = Object.getPrototypeOf(value);
        if (proto === null || proto === Object.prototype) return "object";
        const ctor = value.constructor;
        return typeof ctor === "function" && ctor.name ? ctor.name : "object";
    }
    return typeof value;
}

/**
 * Wraps SQL text generated by this library (BEGIN, SAVEPOINT, FETCH, ...).
 * Not exported from the package: caller input must go through `sql`.
 */
export function literal(text: string): Template {
    return new Template([text], []);
}

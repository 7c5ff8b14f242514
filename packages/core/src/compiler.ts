import {
    CyclicTemplateError,
    InvalidParameterTypeError,
    InvalidSegmentError,
    MalformedTemplateError,
    UnsupportedTemplateError,
} from "./errors.js";
import { Template, classifySlot, describeValue } from "./template.js";

export interface CompiledStatement {
    readonly text: string;
    readonly params: readonly unknown[];
}

/**
 * Positional placeholder syntax of the target database.
 * `index` starts at 1.
 */
export interface Dialect {
    placeholder(index: number): string;
}

export const postgresDialect: Dialect = {
    placeholder: (index) => `$${index}`,
};

interface Output {
    chunks: string[];
    params: unknown[];
}

/**
 * Flattens a template tree into one statement and its parameter list.
 *
 * Nested templates are spliced in place and share the parent's placeholder
 * counter, so numbering stays contiguous across the whole tree. Literal text
 * only ever comes from template segments and values only ever become
 * placeholders.
 */
export function compile(template: Template, dialect: Dialect = postgresDialect): CompiledStatement {
    if (!(template instanceof Template)) {
        throw new UnsupportedTemplateError(describeValue(template));
    }
    const out: Output = { chunks: [], params: [] };
    walk(template, [], new Set(), out, dialect);
    return { text: out.chunks.join(""), params: out.params };
}

function walk(
    template: Template,
    path: readonly number[],
    ancestors: Set<Template>,
    out: Output,
    dialect: Dialect
): void {
    const { strings, values } = template;
    if (strings.length !== values.length + 1) {
        throw new MalformedTemplateError(path, strings.length, values.length);
    }
    const segments = strings.map((text: unknown, index) => {
        if (typeof text !== "string") throw new InvalidSegmentError(path, index);
        return text;
    });

    ancestors.add(template);
    for (let i = 0; i < values.length; i++) {
        out.chunks.push(segments[i] ?? "");
        const slotPath = [...path, i];
        const slot = classifySlot(values[i]);
        switch (slot.kind) {
            case "template":
                if (ancestors.has(slot.template)) {
                    throw new CyclicTemplateError(slotPath);
                }
                walk(slot.template, slotPath, ancestors, out, dialect);
                break;
            case "scalar":
                out.params.push(slot.value);
                out.chunks.push(dialect.placeholder(out.params.length));
                break;
            case "invalid":
                throw new InvalidParameterTypeError(slotPath, slot.received);
            default: {
                const unreachable: never = slot;
                throw new Error(`Unhandled slot ${JSON.stringify(unreachable)}`);
            }
        }
    }
    out.chunks.push(segments[values.length] ?? "");
    ancestors.delete(template);
}

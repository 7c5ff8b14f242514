import { TemplateCompileError } from "./errors.js";

const MAX_IDENTIFIER_LENGTH = 63;

/**
 * Quotes a PostgreSQL identifier (channel, savepoint or cursor name) for use
 * in statements that cannot take it as a parameter.
 */
export function quoteIdentifier(name: string): string {
    if (name.length === 0 || name.length > MAX_IDENTIFIER_LENGTH || name.includes("\0")) {
        throw new TemplateCompileError(`Invalid identifier: ${JSON.stringify(name)}`);
    }
    return `"${name.replace(/"/g, '""')}"`;
}

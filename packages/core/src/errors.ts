/**
 * Error classes for pgweave.
 *
 * Every error raised by the library extends {@link PgweaveError}, so callers
 * can catch the whole family or a single subclass.
 */

export class PgweaveError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "PgweaveError";
        Object.setPrototypeOf(this, PgweaveError.prototype);
    }
}

/**
 * Bad connection string or pool options. Raised before any network attempt.
 */
export class ConfigurationError extends PgweaveError {
    constructor(message: string) {
        super(message);
        this.name = "ConfigurationError";
        Object.setPrototypeOf(this, ConfigurationError.prototype);
    }
}

export class TemplateCompileError extends PgweaveError {
    constructor(message: string) {
        super(message);
        this.name = "TemplateCompileError";
        Object.setPrototypeOf(this, TemplateCompileError.prototype);
    }
}

/**
 * A slot holds a value that is neither a scalar nor a Template.
 *
 * `path` lists slot indexes from the root template down to the offending
 * slot, e.g. `[2, 0]` is the first slot of the template in the root's third slot.
 */
export class InvalidParameterTypeError extends TemplateCompileError {
    constructor(readonly path: readonly number[], readonly received: string) {
        super(`Unsupported parameter type "${received}" in slot ${path.join(".")}`);
        this.name = "InvalidParameterTypeError";
        Object.setPrototypeOf(this, InvalidParameterTypeError.prototype);
    }
}

export class CyclicTemplateError extends TemplateCompileError {
    constructor(readonly path: readonly number[]) {
        super(`Template contains itself at slot ${path.join(".")}`);
        this.name = "CyclicTemplateError";
        Object.setPrototypeOf(this, CyclicTemplateError.prototype);
    }
}

export class MalformedTemplateError extends TemplateCompileError {
    constructor(readonly path: readonly number[], segments: number, slots: number) {
        super(
            `Malformed template at ${path.length > 0 ? `slot ${path.join(".")}` : "root"}: ` +
            `expected ${slots + 1} literal segments for ${slots} slots, got ${segments}`
        );
        this.name = "MalformedTemplateError";
        Object.setPrototypeOf(this, MalformedTemplateError.prototype);
    }
}

/**
 * A literal segment is not a string. Tagged templates give `undefined` for a
 * segment with an invalid escape sequence such as `\u` in `'C:\users'`.
 */
export class InvalidSegmentError extends TemplateCompileError {
    constructor(readonly path: readonly number[], readonly segment: number) {
        super(
            `Literal segment ${segment} at ${path.length > 0 ? `slot ${path.join(".")}` : "root"} is not a string; ` +
            "check it for invalid escape sequences"
        );
        this.name = "InvalidSegmentError";
        Object.setPrototypeOf(this, InvalidSegmentError.prototype);
    }
}

/**
 * A plain string (or anything else) was passed where a Template is required.
 * Build queries with the `sql` tag instead.
 */
export class UnsupportedTemplateError extends TemplateCompileError {
    constructor(received: string) {
        super(`Expected a Template built with the sql tag, got ${received}`);
        this.name = "UnsupportedTemplateError";
        Object.setPrototypeOf(this, UnsupportedTemplateError.prototype);
    }
}

export class CardinalityError extends PgweaveError {
    constructor(message: string) {
        super(message);
        this.name = "CardinalityError";
        Object.setPrototypeOf(this, CardinalityError.prototype);
    }
}

export class MappingError extends PgweaveError {
    constructor(
        readonly rowIndex: number,
        readonly column: string,
        readonly field: string,
        readonly reason: string
    ) {
        super(`Row ${rowIndex}: cannot map column "${column}" to field "${field}": ${reason}`);
        this.name = "MappingError";
        Object.setPrototypeOf(this, MappingError.prototype);
    }
}

export class IllegalStateError extends PgweaveError {
    constructor(message: string) {
        super(message);
        this.name = "IllegalStateError";
        Object.setPrototypeOf(this, IllegalStateError.prototype);
    }
}

/**
 * A second statement was started on a connection while one is in flight.
 */
export class ConnectionBusyError extends IllegalStateError {
    constructor() {
        super("Connection is busy: await the previous statement before sending another");
        this.name = "ConnectionBusyError";
        Object.setPrototypeOf(this, ConnectionBusyError.prototype);
    }
}

export class TransactionClosedError extends IllegalStateError {
    constructor(status: string) {
        super(`Transaction is not in started status: ${status}`);
        this.name = "TransactionClosedError";
        Object.setPrototypeOf(this, TransactionClosedError.prototype);
    }
}

export class PoolClosedError extends IllegalStateError {
    constructor() {
        super("Pool is closed");
        this.name = "PoolClosedError";
        Object.setPrototypeOf(this, PoolClosedError.prototype);
    }
}

export class ListenerNotFoundError extends IllegalStateError {
    constructor(channel: string) {
        super(`No such listener registered on channel "${channel}"`);
        this.name = "ListenerNotFoundError";
        Object.setPrototypeOf(this, ListenerNotFoundError.prototype);
    }
}

export class TimeoutError extends PgweaveError {
    constructor(readonly operation: string, readonly timeoutMs: number) {
        super(`${operation} timed out after ${timeoutMs}ms`);
        this.name = "TimeoutError";
        Object.setPrototypeOf(this, TimeoutError.prototype);
    }
}

export class CancelledError extends PgweaveError {
    constructor(readonly operation: string, reason?: unknown) {
        super(`${operation} was cancelled`, { cause: reason });
        this.name = "CancelledError";
        Object.setPrototypeOf(this, CancelledError.prototype);
    }
}

/**
 * Failure reported by the wire collaborator, e.g. a constraint violation.
 * The driver's error is kept as `cause`; `code` is its SQLSTATE when present.
 */
export class WireError extends PgweaveError {
    readonly code: string | undefined;

    constructor(cause: unknown) {
        super(cause instanceof Error ? cause.message : String(cause), { cause });
        this.name = "WireError";
        this.code = sqlState(cause);
        Object.setPrototypeOf(this, WireError.prototype);
    }
}

function sqlState(error: unknown): string | undefined {
    if (typeof error === "object" && error !== null && "code" in error) {
        const code = error.code;
        if (typeof code === "string") return code;
    }
    return undefined;
}

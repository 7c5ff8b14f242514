/**
 * pgweave - typed, template-driven PostgreSQL access with a FIFO connection pool.
 *
 * @packageDocumentation
 */

export { Template, sql, classifySlot } from "./template.js";
export type { Slot } from "./template.js";
export { compile, postgresDialect } from "./compiler.js";
export type { CompiledStatement, Dialect } from "./compiler.js";
export { mapRows, mapRow, mapValue } from "./mapper.js";
export type { RecordShape, ValueContext } from "./mapper.js";
export { Connection } from "./connection.js";
export type { Listener, QueryOptions } from "./connection.js";
export { Transaction, TransactionOptionsSchema, beginStatement } from "./transaction.js";
export type { TransactionOptions, TransactionStatus } from "./transaction.js";
export { Cursor, CursorFactory } from "./cursor.js";
export type { CursorOptions } from "./cursor.js";
export { Pool } from "./pool.js";
export type { AcquireOptions, CloseOptions, PoolStats } from "./pool.js";
export {
    PoolOptionsSchema,
    linkConfigFromEnv,
    parseConnectionString,
    resolvePoolConfig,
} from "./config.js";
export type { PoolConfig, PoolOptions } from "./config.js";
export { quoteIdentifier } from "./identifiers.js";
export { Logger } from "./logger.js";
export type { LogEntry, LogLevel, LogSink } from "./logger.js";
export type { CallOptions } from "./deadline.js";
export {
    PgweaveError,
    ConfigurationError,
    TemplateCompileError,
    InvalidParameterTypeError,
    InvalidSegmentError,
    CyclicTemplateError,
    MalformedTemplateError,
    UnsupportedTemplateError,
    CardinalityError,
    MappingError,
    IllegalStateError,
    ConnectionBusyError,
    TransactionClosedError,
    PoolClosedError,
    ListenerNotFoundError,
    TimeoutError,
    CancelledError,
    WireError,
} from "./errors.js";
export type { Row, WireValue, WireDriver, WireLink, WireResult, LinkConfig } from "@pgweave/shared/executor/interface.js";
export { PostgresDriver } from "@pgweave/shared/executor/postgres.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
    timestamp: string;
    level: LogLevel;
    message: string;
    context?: Record<string, unknown>;
}

export type LogSink = (line: string) => void;

const defaultSink: LogSink = (line) => console.error(line);

/**
 * Structured JSON logger. One line per entry, written to stderr so that
 * applications keep stdout for themselves.
 *
 * Debug entries (one per statement) are only written when `DEBUG` or
 * `PGWEAVE_DEBUG` is set.
 */
export class Logger {
    private static sink: LogSink = defaultSink;

    /** Redirects output, e.g. into an application's own logger. Pass nothing to restore stderr. */
    static setSink(sink?: LogSink): void {
        this.sink = sink ?? defaultSink;
    }

    private static write(level: LogLevel, message: string, context?: Record<string, unknown>): void {
        const entry: LogEntry = {
            timestamp: new Date().toISOString(),
            level,
            message,
        };
        if (context) {
            entry.context = context;
        }
        this.sink(JSON.stringify(entry, replacer));
    }

    static info(message: string, context?: Record<string, unknown>) {
        this.write("info", message, context);
    }

    static warn(message: string, context?: Record<string, unknown>) {
        this.write("warn", message, context);
    }

    static error(message: string, context?: Record<string, unknown>) {
        this.write("error", message, context);
    }

    static debug(message: string, context?: Record<string, unknown>) {
        if (process.env['DEBUG'] || process.env['PGWEAVE_DEBUG']) {
            this.write("debug", message, context);
        }
    }
}

// JSON.stringify throws on bigint and drops Error fields
function replacer(_key: string, value: unknown): unknown {
    if (typeof value === "bigint") return value.toString();
    if (value instanceof Error) return { name: value.name, message: value.message };
    return value;
}

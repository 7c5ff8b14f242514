import pg from "pg";
import {
    LinkConfig,
    NotificationHandler,
    Row,
    WireDriver,
    WireLink,
    WireResult,
} from "./interface.js";

const INT8_OID = 20;
const INT8_ARRAY_OID = 1016;

function toBigInts(value: unknown): unknown {
    if (Array.isArray(value)) return value.map(toBigInts);
    return typeof value === "string" ? BigInt(value) : value;
}

/**
 * Parsers for the driver's own clients: int8 and int8[] arrive as bigint
 * instead of text. pg's process-wide registry is left alone.
 */
export function linkTypes(): pg.TypeOverrides {
    const types = new pg.TypeOverrides();
    const parseInt8Array = pg.types.getTypeParser(INT8_ARRAY_OID);
    types.setTypeParser(INT8_OID, (value: string) => BigInt(value));
    types.setTypeParser(INT8_ARRAY_OID, (value: string) => toBigInts(parseInt8Array(value)));
    return types;
}

export class PostgresLink implements WireLink {
    private failed = false;
    private readonly handlers = new Set<NotificationHandler>();

    constructor(private readonly client: pg.Client) {
        client.on("error", () => {
            this.failed = true;
        });
        client.on("end", () => {
            this.failed = true;
        });
        client.on("notification", (message) => {
            const notification = {
                processId: message.processId,
                channel: message.channel,
                payload: message.payload ?? "",
            };
            for (const handler of this.handlers) {
                handler(notification);
            }
        });
    }

    get broken(): boolean {
        return this.failed;
    }

    async send(text: string, params: readonly unknown[]): Promise<WireResult> {
        // Object form keeps the statement on the extended protocol even with zero params
        const result = await this.client.query<Row>({
            text,
            values: [...params],
        });
        return {
            rows: result.rows,
            columns: result.fields.map((f) => f.name),
            rowCount: result.rowCount ?? null,
        };
    }

    onNotification(handler: NotificationHandler): () => void {
        this.handlers.add(handler);
        return () => {
            this.handlers.delete(handler);
        };
    }

    async close(): Promise<void> {
        this.failed = true;
        this.handlers.clear();
        await this.client.end();
    }
}

export class PostgresDriver implements WireDriver {
    private readonly types = linkTypes();

    async open(config: LinkConfig): Promise<WireLink> {
        const clientConfig: pg.ClientConfig = {
            host: config.host,
            port: config.port,
            user: config.user,
            database: config.database,
            types: this.types,
        };
        if (config.password !== undefined) clientConfig.password = config.password;
        if (config.applicationName !== undefined) clientConfig.application_name = config.applicationName;
        if (config.ssl !== undefined) clientConfig.ssl = config.ssl;

        const client = new pg.Client(clientConfig);
        await client.connect();
        return new PostgresLink(client);
    }
}

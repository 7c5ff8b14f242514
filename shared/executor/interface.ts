/**
 * A single value as it comes off the wire, after the driver's type parsers ran.
 */
export type WireValue =
    | null
    | boolean
    | number
    | bigint
    | string
    | Uint8Array
    | Date
    | WireValue[]
    | { [key: string]: WireValue };

export type Row = Readonly<Record<string, WireValue>>;

export interface WireResult {
    rows: Row[];
    /** Column names in server order. */
    columns: string[];
    rowCount: number | null;
}

export interface LinkConfig {
    host: string;
    port: number;
    user: string;
    password?: string;
    database: string;
    applicationName?: string;
    ssl?: boolean;
}

export interface Notification {
    processId: number;
    channel: string;
    payload: string;
}

export type NotificationHandler = (notification: Notification) => void;

/**
 * One established network link to the server.
 *
 * The link knows nothing about pooling or transactions: it sends one
 * statement, returns its rows, and reports whether it is still usable.
 * `broken` flips to true once the underlying socket errored or ended and
 * never flips back.
 */
export interface WireLink {
    readonly broken: boolean;
    send(text: string, params: readonly unknown[]): Promise<WireResult>;
    onNotification(handler: NotificationHandler): () => void;
    close(): Promise<void>;
}

export interface WireDriver {
    open(config: LinkConfig): Promise<WireLink>;
}

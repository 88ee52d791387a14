export type CacheMode = "none" | "statement";

/**
 * What the wire layer needs to know about a statement.
 *
 * An empty `name` means the unnamed statement: it is parsed, bound and executed
 * in one round trip and nothing survives on the server afterwards.
 */
export interface StatementRef {
    readonly name: string;
    readonly statement: string;
    readonly cache: CacheMode;
}

export interface WireResult {
    command: string;
    columns: string[];
    rows: unknown[][];
    numRows: number;
}

export interface CheckoutOptions {
    queue: boolean;
    timeout: number;
}

/**
 * A server-side cursor opened by `DECLARE`. Only valid inside a transaction.
 */
export interface WireCursor {
    read(maxRows: number): Promise<WireResult>;
    close(): Promise<void>;
}

/**
 * Receiving end of `COPY ... FROM STDIN`.
 */
export interface CopySink {
    write(chunk: Buffer | string): Promise<void>;
    /** Ends the copy and resolves with the number of rows the server stored. */
    finish(): Promise<number>;
    abort(reason: Error): Promise<void>;
}

/**
 * One checked-out physical connection.
 *
 * Implementations reject with `PgError` subclasses only: anything the driver
 * throws is classified before it leaves the session.
 */
export interface WireSession {
    readonly id: number;
    /** Parse, bind and execute in one pipelined request. */
    prepareExecute(statement: StatementRef, params: unknown[]): Promise<WireResult>;
    prepare(statement: StatementRef): Promise<void>;
    execute(statement: StatementRef, params: unknown[]): Promise<WireResult>;
    close(statement: StatementRef): Promise<void>;
    /** Simple query protocol, no parameters. Used for transaction control. */
    simple(sql: string): Promise<WireResult>;
    openCursor(name: string, statement: StatementRef, params: unknown[]): Promise<WireCursor>;
    copyOut(sql: string): AsyncIterable<Buffer>;
    copyIn(sql: string): Promise<CopySink>;
    parameters(): Promise<Record<string, string>>;
    /**
     * Hands the connection back. With `destroy` the physical connection is
     * closed instead of returning to the pool.
     */
    release(destroy?: boolean): void;
}

export interface WirePool {
    checkout(options: CheckoutOptions): Promise<WireSession>;
    end(): Promise<void>;
}

import type { WireCursor } from "../../../shared/executor/interface.js";
import { OwnershipError, PgError, ProgrammingError } from "../../../shared/executor/errors.js";
import { Logger } from "../../../shared/logger.js";
import { PinnedConnection, type ConnectionHandle, type StreamLease } from "./connection.js";
import type { StreamOptions } from "./options.js";
import { decode, type QueryResult } from "./request.js";
import { Query } from "./statement.js";

export type CopyChunk = Buffer | string;

export function isCopyOut(sql: string): boolean {
    return /^\s*copy\b[\s\S]*\bto\s+stdout\b/i.test(sql);
}

export function isCopyIn(sql: string): boolean {
    return /^\s*copy\b[\s\S]*\bfrom\s+stdin\b/i.test(sql);
}

/**
 * Lazily reads or writes a statement in chunks over a pinned connection.
 *
 * Iterating it yields results of at most `maxRows` rows: raw copy-data rows
 * for `COPY ... TO STDOUT`, cursor rows otherwise. A stream is read once;
 * iterating it again yields nothing.
 *
 * `into` feeds an iterable of chunks to `COPY ... FROM STDIN`. Given any other
 * statement, the chunks are read and dropped and the statement runs as usual.
 *
 * While a COPY is running, every other call on its connection fails with
 * `OwnershipError`. Cursor streams take the connection one FETCH at a time,
 * so queries and other cursor streams may run between chunks.
 */
export class PgStream implements AsyncIterable<QueryResult> {
    private consumed = false;
    private readonly maxRows: number;

    constructor(
        private readonly conn: PinnedConnection,
        private readonly query: Query | string,
        private readonly params: unknown[],
        private readonly options: StreamOptions,
    ) {
        this.maxRows = options.maxRows ?? conn.config.maxRows;
        if (!Number.isInteger(this.maxRows) || this.maxRows < 1) {
            throw new ProgrammingError(`maxRows must be a positive integer, got ${this.maxRows}`);
        }
    }

    private get sql(): string {
        return typeof this.query === "string" ? this.query : this.query.statement;
    }

    [Symbol.asyncIterator](): AsyncGenerator<QueryResult, void, undefined> {
        return this.produce();
    }

    async into(source: AsyncIterable<CopyChunk> | Iterable<CopyChunk>): Promise<QueryResult> {
        if (!this.claim()) throw new ProgrammingError("stream has already been used");
        const lease = await this.conn.openStream();
        try {
            if (isCopyIn(this.sql)) return await this.copyIn(lease, source);
            return await this.discard(lease, source);
        } finally {
            lease.close();
        }
    }

    private claim(): boolean {
        if (this.consumed) return false;
        if (typeof this.query !== "string") this.query.assertOpen();
        this.consumed = true;
        return true;
    }

    private async *produce(): AsyncGenerator<QueryResult, void, undefined> {
        if (!this.claim()) return;
        if (!isCopyOut(this.sql)) {
            yield* this.fetch();
            return;
        }
        const lease = await this.conn.openStream();
        try {
            yield* this.copyOut(lease);
        } finally {
            lease.close();
        }
    }

    private async *copyOut(lease: StreamLease): AsyncGenerator<QueryResult, void, undefined> {
        const sql = this.sql;
        const iterator = await lease.call(async (session) => session.copyOut(sql)[Symbol.asyncIterator]());
        let complete = false;
        let failed = false;
        try {
            let rows: Buffer[] = [];
            for (;;) {
                const next = await lease.call(() => iterator.next());
                if (next.done) break;
                rows.push(next.value);
                if (rows.length === this.maxRows) {
                    yield copyResult(rows);
                    rows = [];
                }
            }
            complete = true;
            if (rows.length > 0) yield copyResult(rows);
        } catch (error) {
            failed = true;
            throw error;
        } finally {
            if (!complete && !failed) {
                // The server keeps sending copy data nobody reads, so the session cannot be reused.
                lease.interrupt("COPY TO STDOUT stopped before completion");
                await iterator.return?.();
            }
        }
    }

    private async *fetch(): AsyncGenerator<QueryResult, void, undefined> {
        const { conn } = this;
        if (!conn.inTransaction) {
            throw new OwnershipError("cursor streams can only run inside a transaction");
        }
        const name = conn.pin.nextName("pgrelay_cursor");
        const statement = typeof this.query === "string" ? new Query("", this.query) : this.query;
        const cursor: WireCursor = await conn.step((session) => session.openCursor(name, statement, this.params));

        let failed = false;
        try {
            for (;;) {
                const result = await conn.step(() => cursor.read(this.maxRows));
                if (result.rows.length > 0) yield decode(result, this.options.decodeMapper);
                if (result.rows.length < this.maxRows) break;
            }
        } catch (error) {
            failed = true;
            throw error;
        } finally {
            if (!failed) await conn.step(() => cursor.close());
        }
    }

    private async copyIn(lease: StreamLease, source: AsyncIterable<CopyChunk> | Iterable<CopyChunk>): Promise<QueryResult> {
        const sql = this.sql;
        const sink = await lease.call((session) => session.copyIn(sql));
        try {
            for await (const chunk of source) {
                await lease.call(() => sink.write(chunk));
            }
        } catch (error) {
            const reason = error instanceof Error ? error : new Error(String(error));
            await sink.abort(reason);
            if (!(error instanceof PgError)) lease.fail(error);
            throw error;
        }
        const numRows = await lease.call(() => sink.finish());
        return { command: "COPY", columns: [], rows: [], numRows };
    }

    private async discard(lease: StreamLease, source: AsyncIterable<CopyChunk> | Iterable<CopyChunk>): Promise<QueryResult> {
        let chunks = 0;
        for await (const _chunk of source) {
            chunks += 1;
        }
        Logger.debug("statement is not COPY FROM STDIN, dropping copy payload", { chunks });

        const { query, params } = this;
        const result = typeof query === "string"
            ? await lease.call((session) => session.prepareExecute(new Query("", query), params))
            : await lease.call((session) => session.execute(query, params));
        this.conn.checkCommand(this.sql, result.command);
        return decode(result, this.options.decodeMapper);
    }
}

function copyResult(rows: Buffer[]): QueryResult {
    return { command: "COPY", columns: [], rows, numRows: rows.length };
}

/**
 * Builds a stream over `conn`, which must come from `transaction` or `run`.
 * Nothing is sent until the stream is iterated or `into` is called.
 */
export function stream(
    conn: ConnectionHandle,
    query: Query | string,
    params: unknown[] = [],
    options: StreamOptions = {},
): PgStream {
    if (!(conn instanceof PinnedConnection)) {
        throw new OwnershipError("streams need a connection pinned by transaction or run");
    }
    conn.assertOwned();
    return new PgStream(conn, query, params, options);
}

import { ProgrammingError } from "../../../shared/executor/errors.js";
import type { ConnectionHandle } from "./connection.js";
import type { CallOptions, ExecuteOptions, QueryOptions } from "./options.js";
import { prepareExecuteRequest, send, statementName, type QueryResult } from "./request.js";
import { attempt, type Result } from "./result.js";
import { cachedQuery, type CachedOutcome } from "./statement-cache.js";
import { Query } from "./statement.js";

/**
 * Runs `statement` with positional `$n` parameters.
 *
 * Without `cacheStatement` the statement is parsed, bound and executed
 * unnamed in one round trip. With it, see `cachedQuery`.
 *
 * @example
 * const result = await query(pool, "SELECT $1::int", [42]);
 * if (result.ok) console.log(result.value.rows); // [[42]]
 */
export function query(
    conn: ConnectionHandle,
    statement: string,
    params: unknown[] = [],
    options: QueryOptions = {},
): Promise<Result<QueryResult>> {
    return attempt(() => queryOrThrow(conn, statement, params, options));
}

export async function queryOrThrow(
    conn: ConnectionHandle,
    statement: string,
    params: unknown[] = [],
    options: QueryOptions = {},
): Promise<QueryResult> {
    if (options.cacheStatement !== undefined) {
        const { result } = await cachedQuery(conn, options.cacheStatement, statement, params, options);
        return result;
    }
    return prepareExecuteRequest(conn, new Query("", statement), params, options);
}

/**
 * Prepares `statement` under `name` without running it. An empty name
 * prepares the unnamed statement, which only validates it.
 */
export function prepare(
    conn: ConnectionHandle,
    name: string,
    statement: string,
    options: CallOptions = {},
): Promise<Result<Query>> {
    return attempt(() => prepareOrThrow(conn, name, statement, options));
}

export async function prepareOrThrow(
    conn: ConnectionHandle,
    name: string,
    statement: string,
    options: CallOptions = {},
): Promise<Query> {
    const prepared = new Query(statementName(conn, name), statement);
    await conn.request((session) => session.prepare(prepared), options);
    return prepared;
}

export function prepareExecute(
    conn: ConnectionHandle,
    name: string,
    statement: string,
    params: unknown[] = [],
    options: QueryOptions = {},
): Promise<Result<CachedOutcome>> {
    return attempt(() => prepareExecuteOrThrow(conn, name, statement, params, options));
}

export async function prepareExecuteOrThrow(
    conn: ConnectionHandle,
    name: string,
    statement: string,
    params: unknown[] = [],
    options: QueryOptions = {},
): Promise<CachedOutcome> {
    if (options.cacheStatement !== undefined) {
        return cachedQuery(conn, options.cacheStatement, statement, params, options);
    }
    const prepared = new Query(statementName(conn, name), statement);
    return { query: prepared, result: await prepareExecuteRequest(conn, prepared, params, options) };
}

/**
 * Runs a statement returned by `prepare`. If the server no longer knows it
 * (the connection was replaced, or it was deallocated by hand) the server's
 * error is returned as is.
 */
export function execute(
    conn: ConnectionHandle,
    prepared: Query,
    params: unknown[] = [],
    options: ExecuteOptions = {},
): Promise<Result<QueryResult>> {
    return attempt(() => executeOrThrow(conn, prepared, params, options));
}

export async function executeOrThrow(
    conn: ConnectionHandle,
    prepared: Query,
    params: unknown[] = [],
    options: ExecuteOptions = {},
): Promise<QueryResult> {
    prepared.assertOpen();
    return send(conn, prepared, (session) => session.execute(prepared, params), options);
}

/**
 * Deallocates a prepared statement. Closing it twice, or closing a name the
 * server never saw, is an error result.
 */
export function close(conn: ConnectionHandle, prepared: Query, options: CallOptions = {}): Promise<Result<void>> {
    return attempt(() => closeOrThrow(conn, prepared, options));
}

export async function closeOrThrow(conn: ConnectionHandle, prepared: Query, options: CallOptions = {}): Promise<void> {
    if (prepared.isClosed) {
        throw new ProgrammingError(`prepared statement ${JSON.stringify(prepared.name)} is already closed`);
    }
    await conn.request((session) => session.close(prepared), options);
    prepared.markClosed();
}

/**
 * Server parameters (server_version, TimeZone, ...) of the session serving
 * the call. Read once per physical connection.
 */
export function parameters(conn: ConnectionHandle, options: CallOptions = {}): Promise<Record<string, string>> {
    return conn.request((session) => session.parameters(), options);
}

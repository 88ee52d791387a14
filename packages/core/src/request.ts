import type { WireResult, WireSession } from "../../../shared/executor/interface.js";
import { Logger } from "../../../shared/logger.js";
import type { ConnectionHandle } from "./connection.js";
import type { DecodeMapper, ExecuteOptions } from "./options.js";
import type { Query } from "./statement.js";

export interface QueryResult {
    command: string;
    columns: string[];
    /** Column values in column order, or whatever `decodeMapper` made of them. */
    rows: unknown[];
    numRows: number;
}

export function decode(result: WireResult, mapper?: DecodeMapper): QueryResult {
    return {
        command: result.command,
        columns: result.columns,
        rows: mapper ? result.rows.map(mapper) : result.rows,
        numRows: result.numRows,
    };
}

/** The name a statement is prepared under, given the connection's `prepare` setting. */
export function statementName(conn: ConnectionHandle, name: string): string {
    return conn.config.prepare === "unnamed" ? "" : name;
}

/**
 * Sends one statement through `conn` and post-processes the reply.
 */
export async function send(
    conn: ConnectionHandle,
    query: Query,
    work: (session: WireSession) => Promise<WireResult>,
    options: ExecuteOptions,
): Promise<QueryResult> {
    Logger.debug("sending statement", { name: query.name, statement: query.statement });
    const result = await conn.request(work, options);
    conn.checkCommand(query.statement, result.command);
    return decode(result, options.decodeMapper);
}

export function prepareExecuteRequest(
    conn: ConnectionHandle,
    query: Query,
    params: unknown[],
    options: ExecuteOptions,
): Promise<QueryResult> {
    return send(conn, query, (session) => session.prepareExecute(query, params), options);
}

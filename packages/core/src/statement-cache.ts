import { ErrorKind, PgError } from "../../../shared/executor/errors.js";
import { Logger } from "../../../shared/logger.js";
import type { ConnectionHandle } from "./connection.js";
import type { ExecuteOptions } from "./options.js";
import { prepareExecuteRequest, statementName, type QueryResult } from "./request.js";
import { Query } from "./statement.js";

export interface CachedOutcome {
    query: Query;
    result: QueryResult;
}

function assertNever(kind: never): never {
    throw new Error(`unhandled error kind: ${String(kind)}`);
}

/**
 * Runs `statement` as a named statement cached on the session under `name`.
 *
 * When the server (or a pooler in front of it) answers with
 * feature_not_supported, the request is repeated once as an unnamed statement,
 * unless the pinned session is already in a failed transaction.
 */
export async function cachedQuery(
    conn: ConnectionHandle,
    name: string,
    statement: string,
    params: unknown[],
    options: ExecuteOptions,
): Promise<CachedOutcome> {
    const query = new Query(statementName(conn, name), statement, "statement");

    try {
        return { query, result: await prepareExecuteRequest(conn, query, params, options) };
    } catch (error) {
        if (!(error instanceof PgError)) throw error;

        switch (error.kind) {
            case ErrorKind.FeatureNotSupported: {
                if (conn.status() === "error") throw error;
                Logger.warn("cached statement not supported, falling back to an unnamed statement", {
                    name: query.name,
                    error: error.message,
                });
                const unnamed = new Query("", statement);
                return { query: unnamed, result: await prepareExecuteRequest(conn, unnamed, params, options) };
            }
            case ErrorKind.Server:
            case ErrorKind.Connection:
            case ErrorKind.Ownership:
            case ErrorKind.Programming:
            case ErrorKind.Transaction:
                throw error;
            default:
                return assertNever(error.kind);
        }
    }
}

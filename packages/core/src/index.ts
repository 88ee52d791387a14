import type pg from "pg";
import { PostgresPool } from "../../../shared/executor/postgres.js";
import { Logger } from "../../../shared/logger.js";
import { resolveConfig, type ConnectionConfigInput, type ResolvedConfig } from "./config.js";
import { Pool } from "./connection.js";

function escapeOption(value: string): string {
    return value.replace(/[\\ ]/g, (char) => `\\${char}`);
}

/**
 * Translates the validated configuration into node-postgres pool settings.
 * Run-time parameters travel as `-c name=value` startup options.
 */
export function toPoolConfig(config: ResolvedConfig): pg.PoolConfig {
    const options = Object.entries(config.parameters)
        .map(([name, value]) => `-c ${name}=${escapeOption(value)}`)
        .join(" ");

    return {
        host: config.socket ?? config.host,
        port: config.port,
        database: config.database,
        user: config.user,
        password: config.password,
        ssl: config.ssl,
        application_name: config.applicationName,
        options: options === "" ? undefined : options,
        max: config.poolSize,
        idleTimeoutMillis: config.idleTimeout,
        connectionTimeoutMillis: config.connectTimeout,
    };
}

/**
 * Validates `input` and opens a pool. Connections are made on first use.
 *
 * @example
 * const pool = start({ database: "app", user: "app", password: "test-secret" });
 * const result = await query(pool, "SELECT 1");
 * await pool.end();
 */
export function start(input: ConnectionConfigInput): Pool {
    const config = resolveConfig(input);
    const pool = new Pool(new PostgresPool(toPoolConfig(config)), config);
    Logger.info("pool started", {
        host: config.socket ?? config.host,
        port: config.port,
        database: config.database,
        poolSize: config.poolSize,
    });
    return pool;
}

export { configFromEnv, resolveConfig, ConnectionConfigSchema } from "./config.js";
export type { ConnectionConfigInput, ResolvedConfig } from "./config.js";
export { Pool, PinnedConnection } from "./connection.js";
export type { Connection, ConnectionHandle, ConnectionStatus } from "./connection.js";
export {
    close,
    closeOrThrow,
    execute,
    executeOrThrow,
    parameters,
    prepare,
    prepareExecute,
    prepareExecuteOrThrow,
    prepareOrThrow,
    query,
    queryOrThrow,
} from "./dispatcher.js";
export { DEFAULT_MAX_ROWS, DEFAULT_TIMEOUT_MS } from "./options.js";
export type { CallOptions, DecodeMapper, ExecuteOptions, Mode, QueryOptions, StreamOptions } from "./options.js";
export type { QueryResult } from "./request.js";
export { ok, err, unwrap } from "./result.js";
export type { Result } from "./result.js";
export type { CachedOutcome } from "./statement-cache.js";
export { Query } from "./statement.js";
export { PgStream, stream } from "./stream.js";
export type { CopyChunk } from "./stream.js";
export { RollbackSignal, rollback, run, status, transaction } from "./transaction.js";
export type { TransactionBody } from "./transaction.js";
export {
    ConnectionError,
    ErrorKind,
    OwnershipError,
    PgError,
    PostgresError,
    ProgrammingError,
    QueryTimeoutError,
    TransactionError,
} from "../../../shared/executor/errors.js";

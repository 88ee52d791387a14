export const DEFAULT_MAX_ROWS = 500;
export const DEFAULT_TIMEOUT_MS = 15_000;

/**
 * `transaction`: a failed call aborts the surrounding transaction.
 * `savepoint`: each call (or nested transaction) runs behind a savepoint and
 * a failure only undoes that call.
 */
export type Mode = "transaction" | "savepoint";

export type DecodeMapper = (row: unknown[]) => unknown;

export interface CallOptions {
    /** Wait for a free connection instead of failing straight away. */
    queue?: boolean;
    /** Milliseconds. Inside a transaction the transaction's own deadline applies instead. */
    timeout?: number;
    mode?: Mode;
}

export interface ExecuteOptions extends CallOptions {
    decodeMapper?: DecodeMapper;
}

export interface QueryOptions extends ExecuteOptions {
    /** Name under which the statement is prepared once and reused. */
    cacheStatement?: string;
}

export interface StreamOptions extends ExecuteOptions {
    maxRows?: number;
}

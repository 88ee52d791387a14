import { OwnershipError, PgError, TransactionError } from "../../../shared/executor/errors.js";
import {
    PinnedConnection,
    Pool,
    Scope,
    type Connection,
    type ConnectionHandle,
    type ConnectionStatus,
    type SessionPin,
} from "./connection.js";
import type { CallOptions } from "./options.js";
import { err, ok, type Result } from "./result.js";

export type TransactionBody<T> = (conn: PinnedConnection) => Promise<T> | T;

/**
 * Thrown by `rollback` and caught by every enclosing `transaction`, which
 * undoes its own level and throws it on until the outermost one turns it into
 * an error result.
 */
export class RollbackSignal extends Error {
    constructor(readonly reason: unknown) {
        super("transaction rolled back");
        this.name = "RollbackSignal";
    }
}

/**
 * Runs `fn` inside a transaction.
 *
 * On a pool this checks out a session, pins it for `fn` and issues
 * BEGIN/COMMIT/ROLLBACK. On a pinned connection the call nests: in
 * transaction mode it joins the running transaction, in savepoint mode it
 * runs behind its own savepoint.
 *
 * Resolves with `{ ok: false, error: reason }` when `rollback(conn, reason)`
 * is called at any depth, and with a `TransactionError` when a call inside
 * failed. Whatever `fn` throws is rethrown after the rollback.
 *
 * The `timeout` of the outermost transaction bounds everything inside it.
 */
export async function transaction<T>(
    conn: Connection,
    fn: TransactionBody<T>,
    options: CallOptions = {},
): Promise<Result<T, unknown>> {
    if (conn instanceof Pool) return outermost(conn, fn, options);

    conn.assertIdle();
    if (!conn.inTransaction) {
        // Pinned by `run`: this level owns the real transaction.
        return begin(conn.pin, new Scope(options.mode ?? "transaction", conn.scope), fn);
    }
    const mode = options.mode ?? conn.scope.callMode;
    return mode === "savepoint"
        ? nestedSavepoint(conn, conn.scope.child(mode), fn)
        : nestedTransaction(conn, conn.scope.child(mode), fn);
}

/**
 * Aborts the innermost transaction and every transaction around it. Code
 * after the call does not run.
 */
export function rollback(conn: ConnectionHandle, reason: unknown): never {
    if (!(conn instanceof PinnedConnection) || !conn.inTransaction) {
        throw new OwnershipError("rollback can only be called inside a transaction");
    }
    conn.assertOwned();
    if (!conn.pin.rollbackRequest) conn.pin.rollbackRequest = { reason };
    throw new RollbackSignal(reason);
}

/**
 * Pins one session for a series of calls without opening a transaction.
 * Streams need a pinned connection, so COPY outside of a transaction goes
 * through here.
 */
export async function run<T>(conn: Connection, fn: TransactionBody<T>, options: CallOptions = {}): Promise<T> {
    if (conn instanceof PinnedConnection) {
        conn.assertIdle();
        const scope = conn.scope.child(options.mode ?? conn.scope.callMode);
        try {
            return await fn(new PinnedConnection(conn.pin, scope));
        } finally {
            scope.state = "closed";
        }
    }

    const pin = await conn.pin(options);
    const scope = new Scope("transaction");
    try {
        return await fn(new PinnedConnection(pin, scope));
    } finally {
        scope.state = "closed";
        pin.release();
    }
}

export function status(conn: ConnectionHandle): ConnectionStatus {
    return conn.status();
}

async function outermost<T>(pool: Pool, fn: TransactionBody<T>, options: CallOptions): Promise<Result<T, unknown>> {
    let pin: SessionPin;
    try {
        pin = await pool.pin(options);
    } catch (error) {
        if (error instanceof PgError) return err(error);
        throw error;
    }

    try {
        return await begin(pin, new Scope(options.mode ?? "transaction"), fn);
    } finally {
        pin.release();
    }
}

async function begin<T>(pin: SessionPin, scope: Scope, fn: TransactionBody<T>): Promise<Result<T, unknown>> {
    try {
        await pin.command("BEGIN");
    } catch (error) {
        scope.state = "rolled_back";
        if (error instanceof PgError) return err(error);
        throw error;
    }
    pin.status = "transaction";
    pin.failure = undefined;
    pin.rollbackRequest = undefined;

    const conn = new PinnedConnection(pin, scope);
    let value: T;
    try {
        value = await fn(conn);
    } catch (error) {
        scope.state = "rolled_back";
        await conclude(pin, "ROLLBACK");
        if (error instanceof RollbackSignal) return err(error.reason);
        throw error;
    }

    if (pin.rollbackRequest) {
        scope.state = "rolled_back";
        const { reason } = pin.rollbackRequest;
        await conclude(pin, "ROLLBACK");
        return err(reason);
    }
    if (conn.status() === "error" || pin.broken) {
        scope.state = "rolled_back";
        const failure = pin.failure ?? pin.broken;
        await conclude(pin, "ROLLBACK");
        return err(new TransactionError("transaction rolled back because a call inside it failed", { cause: failure }));
    }

    const failed = await conclude(pin, "COMMIT");
    if (failed) {
        scope.state = "rolled_back";
        return err(failed);
    }
    scope.state = "committed";
    return ok(value);
}

/**
 * Issues COMMIT or ROLLBACK and puts the pin back to idle whatever the outcome.
 * A COPY still in flight means the session cannot take either, so it is given up.
 */
async function conclude(pin: SessionPin, sql: "COMMIT" | "ROLLBACK"): Promise<PgError | undefined> {
    if (sql === "ROLLBACK") pin.log.info("rolling back transaction");
    if (pin.streaming) {
        pin.break(new OwnershipError("transaction ended while a COPY stream on its connection was still open"));
    }
    try {
        if (pin.broken) return pin.broken;
        await pin.command(sql);
        return undefined;
    } catch (error) {
        if (!(error instanceof PgError)) throw error;
        pin.log.warn(`${sql} failed`, { error: error.message });
        return error;
    } finally {
        pin.status = "idle";
        pin.failure = undefined;
        pin.rollbackRequest = undefined;
    }
}

async function nestedTransaction<T>(
    conn: PinnedConnection,
    scope: Scope,
    fn: TransactionBody<T>,
): Promise<Result<T, unknown>> {
    const { pin } = conn;
    let value: T;
    try {
        value = await fn(new PinnedConnection(pin, scope));
    } catch (error) {
        scope.state = "rolled_back";
        if (!(error instanceof RollbackSignal)) pin.recordFailure(error);
        throw error;
    }

    if (pin.rollbackRequest) {
        scope.state = "rolled_back";
        throw new RollbackSignal(pin.rollbackRequest.reason);
    }
    if (pin.status === "error") {
        scope.state = "rolled_back";
        return err(new TransactionError("transaction failed because a call inside it failed", { cause: pin.failure }));
    }
    scope.state = "committed";
    return ok(value);
}

async function nestedSavepoint<T>(
    conn: PinnedConnection,
    scope: Scope,
    fn: TransactionBody<T>,
): Promise<Result<T, unknown>> {
    const { pin } = conn;
    const savepoint = pin.nextName("pgrelay_savepoint");
    try {
        await pin.command(`SAVEPOINT ${savepoint}`);
    } catch (error) {
        scope.state = "rolled_back";
        if (error instanceof PgError) return err(error);
        throw error;
    }

    let value: T;
    try {
        value = await fn(new PinnedConnection(pin, scope));
    } catch (error) {
        scope.state = "rolled_back";
        // A rollback request ends the whole transaction, so the savepoint goes with it.
        if (!(error instanceof RollbackSignal)) await restore(pin, savepoint);
        throw error;
    }

    if (pin.rollbackRequest) {
        scope.state = "rolled_back";
        throw new RollbackSignal(pin.rollbackRequest.reason);
    }
    if (pin.status === "error") {
        scope.state = "rolled_back";
        const failure = pin.failure;
        await restore(pin, savepoint);
        return err(new TransactionError("savepoint rolled back because a call inside it failed", { cause: failure }));
    }

    try {
        await pin.command(`RELEASE SAVEPOINT ${savepoint}`);
    } catch (error) {
        scope.state = "rolled_back";
        if (!(error instanceof PgError)) throw error;
        pin.recordFailure(error);
        return err(error);
    }
    scope.state = "committed";
    return ok(value);
}

/** Rolls back to `savepoint` and, if that worked, clears the failure recorded since. */
async function restore(pin: SessionPin, savepoint: string): Promise<void> {
    if (pin.broken) return;
    try {
        await pin.command(`ROLLBACK TO SAVEPOINT ${savepoint}`);
        await pin.command(`RELEASE SAVEPOINT ${savepoint}`);
    } catch (error) {
        if (!(error instanceof PgError)) throw error;
        pin.log.warn("could not roll back to savepoint", { savepoint, error: error.message });
        pin.recordFailure(error);
        return;
    }
    pin.status = "transaction";
    pin.failure = undefined;
}

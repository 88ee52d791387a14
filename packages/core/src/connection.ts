import type { WirePool, WireSession } from "../../../shared/executor/interface.js";
import {
    ConnectionError,
    OwnershipError,
    PgError,
    PostgresError,
    ProgrammingError,
    QueryTimeoutError,
    TransactionError,
} from "../../../shared/executor/errors.js";
import { withTimeout } from "../../../shared/executor/timeout.js";
import { Logger, type ContextLogger } from "../../../shared/logger.js";
import type { ResolvedConfig } from "./config.js";
import type { CallOptions, Mode } from "./options.js";

export type ConnectionStatus = "idle" | "transaction" | "error";

export type Work<T> = (session: WireSession) => Promise<T>;

/**
 * What every entry point needs from a connection reference, whether it is the
 * pool or a session pinned by `transaction`/`run`.
 */
export interface ConnectionHandle {
    readonly config: ResolvedConfig;
    status(): ConnectionStatus;
    request<T>(work: Work<T>, options?: CallOptions): Promise<T>;
    /** Called with the command tag of every result so transaction state changes can be policed. */
    checkCommand(statement: string, command: string): void;
}

const QUERY_SAVEPOINT = "pgrelay_query";

function mustDisconnect(error: PgError, config: ResolvedConfig): boolean {
    if (error instanceof ConnectionError) return true;
    if (error instanceof PostgresError && error.matches(config.disconnectCodes)) {
        Logger.warn("disconnecting on configured error code", { code: error.code, condition: error.condition });
        return true;
    }
    return false;
}

/**
 * True when `command` (the tag the server answered with) opened or ended a
 * transaction. `ROLLBACK TO SAVEPOINT` shares the `ROLLBACK` tag but does not.
 */
export function changesTransactionState(statement: string, command: string): boolean {
    switch (command) {
        case "BEGIN":
        case "START":
        case "COMMIT":
            return true;
        case "ROLLBACK":
            return !/^\s*(rollback|abort)(\s+(work|transaction))?\s+to\b/i.test(statement);
        default:
            return false;
    }
}

/**
 * The pool handle. Each request checks a connection out, runs, and hands it
 * back, so two requests on the pool share no session state.
 */
export class Pool implements ConnectionHandle {
    constructor(private readonly wire: WirePool, readonly config: ResolvedConfig) { }

    status(): ConnectionStatus {
        return "idle";
    }

    async request<T>(work: Work<T>, options: CallOptions = {}): Promise<T> {
        if (options.mode === "savepoint") {
            throw new ProgrammingError("savepoint mode can only be used inside a transaction");
        }

        const timeout = options.timeout ?? this.config.timeout;
        const deadline = Date.now() + timeout;
        const session = await this.wire.checkout({ queue: options.queue ?? this.config.queue, timeout });

        let discard = false;
        try {
            return await withTimeout(work(session), deadline - Date.now(), () => {
                discard = true;
            });
        } catch (error) {
            if (error instanceof PgError && mustDisconnect(error, this.config)) discard = true;
            throw error;
        } finally {
            if (discard) Logger.with({ session: session.id }).warn("discarding connection");
            session.release(discard);
        }
    }

    checkCommand(): void {
        // Outside a transaction there is no state to protect.
    }

    /** Checks a session out for exclusive use by `transaction` or `run`. */
    async pin(options: CallOptions = {}): Promise<SessionPin> {
        const timeout = options.timeout ?? this.config.timeout;
        const deadline = Date.now() + timeout;
        const session = await this.wire.checkout({ queue: options.queue ?? this.config.queue, timeout });
        return new SessionPin(session, this.config, deadline);
    }

    async end(): Promise<void> {
        await this.wire.end();
        Logger.info("pool closed");
    }
}

/**
 * One checked-out session shared by every scope of a transaction.
 *
 * Requests take turns through `acquire`, so calls issued one after another on
 * the same handle reach the server in that order.
 */
export class SessionPin {
    status: ConnectionStatus = "idle";
    /** First failure seen since the transaction (or savepoint) began. */
    failure: unknown;
    broken: ConnectionError | undefined;
    rollbackRequest: { reason: unknown } | undefined;
    /** Set while a COPY stream holds the session. */
    streaming = false;
    readonly log: ContextLogger;
    private released = false;
    private sequence = 0;
    private tail: Promise<void> = Promise.resolve();

    constructor(readonly session: WireSession, readonly config: ResolvedConfig, readonly deadline: number) {
        this.log = Logger.with({ session: session.id });
    }

    nextName(prefix: string): string {
        this.sequence += 1;
        return `${prefix}_${this.sequence}`;
    }

    /** Resolves with the unlock function once every earlier holder is done. */
    async acquire(): Promise<() => void> {
        const previous = this.tail;
        let unlock: () => void = () => undefined;
        const current = new Promise<void>((resolve) => {
            unlock = resolve;
        });
        this.tail = previous.then(() => current);
        const remaining = this.deadline - Date.now();
        try {
            await withTimeout(previous, remaining, () => {
                this.break(new QueryTimeoutError(Math.max(remaining, 0)));
            });
        } catch (error) {
            unlock();
            throw error;
        }
        return unlock;
    }

    /** One round trip, bounded by what is left of the pin's deadline. */
    async call<T>(work: Work<T>): Promise<T> {
        if (this.broken) throw this.broken;

        const remaining = this.deadline - Date.now();
        if (remaining <= 0) {
            const timeout = new QueryTimeoutError(0);
            this.break(timeout);
            throw timeout;
        }

        try {
            return await withTimeout(work(this.session), remaining, () => {
                this.break(new QueryTimeoutError(remaining));
            });
        } catch (error) {
            if (error instanceof PgError && mustDisconnect(error, this.config)) this.break(error);
            throw error;
        }
    }

    /** Takes the lock for a single call. */
    async exclusive<T>(work: Work<T>): Promise<T> {
        const unlock = await this.acquire();
        try {
            return await this.call(work);
        } finally {
            unlock();
        }
    }

    /** Transaction control. Refused while a COPY holds the session. */
    command(sql: string): Promise<unknown> {
        if (this.streaming) {
            const error = new OwnershipError(`cannot issue ${sql} while a COPY stream is in flight on this connection`);
            return Promise.reject(error);
        }
        return this.exclusive((session) => session.simple(sql));
    }

    recordFailure(error: unknown): void {
        if (this.status === "idle") return;
        if (this.status === "transaction") this.failure = error;
        this.status = "error";
    }

    /** After this every call fails with the same `ConnectionError`. */
    break(cause: PgError): void {
        if (this.broken) return;
        this.broken = cause instanceof ConnectionError
            ? cause
            : new ConnectionError("connection is no longer usable", { cause });
        this.log.warn("connection marked unusable", { reason: cause.message });
    }

    release(): void {
        if (this.released) return;
        this.released = true;
        this.session.release(this.broken !== undefined);
    }
}

export type ScopeState = "active" | "committed" | "rolled_back" | "closed";

/**
 * One level of `transaction` or `run`. `callMode` is the mode calls default
 * to, fixed by the scope that issued BEGIN.
 */
export class Scope {
    state: ScopeState = "active";

    constructor(readonly mode: Mode, readonly parent?: Scope, readonly callMode: Mode = mode) { }

    child(mode: Mode): Scope {
        return new Scope(mode, this, this.callMode);
    }

    /** True while this scope and all of its ancestors are still open. */
    get open(): boolean {
        for (let scope: Scope | undefined = this; scope; scope = scope.parent) {
            if (scope.state !== "active") return false;
        }
        return true;
    }
}

export interface StreamLease {
    call<T>(work: Work<T>): Promise<T>;
    fail(error: unknown): void;
    interrupt(reason: string): void;
    close(): void;
}

/**
 * A session reference handed to the function given to `transaction` or `run`.
 * It is only valid while the scope that created it is open.
 */
export class PinnedConnection implements ConnectionHandle {
    constructor(readonly pin: SessionPin, readonly scope: Scope) { }

    get config(): ResolvedConfig {
        return this.pin.config;
    }

    get inTransaction(): boolean {
        return this.pin.status !== "idle";
    }

    status(): ConnectionStatus {
        return this.pin.status;
    }

    assertOwned(): void {
        if (!this.scope.open) {
            throw new OwnershipError("connection reference used outside of the scope that pinned it");
        }
    }

    assertUsable(): void {
        this.assertOwned();
        if (this.pin.broken) throw this.pin.broken;
    }

    /** Usable, and no COPY stream holds the session. */
    assertIdle(): void {
        this.assertUsable();
        if (this.pin.streaming) {
            throw new OwnershipError("a COPY stream is in flight on this connection; finish it before issuing another request");
        }
    }

    async request<T>(work: Work<T>, options: CallOptions = {}): Promise<T> {
        this.assertIdle();
        const mode = options.mode ?? this.scope.callMode;
        if (mode === "savepoint" && !this.inTransaction) {
            throw new ProgrammingError("savepoint mode can only be used inside a transaction");
        }

        const unlock = await this.pin.acquire();
        try {
            this.assertUsable();
            return mode === "savepoint" ? await this.withSavepoint(work) : await this.tracked(work);
        } finally {
            unlock();
        }
    }

    checkCommand(statement: string, command: string): void {
        if (!this.inTransaction || !changesTransactionState(statement, command)) return;

        if (this.config.transactions === "naive") {
            this.pin.log.warn("transaction state changed by a statement inside a managed transaction", { command });
            return;
        }
        const error = new TransactionError(`unexpected ${command} inside a managed transaction`);
        this.pin.recordFailure(error);
        throw error;
    }

    /**
     * One round trip under the session lock, never wrapped in a savepoint.
     * Cursor streams fetch through here, so queries may run between fetches.
     */
    async step<T>(work: Work<T>): Promise<T> {
        this.assertIdle();
        const unlock = await this.pin.acquire();
        try {
            this.assertUsable();
            return await this.tracked(work);
        } finally {
            unlock();
        }
    }

    /**
     * Pins the session for a COPY until `close` is called. Other requests,
     * streams and transaction control fail with `OwnershipError` meanwhile.
     */
    async openStream(): Promise<StreamLease> {
        this.assertIdle();
        this.pin.streaming = true;

        let unlock: () => void;
        try {
            unlock = await this.pin.acquire();
        } catch (error) {
            this.pin.streaming = false;
            throw error;
        }

        return {
            call: (work) => this.tracked(work),
            fail: (error) => this.pin.recordFailure(error),
            interrupt: (reason) => this.pin.break(new ConnectionError(reason)),
            close: () => {
                this.pin.streaming = false;
                unlock();
            },
        };
    }

    private async tracked<T>(work: Work<T>): Promise<T> {
        try {
            return await this.pin.call(work);
        } catch (error) {
            if (error instanceof PostgresError || error instanceof ConnectionError) this.pin.recordFailure(error);
            throw error;
        }
    }

    private async withSavepoint<T>(work: Work<T>): Promise<T> {
        await this.tracked((session) => session.simple(`SAVEPOINT ${QUERY_SAVEPOINT}`));
        let result: T;
        try {
            result = await this.pin.call(work);
        } catch (error) {
            if (error instanceof ConnectionError) {
                this.pin.recordFailure(error);
            } else {
                await this.tracked((session) => session.simple(`ROLLBACK TO SAVEPOINT ${QUERY_SAVEPOINT}`));
                await this.tracked((session) => session.simple(`RELEASE SAVEPOINT ${QUERY_SAVEPOINT}`));
            }
            throw error;
        }
        await this.tracked((session) => session.simple(`RELEASE SAVEPOINT ${QUERY_SAVEPOINT}`));
        return result;
    }
}

export type Connection = Pool | PinnedConnection;

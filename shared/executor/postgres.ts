import { once } from "node:events";
import { finished } from "node:stream/promises";
import pg from "pg";
import copyStreams from "pg-copy-streams";
import { Logger } from "../logger.js";
import type {
    CheckoutOptions,
    CopySink,
    StatementRef,
    WireCursor,
    WirePool,
    WireResult,
    WireSession,
} from "./interface.js";
import { ConnectionError, PgError, PostgresError } from "./errors.js";
import { CopyRowSplitter } from "./copy-rows.js";
import { toLiteral } from "./literals.js";
import { withTimeout } from "./timeout.js";

/** Parameters the server reports through ParameterStatus. */
const REPORTED_PARAMETERS = [
    "application_name",
    "client_encoding",
    "DateStyle",
    "integer_datetimes",
    "IntervalStyle",
    "is_superuser",
    "server_encoding",
    "server_version",
    "session_authorization",
    "standard_conforming_strings",
    "TimeZone",
];

// Explicit prepares of the unnamed statement are validated under this name and dropped again.
const UNNAMED_CHECK = "pgrelay_unnamed_check";

/**
 * Converts whatever node-postgres throws into the error taxonomy.
 */
export function fromDriverError(error: unknown): PgError {
    if (error instanceof PgError) return error;
    if (error instanceof pg.DatabaseError) {
        return new PostgresError({
            code: error.code ?? "XX000",
            message: error.message,
            severity: error.severity,
            detail: error.detail,
            hint: error.hint,
            position: error.position,
            schema: error.schema,
            table: error.table,
            column: error.column,
            constraint: error.constraint,
            where: error.where,
            routine: error.routine,
        }, { cause: error });
    }
    if (error instanceof Error) return new ConnectionError(error.message, { cause: error });
    return new ConnectionError(String(error));
}

/** The part of a node-postgres client a session talks to. */
export interface DriverClient {
    query<T extends pg.Submittable>(stream: T): T;
    query(config: pg.QueryArrayConfig): Promise<pg.QueryArrayResult>;
    escapeIdentifier(text: string): string;
    escapeLiteral(text: string): string;
    release(destroy?: boolean): void;
}

/** The part of a node-postgres pool `PostgresPool` drives. */
export interface DriverPool {
    readonly idleCount: number;
    readonly totalCount: number;
    connect(): Promise<DriverClient>;
    on(event: "error", listener: (error: Error) => void): unknown;
    end(): Promise<void>;
}

function toWireResult(result: pg.QueryArrayResult): WireResult {
    return {
        command: result.command,
        columns: result.fields.map((field) => field.name),
        rows: result.rows,
        numRows: result.rowCount ?? result.rows.length,
    };
}

/**
 * State that belongs to the physical connection rather than to one checkout:
 * node-postgres keeps named statements per client, and so do we.
 */
interface ClientState {
    id: number;
    cached: Map<string, string>;
    /**
     * Cached names that were closed or replaced by an explicit prepare:
     * node-postgres would skip their Parse, so they run unnamed.
     */
    retired: Set<string>;
    /** Names taken by SQL-level PREPARE. */
    prepared: Set<string>;
    parameters: Record<string, string> | undefined;
}

let clientIds = 0;
const clientStates = new WeakMap<DriverClient, ClientState>();

function stateOf(client: DriverClient): ClientState {
    let state = clientStates.get(client);
    if (!state) {
        state = { id: ++clientIds, cached: new Map(), retired: new Set(), prepared: new Set(), parameters: undefined };
        clientStates.set(client, state);
    }
    return state;
}

/**
 * Session bound to a single checked-out connection.
 *
 * Cached statements use node-postgres named queries, which parse once per
 * connection. Explicitly prepared statements are SQL-level `PREPARE` objects
 * executed with `EXECUTE`, since node-postgres has no prepare-only request.
 */
export class PostgresSession implements WireSession {
    readonly id: number;
    private readonly state: ClientState;
    private released = false;

    constructor(private readonly client: DriverClient) {
        this.state = stateOf(client);
        this.id = this.state.id;
    }

    async prepareExecute(statement: StatementRef, params: unknown[]): Promise<WireResult> {
        if (statement.name === "") {
            return this.run({ text: statement.statement, values: params, rowMode: "array" });
        }

        if (statement.cache === "statement") {
            const known = this.state.cached.get(statement.name);
            const taken = this.state.retired.has(statement.name) || this.state.prepared.has(statement.name);
            if (taken || (known !== undefined && known !== statement.statement)) {
                Logger.debug("cached statement name is unavailable, running unnamed", {
                    name: statement.name,
                    session: this.id,
                });
                return this.run({ text: statement.statement, values: params, rowMode: "array" });
            }
            const result = await this.run({
                name: statement.name,
                text: statement.statement,
                values: params,
                rowMode: "array",
            });
            this.state.cached.set(statement.name, statement.statement);
            return result;
        }

        await this.prepare(statement);
        return this.execute(statement, params);
    }

    async prepare(statement: StatementRef): Promise<void> {
        const name = statement.name === "" ? UNNAMED_CHECK : statement.name;
        const identifier = this.client.escapeIdentifier(name);

        const existing = await this.run({
            text: "SELECT 1 FROM pg_prepared_statements WHERE name = $1",
            values: [name],
            rowMode: "array",
        });
        if (existing.rows.length > 0) {
            await this.simple(`DEALLOCATE ${identifier}`);
        }
        this.retire(name);

        await this.simple(`PREPARE ${identifier} AS ${statement.statement}`);
        if (statement.name === "") {
            await this.simple(`DEALLOCATE ${identifier}`);
        } else {
            this.state.prepared.add(name);
        }
    }

    async execute(statement: StatementRef, params: unknown[]): Promise<WireResult> {
        if (statement.name === "") {
            return this.run({ text: statement.statement, values: params, rowMode: "array" });
        }
        if (statement.cache === "statement") {
            return this.prepareExecute(statement, params);
        }
        const args = params.map((param) => toLiteral(param, (text) => this.client.escapeLiteral(text)));
        const identifier = this.client.escapeIdentifier(statement.name);
        return this.simple(args.length > 0 ? `EXECUTE ${identifier}(${args.join(", ")})` : `EXECUTE ${identifier}`);
    }

    async close(statement: StatementRef): Promise<void> {
        if (statement.name === "") return;
        await this.simple(`DEALLOCATE ${this.client.escapeIdentifier(statement.name)}`);
        this.state.prepared.delete(statement.name);
        this.retire(statement.name);
    }

    simple(sql: string): Promise<WireResult> {
        return this.run({ text: sql, rowMode: "array" });
    }

    async openCursor(name: string, statement: StatementRef, params: unknown[]): Promise<WireCursor> {
        const identifier = this.client.escapeIdentifier(name);
        await this.run({
            text: `DECLARE ${identifier} NO SCROLL CURSOR FOR ${statement.statement}`,
            values: params,
            rowMode: "array",
        });
        return {
            read: (maxRows) => this.simple(`FETCH FORWARD ${maxRows} FROM ${identifier}`),
            close: async () => {
                await this.simple(`CLOSE ${identifier}`);
            },
        };
    }

    async *copyOut(sql: string): AsyncGenerator<Buffer, void, undefined> {
        const splitter = CopyRowSplitter.forStatement(sql);
        const stream = this.client.query(copyStreams.to(sql));
        try {
            for await (const chunk of stream) {
                const data: unknown = chunk;
                const buffer = Buffer.isBuffer(data) ? data : Buffer.from(String(data));
                yield* splitter.push(buffer);
            }
        } catch (error) {
            throw fromDriverError(error);
        }
        const rest = splitter.flush();
        if (rest) yield rest;
    }

    async copyIn(sql: string): Promise<CopySink> {
        const stream = this.client.query(copyStreams.from(sql));
        let failure: PgError | undefined;
        stream.on("error", (error: unknown) => {
            failure = fromDriverError(error);
        });

        const ensureHealthy = () => {
            if (failure) throw failure;
        };

        return {
            write: async (chunk) => {
                ensureHealthy();
                if (!stream.write(chunk)) {
                    try {
                        await once(stream, "drain");
                    } catch (error) {
                        throw fromDriverError(error);
                    }
                }
            },
            finish: async () => {
                ensureHealthy();
                stream.end();
                try {
                    await finished(stream, { readable: false });
                } catch (error) {
                    throw fromDriverError(error);
                }
                return stream.rowCount;
            },
            abort: async (reason) => {
                if (stream.destroyed) return;
                const closed = new Promise<void>((resolve) => stream.once("close", () => resolve()));
                stream.destroy(reason);
                await closed;
            },
        };
    }

    async parameters(): Promise<Record<string, string>> {
        if (!this.state.parameters) {
            const result = await this.run({
                text: "SELECT name, current_setting(name, true) FROM unnest($1::text[]) AS name",
                values: [REPORTED_PARAMETERS],
                rowMode: "array",
            });
            const parameters: Record<string, string> = {};
            for (const [name, value] of result.rows) {
                if (typeof name === "string" && typeof value === "string") {
                    parameters[name] = value;
                }
            }
            this.state.parameters = parameters;
        }
        return { ...this.state.parameters };
    }

    release(destroy = false): void {
        if (this.released) return;
        this.released = true;
        // A destroyed client takes its named statements with it.
        if (destroy) clientStates.delete(this.client);
        this.client.release(destroy);
    }

    /** The server no longer holds what node-postgres thinks it parsed under `name`. */
    private retire(name: string): void {
        if (this.state.cached.delete(name)) this.state.retired.add(name);
    }

    private async run(config: pg.QueryArrayConfig): Promise<WireResult> {
        try {
            return toWireResult(await this.client.query(config));
        } catch (error) {
            throw fromDriverError(error);
        }
    }
}

export class PostgresPool implements WirePool {
    private readonly max: number;

    constructor(config: pg.PoolConfig, private readonly pool: DriverPool = new pg.Pool(config)) {
        this.max = config.max ?? 10;
        this.pool.on("error", (error) => {
            Logger.error("idle connection failed", { error: error.message });
        });
    }

    async checkout(options: CheckoutOptions): Promise<WireSession> {
        if (!options.queue && this.pool.idleCount === 0 && this.pool.totalCount >= this.max) {
            throw new ConnectionError("connection not available and queuing is disabled");
        }

        const pending = this.pool.connect();
        try {
            const client = await withTimeout(pending, options.timeout, () => {
                // The checkout may still succeed later; hand that client straight back.
                void pending.then(
                    (late) => late.release(),
                    (error: unknown) => Logger.debug("checkout failed after timeout", { error: String(error) }),
                );
            });
            return new PostgresSession(client);
        } catch (error) {
            throw fromDriverError(error);
        }
    }

    async end(): Promise<void> {
        await this.pool.end();
    }
}

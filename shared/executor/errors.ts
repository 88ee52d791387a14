import { readFileSync } from "node:fs";

/**
 * Every failure that leaves the wire layer carries one of these kinds.
 * Coordinators branch on the kind, never on messages.
 */
export enum ErrorKind {
    /** The server answered with an ErrorResponse. */
    Server = "server",
    /** SQLSTATE 0A000: the server or a proxy in front of it cannot honour the request. */
    FeatureNotSupported = "feature_not_supported",
    /** Transport failure, checkout failure or timeout. The connection is not reused. */
    Connection = "connection",
    /** A handle was used outside the scope that owns it. */
    Ownership = "ownership",
    /** Bad arguments or options. Never retried. */
    Programming = "programming",
    /** A transaction had to be rolled back. */
    Transaction = "transaction",
}

export abstract class PgError extends Error {
    abstract readonly kind: ErrorKind;

    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
    }
}

const FEATURE_NOT_SUPPORTED = "0A000";

let conditions: Record<string, string> | undefined;

/**
 * Maps a SQLSTATE to its condition name, e.g. `25006` to `read_only_sql_transaction`.
 */
export function conditionName(code: string): string | undefined {
    if (!conditions) {
        const raw: unknown = JSON.parse(readFileSync(new URL("./errcodes.json", import.meta.url), "utf8"));
        conditions = {};
        if (typeof raw === "object" && raw !== null) {
            for (const [key, value] of Object.entries(raw)) {
                if (typeof value === "string") conditions[key] = value;
            }
        }
    }
    return conditions[code];
}

export interface PostgresErrorFields {
    code: string;
    message: string;
    severity?: string | undefined;
    detail?: string | undefined;
    hint?: string | undefined;
    position?: string | undefined;
    schema?: string | undefined;
    table?: string | undefined;
    column?: string | undefined;
    constraint?: string | undefined;
    where?: string | undefined;
    routine?: string | undefined;
}

/**
 * Error reported by the server, e.g.
 * `ERROR 25006 (read_only_sql_transaction) cannot execute INSERT in a read-only transaction`.
 */
export class PostgresError extends PgError {
    readonly kind: ErrorKind.Server | ErrorKind.FeatureNotSupported;
    readonly code: string;
    readonly condition: string | undefined;
    readonly severity: string;
    readonly detail: string | undefined;
    readonly hint: string | undefined;
    readonly position: string | undefined;
    readonly schema: string | undefined;
    readonly table: string | undefined;
    readonly column: string | undefined;
    readonly constraint: string | undefined;
    readonly where: string | undefined;
    readonly routine: string | undefined;

    constructor(fields: PostgresErrorFields, options?: ErrorOptions) {
        const condition = conditionName(fields.code);
        const severity = fields.severity ?? "ERROR";
        super(`${severity} ${fields.code} (${condition ?? "unknown"}) ${fields.message}`, options);
        this.kind = fields.code === FEATURE_NOT_SUPPORTED ? ErrorKind.FeatureNotSupported : ErrorKind.Server;
        this.code = fields.code;
        this.condition = condition;
        this.severity = severity;
        this.detail = fields.detail;
        this.hint = fields.hint;
        this.position = fields.position;
        this.schema = fields.schema;
        this.table = fields.table;
        this.column = fields.column;
        this.constraint = fields.constraint;
        this.where = fields.where;
        this.routine = fields.routine;
    }

    /** True when the SQLSTATE or the condition name is listed. */
    matches(codes: ReadonlySet<string>): boolean {
        return codes.has(this.code) || (this.condition !== undefined && codes.has(this.condition));
    }
}

export class ConnectionError extends PgError {
    readonly kind = ErrorKind.Connection;
}

export class QueryTimeoutError extends ConnectionError {
    constructor(readonly timeout: number) {
        super(`request timed out after ${timeout}ms`);
    }
}

export class OwnershipError extends PgError {
    readonly kind = ErrorKind.Ownership;
}

export class ProgrammingError extends PgError {
    readonly kind = ErrorKind.Programming;
}

export class TransactionError extends PgError {
    readonly kind = ErrorKind.Transaction;
}

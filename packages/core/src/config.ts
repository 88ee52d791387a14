import { z } from "zod";
import { ProgrammingError } from "../../../shared/executor/errors.js";
import { DEFAULT_MAX_ROWS, DEFAULT_TIMEOUT_MS } from "./options.js";

export const ConnectionConfigSchema = z.object({
    host: z.string().default("localhost"),
    port: z.number().int().min(1).max(65535).default(5432),
    socket: z.string().optional().describe("Directory holding the server's unix socket. Takes precedence over host."),
    database: z.string().min(1),
    user: z.string().min(1),
    password: z.string().optional(),
    ssl: z.boolean().default(false),
    applicationName: z.string().optional(),
    parameters: z.record(z.string(), z.string()).default({}).describe("Run-time parameters sent at connection startup"),
    prepare: z.enum(["named", "unnamed"]).default("named").describe("'unnamed' forces every statement to the unnamed slot, for poolers that drop named statements"),
    transactions: z.enum(["strict", "naive"]).default("strict"),
    disconnectOnErrorCodes: z.array(z.string()).default([]).describe("SQLSTATEs or condition names that make the connection reconnect"),
    poolSize: z.number().int().positive().default(1),
    queue: z.boolean().default(true),
    timeout: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
    connectTimeout: z.number().int().positive().optional(),
    idleTimeout: z.number().int().nonnegative().default(10_000),
    maxRows: z.number().int().positive().default(DEFAULT_MAX_ROWS),
});

export type ConnectionConfigInput = z.input<typeof ConnectionConfigSchema>;

export interface ResolvedConfig extends z.output<typeof ConnectionConfigSchema> {
    connectTimeout: number;
    disconnectCodes: ReadonlySet<string>;
}

export function resolveConfig(input: unknown): ResolvedConfig {
    const parsed = ConnectionConfigSchema.safeParse(input);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`);
        throw new ProgrammingError(`Invalid connection configuration: ${issues.join("; ")}`);
    }
    const config = parsed.data;
    return {
        ...config,
        connectTimeout: config.connectTimeout ?? config.timeout,
        disconnectCodes: new Set(config.disconnectOnErrorCodes),
    };
}

function sslFromMode(mode: string): boolean {
    return mode !== "disable" && mode !== "allow" && mode !== "prefer";
}

/**
 * Fills the usual libpq environment variables in under `overrides`.
 */
export function configFromEnv(
    overrides: Partial<ConnectionConfigInput> = {},
    env: NodeJS.ProcessEnv = process.env,
): ResolvedConfig {
    const fromEnv: Partial<ConnectionConfigInput> = {};
    if (env['PGHOST']) fromEnv.host = env['PGHOST'];
    if (env['PGPORT']) fromEnv.port = parseInt(env['PGPORT'], 10);
    if (env['PGDATABASE']) fromEnv.database = env['PGDATABASE'];
    const user = env['PGUSER'] || env['USER'];
    if (user) fromEnv.user = user;
    if (env['PGPASSWORD']) fromEnv.password = env['PGPASSWORD'];
    if (env['PGSSLMODE']) fromEnv.ssl = sslFromMode(env['PGSSLMODE']);

    return resolveConfig({ ...fromEnv, ...overrides });
}

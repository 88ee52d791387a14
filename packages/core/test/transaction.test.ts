import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
    ConnectionError,
    OwnershipError,
    PostgresError,
    QueryTimeoutError,
    TransactionError,
} from "../../../shared/executor/errors.js";
import type { PinnedConnection } from "../src/connection.js";
import { query, queryOrThrow } from "../src/dispatcher.js";
import { RollbackSignal, rollback, run, status, transaction } from "../src/transaction.js";
import { fakePool, hang, result, serverError } from "./support/fake-wire.js";

const DUPLICATE = "INSERT INTO t VALUES (2)";

beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(() => {
    vi.restoreAllMocks();
});

describe("transaction", () => {
    it("commits and returns the function's value", async () => {
        const { pool, server, wire } = fakePool();

        const outcome = await transaction(pool, async (conn) => {
            await queryOrThrow(conn, "INSERT INTO t VALUES (1)");
            return "done";
        });

        expect(outcome).toEqual({ ok: true, value: "done" });
        expect(server.log).toEqual(["BEGIN", "prepareExecute() INSERT INTO t VALUES (1)", "COMMIT"]);
        expect(wire.sessions).toHaveLength(1);
        expect(wire.sessions[0]?.released).toBe(true);
        expect(wire.sessions[0]?.destroyed).toBe(false);
    });

    it("runs every call on the same session in issue order", async () => {
        const { pool, server, wire } = fakePool();
        server.on("SELECT 1", async () => {
            await new Promise((resolve) => setTimeout(resolve, 10));
            return result([[1]]);
        });

        await transaction(pool, (conn) => Promise.all([
            query(conn, "SELECT 1"),
            query(conn, "SELECT 2"),
            query(conn, "SELECT 3"),
        ]));

        expect(server.log).toEqual([
            "BEGIN",
            "prepareExecute() SELECT 1",
            "prepareExecute() SELECT 2",
            "prepareExecute() SELECT 3",
            "COMMIT",
        ]);
        expect(wire.sessions).toHaveLength(1);
    });

    it("rolls back and rethrows what the function throws", async () => {
        const { pool, server, wire } = fakePool();

        await expect(transaction(pool, async () => {
            throw new Error("boom");
        })).rejects.toThrow("boom");

        expect(server.log).toEqual(["BEGIN", "ROLLBACK"]);
        expect(wire.sessions[0]?.released).toBe(true);
    });

    it("returns BEGIN's failure without running the function", async () => {
        const { pool, server } = fakePool();
        server.on("BEGIN", serverError("57P01", "terminating connection due to administrator command"));
        const body = vi.fn();

        const outcome = await transaction(pool, body);

        expect(outcome.ok).toBe(false);
        if (outcome.ok) return;
        expect(outcome.error).toBeInstanceOf(PostgresError);
        expect(body).not.toHaveBeenCalled();
    });

    it("returns checkout failures as error results", async () => {
        const { pool, wire } = fakePool();
        wire.checkoutFailure = new ConnectionError("connection refused");

        const outcome = await transaction(pool, async () => "never");

        expect(outcome).toEqual({ ok: false, error: wire.checkoutFailure });
    });

    it("returns a TransactionError when a call inside failed", async () => {
        const { pool, server } = fakePool();
        server.on(DUPLICATE, serverError("23505", "duplicate key value violates unique constraint"));

        const outcome = await transaction(pool, async (conn) => {
            const inserted = await query(conn, DUPLICATE);
            expect(status(conn)).toBe("error");
            return inserted.ok;
        });

        expect(outcome.ok).toBe(false);
        if (outcome.ok) return;
        expect(outcome.error).toBeInstanceOf(TransactionError);
        expect(outcome.error).toHaveProperty("cause.message", "ERROR 23505 (unique_violation) duplicate key value violates unique constraint");
        expect(server.log).toEqual(["BEGIN", `prepareExecute() ${DUPLICATE}`, "ROLLBACK"]);
    });
});

describe("rollback", () => {
    it("turns the reason into the error result", async () => {
        const { pool, server } = fakePool();

        const outcome = await transaction(pool, async (conn) => {
            rollback(conn, "nope");
        });

        expect(outcome).toEqual({ ok: false, error: "nope" });
        expect(server.log).toEqual(["BEGIN", "ROLLBACK"]);
    });

    it("bubbles from any depth to the outermost transaction", async () => {
        const { pool, server } = fakePool();
        const after = vi.fn();

        const outcome = await transaction(pool, async (conn) => {
            await transaction(conn, async (inner) => {
                await transaction(inner, async (innermost) => {
                    rollback(innermost, { reason: "deep" });
                });
                after();
            });
            after();
            return "unreachable";
        });

        expect(outcome).toEqual({ ok: false, error: { reason: "deep" } });
        expect(after).not.toHaveBeenCalled();
        expect(server.log).toEqual(["BEGIN", "ROLLBACK"]);
    });

    it("bubbles through savepoints without rolling back to them", async () => {
        const { pool, server } = fakePool();
        const after = vi.fn();

        const outcome = await transaction(pool, async (conn) => {
            await transaction(conn, async (inner) => {
                rollback(inner, "from savepoint");
            }, { mode: "savepoint" });
            after();
        });

        expect(outcome).toEqual({ ok: false, error: "from savepoint" });
        expect(after).not.toHaveBeenCalled();
        expect(server.log).toEqual(["BEGIN", "SAVEPOINT pgrelay_savepoint_1", "ROLLBACK"]);
    });

    it("still rolls back when the signal is caught by the caller", async () => {
        const { pool, server } = fakePool();

        const outcome = await transaction(pool, async (conn) => {
            try {
                rollback(conn, "swallowed");
            } catch (error) {
                expect(error).toBeInstanceOf(RollbackSignal);
            }
            return 1;
        });

        expect(outcome).toEqual({ ok: false, error: "swallowed" });
        expect(server.log).toEqual(["BEGIN", "ROLLBACK"]);
    });

    it("is an ownership error outside a transaction", async () => {
        const { pool } = fakePool();

        expect(() => rollback(pool, "x")).toThrow(OwnershipError);
        await expect(run(pool, async (conn) => rollback(conn, "x"))).rejects.toBeInstanceOf(OwnershipError);
    });
});

describe("nested transactions", () => {
    it("in transaction mode, a failure inside fails the outer transaction", async () => {
        const { pool, server } = fakePool();
        server.on(DUPLICATE, serverError("23505"));

        const outcome = await transaction(pool, async (conn) => {
            await expect(transaction(conn, async (inner) => {
                await queryOrThrow(inner, DUPLICATE);
            })).rejects.toBeInstanceOf(PostgresError);
            return "continued";
        });

        expect(outcome.ok).toBe(false);
        if (outcome.ok) return;
        expect(outcome.error).toBeInstanceOf(TransactionError);
        expect(server.log).toEqual(["BEGIN", `prepareExecute() ${DUPLICATE}`, "ROLLBACK"]);
    });

    it("in transaction mode, a failed call makes the nested call return an error", async () => {
        const { pool, server } = fakePool();
        server.on(DUPLICATE, serverError("23505"));
        const nested: unknown[] = [];

        await transaction(pool, async (conn) => {
            const outcome = await transaction(conn, async (inner) => (await query(inner, DUPLICATE)).ok);
            nested.push(outcome);
        });

        expect(nested).toHaveLength(1);
        expect(nested[0]).toEqual({ ok: false, error: expect.any(TransactionError) });
    });

    it("in savepoint mode, a failure inside does not stop the outer transaction from committing", async () => {
        const { pool, server } = fakePool();
        server.on(DUPLICATE, serverError("23505"));

        const outcome = await transaction(pool, async (conn) => {
            await expect(transaction(conn, async (inner) => {
                await queryOrThrow(inner, DUPLICATE);
            }, { mode: "savepoint" })).rejects.toBeInstanceOf(PostgresError);
            expect(status(conn)).toBe("transaction");
            await queryOrThrow(conn, "INSERT INTO t VALUES (3)");
            return "committed";
        });

        expect(outcome).toEqual({ ok: true, value: "committed" });
        expect(server.log).toEqual([
            "BEGIN",
            "SAVEPOINT pgrelay_savepoint_1",
            `prepareExecute() ${DUPLICATE}`,
            "ROLLBACK TO SAVEPOINT pgrelay_savepoint_1",
            "RELEASE SAVEPOINT pgrelay_savepoint_1",
            "prepareExecute() INSERT INTO t VALUES (3)",
            "COMMIT",
        ]);
    });

    it("in savepoint mode, a failed call rolls back to the savepoint and returns an error", async () => {
        const { pool, server } = fakePool();
        server.on(DUPLICATE, serverError("23505"));

        const outcome = await transaction(pool, async (conn) => {
            const nested = await transaction(conn, (inner) => query(inner, DUPLICATE), { mode: "savepoint" });
            return nested.ok;
        });

        expect(outcome).toEqual({ ok: true, value: false });
        expect(server.log).toEqual([
            "BEGIN",
            "SAVEPOINT pgrelay_savepoint_1",
            `prepareExecute() ${DUPLICATE}`,
            "ROLLBACK TO SAVEPOINT pgrelay_savepoint_1",
            "RELEASE SAVEPOINT pgrelay_savepoint_1",
            "COMMIT",
        ]);
    });

    it("releases the savepoint of a nested call that succeeds", async () => {
        const { pool, server } = fakePool();

        const outcome = await transaction(pool, (conn) =>
            transaction(conn, (inner) => queryOrThrow(inner, "SELECT 1"), { mode: "savepoint" }));

        expect(outcome.ok).toBe(true);
        expect(server.log).toEqual([
            "BEGIN",
            "SAVEPOINT pgrelay_savepoint_1",
            "prepareExecute() SELECT 1",
            "RELEASE SAVEPOINT pgrelay_savepoint_1",
            "COMMIT",
        ]);
    });

    it("wraps single calls in a savepoint when asked to", async () => {
        const { pool, server } = fakePool();
        server.on(DUPLICATE, serverError("23505"));

        const outcome = await transaction(pool, async (conn) => {
            const failed = await query(conn, DUPLICATE, [], { mode: "savepoint" });
            const selected = await query(conn, "SELECT 1");
            return [failed.ok, selected.ok];
        });

        expect(outcome).toEqual({ ok: true, value: [false, true] });
        expect(server.log).toEqual([
            "BEGIN",
            "SAVEPOINT pgrelay_query",
            `prepareExecute() ${DUPLICATE}`,
            "ROLLBACK TO SAVEPOINT pgrelay_query",
            "RELEASE SAVEPOINT pgrelay_query",
            "prepareExecute() SELECT 1",
            "COMMIT",
        ]);
    });
});

describe("ownership", () => {
    it("rejects a pinned connection used after its transaction ended", async () => {
        const { pool, server } = fakePool();
        const leaked: PinnedConnection[] = [];

        await transaction(pool, async (conn) => {
            leaked.push(conn);
        });
        const outcome = await query(leaked[0] ?? pool, "SELECT 1");

        expect(leaked).toHaveLength(1);
        expect(outcome.ok).toBe(false);
        if (outcome.ok) return;
        expect(outcome.error).toBeInstanceOf(OwnershipError);
        expect(server.log).toEqual(["BEGIN", "COMMIT"]);
    });

    it("rejects a nested connection used after its nested scope ended", async () => {
        const { pool } = fakePool();
        const leaked: PinnedConnection[] = [];

        const outcome = await transaction(pool, async (conn) => {
            await transaction(conn, async (inner) => {
                leaked.push(inner);
            });
            const stale = await query(leaked[0] ?? conn, "SELECT 1");
            return stale.ok ? "usable" : stale.error.constructor.name;
        });

        expect(outcome).toEqual({ ok: true, value: "OwnershipError" });
    });
});

describe("timeouts", () => {
    it("bounds the whole transaction by its own timeout", async () => {
        const { pool, server, wire } = fakePool();
        server.on("SELECT pg_sleep(10)", () => hang());

        await expect(transaction(pool, async (conn) => {
            await queryOrThrow(conn, "SELECT 1", [], { timeout: 60_000 });
            await queryOrThrow(conn, "SELECT pg_sleep(10)", [], { timeout: 60_000 });
        }, { timeout: 50 })).rejects.toBeInstanceOf(QueryTimeoutError);

        expect(server.log).toEqual(["BEGIN", "prepareExecute() SELECT 1", "prepareExecute() SELECT pg_sleep(10)"]);
        expect(wire.sessions[0]?.destroyed).toBe(true);
    });
});

describe("transaction state checks", () => {
    it("fails a statement that ends the transaction in strict mode", async () => {
        const { pool, server } = fakePool();
        const inner: unknown[] = [];

        const outcome = await transaction(pool, async (conn) => {
            inner.push(await query(conn, "COMMIT"));
        });

        expect(inner[0]).toEqual({ ok: false, error: expect.any(TransactionError) });
        expect(outcome.ok).toBe(false);
        expect(server.log).toEqual(["BEGIN", "prepareExecute() COMMIT", "ROLLBACK"]);
    });

    it("only warns in naive mode", async () => {
        const { pool, server } = fakePool({ transactions: "naive" });
        const stderr = vi.spyOn(console, "error").mockImplementation(() => undefined);

        const outcome = await transaction(pool, async (conn) => (await query(conn, "COMMIT")).ok);

        expect(outcome).toEqual({ ok: true, value: true });
        const entries: unknown[] = stderr.mock.calls.map(([line]) => JSON.parse(String(line)));
        expect(entries).toContainEqual({
            timestamp: expect.any(String),
            level: "warn",
            message: "transaction state changed by a statement inside a managed transaction",
            context: { session: 1, command: "COMMIT" },
        });
        expect(server.log).toEqual(["BEGIN", "prepareExecute() COMMIT", "COMMIT"]);
    });

    it("allows rolling back to a savepoint of the caller's own", async () => {
        const { pool } = fakePool();

        const outcome = await transaction(pool, async (conn) => {
            await queryOrThrow(conn, "SAVEPOINT mine");
            return (await query(conn, "ROLLBACK TO SAVEPOINT mine")).ok;
        });

        expect(outcome).toEqual({ ok: true, value: true });
    });
});

describe("run", () => {
    it("pins one session without a transaction", async () => {
        const { pool, server, wire } = fakePool();

        const seen = await run(pool, async (conn) => {
            await queryOrThrow(conn, "SELECT 1");
            await queryOrThrow(conn, "SELECT 2");
            return status(conn);
        });

        expect(seen).toBe("idle");
        expect(wire.sessions).toHaveLength(1);
        expect(server.log).toEqual(["prepareExecute() SELECT 1", "prepareExecute() SELECT 2"]);
    });

    it("opens a real transaction when one is started inside it", async () => {
        const { pool, server } = fakePool();

        const outcome = await run(pool, (conn) => transaction(conn, (tx) => queryOrThrow(tx, "SELECT 1")));

        expect(outcome.ok).toBe(true);
        expect(server.log).toEqual(["BEGIN", "prepareExecute() SELECT 1", "COMMIT"]);
    });

    it("makes the pool refuse a second checkout when queuing is off", async () => {
        const { pool } = fakePool();

        const outcome = await run(pool, () => query(pool, "SELECT 1", [], { queue: false }));

        expect(outcome.ok).toBe(false);
        if (outcome.ok) return;
        expect(outcome.error).toBeInstanceOf(ConnectionError);
    });
});

describe("status", () => {
    it("reports idle for the pool and transaction inside one", async () => {
        const { pool } = fakePool();

        const inside = await transaction(pool, async (conn) => status(conn));

        expect(status(pool)).toBe("idle");
        expect(inside).toEqual({ ok: true, value: "transaction" });
    });
});

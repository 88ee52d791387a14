import { PgError } from "../../../shared/executor/errors.js";

export type Result<T, E = PgError> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
    return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
    return { ok: false, error };
}

/**
 * Runs `work` and turns a rejected `PgError` into an error result.
 * Anything else that is thrown is not ours to classify and keeps propagating.
 */
export async function attempt<T>(work: () => Promise<T>): Promise<Result<T>> {
    try {
        return ok(await work());
    } catch (error) {
        if (error instanceof PgError) return err(error);
        throw error;
    }
}

export function unwrap<T>(result: Result<T>): T {
    if (result.ok) return result.value;
    throw result.error;
}

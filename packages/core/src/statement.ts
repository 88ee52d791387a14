import type { CacheMode, StatementRef } from "../../../shared/executor/interface.js";
import { ProgrammingError } from "../../../shared/executor/errors.js";

/**
 * A statement handle as returned by `prepare`.
 *
 * The server-side object lives until `close` or until its connection goes
 * away; nothing here deallocates it implicitly.
 */
export class Query implements StatementRef {
    private closed = false;

    constructor(
        readonly name: string,
        readonly statement: string,
        readonly cache: CacheMode = "none",
    ) { }

    get isClosed(): boolean {
        return this.closed;
    }

    markClosed(): void {
        this.closed = true;
    }

    assertOpen(): void {
        if (this.closed) {
            throw new ProgrammingError(`prepared statement ${JSON.stringify(this.name)} has been closed`);
        }
    }
}

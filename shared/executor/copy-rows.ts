export type CopyFormat = "text" | "csv" | "binary";

/** Byte values of the CSV QUOTE and ESCAPE characters. */
export interface CsvQuoting {
    quote: number;
    escape: number;
}

const NEWLINE = 0x0a;
const DOUBLE_QUOTE = 0x22;

/**
 * Re-cuts `COPY ... TO STDOUT` output into one buffer per row.
 *
 * The driver hands out copy data in whatever pieces arrived on the socket.
 * Text and CSV rows end with a newline, which stays part of the row. In CSV a
 * newline inside a quoted field belongs to the field. Binary output has no row
 * separator and is passed through untouched.
 */
export class CopyRowSplitter {
    private pending: Buffer = Buffer.alloc(0);
    /** How much of `pending` has already been looked at. */
    private scanned = 0;
    private quoted = false;
    private escaping = false;

    constructor(
        private readonly format: CopyFormat,
        private readonly quoting: CsvQuoting = { quote: DOUBLE_QUOTE, escape: DOUBLE_QUOTE },
    ) { }

    static forStatement(sql: string): CopyRowSplitter {
        const options = copyOptions(sql);
        const format = copyFormat(sql);
        if (format !== "csv") return new CopyRowSplitter(format);

        const quote = optionChar(options, "quote") ?? DOUBLE_QUOTE;
        return new CopyRowSplitter(format, { quote, escape: optionChar(options, "escape") ?? quote });
    }

    push(chunk: Buffer): Buffer[] {
        if (this.format === "binary") {
            return chunk.length > 0 ? [chunk] : [];
        }

        const data = this.pending.length > 0 ? Buffer.concat([this.pending, chunk]) : chunk;
        const rows: Buffer[] = [];
        let start = 0;
        let end = this.rowEnd(data, this.scanned);
        while (end !== -1) {
            rows.push(data.subarray(start, end + 1));
            start = end + 1;
            end = this.rowEnd(data, start);
        }
        this.pending = data.subarray(start);
        this.scanned = this.pending.length;
        return rows;
    }

    /** Whatever is left once the copy has ended, if anything. */
    flush(): Buffer | undefined {
        if (this.pending.length === 0) return undefined;
        const rest = this.pending;
        this.pending = Buffer.alloc(0);
        this.scanned = 0;
        this.quoted = false;
        this.escaping = false;
        return rest;
    }

    private rowEnd(data: Buffer, from: number): number {
        if (this.format === "text") return data.indexOf(NEWLINE, from);

        const { quote, escape } = this.quoting;
        for (let i = from; i < data.length; i += 1) {
            const byte = data[i];
            if (this.escaping) {
                this.escaping = false;
            } else if (this.quoted && escape !== quote && byte === escape) {
                this.escaping = true;
            } else if (byte === quote) {
                this.quoted = !this.quoted;
            } else if (byte === NEWLINE && !this.quoted) {
                return i;
            }
        }
        return -1;
    }
}

// Options follow the target, so a subquery mentioning "csv" does not count.
function copyOptions(sql: string): string {
    const at = sql.search(/\bto\s+stdout\b/i);
    return at === -1 ? sql : sql.slice(at);
}

function optionChar(options: string, name: "quote" | "escape"): number | undefined {
    const match = new RegExp(`\\b${name}\\s+(?:as\\s+)?'([^'])'`, "i").exec(options);
    const char = match?.[1];
    return char === undefined ? undefined : Buffer.from(char)[0];
}

export function copyFormat(sql: string): CopyFormat {
    const options = copyOptions(sql);
    if (/^\s*copy\s+binary\b/i.test(sql) || /\bbinary\b/i.test(options)) return "binary";
    if (/\bcsv\b/i.test(options)) return "csv";
    return "text";
}

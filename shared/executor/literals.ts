import { ProgrammingError } from "./errors.js";

export type EscapeLiteral = (text: string) => string;

/**
 * Renders a parameter as a SQL literal for `EXECUTE name(...)`.
 *
 * The server coerces each literal to the parameter type inferred when the
 * statement was prepared, so everything that is not NULL, a boolean or a
 * number travels as a quoted string.
 */
export function toLiteral(value: unknown, escape: EscapeLiteral): string {
    if (value === null || value === undefined) return "NULL";
    if (typeof value === "boolean") return value ? "TRUE" : "FALSE";
    if (typeof value === "bigint") return value.toString();
    if (typeof value === "number") {
        return Number.isFinite(value) ? String(value) : escape(String(value));
    }
    if (typeof value === "string") return escape(value);
    if (value instanceof Date) return escape(value.toISOString());
    if (value instanceof Uint8Array) return escape(`\\x${Buffer.from(value).toString("hex")}`);
    if (Array.isArray(value)) return escape(toArrayText(value));
    if (typeof value === "object") return escape(JSON.stringify(value));
    throw new ProgrammingError(`cannot encode parameter of type ${typeof value}`);
}

/**
 * PostgreSQL array input syntax: `{1,2,"a b",NULL}`.
 */
export function toArrayText(values: readonly unknown[]): string {
    const items = values.map((item) => {
        if (item === null || item === undefined) return "NULL";
        if (Array.isArray(item)) return toArrayText(item);
        return quoteElement(elementText(item));
    });
    return `{${items.join(",")}}`;
}

function elementText(item: unknown): string {
    if (item instanceof Date) return item.toISOString();
    if (item instanceof Uint8Array) return `\\x${Buffer.from(item).toString("hex")}`;
    if (typeof item === "object") return JSON.stringify(item);
    return String(item);
}

function quoteElement(text: string): string {
    return `"${text.replace(/[\\"]/g, (char) => `\\${char}`)}"`;
}

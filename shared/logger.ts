export type LogLevel = "info" | "warn" | "error" | "debug";

export type LogContext = Record<string, unknown>;

export interface LogEntry {
    timestamp: string;
    level: LogLevel;
    message: string;
    context?: LogContext;
}

function write(level: LogLevel, message: string, context?: LogContext): void {
    if (level === "debug" && !process.env['DEBUG']) return;
    const entry: LogEntry = {
        timestamp: new Date().toISOString(),
        level,
        message,
    };
    if (context && Object.keys(context).length > 0) {
        entry.context = context;
    }
    console.error(JSON.stringify(entry));
}

/**
 * Logger bound to fixed context, such as the session a line is about. Context
 * given per call is merged over it.
 */
export class ContextLogger {
    constructor(readonly context: LogContext) { }

    with(context: LogContext): ContextLogger {
        return new ContextLogger({ ...this.context, ...context });
    }

    info(message: string, context?: LogContext) {
        write("info", message, { ...this.context, ...context });
    }

    warn(message: string, context?: LogContext) {
        write("warn", message, { ...this.context, ...context });
    }

    error(message: string, context?: LogContext) {
        write("error", message, { ...this.context, ...context });
    }

    debug(message: string, context?: LogContext) {
        write("debug", message, { ...this.context, ...context });
    }
}

/**
 * Structured JSON logger that writes to stderr, one line per entry.
 *
 * stdout belongs to the application embedding the client, so nothing here
 * ever writes to it. `debug` lines appear only when `DEBUG` is set.
 */
export class Logger {
    static with(context: LogContext): ContextLogger {
        return new ContextLogger(context);
    }

    static info(message: string, context?: LogContext) {
        write("info", message, context);
    }

    static warn(message: string, context?: LogContext) {
        write("warn", message, context);
    }

    static error(message: string, context?: LogContext) {
        write("error", message, context);
    }

    static debug(message: string, context?: LogContext) {
        write("debug", message, context);
    }
}

export type LogLevel = "debug" | "warn" | "error";

export type LogEntry = {
    level: LogLevel;
    code: string;
    message: string;
    details?: Record<string, unknown>;
    timestamp: number;
};

export type LogHandler = (entry: LogEntry) => void;

/** What an event needs from a logger. {@link Logger} implements it; so can any adapter. */
export interface LoggerContext {
    debug(code: string, message: string, details?: Record<string, unknown>): void;
    warn(code: string, message: string, details?: Record<string, unknown>): void;
    error(code: string, message: string, details?: Record<string, unknown>): void;
}

export type LoggerOptions = {
    /** Entries below this level are dropped before reaching handlers. Defaults to `"debug"`. */
    level?: LogLevel;
    handlers?: LogHandler[];
};

export type ConsoleHandlerOptions = {
    /** Tag printed for debug entries. Defaults to `"bindline"`. */
    tag?: string;
    /** Emit ANSI colour codes. Defaults to `true`. */
    colors?: boolean;
};

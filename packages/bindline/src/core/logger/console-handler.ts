import type { ConsoleHandlerOptions, LogEntry, LogHandler } from "./types";

type Palette = {
    dim: string;
    cyan: string;
    green: string;
    yellow: string;
    magenta: string;
    reset: string;
};

const ANSI: Palette = {
    dim: "\x1b[90m",
    cyan: "\x1b[36m",
    green: "\x1b[32m",
    yellow: "\x1b[33m",
    magenta: "\x1b[35m",
    reset: "\x1b[0m",
};

const PLAIN: Palette = { dim: "", cyan: "", green: "", yellow: "", magenta: "", reset: "" };

function formatTime(ts: number): string {
    const d = new Date(ts);
    const h = String(d.getHours()).padStart(2, "0");
    const m = String(d.getMinutes()).padStart(2, "0");
    const s = String(d.getSeconds()).padStart(2, "0");
    return `${h}:${m}:${s}`;
}

function formatValue(value: unknown, c: Palette): string {
    if (value === null) return `${c.magenta}null${c.reset}`;
    if (value === undefined) return `${c.dim}undefined${c.reset}`;
    if (typeof value === "string") return `${c.green}"${value}"${c.reset}`;
    if (typeof value === "number" || typeof value === "boolean") return `${c.yellow}${value}${c.reset}`;
    if (typeof value === "function") return `${c.cyan}[fn ${value.name || "anonymous"}]${c.reset}`;
    if (Array.isArray(value)) {
        if (value.length === 0) return "[]";
        return `[${value.map((v) => formatValue(v, c)).join(`${c.dim},${c.reset} `)}]`;
    }
    if (typeof value === "object") {
        const entries = Object.entries(value);
        if (entries.length === 0) return "{}";
        const pairs = entries.map(([k, v]) => `${c.cyan}${k}${c.reset}${c.dim}:${c.reset} ${formatValue(v, c)}`);
        return `${c.dim}{${c.reset} ${pairs.join(`${c.dim},${c.reset} `)} ${c.dim}}${c.reset}`;
    }
    return String(value);
}

/** Format a log entry as a single console line: `HH:MM:SS [tag] code → message {details}`. */
export function formatEntry(entry: LogEntry, options?: ConsoleHandlerOptions): string {
    const palette = options?.colors === false ? PLAIN : ANSI;
    const tag = entry.level === "debug" ? (options?.tag ?? "bindline") : entry.level;
    const detailsPart = entry.details ? ` ${formatValue(entry.details, palette)}` : "";
    return `${formatTime(entry.timestamp)} [${tag}] ${entry.code} → ${entry.message}${detailsPart}`;
}

export function createConsoleHandler(options?: ConsoleHandlerOptions): LogHandler {
    return (entry: LogEntry) => {
        const line = formatEntry(entry, options);
        if (entry.level === "error") {
            console.error(line);
        } else if (entry.level === "warn") {
            console.warn(line);
        } else {
            console.log(line);
        }
    };
}

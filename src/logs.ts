import { format } from "node:util";

export type LogLevel = "info" | "warn" | "error";

export interface LogEntry {
    id: number;
    timestamp: string;
    level: LogLevel;
    /** The `[area]` prefix of the line, e.g. "catalog", or "app" when there is none. */
    area: string;
    message: string;
}

export interface LogQuery {
    limit?: number;
    sinceId?: number;
    level?: LogLevel;
}

const MAX_LOG_ENTRIES = 1000;
const DEFAULT_LIMIT = 200;
const AREA_PREFIX = /^\[([\w-]+)\]\s*/;

const entries: LogEntry[] = [];
let nextId = 1;
let captureInstalled = false;

export function addLog(level: LogLevel, line: string): LogEntry {
    const match = AREA_PREFIX.exec(line);
    const entry: LogEntry = {
        id: nextId++,
        timestamp: new Date().toISOString(),
        level,
        area: match ? match[1] : "app",
        message: match ? line.slice(match[0].length) : line,
    };
    entries.push(entry);

    if (entries.length > MAX_LOG_ENTRIES) {
        entries.splice(0, entries.length - MAX_LOG_ENTRIES);
    }
    return entry;
}

/** Newest `limit` entries matching the query, oldest first. */
export function getLogs(query: LogQuery = {}): LogEntry[] {
    const limit = query.limit ?? DEFAULT_LIMIT;

    const filtered = entries.filter(
        (entry) =>
            (query.sinceId === undefined || entry.id > query.sinceId) &&
            (query.level === undefined || entry.level === query.level)
    );

    return filtered.length <= limit ? filtered : filtered.slice(filtered.length - limit);
}

export function clearLogs(): void {
    entries.length = 0;
}

/**
 * Mirror console output into the in-memory buffer shown on /logs.
 * Output still reaches stdout/stderr as before.
 */
export function installConsoleLogCapture(): void {
    if (captureInstalled) return;
    captureInstalled = true;

    const original = {
        log: console.log.bind(console),
        warn: console.warn.bind(console),
        error: console.error.bind(console),
    };

    console.log = (...args: unknown[]) => {
        addLog("info", format(...args));
        original.log(...args);
    };

    console.warn = (...args: unknown[]) => {
        addLog("warn", format(...args));
        original.warn(...args);
    };

    console.error = (...args: unknown[]) => {
        addLog("error", format(...args));
        original.error(...args);
    };
}

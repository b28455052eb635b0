import type { LoggerPort, LogMeta } from "./ports";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

/**
 * Console-backed logger for local runs and tests. Lines look like
 * `[bansync:propagator] fan-out finished { syncId: '…' }`.
 */
export function consoleLogger(scope: string, level: LogLevel = "info"): LoggerPort {
    const prefix = `[bansync:${scope}]`;
    const min = RANK[level];
    const emit = (lvl: Exclude<LogLevel, "silent">, sink: (...args: unknown[]) => void) =>
        (message: string, meta?: LogMeta) => {
            if (RANK[lvl] < min) return;
            if (meta) sink(prefix, message, meta);
            else sink(prefix, message);
        };
    return {
        debug: emit("debug", console.debug),
        info: emit("info", console.info),
        warn: emit("warn", console.warn),
        error: emit("error", console.error),
    };
}

export const silentLogger: LoggerPort = consoleLogger("silent", "silent");

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_VALUES: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    silent: 4,
};

export interface Logger {
    debug(msg: string): void;
    info(msg: string): void;
    warn(msg: string): void;
    error(msg: string, err?: unknown): void;
    child(context: string): Logger;
}

/** Receives one formatted line; defaults to stdout/stderr. */
export type LogSink = (level: Exclude<LogLevel, "silent">, line: string) => void;

export function isLogLevel(raw: string): raw is LogLevel {
    return Object.hasOwn(LEVEL_VALUES, raw);
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

const consoleSink: LogSink = (level, line) => {
    if (level === "warn" || level === "error") console.error(line);
    else console.log(line);
};

export function createLogger(options?: { level?: LogLevel; sink?: LogSink }): Logger {
    const threshold = LEVEL_VALUES[options?.level ?? "info"];
    return buildLogger(threshold, options?.sink ?? consoleSink, []);
}

function buildLogger(threshold: number, sink: LogSink, context: string[]): Logger {
    const prefix = context.length > 0 ? `[${context.join("/")}] ` : "";

    function write(level: Exclude<LogLevel, "silent">, msg: string): void {
        if (LEVEL_VALUES[level] < threshold) return;
        const time = new Date().toISOString().slice(11, 19);
        sink(level, `${time} ${level.toUpperCase().padEnd(5)} ${prefix}${msg}`);
    }

    return {
        debug: (msg) => write("debug", msg),
        info: (msg) => write("info", msg),
        warn: (msg) => write("warn", msg),
        error: (msg, err) => write("error", err === undefined ? msg : `${msg}: ${errorMessage(err)}`),
        child: (name) => buildLogger(threshold, sink, [...context, name]),
    };
}

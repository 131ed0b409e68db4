import chalk, { Chalk, type ChalkInstance, type ForegroundColorName } from "chalk";
import { LOG_LEVEL_TOKEN_WIDTH } from "./constants";

export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3,
    SILENT = 4,
}

export interface LogSink {
    write(text: string): unknown;
}

export interface LoggerOptions {
    out?: LogSink;
    err?: LogSink;
    colors?: boolean;
    now?: () => Date;
}

export interface ProgressLineOptions {
    gid: string;
    percent: number;
    speedText: string;
    connections: number;
    etaText: string;
}

type Channel = "debug" | "info" | "success" | "warn" | "error";

const CHANNELS: Record<
    Channel,
    { level: LogLevel; token: string; color: ForegroundColorName; sink: "out" | "err" }
> = {
    debug: { level: LogLevel.DEBUG, token: "DEBUG", color: "magenta", sink: "out" },
    info: { level: LogLevel.INFO, token: "NOTICE", color: "cyan", sink: "out" },
    success: { level: LogLevel.INFO, token: "SUCCESS", color: "green", sink: "out" },
    warn: { level: LogLevel.WARN, token: "WARNING", color: "yellow", sink: "err" },
    error: { level: LogLevel.ERROR, token: "ERROR", color: "red", sink: "err" },
};

const CLEAR_LINE = "\r\x1b[2K";

/**
 * Console logger with one in-place progress line. Any other line first wipes
 * the progress line, which always sits on `out`.
 */
export class Logger {
    private level: LogLevel = LogLevel.INFO;
    private progressShown = false;
    private readonly sinks: Record<"out" | "err", LogSink>;
    private readonly paint: ChalkInstance;
    private readonly now: () => Date;

    constructor(options: LoggerOptions = {}) {
        this.sinks = { out: options.out ?? process.stdout, err: options.err ?? process.stderr };
        this.paint = options.colors === false ? new Chalk({ level: 0 }) : chalk;
        this.now = options.now ?? (() => new Date());
    }

    setLevel(level: LogLevel): void {
        this.level = level;
    }

    debug(message: string): void {
        this.line("debug", message);
    }

    info(message: string): void {
        this.line("info", message);
    }

    success(message: string): void {
        this.line("success", message);
    }

    warn(message: string): void {
        this.line("warn", message);
    }

    error(message: string): void {
        this.line("error", message);
    }

    progress(options: ProgressLineOptions): void {
        if (this.level > LogLevel.INFO) return;

        const paint = this.paint;
        const line = [
            this.prefix("PROGRESS", "cyan"),
            paint.cyan(options.gid),
            paint.green(`Downloaded ${options.percent}%`),
            paint.magenta(`(Currently: ${options.speedText})`),
            paint.yellow(`CN:${options.connections}`),
            paint.blue(`ETA:${options.etaText}`),
        ].join(" ");

        this.sinks.out.write(`${CLEAR_LINE}${line}`);
        this.progressShown = true;
    }

    /**
     * Leave the last progress line on screen and move below it
     */
    stopProgress(): void {
        if (!this.progressShown) return;
        this.sinks.out.write("\n");
        this.progressShown = false;
    }

    private line(channel: Channel, message: string): void {
        const { level, token, color, sink } = CHANNELS[channel];
        if (this.level > level) return;

        if (this.progressShown) {
            this.sinks.out.write(CLEAR_LINE);
            this.progressShown = false;
        }
        this.sinks[sink].write(`${this.prefix(token, color)} ${message}\n`);
    }

    private prefix(token: string, color: ForegroundColorName): string {
        const paddedToken = `[${token}]`.padEnd(LOG_LEVEL_TOKEN_WIDTH);
        return `${getLogTimestamp(this.now())} ${this.paint[color](paddedToken)}`;
    }
}

export const log = new Logger();

const LOG_LEVELS: Record<string, LogLevel> = {
    debug: LogLevel.DEBUG,
    info: LogLevel.INFO,
    warn: LogLevel.WARN,
    error: LogLevel.ERROR,
    silent: LogLevel.SILENT,
};

export function parseLogLevel(level: string): LogLevel {
    return LOG_LEVELS[level.toLowerCase()] ?? LogLevel.INFO;
}

/**
 * `MM/DD HH:MM:SS` in local time
 */
export function getLogTimestamp(date: Date = new Date()): string {
    const pad = (value: number) => String(value).padStart(2, "0");
    const day = `${pad(date.getMonth() + 1)}/${pad(date.getDate())}`;
    return `${day} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

import pino, { type Logger, type LoggerOptions as PinoOptions } from "pino";
import pretty from "pino-pretty";
import type { LogLevel } from "./config/index.js";

export interface LoggerOptions {
    level?: LogLevel;
    pretty?: boolean;
}

// stdout carries the totals, so every log line goes to stderr (fd 2).
export function createLogger(opts: LoggerOptions = {}): Logger {
    const options: PinoOptions = {
        base: undefined,
        level: opts.level ?? "info",
        formatters: {
            level: (label) => ({ level: label }),
        },
        timestamp: pino.stdTimeFunctions.epochTime,
    };
    if (opts.pretty) {
        return pino(options, pretty({
            destination: 2,
            sync: true,
            translateTime: "SYS:yyyy-mm-dd HH:MM:ss.l",
            colorize: true,
            ignore: "pid,hostname",
        }));
    }
    return pino(options, pino.destination({ dest: 2, sync: true }));
}

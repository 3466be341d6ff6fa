/**
 * Research Log — Append-only, human-readable record of every iteration.
 *
 * pino writes structured events; the pino-pretty transport renders them as
 * one plain line each into `research_log.txt` (and optionally stderr).
 */
import pino, { type Logger, type LevelWithSilent, type TransportTargetOptions } from "pino";

export type { Logger } from "pino";

export interface ResearchLoggerOptions {
    /** Append-only log file. Omit to log to stderr only. */
    logFile?: string;
    level?: LevelWithSilent;
    /** Mirror the log to stderr with colours. */
    console?: boolean;
}

const PRETTY_OPTIONS = {
    translateTime: "SYS:yyyy-mm-dd HH:MM:ss",
    ignore: "pid,hostname",
    singleLine: true,
};

export function createResearchLogger(options: ResearchLoggerOptions = {}): Logger {
    const level = options.level ?? "info";
    const targets: TransportTargetOptions[] = [];

    if (options.logFile) {
        targets.push({
            target: "pino-pretty",
            level,
            options: { ...PRETTY_OPTIONS, colorize: false, destination: options.logFile, mkdir: true, append: true },
        });
    }
    if (options.console || !options.logFile) {
        targets.push({
            target: "pino-pretty",
            level,
            options: { ...PRETTY_OPTIONS, colorize: true, destination: 2 },
        });
    }

    return pino({ level, base: { service: "research-loop" } }, pino.transport({ targets }));
}

/** A logger that drops everything. Used by tests and library callers that bring no logger. */
export function createSilentLogger(): Logger {
    return pino({ level: "silent" });
}

/**
 * Flush pending log lines before the process exits.
 */
export async function flushLogger(logger: Logger): Promise<void> {
    await new Promise<void>((resolve, reject) => {
        logger.flush((err) => (err ? reject(err) : resolve()));
    });
}

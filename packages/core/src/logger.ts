/**
 * File logger. The terminal belongs to the line editor, so nothing is ever
 * logged to stdout or stderr: without a log file the logger is silent.
 */
import winston from 'winston'

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

export type Logger = Pick<winston.Logger, 'error' | 'warn' | 'info' | 'debug'>

export type LoggerOptions = {
    level?: LogLevel
    /** Absolute path of the log file; empty or missing disables logging. */
    file?: string
}

const logFormat = winston.format.combine(
    winston.format.timestamp(),
    winston.format.printf(({ timestamp, level, message, ...meta }) =>
        JSON.stringify({ timestamp, level, pid: process.pid, message, ...meta }),
    ),
)

export function isLogLevel(value: string | undefined): value is LogLevel {
    return LOG_LEVELS.some((level) => level === value)
}

export function createLogger(options: LoggerOptions = {}): winston.Logger {
    const level = options.level ?? 'warn'
    const file = options.file?.trim()
    if (!file) {
        return winston.createLogger({
            level,
            silent: true,
            transports: [new winston.transports.Console({ silent: true })],
        })
    }
    return winston.createLogger({
        level,
        format: logFormat,
        transports: [new winston.transports.File({ filename: file })],
        exitOnError: false,
    })
}

/** Logger configured from `VTLINE_LOG_LEVEL` / `VTLINE_LOG_FILE`. */
export function createEnvLogger(env: NodeJS.ProcessEnv = process.env): winston.Logger {
    const level = env.VTLINE_LOG_LEVEL
    return createLogger({
        level: isLogLevel(level) ? level : undefined,
        file: env.VTLINE_LOG_FILE,
    })
}

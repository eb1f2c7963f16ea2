import pino, { Level } from "pino"

/**
 * Process-wide wrapper around a pino logger. Every line goes to stderr, so
 * stdout carries only command output. Starts at `info`; the validated
 * configuration raises or lowers it through `setLevel`.
 */
export class LoggerProvider {
    private pino = pino({ level: "info" }, process.stderr)

    get level(): string {
        return this.pino.level
    }

    setLevel(level: Level) {
        this.pino.level = level
    }

    debug(message: string, ...args: unknown[]) {
        this.pino.debug({ args }, message)
    }

    error(message: string, error?: unknown) {
        this.pino.error({ err: error }, message)
    }
}

export const logger = new LoggerProvider()

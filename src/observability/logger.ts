/**
 * Structured logger with run context support
 */
import pino from 'pino';
import { logLevelSchema, type LogLevel } from '../config/index.js';

// stdout is reserved for the CLI summary line
const baseLogger = pino(
    {
        level: logLevelSchema.catch('info').parse(process.env.LOG_LEVEL),
        base: {
            service: 'tournament-export',
        },
        timestamp: pino.stdTimeFunctions.isoTime,
        formatters: {
            level: (label) => ({ level: label }),
        },
    },
    pino.destination(2)
);

export interface LogContext {
    community?: string;
    communityId?: string;
    year?: number;
    page?: number;
    requestId?: string;
    stage?: 'config' | 'auth' | 'fetch' | 'normalize' | 'write';
}

/**
 * Error fields for the log payload; HTTP failures keep their status
 */
export function serializeError(error: unknown): Record<string, unknown> {
    if (!(error instanceof Error)) return { error };

    const status = 'status' in error && typeof error.status === 'number' ? error.status : undefined;
    return {
        error: {
            code: error.name,
            message: error.message,
            ...(status !== undefined ? { status } : {}),
            stack: error.stack,
        },
    };
}

export class Logger {
    private logger: pino.Logger;

    constructor(context?: LogContext) {
        this.logger = context ? baseLogger.child(context) : baseLogger;
    }

    /**
     * Effective level. pino children copy the level at creation, so follow the base logger.
     */
    get level(): string {
        return this.sync().level;
    }

    private sync(): pino.Logger {
        if (this.logger.level !== baseLogger.level) {
            this.logger.level = baseLogger.level;
        }
        return this.logger;
    }

    child(context: LogContext): Logger {
        const newLogger = new Logger();
        newLogger.logger = this.logger.child(context);
        return newLogger;
    }

    debug(message: string, data?: Record<string, unknown>): void {
        this.sync().debug(data || {}, message);
    }

    info(message: string, data?: Record<string, unknown>): void {
        this.sync().info(data || {}, message);
    }

    warn(message: string, data?: Record<string, unknown>): void {
        this.sync().warn(data || {}, message);
    }

    error(message: string, error?: Error | unknown, data?: Record<string, unknown>): void {
        this.sync().error({ ...serializeError(error), ...data }, message);
    }
}

/**
 * Apply the validated level once configuration (including the env file) is known
 */
export function setLogLevel(level: LogLevel): void {
    baseLogger.level = level;
}

export const logger = new Logger();
export const createLogger = (context: LogContext) => new Logger(context);

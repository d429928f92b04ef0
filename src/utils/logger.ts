/**
 * Centralized Logging Utility
 * Provides structured logging with consistent format across the application
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
    requestId?: string;
    [key: string]: unknown;
}

export interface LogEntry {
    timestamp: string;
    level: LogLevel;
    message: string;
    requestId?: string;
    error?: {
        name: string;
        message: string;
        stack?: string;
    };
    context?: LogContext;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
};

export function isLogLevel(value: string | undefined): value is LogLevel {
    return value !== undefined && Object.hasOwn(LOG_LEVEL_PRIORITY, value);
}

export class Logger {
    constructor(
        private minLevel: LogLevel = 'info',
        private baseContext: LogContext = {}
    ) {}

    setLevel(level: LogLevel): void {
        this.minLevel = level;
    }

    child(context: LogContext): Logger {
        return new Logger(this.minLevel, { ...this.baseContext, ...context });
    }

    error(message: string, error?: Error | unknown, context?: LogContext): void {
        const entry = this.buildEntry('error', message, context);
        if (!entry) {
            return;
        }

        if (error instanceof Error) {
            entry.error = {
                name: error.name,
                message: error.message,
                stack: error.stack,
            };
        } else if (error) {
            entry.error = {
                name: 'Unknown',
                message: String(error),
            };
        }

        console.error(this.formatLog(entry));
    }

    warn(message: string, context?: LogContext): void {
        const entry = this.buildEntry('warn', message, context);
        if (entry) {
            console.warn(this.formatLog(entry));
        }
    }

    info(message: string, context?: LogContext): void {
        const entry = this.buildEntry('info', message, context);
        if (entry) {
            console.log(this.formatLog(entry));
        }
    }

    debug(message: string, context?: LogContext): void {
        const entry = this.buildEntry('debug', message, context);
        if (entry) {
            console.debug(this.formatLog(entry));
        }
    }

    private buildEntry(level: LogLevel, message: string, context?: LogContext): LogEntry | null {
        if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.minLevel]) {
            return null;
        }

        const merged: LogContext = { ...this.baseContext, ...context };
        const hasContext = Object.keys(merged).length > 0;

        return {
            timestamp: new Date().toISOString(),
            level,
            message,
            requestId: merged.requestId,
            context: hasContext ? merged : undefined,
        };
    }

    private formatLog(entry: LogEntry): string {
        return JSON.stringify(entry);
    }
}

export const logger = new Logger();

// src/core/logging/Logger.ts

/**
 * Structured Logger Service
 *
 * Centralizes logging to ensure:
 * 1. Structured output (timestamps, levels, modules)
 * 2. Secret redaction (payment tokens, API keys)
 * 3. Configurable verbosity
 *
 * Everything goes to stderr: stdout is owned by the MCP stdio transport.
 */

import { ENV } from '../../config/env';

export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3,
    SILENT = 4,
}

const LEVEL_BY_NAME: Record<NonNullable<typeof ENV.LOG_LEVEL>, LogLevel> = {
    debug: LogLevel.DEBUG,
    info: LogLevel.INFO,
    warn: LogLevel.WARN,
    error: LogLevel.ERROR,
    silent: LogLevel.SILENT,
};

function defaultLevel(): LogLevel {
    if (ENV.LOG_LEVEL) return LEVEL_BY_NAME[ENV.LOG_LEVEL];
    if (ENV.NODE_ENV === 'test') return LogLevel.SILENT;
    return ENV.NODE_ENV === 'production' ? LogLevel.INFO : LogLevel.DEBUG;
}

export type LogContext = Record<string, unknown>;

export class Logger {
    private static currentLevel: LogLevel = defaultLevel();

    /**
     * Payment-provider style secrets (sk_live_..., pk_test_..., sk-...)
     * followed by at least 16 token characters.
     */
    private static SECRET_REGEX = /\b(?:sk|pk|rk)[-_](?:(?:live|test)_)?[a-zA-Z0-9]{16,}/g;

    public static setLevel(level: LogLevel): void {
        this.currentLevel = level;
    }

    public static getLevel(): LogLevel {
        return this.currentLevel;
    }

    /**
     * Redacts secrets from a string or JSON-serializable value
     */
    public static redact(message: unknown): unknown {
        if (typeof message === 'string') {
            return message.replace(this.SECRET_REGEX, '[REDACTED]');
        } else if (typeof message === 'object' && message !== null) {
            try {
                const str = JSON.stringify(message);
                const redacted = str.replace(this.SECRET_REGEX, '[REDACTED]');
                const parsed: unknown = JSON.parse(redacted);
                return parsed;
            } catch {
                return message; // Circular reference
            }
        }
        return message;
    }

    public static formatMessage(level: string, module: string, message: string, context?: LogContext): string {
        const timestamp = new Date().toISOString();
        let log = `[${timestamp}] [${level}] [${module}] ${String(this.redact(message))}`;

        if (context && Object.keys(context).length > 0) {
            log += ` ${JSON.stringify(this.redact(context))}`;
        }

        return log;
    }

    public static debug(module: string, message: string, context?: LogContext): void {
        if (this.currentLevel <= LogLevel.DEBUG) {
            console.error(this.formatMessage('DEBUG', module, message, context));
        }
    }

    public static info(module: string, message: string, context?: LogContext): void {
        if (this.currentLevel <= LogLevel.INFO) {
            console.error(this.formatMessage('INFO', module, message, context));
        }
    }

    public static warn(module: string, message: string, context?: LogContext): void {
        if (this.currentLevel <= LogLevel.WARN) {
            console.error(this.formatMessage('WARN', module, message, context));
        }
    }

    public static error(module: string, message: string, error?: unknown): void {
        if (this.currentLevel <= LogLevel.ERROR) {
            let errorDetails = '';
            if (error instanceof Error) {
                errorDetails = ` Stack: ${String(this.redact(error.stack ?? error.message))}`;
            } else if (error !== undefined) {
                errorDetails = ` Details: ${JSON.stringify(this.redact(error))}`;
            }

            console.error(this.formatMessage('ERROR', module, message) + errorDetails);
        }
    }
}

import { ILogger, LogLevel, LogMeta } from '../shared/logging/Logger';

export interface RecordedLog {
    level: LogLevel;
    message: string;
    meta?: LogMeta;
    error?: unknown;
}

/**
 * Logger that keeps every entry in memory
 */
export class RecordingLogger implements ILogger {
    readonly entries: RecordedLog[] = [];

    debug(message: string, meta?: LogMeta): void {
        this.entries.push({ level: LogLevel.DEBUG, message, meta });
    }

    info(message: string, meta?: LogMeta): void {
        this.entries.push({ level: LogLevel.INFO, message, meta });
    }

    warn(message: string, meta?: LogMeta): void {
        this.entries.push({ level: LogLevel.WARN, message, meta });
    }

    error(message: string, error?: unknown, meta?: LogMeta): void {
        this.entries.push({ level: LogLevel.ERROR, message, meta, error });
    }

    fatal(message: string, error?: unknown, meta?: LogMeta): void {
        this.entries.push({ level: LogLevel.FATAL, message, meta, error });
    }

    messages(level: LogLevel): string[] {
        return this.entries.filter(entry => entry.level === level).map(entry => entry.message);
    }
}

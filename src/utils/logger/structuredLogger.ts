import fs from 'fs';
import path from 'path';
import type { Writable } from 'stream';
import { ensureDirExistence } from '../ensureDirExistence.js';
import { isTest } from '../isTest.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

/**
 * Structured log entry, serialized as one JSON object per line
 */
export interface LogEntry {
    timestamp: string;
    level: LogLevel;
    event: string;
    [key: string]: unknown;
}

/**
 * Observability interface injected into every pipeline component.
 * Each session gets its own child so no logger state is shared.
 */
export interface MonitoringLogger {
    debug(event: string, data?: Record<string, unknown>): void;
    info(event: string, data?: Record<string, unknown>): void;
    warn(event: string, data?: Record<string, unknown>): void;
    error(event: string, data?: Record<string, unknown>): void;
    child(context: Record<string, unknown>): MonitoringLogger;
}

export interface StructuredLoggerOptions {
    /** Minimum level written (default: info) */
    level?: LogLevel;
    /** Destination for JSON lines */
    stream?: Writable;
    /** Echo entries to the console as well */
    console?: boolean;
    /** Fields merged into every entry */
    context?: Record<string, unknown>;
}

/**
 * JSON-lines logger. Children share the destination but carry their own context.
 */
export class StructuredLogger implements MonitoringLogger {
    private readonly level: LogLevel;
    private readonly stream?: Writable;
    private readonly echo: boolean;
    private readonly context: Record<string, unknown>;

    constructor(options: StructuredLoggerOptions = {}) {
        this.level = options.level ?? 'info';
        this.stream = options.stream;
        this.echo = options.console ?? false;
        this.context = options.context ?? {};
    }

    debug(event: string, data?: Record<string, unknown>): void {
        this.write('debug', event, data);
    }

    info(event: string, data?: Record<string, unknown>): void {
        this.write('info', event, data);
    }

    warn(event: string, data?: Record<string, unknown>): void {
        this.write('warn', event, data);
    }

    error(event: string, data?: Record<string, unknown>): void {
        this.write('error', event, data);
    }

    child(context: Record<string, unknown>): MonitoringLogger {
        return new StructuredLogger({
            level: this.level,
            stream: this.stream,
            console: this.echo,
            context: { ...this.context, ...context },
        });
    }

    /**
     * Whether entries at `level` are written
     */
    isEnabled(level: LogLevel): boolean {
        return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
    }

    private write(level: LogLevel, event: string, data?: Record<string, unknown>): void {
        if (!this.isEnabled(level)) return;

        const entry: LogEntry = {
            timestamp: new Date().toISOString(),
            level,
            event,
            ...this.context,
            ...data,
        };
        const line = JSON.stringify(entry, errorReplacer);

        this.stream?.write(`${line}\n`);

        if (this.echo) {
            if (level === 'error') {
                console.error(line);
            } else if (level === 'warn') {
                console.warn(line);
            } else {
                console.log(line);
            }
        }
    }
}

function errorReplacer(_key: string, value: unknown): unknown {
    if (value instanceof Error) {
        return { name: value.name, message: value.message };
    }
    return value;
}

/**
 * Logger that discards everything
 */
export const silentLogger: MonitoringLogger = {
    debug: () => undefined,
    info: () => undefined,
    warn: () => undefined,
    error: () => undefined,
    child: () => silentLogger,
};

/**
 * Logger appending JSON lines to `<dataDir>/monitoring.log`
 */
export function createFileLogger(options: { level?: LogLevel; console?: boolean; filePath?: string } = {}): {
    logger: StructuredLogger;
    close: () => void;
} {
    const dataDir = isTest
        ? path.resolve(process.cwd(), 'test/data')
        : process.env.DATA_DIR || path.resolve(process.cwd(), 'data');
    const filePath = options.filePath ?? path.join(dataDir, 'monitoring.log');
    ensureDirExistence(filePath);

    const stream = fs.createWriteStream(filePath, { flags: 'a' });
    const logger = new StructuredLogger({
        level: options.level,
        stream,
        console: options.console,
    });

    return {
        logger,
        close: () => stream.end(),
    };
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
    switch (value) {
        case 'debug':
        case 'info':
        case 'warn':
        case 'error':
            return value;
        default:
            return fallback;
    }
}

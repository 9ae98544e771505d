import type { LogLevel, MonitoringLogger } from '../../src/utils/logger/structuredLogger.js';

export interface RecordedEntry {
    level: LogLevel;
    event: string;
    data: Record<string, unknown>;
}

/**
 * In-memory logger for assertions on emitted events. Children append to the
 * same list with their context merged in.
 */
export function createRecordingLogger(context: Record<string, unknown> = {}, entries: RecordedEntry[] = []): {
    logger: MonitoringLogger;
    entries: RecordedEntry[];
} {
    const record = (level: LogLevel) => (event: string, data?: Record<string, unknown>) => {
        entries.push({ level, event, data: { ...context, ...data } });
    };

    const logger: MonitoringLogger = {
        debug: record('debug'),
        info: record('info'),
        warn: record('warn'),
        error: record('error'),
        child: childContext => createRecordingLogger({ ...context, ...childContext }, entries).logger,
    };

    return { logger, entries };
}

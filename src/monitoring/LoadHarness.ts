import { createDefaultConfig, type MonitoringConfig } from './types/Configuration.js';
import { MonitoringSession, type SessionSummary } from './MonitoringSession.js';
import { SyntheticEventSource } from './sources/SyntheticEventSource.js';
import type { InteractionEventSource } from './sources/EventSource.js';
import type { RiskReportSink } from './sinks/RiskSink.js';
import type { MetricsCollector } from '../utils/logger/metricsCollector.js';
import { silentLogger, type MonitoringLogger } from '../utils/logger/structuredLogger.js';

export interface LoadHarnessOptions {
    sessionCount: number;
    durationSeconds: number;
    /** Shared by every session; nothing else is */
    sink: RiskReportSink;
    config?: MonitoringConfig;
    createSource?: (index: number) => InteractionEventSource;
    logger?: MonitoringLogger;
    metrics?: MetricsCollector;
    /** Ends the run early */
    signal?: AbortSignal;
}

/**
 * Run independent sessions side by side for a fixed duration and return
 * their summaries in start order
 */
export async function runConcurrentSessions(options: LoadHarnessOptions): Promise<SessionSummary[]> {
    const { sessionCount, durationSeconds, sink } = options;
    if (!Number.isInteger(sessionCount) || sessionCount < 1) {
        throw new Error('Session count must be a positive integer');
    }
    if (!(durationSeconds > 0)) {
        throw new Error('Duration must be positive');
    }

    const logger = options.logger ?? silentLogger;
    const config = options.config ?? createDefaultConfig();
    const createSource = options.createSource ?? (() => new SyntheticEventSource({ logger }));

    const sessions = Array.from({ length: sessionCount }, (_, index) => new MonitoringSession({
        config,
        sink,
        source: createSource(index),
        logger,
        metrics: options.metrics,
    }));

    logger.info('load_test_started', { sessionCount, durationSeconds });
    const runs = sessions.map(session => session.run());

    await waitFor(durationSeconds * 1000, options.signal);

    await Promise.all(sessions.map(session => session.stop()));
    await Promise.all(runs);

    const summaries = sessions.map(session => session.summary());
    logger.info('load_test_completed', {
        sessionCount,
        reportsAccepted: summaries.reduce((sum, s) => sum + s.reportsAccepted, 0),
        reportsFailed: summaries.reduce((sum, s) => sum + s.reportsFailed, 0),
    });
    return summaries;
}

function waitFor(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise(resolve => {
        if (signal?.aborted) {
            resolve();
            return;
        }
        const timer = setTimeout(resolve, ms);
        signal?.addEventListener('abort', () => {
            clearTimeout(timer);
            resolve();
        }, { once: true });
    });
}

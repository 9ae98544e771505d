import { jest } from '@jest/globals';
import type { InteractionEvent } from '../../src/monitoring/types/InteractionEvent.js';
import type { InteractionEventSource } from '../../src/monitoring/sources/EventSource.js';
import type { RiskReportSink } from '../../src/monitoring/sinks/RiskSink.js';
import type { RiskReport, SinkResult } from '../../src/monitoring/types/RiskReport.js';
import { createDefaultConfig, type MonitoringConfig } from '../../src/monitoring/types/Configuration.js';

/**
 * Source handing out queued batches, one per poll
 */
export class QueuedEventSource implements InteractionEventSource {
    readonly start = jest.fn(async () => undefined);
    readonly stop = jest.fn(async () => undefined);
    private batches: InteractionEvent[][];

    constructor(batches: InteractionEvent[][] = []) {
        this.batches = [...batches];
    }

    async getEvents(_timeoutMs: number): Promise<InteractionEvent[]> {
        return this.batches.shift() ?? [];
    }
}

/**
 * Sink recording every report and answering with `result`
 */
export function createRecordingSink(result: SinkResult = { status: 'accepted', recordId: 1 }) {
    const sink = {
        send: jest.fn(async (_report: RiskReport): Promise<SinkResult> => result),
    };
    return sink satisfies RiskReportSink;
}

/**
 * Defaults with a 20 s calibration so tests can force a fallback baseline
 */
export function createTestConfig(): MonitoringConfig {
    const config = createDefaultConfig();
    config.calibration.duration = 20;
    config.reporting.drainTimeoutMs = 0;
    config.reporting.pollIntervalMs = 10;
    return config;
}

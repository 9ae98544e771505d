import { EventEmitter } from 'events';
import type { SinkResult } from '../../monitoring/types/RiskReport.js';
import { isTest } from '../isTest.js';

/**
 * Rolling view over the last minute
 */
export interface RealTimeMetrics {
    ticksPerSecond: number;
    averageProcessingTime: number;
    reportsPerMinute: number;
    requestsPerMinute: number;
    errorRate: number;
    memoryUsage: NodeJS.MemoryUsage;
}

/**
 * Totals since start-up (or the last reset)
 */
export interface MetricsTotals {
    ticks: number;
    events: number;
    requests: number;
    reportsAccepted: number;
    reportsRejected: number;
    reportsFailed: number;
    errors: number;
}

export interface ProcessingTimePercentiles {
    p50: number;
    p90: number;
    p95: number;
    p99: number;
}

export interface MetricsSnapshot {
    totals: MetricsTotals;
    realTime: RealTimeMetrics;
    processingTimePercentiles: ProcessingTimePercentiles;
    errorsByComponent: Record<string, number>;
}

/**
 * Metrics for the monitoring pipeline and the collector. Emits `report`
 * for every sink outcome and `error` for every recorded error.
 */
export class MetricsCollector extends EventEmitter {
    private readonly windowSize = 60; // seconds
    private readonly maxSamples = 10000;

    private tickTimes: number[] = [];
    private processingTimes: number[] = [];
    private reportTimes: number[] = [];
    private requestTimes: number[] = [];
    private errorTimes: number[] = [];
    private errorsByComponent: Map<string, number> = new Map();

    private totals: MetricsTotals = MetricsCollector.emptyTotals();

    private intervals: NodeJS.Timeout[] = [];

    constructor(options: { periodicTasks?: boolean } = {}) {
        super();
        this.setMaxListeners(20);

        if (options.periodicTasks ?? !isTest) {
            this.startPeriodicTasks();
        }
    }

    /**
     * Record one polling tick and how long it took (ms)
     */
    recordTick(processingTimeMs: number, eventCount: number = 0): void {
        const now = Date.now();
        this.totals.ticks++;
        this.totals.events += eventCount;
        this.tickTimes.push(now);
        this.processingTimes.push(processingTimeMs);
        if (this.processingTimes.length > this.maxSamples) {
            this.processingTimes.shift();
        }
    }

    /**
     * Record one handled HTTP request
     */
    recordRequest(): void {
        this.totals.requests++;
        this.requestTimes.push(Date.now());
    }

    /**
     * Record a sink outcome
     */
    recordReport(result: SinkResult): void {
        switch (result.status) {
            case 'accepted':
                this.totals.reportsAccepted++;
                break;
            case 'rejected':
                this.totals.reportsRejected++;
                break;
            case 'failed':
                this.totals.reportsFailed++;
                break;
        }
        this.reportTimes.push(Date.now());
        this.emit('report', result);
    }

    /**
     * Record an error event
     */
    recordError(error: Error, component: string = 'unknown'): void {
        const now = Date.now();
        this.totals.errors++;
        this.errorTimes.push(now);
        this.errorsByComponent.set(component, (this.errorsByComponent.get(component) ?? 0) + 1);

        // 'error' without a listener would throw
        if (this.listenerCount('error') > 0) {
            this.emit('error', { error, component, timestamp: now });
        }
    }

    getTotals(): MetricsTotals {
        return { ...this.totals };
    }

    getRealTimeMetrics(): RealTimeMetrics {
        const windowStart = Date.now() - this.windowSize * 1000;
        const recentTicks = this.tickTimes.filter(t => t >= windowStart);
        const recentProcessing = recentTicks.length > 0 ? this.processingTimes.slice(-recentTicks.length) : [];
        const recentReports = this.reportTimes.filter(t => t >= windowStart);
        const recentRequests = this.requestTimes.filter(t => t >= windowStart);
        const recentErrors = this.errorTimes.filter(t => t >= windowStart);

        return {
            ticksPerSecond: recentTicks.length / this.windowSize,
            averageProcessingTime: recentProcessing.length > 0
                ? recentProcessing.reduce((sum, time) => sum + time, 0) / recentProcessing.length
                : 0,
            reportsPerMinute: recentReports.length * (60 / this.windowSize),
            requestsPerMinute: recentRequests.length * (60 / this.windowSize),
            errorRate: recentTicks.length > 0 ? recentErrors.length / recentTicks.length : 0,
            memoryUsage: process.memoryUsage(),
        };
    }

    getProcessingTimePercentiles(): ProcessingTimePercentiles {
        const sorted = [...this.processingTimes].sort((a, b) => a - b);
        return {
            p50: calculatePercentile(sorted, 0.5),
            p90: calculatePercentile(sorted, 0.9),
            p95: calculatePercentile(sorted, 0.95),
            p99: calculatePercentile(sorted, 0.99),
        };
    }

    getSnapshot(): MetricsSnapshot {
        return {
            totals: this.getTotals(),
            realTime: this.getRealTimeMetrics(),
            processingTimePercentiles: this.getProcessingTimePercentiles(),
            errorsByComponent: Object.fromEntries(this.errorsByComponent),
        };
    }

    /**
     * Reset all metrics (useful for testing)
     */
    reset(): void {
        this.tickTimes = [];
        this.processingTimes = [];
        this.reportTimes = [];
        this.requestTimes = [];
        this.errorTimes = [];
        this.errorsByComponent.clear();
        this.totals = MetricsCollector.emptyTotals();

        this.stopPeriodicTasks();
    }

    private startPeriodicTasks(): void {
        // Clean up old data every minute
        this.intervals.push(setInterval(() => {
            this.cleanupOldData();
        }, 60 * 1000));

        // Emit metrics update every 10 seconds
        this.intervals.push(setInterval(() => {
            this.emit('metricsUpdate', this.getRealTimeMetrics());
        }, 10 * 1000));

        for (const interval of this.intervals) {
            interval.unref();
        }
    }

    /**
     * Stop periodic tasks and clean up intervals
     */
    public stopPeriodicTasks(): void {
        this.intervals.forEach(interval => clearInterval(interval));
        this.intervals = [];
    }

    private cleanupOldData(): void {
        const cutoff = Date.now() - this.windowSize * 2 * 1000; // Keep 2x window size

        this.tickTimes = this.tickTimes.filter(t => t >= cutoff);
        this.reportTimes = this.reportTimes.filter(t => t >= cutoff);
        this.requestTimes = this.requestTimes.filter(t => t >= cutoff);
        this.errorTimes = this.errorTimes.filter(t => t >= cutoff);
    }

    private static emptyTotals(): MetricsTotals {
        return {
            ticks: 0,
            events: 0,
            requests: 0,
            reportsAccepted: 0,
            reportsRejected: 0,
            reportsFailed: 0,
            errors: 0,
        };
    }
}

/**
 * Nearest-rank percentile of an ascending array; 0 when empty
 */
export function calculatePercentile(sorted: readonly number[], percentile: number): number {
    if (sorted.length === 0) return 0;
    const index = Math.ceil(sorted.length * percentile) - 1;
    return sorted[Math.max(0, Math.min(index, sorted.length - 1))];
}

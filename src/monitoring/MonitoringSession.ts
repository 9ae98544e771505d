import { randomUUID } from 'crypto';
import type { InteractionEvent } from './types/InteractionEvent.js';
import type { FeatureVector } from './types/FeatureVector.js';
import type { AnomalyScores } from './types/AnomalyScores.js';
import type { BaselineProfile } from './types/BaselineProfile.js';
import type { RiskReport, SinkResult } from './types/RiskReport.js';
import {
    createDefaultConfig,
    type CalibrationConfig,
    type MonitoringConfig,
    type ReportingConfig,
} from './types/Configuration.js';
import { FeatureExtractor } from './FeatureExtractor.js';
import { BaselineBuilder } from './BaselineBuilder.js';
import { ActivityShiftDetector } from './ActivityShiftDetector.js';
import { RiskEngine } from './RiskEngine.js';
import {
    MonitoringErrorHandler,
    MonitoringErrorType,
    OperationTimeoutError,
    PerformanceGuard,
    type ErrorStats,
} from './ErrorHandler.js';
import type { InteractionEventSource } from './sources/EventSource.js';
import type { RiskReportSink } from './sinks/RiskSink.js';
import type { MetricsCollector } from '../utils/logger/metricsCollector.js';
import { silentLogger, type MonitoringLogger } from '../utils/logger/structuredLogger.js';

export interface MonitoringSessionOptions {
    sessionId?: string;
    config?: MonitoringConfig;
    source?: InteractionEventSource;
    sink?: RiskReportSink;
    logger?: MonitoringLogger;
    metrics?: MetricsCollector;
    /** Current time in seconds */
    clock?: () => number;
}

/**
 * Outcome of one pipeline step
 */
export interface StepResult {
    features: FeatureVector;
    calibrated: boolean;
    /** Calibration progress, 0-100 */
    progress: number;
    scores?: AnomalyScores;
    risk?: number;
}

export interface SessionSummary {
    sessionId: string;
    eventCount: number;
    reportsAccepted: number;
    reportsRejected: number;
    reportsFailed: number;
    currentRisk: number;
    calibrated: boolean;
    durationSeconds: number;
}

/**
 * One monitored session: owns its extractor, baseline builder, detector and
 * risk engine, polls its event source and emits periodic risk reports.
 */
export class MonitoringSession {
    readonly sessionId: string;

    private readonly extractor: FeatureExtractor;
    private readonly builder: BaselineBuilder;
    private readonly detector: ActivityShiftDetector;
    private readonly riskEngine: RiskEngine;
    private readonly errorHandler: MonitoringErrorHandler;
    private readonly performanceGuard: PerformanceGuard;
    private readonly windowDuration: number;
    private readonly calibration: CalibrationConfig;
    private reporting: ReportingConfig;

    private readonly source?: InteractionEventSource;
    private readonly sink?: RiskReportSink;
    private readonly logger: MonitoringLogger;
    private readonly metrics?: MetricsCollector;
    private readonly clock: () => number;

    private readonly pending = new Set<Promise<void>>();
    private loop?: Promise<void>;
    private stopRequested = false;
    private wake?: () => void;
    private sleepTimer?: NodeJS.Timeout;

    private startedAt?: number;
    private endedAt?: number;
    private lastReportAt?: number;
    private lastScores?: AnomalyScores;
    private eventCount = 0;
    private reportsAccepted = 0;
    private reportsRejected = 0;
    private reportsFailed = 0;

    constructor(options: MonitoringSessionOptions = {}) {
        const config = options.config ?? createDefaultConfig();
        this.sessionId = options.sessionId ?? randomUUID();
        this.logger = (options.logger ?? silentLogger).child({ sessionId: this.sessionId });
        this.metrics = options.metrics;
        this.source = options.source;
        this.sink = options.sink;
        this.clock = options.clock ?? (() => Date.now() / 1000);

        this.windowDuration = config.windowDuration;
        this.calibration = { ...config.calibration, fallbackProfile: { ...config.calibration.fallbackProfile } };
        this.reporting = { ...config.reporting };
        this.extractor = new FeatureExtractor(config.windowDuration, this.logger);
        this.builder = new BaselineBuilder(config.calibration, this.logger);
        this.detector = new ActivityShiftDetector(config.detection, this.logger);
        this.riskEngine = new RiskEngine(config.risk, this.logger);
        this.errorHandler = new MonitoringErrorHandler(this.logger, config.reporting.sinkTimeoutMs);
        this.performanceGuard = new PerformanceGuard(config.reporting.sinkTimeoutMs);
    }

    /**
     * Synchronous core step: ingest events, compute features, advance
     * calibration and, once calibrated, score and combine.
     */
    step(events: readonly InteractionEvent[], now: number): StepResult {
        if (this.startedAt === undefined) {
            this.startedAt = now;
        }
        this.eventCount += events.length;

        let features: FeatureVector;
        try {
            this.extractor.addEvents(events);
            features = this.extractor.computeFeatures(now);
        } catch (error) {
            features = this.errorHandler.handleFeatureExtractionError(error, now, this.windowDuration);
        }

        this.errorHandler.guard(() => this.builder.update(features, now), undefined, MonitoringErrorType.CALIBRATION_ERROR);

        const baseline = this.builder.baseline;
        if (baseline && !this.detector.hasBaseline) {
            this.detector.setBaseline(baseline);
            const state = this.builder.calibrationState;
            this.logger.info('calibration_complete', {
                fallback: state.status === 'calibrated' && state.fallback,
                avgTypingSpeed: baseline.avgTypingSpeed,
                avgIdleDuration: baseline.avgIdleDuration,
                avgFocusRate: baseline.avgFocusRate,
            });
        }

        if (!this.detector.hasBaseline) {
            return { features, calibrated: false, progress: this.builder.calibrationProgress(now) };
        }

        let scores: AnomalyScores;
        try {
            scores = this.detector.computeScores(features);
        } catch (error) {
            scores = this.errorHandler.handleDetectionError(error);
        }

        const risk = this.errorHandler.guard(
            () => this.riskEngine.computeRisk(scores),
            this.riskEngine.currentRisk,
            MonitoringErrorType.RISK_ENGINE_ERROR
        );
        this.lastScores = scores;

        return { features, calibrated: true, progress: 100, scores, risk };
    }

    /**
     * Drain the source, run one step and emit a report when one is due.
     * Never rejects.
     */
    async tick(now?: number): Promise<StepResult> {
        const started = process.hrtime.bigint();

        let events: InteractionEvent[] = [];
        const source = this.source;
        if (source) {
            events = await this.errorHandler.guardAsync(
                () => source.getEvents(this.reporting.drainTimeoutMs),
                [],
                MonitoringErrorType.SOURCE_ERROR,
                this.reporting.drainTimeoutMs + 1000
            );
        }

        const at = now ?? this.clock();
        const result = this.step(events, at);

        if (result.calibrated && result.scores && result.risk !== undefined && this.isReportDue(at)) {
            this.lastReportAt = at;
            this.emit({
                timestamp: at,
                riskScore: result.risk,
                anomalyScores: result.scores,
                sessionId: this.sessionId,
                source: this.reporting.source,
            });
        }

        this.metrics?.recordTick(Number(process.hrtime.bigint() - started) / 1_000_000, events.length);
        return result;
    }

    /**
     * Start the source and tick every poll interval until `stop()`
     */
    async run(): Promise<void> {
        if (this.loop) return this.loop;

        this.stopRequested = false;
        this.endedAt = undefined;
        this.loop = this.runLoop();
        return this.loop;
    }

    /**
     * Ask the loop to exit after the current tick, stop the source and wait
     * for in-flight report emissions
     */
    async stop(): Promise<void> {
        this.stopRequested = true;
        if (this.sleepTimer) {
            clearTimeout(this.sleepTimer);
            this.sleepTimer = undefined;
        }
        this.wake?.();

        await this.loop;
        this.loop = undefined;
        await this.flush();
    }

    /**
     * Wait for every report emission still in flight
     */
    async flush(): Promise<void> {
        await Promise.allSettled([...this.pending]);
    }

    /**
     * Apply new reporting settings to the running loop
     */
    updateReporting(reporting: ReportingConfig): void {
        this.reporting = { ...reporting };
        this.logger.info('reporting_updated', { ...reporting });
    }

    /**
     * Apply a reloaded configuration. Detection, risk and reporting settings
     * take effect on the next tick. The window and calibration settings are
     * fixed for the session's lifetime; changing them only logs a warning.
     */
    applyConfig(config: MonitoringConfig): void {
        const restartRequired: string[] = [];
        if (config.windowDuration !== this.windowDuration) {
            restartRequired.push('windowDuration');
        }
        if (JSON.stringify(config.calibration) !== JSON.stringify(this.calibration)) {
            restartRequired.push('calibration');
        }
        if (restartRequired.length > 0) {
            this.logger.warn('config_restart_required', { fields: restartRequired });
        }

        this.detector.updateThresholds(config.detection);
        this.errorHandler.guard(
            () => this.riskEngine.updateConfig(config.risk),
            undefined,
            MonitoringErrorType.RISK_ENGINE_ERROR
        );
        this.updateReporting(config.reporting);
    }

    summary(): SessionSummary {
        const end = this.endedAt ?? this.clock();
        return {
            sessionId: this.sessionId,
            eventCount: this.eventCount,
            reportsAccepted: this.reportsAccepted,
            reportsRejected: this.reportsRejected,
            reportsFailed: this.reportsFailed,
            currentRisk: this.riskEngine.currentRisk,
            calibrated: this.builder.isCalibrated,
            durationSeconds: this.startedAt === undefined ? 0 : Math.max(0, end - this.startedAt),
        };
    }

    get isCalibrated(): boolean {
        return this.builder.isCalibrated;
    }

    get baseline(): BaselineProfile | undefined {
        return this.builder.baseline;
    }

    get pendingReports(): number {
        return this.pending.size;
    }

    /**
     * Readable explanation of the latest scores
     */
    explainLatest(): string {
        return this.lastScores ? this.detector.explain(this.lastScores) : 'Calibrating';
    }

    getErrorStats(): ErrorStats {
        return this.errorHandler.getErrorStats();
    }

    private async runLoop(): Promise<void> {
        this.startedAt = this.clock();
        if (this.source) {
            await this.source.start();
        }
        this.logger.info('session_started', {
            pollIntervalMs: this.reporting.pollIntervalMs,
            reportInterval: this.reporting.reportInterval,
        });

        while (!this.stopRequested) {
            await this.tick();
            if (this.stopRequested) break;
            if (this.source?.isExhausted?.()) {
                this.logger.info('event_source_exhausted');
                break;
            }
            await this.sleep(this.reporting.pollIntervalMs);
        }

        if (this.source) {
            await this.source.stop();
        }
        this.endedAt = this.clock();
        this.logger.info('session_stopped', { ...this.summary() });
    }

    private sleep(ms: number): Promise<void> {
        return new Promise(resolve => {
            this.wake = () => {
                this.wake = undefined;
                resolve();
            };
            this.sleepTimer = setTimeout(() => {
                this.sleepTimer = undefined;
                this.wake?.();
            }, ms);
        });
    }

    private isReportDue(now: number): boolean {
        return this.lastReportAt === undefined || now - this.lastReportAt >= this.reporting.reportInterval;
    }

    /**
     * Fire-and-forget delivery; the next tick never waits for it
     */
    private emit(report: RiskReport): void {
        if (!this.sink) return;

        const delivery: Promise<void> = this.deliver(this.sink, report)
            .catch((error: unknown) => this.errorHandler.handleReportError(error))
            .finally(() => {
                this.pending.delete(delivery);
            });
        this.pending.add(delivery);
    }

    private async deliver(sink: RiskReportSink, report: RiskReport): Promise<void> {
        let result: SinkResult;
        let errorType = MonitoringErrorType.SINK_FAILURE;
        try {
            result = await this.performanceGuard.runWithTimeout(() => sink.send(report), this.reporting.sinkTimeoutMs);
        } catch (error) {
            if (error instanceof OperationTimeoutError) {
                errorType = MonitoringErrorType.SINK_TIMEOUT;
            }
            result = { status: 'failed', error: error instanceof Error ? error.message : String(error) };
        }

        switch (result.status) {
            case 'accepted':
                this.reportsAccepted++;
                this.logger.debug('risk_report_accepted', { recordId: result.recordId, riskScore: report.riskScore });
                break;
            case 'rejected':
                this.reportsRejected++;
                this.logger.warn('risk_report_rejected', { reason: result.reason, riskScore: report.riskScore });
                break;
            case 'failed':
                this.reportsFailed++;
                this.errorHandler.recordError(errorType);
                this.logger.error('risk_report_failed', { error: result.error, riskScore: report.riskScore });
                break;
        }
        this.metrics?.recordReport(result);
    }
}

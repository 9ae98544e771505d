import type { FeatureVector } from './types/FeatureVector.js';
import { createEmptyFeatureVector } from './types/FeatureVector.js';
import { zeroAnomalyScores, type AnomalyScores } from './types/AnomalyScores.js';
import { silentLogger, type MonitoringLogger } from '../utils/logger/structuredLogger.js';

/**
 * Error types for the monitoring pipeline components
 */
export enum MonitoringErrorType {
    FEATURE_EXTRACTION_ERROR = 'FEATURE_EXTRACTION_ERROR',
    CALIBRATION_ERROR = 'CALIBRATION_ERROR',
    DETECTION_ERROR = 'DETECTION_ERROR',
    RISK_ENGINE_ERROR = 'RISK_ENGINE_ERROR',
    SOURCE_ERROR = 'SOURCE_ERROR',
    SINK_FAILURE = 'SINK_FAILURE',
    SINK_TIMEOUT = 'SINK_TIMEOUT',
    REPORT_HANDLING_ERROR = 'REPORT_HANDLING_ERROR',
}

/**
 * Circuit breaker states
 */
export enum CircuitBreakerState {
    CLOSED = 'CLOSED',
    OPEN = 'OPEN',
    HALF_OPEN = 'HALF_OPEN',
}

/**
 * Circuit breaker configuration
 */
export interface CircuitBreakerConfig {
    failureThreshold: number;
    recoveryTimeout: number;
    minimumRequests: number;
}

export interface CircuitBreakerStats {
    state: CircuitBreakerState;
    failureCount: number;
    requestCount: number;
    lastFailureTime: number;
}

/**
 * Circuit breaker for calls to external services
 */
export class CircuitBreaker {
    private state: CircuitBreakerState = CircuitBreakerState.CLOSED;
    private failureCount = 0;
    private lastFailureTime = 0;
    private requestCount = 0;
    private readonly config: CircuitBreakerConfig;
    private readonly now: () => number;

    constructor(config: Partial<CircuitBreakerConfig> = {}, now: () => number = Date.now) {
        this.config = {
            failureThreshold: config.failureThreshold ?? 5,
            recoveryTimeout: config.recoveryTimeout ?? 60000, // 1 minute
            minimumRequests: config.minimumRequests ?? 10,
        };
        this.now = now;
    }

    /**
     * Whether a call may go through now. Moves OPEN to HALF_OPEN once the
     * recovery timeout has passed.
     */
    allowRequest(): boolean {
        if (this.state !== CircuitBreakerState.OPEN) {
            return true;
        }
        if (this.now() - this.lastFailureTime >= this.config.recoveryTimeout) {
            this.state = CircuitBreakerState.HALF_OPEN;
            return true;
        }
        return false;
    }

    /**
     * Record successful operation
     */
    onSuccess(): void {
        this.failureCount = 0;
        if (this.state === CircuitBreakerState.HALF_OPEN) {
            this.state = CircuitBreakerState.CLOSED;
        }
    }

    /**
     * Record failed operation
     */
    onFailure(): void {
        this.failureCount++;
        this.lastFailureTime = this.now();

        if (this.state === CircuitBreakerState.HALF_OPEN || this.shouldOpenCircuit()) {
            this.state = CircuitBreakerState.OPEN;
        }
    }

    /**
     * Count a call let through by `allowRequest`
     */
    recordRequest(): void {
        this.requestCount++;
    }

    private shouldOpenCircuit(): boolean {
        return (
            this.requestCount >= this.config.minimumRequests &&
            this.failureCount >= this.config.failureThreshold
        );
    }

    getState(): CircuitBreakerState {
        return this.state;
    }

    getStats(): CircuitBreakerStats {
        return {
            state: this.state,
            failureCount: this.failureCount,
            requestCount: this.requestCount,
            lastFailureTime: this.lastFailureTime,
        };
    }

    /**
     * Reset circuit breaker manually
     */
    reset(): void {
        this.state = CircuitBreakerState.CLOSED;
        this.failureCount = 0;
        this.requestCount = 0;
        this.lastFailureTime = 0;
    }
}

export class OperationTimeoutError extends Error {
    constructor(public readonly timeoutMs: number) {
        super(`Operation timed out after ${timeoutMs}ms`);
        this.name = 'OperationTimeoutError';
    }
}

/**
 * Performance guard for timeout protection
 */
export class PerformanceGuard {
    private readonly maxProcessingTime: number;

    constructor(maxProcessingTime: number = 2000) {
        this.maxProcessingTime = maxProcessingTime;
    }

    /**
     * Race the operation against a timer. Rejects with OperationTimeoutError
     * when the timer wins; the timer is always cleared.
     */
    async runWithTimeout<T>(operation: () => Promise<T>, timeoutMs?: number): Promise<T> {
        const timeout = timeoutMs ?? this.maxProcessingTime;
        let timer: NodeJS.Timeout | undefined;

        const timeoutPromise = new Promise<never>((_, reject) => {
            timer = setTimeout(() => reject(new OperationTimeoutError(timeout)), timeout);
        });

        try {
            return await Promise.race([operation(), timeoutPromise]);
        } finally {
            clearTimeout(timer);
        }
    }
}

export interface ErrorStats {
    errorCounts: Record<string, number>;
    lastErrors: Record<string, number>;
    totalErrors: number;
}

/**
 * Counts errors per type and wraps pipeline calls with neutral fallbacks so
 * that one failing component never stops the polling loop.
 */
export class MonitoringErrorHandler {
    private readonly errorCounts: Map<MonitoringErrorType, number> = new Map();
    private readonly lastErrors: Map<MonitoringErrorType, number> = new Map();
    private readonly performanceGuard: PerformanceGuard;
    private readonly logger: MonitoringLogger;

    constructor(logger: MonitoringLogger = silentLogger, maxProcessingTime: number = 2000) {
        this.logger = logger;
        this.performanceGuard = new PerformanceGuard(maxProcessingTime);
    }

    /**
     * Run a synchronous component call, returning `fallback` if it throws
     */
    guard<T>(operation: () => T, fallback: T, errorType: MonitoringErrorType): T {
        try {
            return operation();
        } catch (error) {
            this.handle(error, errorType);
            return fallback;
        }
    }

    /**
     * Run an async component call bounded by a timeout, returning `fallback`
     * on failure or timeout
     */
    async guardAsync<T>(
        operation: () => Promise<T>,
        fallback: T,
        errorType: MonitoringErrorType,
        timeoutMs?: number
    ): Promise<T> {
        try {
            return await this.performanceGuard.runWithTimeout(operation, timeoutMs);
        } catch (error) {
            this.handle(error, errorType);
            return fallback;
        }
    }

    /**
     * Feature vector used when extraction fails
     */
    handleFeatureExtractionError(error: unknown, now: number, windowDuration: number): FeatureVector {
        this.handle(error, MonitoringErrorType.FEATURE_EXTRACTION_ERROR);
        return createEmptyFeatureVector(now - windowDuration, now);
    }

    /**
     * Scores used when detection fails
     */
    handleDetectionError(error: unknown): AnomalyScores {
        this.handle(error, MonitoringErrorType.DETECTION_ERROR);
        return zeroAnomalyScores();
    }

    /**
     * Failure after a report was delivered, e.g. in a metrics listener
     */
    handleReportError(error: unknown): void {
        this.handle(error, MonitoringErrorType.REPORT_HANDLING_ERROR);
    }

    /**
     * Record one occurrence of an error type
     */
    recordError(errorType: MonitoringErrorType): void {
        this.errorCounts.set(errorType, (this.errorCounts.get(errorType) ?? 0) + 1);
        this.lastErrors.set(errorType, Date.now());
    }

    getErrorCount(errorType: MonitoringErrorType): number {
        return this.errorCounts.get(errorType) ?? 0;
    }

    getErrorStats(): ErrorStats {
        const errorCounts: Record<string, number> = {};
        const lastErrors: Record<string, number> = {};
        let totalErrors = 0;

        for (const [type, count] of this.errorCounts.entries()) {
            errorCounts[type] = count;
            totalErrors += count;
        }

        for (const [type, timestamp] of this.lastErrors.entries()) {
            lastErrors[type] = timestamp;
        }

        return { errorCounts, lastErrors, totalErrors };
    }

    resetErrorStats(): void {
        this.errorCounts.clear();
        this.lastErrors.clear();
    }

    private handle(error: unknown, errorType: MonitoringErrorType): void {
        this.recordError(errorType);
        this.logger.error('component_error', {
            type: errorType,
            timeout: error instanceof OperationTimeoutError,
            message: error instanceof Error ? error.message : String(error),
        });
    }
}

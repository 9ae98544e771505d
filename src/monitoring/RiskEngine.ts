import type { AnomalyScores } from './types/AnomalyScores.js';
import type { RiskLevel } from './types/RiskReport.js';
import { DEFAULT_RISK_CONFIG, type RiskConfig, type RiskWeights } from './types/Configuration.js';
import { clamp } from './ActivityShiftDetector.js';
import { silentLogger, type MonitoringLogger } from '../utils/logger/structuredLogger.js';

/**
 * Combines the anomaly scores with fixed weights and smooths the result
 * across the last few cycles, biased towards the newest value.
 */
export class RiskEngine {
    private weights: RiskWeights;
    private smoothingWindow: number;
    private latestWeight: number;
    private readonly logger: MonitoringLogger;
    private history: number[] = [];
    private lastRaw = 0;
    private lastSmoothed = 0;

    constructor(config: Partial<RiskConfig> = {}, logger: MonitoringLogger = silentLogger) {
        const merged: RiskConfig = { ...DEFAULT_RISK_CONFIG, ...config };
        this.weights = this.validateWeights(merged.weights);
        this.smoothingWindow = Math.max(1, Math.floor(merged.smoothingWindow));
        if (merged.latestWeight < 0 || merged.latestWeight > 1) {
            throw new Error('Latest-sample weight must be between 0 and 1');
        }
        this.latestWeight = merged.latestWeight;
        this.logger = logger;
    }

    /**
     * Weighted raw risk, clamped to [0, 100]
     */
    combine(scores: AnomalyScores): number {
        const raw =
            this.weights.idleBurst * scores.idleBurst +
            this.weights.focusInstability * scores.focusInstability +
            this.weights.behavioralDrift * scores.behavioralDrift;
        return clamp(raw, 0, 100);
    }

    /**
     * Record a new cycle and return the smoothed risk score (0-100)
     */
    computeRisk(scores: AnomalyScores): number {
        const raw = this.combine(scores);
        this.lastRaw = raw;

        this.history.push(raw);
        if (this.history.length > this.smoothingWindow) {
            this.history.shift();
        }

        let smoothed = raw;
        if (this.history.length > 1) {
            const older = this.history.slice(0, -1);
            const olderMean = older.reduce((sum, value) => sum + value, 0) / older.length;
            smoothed = this.latestWeight * raw + (1 - this.latestWeight) * olderMean;
        }
        this.lastSmoothed = smoothed;

        const level = riskLevel(raw);
        if (level === 'high' || level === 'critical') {
            this.logger.warn('high_risk', { raw, smoothed, level });
        } else if (level === 'medium') {
            this.logger.info('medium_risk', { raw, smoothed });
        } else {
            this.logger.debug('low_risk', { raw, smoothed });
        }

        return smoothed;
    }

    /**
     * Most recent smoothed risk score
     */
    get currentRisk(): number {
        return this.lastSmoothed;
    }

    /**
     * Most recent unsmoothed risk score
     */
    get rawRisk(): number {
        return this.lastRaw;
    }

    getWeights(): RiskWeights {
        return { ...this.weights };
    }

    /**
     * Swap weights and smoothing settings. Kept history is trimmed to the new
     * window, so the next smoothed score already uses it.
     */
    updateConfig(config: Partial<RiskConfig>): void {
        const weights = this.validateWeights(config.weights ?? this.weights);
        const latestWeight = config.latestWeight ?? this.latestWeight;
        if (latestWeight < 0 || latestWeight > 1) {
            throw new Error('Latest-sample weight must be between 0 and 1');
        }

        this.weights = weights;
        this.latestWeight = latestWeight;
        this.smoothingWindow = Math.max(1, Math.floor(config.smoothingWindow ?? this.smoothingWindow));
        if (this.history.length > this.smoothingWindow) {
            this.history = this.history.slice(-this.smoothingWindow);
        }
        this.logger.info('risk_config_updated', { ...this.weights, smoothingWindow: this.smoothingWindow });
    }

    /**
     * Clear history and cached scores, e.g. when a new session starts
     */
    reset(): void {
        this.history = [];
        this.lastRaw = 0;
        this.lastSmoothed = 0;
        this.logger.debug('risk_engine_reset');
    }

    private validateWeights(weights: RiskWeights): RiskWeights {
        const { idleBurst, focusInstability, behavioralDrift } = weights;

        if (idleBurst < 0 || focusInstability < 0 || behavioralDrift < 0) {
            throw new Error('All risk weights must be non-negative');
        }

        if (idleBurst + focusInstability + behavioralDrift === 0) {
            throw new Error('At least one risk weight must be positive');
        }

        return { ...weights };
    }
}

/**
 * Classify a risk score: low < 30 <= medium < 60 <= high < 80 <= critical
 */
export function riskLevel(score: number): RiskLevel {
    if (score >= 80) return 'critical';
    if (score >= 60) return 'high';
    if (score >= 30) return 'medium';
    return 'low';
}

import type { FeatureVector } from './types/FeatureVector.js';
import type { BaselineProfile } from './types/BaselineProfile.js';
import { ANOMALY_RULES, zeroAnomalyScores, type AnomalyRule, type AnomalyScores, type ShiftReason } from './types/AnomalyScores.js';
import { DEFAULT_DETECTION_THRESHOLDS, type DetectionThresholds } from './types/Configuration.js';
import { silentLogger, type MonitoringLogger } from '../utils/logger/structuredLogger.js';

/** Scores above this are reported as critical */
export const CRITICAL_BAND = 60;
/** Scores above this are reported as warnings */
export const WARNING_BAND = 30;

const RECENT_SCORE_LIMIT = 10;

const REASON_TEXT: Record<AnomalyRule, Record<ShiftReason['severity'], string>> = {
    idleBurst: {
        critical: 'CRITICAL: Extreme typing burst after idle - possible copy-paste',
        warning: 'WARNING: Unusual typing pattern after idle',
    },
    focusInstability: {
        critical: 'CRITICAL: Excessive window/tab switching',
        warning: 'WARNING: Frequent focus changes',
    },
    behavioralDrift: {
        critical: 'CRITICAL: Typing speed drastically changed',
        warning: 'WARNING: Typing pattern shifted',
    },
};

/**
 * Compares live features against the frozen baseline with three independent
 * deviation rules:
 * - idle burst: long idle followed by fast typing
 * - focus instability: focus lost far more often than during calibration
 * - behavioral drift: typing speed far from the calibrated speed
 */
export class ActivityShiftDetector {
    private profile?: BaselineProfile;
    private recent: number[] = [];
    private thresholds: DetectionThresholds;
    private readonly logger: MonitoringLogger;

    constructor(
        thresholds: Partial<DetectionThresholds> = {},
        logger: MonitoringLogger = silentLogger,
        baseline?: BaselineProfile
    ) {
        this.thresholds = { ...DEFAULT_DETECTION_THRESHOLDS, ...thresholds };
        this.logger = logger;
        if (baseline) {
            this.setBaseline(baseline);
        }
    }

    get baseline(): BaselineProfile | undefined {
        return this.profile;
    }

    get hasBaseline(): boolean {
        return this.profile !== undefined;
    }

    /**
     * Hand the frozen profile to the detector. Only the first profile is kept.
     */
    setBaseline(profile: BaselineProfile): boolean {
        if (this.profile) {
            this.logger.warn('baseline_already_set', { ignored: profile });
            return false;
        }

        this.profile = profile;
        this.logger.info('baseline_set', {
            avgTypingSpeed: profile.avgTypingSpeed,
            avgIdleDuration: profile.avgIdleDuration,
            avgFocusRate: profile.avgFocusRate,
        });
        return true;
    }

    /**
     * Evaluate all three rules. All-zero without a baseline.
     */
    computeScores(features: FeatureVector): AnomalyScores {
        const baseline = this.profile;
        if (!baseline) {
            return zeroAnomalyScores();
        }

        const idleBurst = this.scoreIdleBurst(features, baseline);
        const focusInstability = this.scoreFocusInstability(features, baseline);
        const behavioralDrift = this.scoreBehavioralDrift(features, baseline);
        const scores: AnomalyScores = {
            idleBurst,
            focusInstability,
            behavioralDrift,
            overall: Math.max(idleBurst, focusInstability, behavioralDrift),
        };

        this.recent.push(scores.overall);
        if (this.recent.length > RECENT_SCORE_LIMIT) {
            this.recent.shift();
        }

        if (scores.overall > CRITICAL_BAND) {
            this.logger.warn('high_anomaly_detected', { ...scores });
        } else if (scores.overall > WARNING_BAND) {
            this.logger.info('medium_anomaly_detected', { overall: scores.overall });
        }

        return scores;
    }

    /**
     * Structured reasons for every rule above the warning band
     */
    describe(scores: AnomalyScores): ShiftReason[] {
        const reasons: ShiftReason[] = [];
        for (const rule of ANOMALY_RULES) {
            const score = scores[rule];
            let severity: ShiftReason['severity'] | undefined;
            if (score > CRITICAL_BAND) {
                severity = 'critical';
            } else if (score > WARNING_BAND) {
                severity = 'warning';
            }

            if (severity) {
                reasons.push({ rule, severity, description: REASON_TEXT[rule][severity], score });
            }
        }

        return reasons;
    }

    /**
     * Human-readable summary of the scores, for reports and dashboards only
     */
    explain(scores: AnomalyScores): string {
        const reasons = this.describe(scores);
        if (reasons.length === 0) {
            return 'Normal behavior detected';
        }
        return reasons.map(r => r.description).join(' | ');
    }

    /**
     * Last overall scores, oldest first
     */
    get recentScores(): readonly number[] {
        return [...this.recent];
    }

    /**
     * Replace the rule thresholds; the baseline and score history are kept
     */
    updateThresholds(thresholds: Partial<DetectionThresholds>): void {
        this.thresholds = { ...this.thresholds, ...thresholds };
        this.logger.info('detection_thresholds_updated', { ...this.thresholds });
    }

    /**
     * Clear score history; the baseline is kept
     */
    reset(): void {
        this.recent = [];
        this.logger.debug('detector_history_reset');
    }

    private scoreIdleBurst(features: FeatureVector, baseline: BaselineProfile): number {
        const t = this.thresholds;
        if (baseline.avgTypingSpeed <= 0) return 0;

        if (features.avgIdleDuration <= baseline.avgIdleDuration * t.idleMultiplier) return 0;
        if (features.avgTypingSpeed <= baseline.avgTypingSpeed * t.typingMultiplier) return 0;

        const ratio = features.avgTypingSpeed / baseline.avgTypingSpeed;
        return clamp((ratio - t.typingMultiplier) * t.idleBurstSlope, 0, t.idleScale);
    }

    private scoreFocusInstability(features: FeatureVector, baseline: BaselineProfile): number {
        const t = this.thresholds;
        const windowLength = features.windowEnd - features.windowStart;
        const focusRate = windowLength > 0 ? (features.focusLossCount * 60) / windowLength : 0;

        if (baseline.avgFocusRate <= 0) return 0;
        if (focusRate <= baseline.avgFocusRate * t.focusMultiplier) return 0;

        const ratio = focusRate / baseline.avgFocusRate;
        return clamp((ratio - t.focusMultiplier) * t.focusSlope, 0, t.focusScale);
    }

    private scoreBehavioralDrift(features: FeatureVector, baseline: BaselineProfile): number {
        const t = this.thresholds;
        if (baseline.avgTypingSpeed <= 0) return 0;

        const deviation = Math.abs(features.avgTypingSpeed - baseline.avgTypingSpeed) / baseline.avgTypingSpeed;
        if (!(deviation > t.driftThreshold)) return 0;

        return clamp((deviation - t.driftThreshold) * t.driftSlope, 0, t.driftScale);
    }
}

/**
 * Clamp to [min, max]; NaN maps to `min`
 */
export function clamp(value: number, min: number, max: number): number {
    if (Number.isNaN(value)) return min;
    return Math.min(max, Math.max(min, value));
}

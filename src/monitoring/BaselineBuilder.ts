import type { FeatureVector } from './types/FeatureVector.js';
import type { BaselineProfile, CalibrationState } from './types/BaselineProfile.js';
import { DEFAULT_CALIBRATION_CONFIG, type CalibrationConfig } from './types/Configuration.js';
import { silentLogger, type MonitoringLogger } from '../utils/logger/structuredLogger.js';

/** Window length assumed when a sample carries none */
const FALLBACK_WINDOW_SECONDS = 30;

/**
 * Observes feature vectors during calibration and freezes a baseline profile
 * once enough typing evidence has accumulated or the calibration time is up.
 *
 * uninitialized -> calibrating -> calibrated
 */
export class BaselineBuilder {
    private state: CalibrationState = { status: 'uninitialized' };
    private history: FeatureVector[] = [];
    private lastUpdateAt?: number;
    private readonly config: CalibrationConfig;
    private readonly logger: MonitoringLogger;

    constructor(config: Partial<CalibrationConfig> = {}, logger: MonitoringLogger = silentLogger) {
        this.config = { ...DEFAULT_CALIBRATION_CONFIG, ...config };
        this.logger = logger;
    }

    /**
     * Begin a new calibration period anchored at `startTime`, discarding any history
     */
    startCalibration(startTime: number): void {
        this.history = [];
        this.state = { status: 'calibrating', startedAt: startTime, history: this.history };
        this.lastUpdateAt = startTime;
        this.logger.info('calibration_started', { startTime, duration: this.config.duration });
    }

    /**
     * Feed the feature vector computed for the window ending at `currentTime`
     */
    update(features: FeatureVector, currentTime: number): void {
        if (this.state.status === 'calibrated') return;

        if (this.state.status === 'uninitialized') {
            this.startCalibration(currentTime);
            return;
        }

        this.lastUpdateAt = currentTime;
        const elapsed = currentTime - this.state.startedAt;

        if (elapsed <= this.config.duration) {
            this.history.push(features);
            this.logger.debug('calibration_sample', { elapsed, samples: this.history.length });

            if (
                this.history.length >= this.config.minSamples &&
                elapsed >= this.config.duration * this.config.earlyConvergenceFraction &&
                this.hasTypingEvidence()
            ) {
                this.buildBaseline(currentTime, false);
            }
            return;
        }

        this.buildBaseline(currentTime, true);

        // Deferred past the window: keep accumulating so the all-samples
        // fallback can eventually apply.
        if (!this.isCalibrated) {
            this.history.push(features);
        }
    }

    /**
     * The frozen profile, once calibrated
     */
    get baseline(): BaselineProfile | undefined {
        return this.state.status === 'calibrated' ? this.state.profile : undefined;
    }

    get isCalibrated(): boolean {
        return this.state.status === 'calibrated';
    }

    get calibrationState(): CalibrationState {
        if (this.state.status === 'calibrating') {
            return { ...this.state, history: [...this.history] };
        }
        return this.state;
    }

    /**
     * Number of samples collected in the current calibration
     */
    get sampleCount(): number {
        return this.history.length;
    }

    /**
     * Calibration progress as a percentage (0-100). Elapsed time is measured
     * up to `now`, or to the last update when omitted.
     */
    calibrationProgress(now?: number): number {
        switch (this.state.status) {
            case 'uninitialized':
                return 0;
            case 'calibrated':
                return 100;
            case 'calibrating': {
                if (this.config.duration <= 0) return 100;
                const reference = now ?? this.lastUpdateAt ?? this.state.startedAt;
                const elapsed = Math.max(0, reference - this.state.startedAt);
                return Math.min(100, (elapsed / this.config.duration) * 100);
            }
        }
    }

    /**
     * Discard the baseline and history
     */
    reset(): void {
        this.history = [];
        this.state = { status: 'uninitialized' };
        this.lastUpdateAt = undefined;
        this.logger.info('calibration_reset');
    }

    private hasTypingEvidence(): boolean {
        return this.history.some(
            fv =>
                fv.avgTypingSpeed > this.config.typingEvidenceSpeed ||
                fv.keyPressCount > this.config.typingEvidenceKeyPresses
        );
    }

    private buildBaseline(currentTime: number, forced: boolean): void {
        if (this.state.status !== 'calibrating') return;
        const startedAt = this.state.startedAt;

        if (this.history.length === 0) {
            this.logger.warn('calibration_fallback_profile', { reason: 'no samples' });
            this.freeze(this.config.fallbackProfile, startedAt, currentTime, true);
            return;
        }

        let valid = this.history.filter(fv => fv.avgTypingSpeed > 0 || fv.keyPressCount > 0);

        if (valid.length === 0) {
            if (this.history.length < this.config.fallbackMinSamples) {
                this.logger.info('calibration_deferred', { samples: this.history.length, forced });
                return;
            }
            this.logger.warn('calibration_without_typing', { samples: this.history.length });
            valid = this.history;
        }

        const count = valid.length;
        let typingTotal = 0;
        let idleTotal = 0;
        let focusLossTotal = 0;
        for (const fv of valid) {
            typingTotal += fv.avgTypingSpeed;
            idleTotal += fv.avgIdleDuration;
            focusLossTotal += fv.focusLossCount;
        }

        let windowLength = valid[0].windowEnd - valid[0].windowStart;
        if (!(windowLength > 0)) {
            windowLength = FALLBACK_WINDOW_SECONDS;
        }

        const profile: BaselineProfile = {
            avgTypingSpeed: typingTotal / count,
            avgIdleDuration: idleTotal / count,
            avgFocusRate: (focusLossTotal / count) * (60 / windowLength),
        };

        this.freeze(profile, startedAt, currentTime, false);
    }

    private freeze(profile: BaselineProfile, startedAt: number, calibratedAt: number, fallback: boolean): void {
        const samples = this.history.length;
        this.state = {
            status: 'calibrated',
            startedAt,
            calibratedAt,
            profile: Object.freeze({ ...profile }),
            fallback,
        };
        this.history = [];

        this.logger.info('baseline_built', {
            samples,
            fallback,
            elapsed: calibratedAt - startedAt,
            avgTypingSpeed: profile.avgTypingSpeed,
            avgIdleDuration: profile.avgIdleDuration,
            avgFocusRate: profile.avgFocusRate,
        });
    }
}

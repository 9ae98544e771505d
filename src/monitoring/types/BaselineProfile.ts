import type { FeatureVector } from './FeatureVector.js';

/**
 * Frozen reference profile of a session's normal behavior
 */
export interface BaselineProfile {
    /** Key presses per minute */
    readonly avgTypingSpeed: number;
    /** Seconds */
    readonly avgIdleDuration: number;
    /** Focus losses per minute */
    readonly avgFocusRate: number;
}

/**
 * Calibration lifecycle. The profile only exists once calibrated, so an
 * unfrozen baseline cannot be observed.
 */
export type CalibrationState =
    | { readonly status: 'uninitialized' }
    | {
        readonly status: 'calibrating';
        readonly startedAt: number;
        readonly history: readonly FeatureVector[];
    }
    | {
        readonly status: 'calibrated';
        readonly startedAt: number;
        readonly calibratedAt: number;
        readonly profile: BaselineProfile;
        /** Whether the profile came from the no-data fallback */
        readonly fallback: boolean;
    };

export type CalibrationStatus = CalibrationState['status'];

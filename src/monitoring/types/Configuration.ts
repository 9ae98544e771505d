import type { BaselineProfile } from './BaselineProfile.js';

/**
 * Calibration (baseline building) settings
 */
export interface CalibrationConfig {
    /** Length of the calibration phase in seconds */
    duration: number;
    /** Samples required before early convergence is considered */
    minSamples: number;
    /** Fraction of `duration` that must elapse before early convergence (0-1) */
    earlyConvergenceFraction: number;
    /** Typing speed (keys/min) above which a sample counts as typing evidence */
    typingEvidenceSpeed: number;
    /** Key press count above which a sample counts as typing evidence */
    typingEvidenceKeyPresses: number;
    /** With no typing samples at all, calibrate on everything once this many samples exist */
    fallbackMinSamples: number;
    /** Profile frozen when calibration times out with no samples */
    fallbackProfile: BaselineProfile;
}

/**
 * Deviation rule thresholds and scales for the activity shift detector
 */
export interface DetectionThresholds {
    /** Idle duration must exceed baseline by this factor for an idle burst */
    idleMultiplier: number;
    /** Typing speed must exceed baseline by this factor for an idle burst */
    typingMultiplier: number;
    /** Focus-loss rate must exceed baseline by this factor */
    focusMultiplier: number;
    /** Relative typing-speed deviation tolerated before drift is scored (0-1) */
    driftThreshold: number;
    /** Maximum idle burst score */
    idleScale: number;
    /** Maximum focus instability score */
    focusScale: number;
    /** Maximum behavioral drift score */
    driftScale: number;
    /** Score per unit of typing ratio above `typingMultiplier` */
    idleBurstSlope: number;
    /** Score per unit of focus ratio above `focusMultiplier` */
    focusSlope: number;
    /** Score per unit of deviation above `driftThreshold` */
    driftSlope: number;
}

/**
 * Weights for combining the three anomaly scores into one risk score
 */
export interface RiskWeights {
    idleBurst: number;
    focusInstability: number;
    behavioralDrift: number;
}

/**
 * Risk combination and smoothing settings
 */
export interface RiskConfig {
    weights: RiskWeights;
    /** Number of raw risk scores kept for smoothing */
    smoothingWindow: number;
    /** Weight of the newest raw score against the mean of the older ones (0-1) */
    latestWeight: number;
}

/**
 * Polling loop and report emission settings
 */
export interface ReportingConfig {
    /** Delay between polling ticks in milliseconds */
    pollIntervalMs: number;
    /** Seconds between two risk reports */
    reportInterval: number;
    /** Maximum wait when draining the event source, in milliseconds */
    drainTimeoutMs: number;
    /** Collector base URL */
    sinkUrl: string;
    /** Maximum time for one report emission in milliseconds */
    sinkTimeoutMs: number;
    /** Producer label attached to every report */
    source: string;
}

/**
 * Main configuration of the monitoring pipeline
 */
export interface MonitoringConfig {
    /** Sliding window length in seconds */
    windowDuration: number;
    calibration: CalibrationConfig;
    detection: DetectionThresholds;
    risk: RiskConfig;
    reporting: ReportingConfig;
}

export const DEFAULT_CALIBRATION_CONFIG: CalibrationConfig = {
    duration: 180, // 3 minutes
    minSamples: 5,
    earlyConvergenceFraction: 0.5,
    typingEvidenceSpeed: 5,
    typingEvidenceKeyPresses: 2,
    fallbackMinSamples: 10,
    fallbackProfile: {
        avgTypingSpeed: 150,
        avgIdleDuration: 2.0,
        avgFocusRate: 0.5,
    },
};

export const DEFAULT_DETECTION_THRESHOLDS: DetectionThresholds = {
    idleMultiplier: 1.2,
    typingMultiplier: 1.3,
    focusMultiplier: 1.5,
    driftThreshold: 0.3,
    idleScale: 70,
    focusScale: 70,
    driftScale: 70,
    idleBurstSlope: 100,
    focusSlope: 70,
    driftSlope: 200,
};

export const DEFAULT_RISK_CONFIG: RiskConfig = {
    weights: {
        idleBurst: 0.4,
        focusInstability: 0.35,
        behavioralDrift: 0.25,
    },
    smoothingWindow: 3,
    latestWeight: 0.6,
};

export const DEFAULT_REPORTING_CONFIG: ReportingConfig = {
    pollIntervalMs: 1000,
    reportInterval: 5,
    drainTimeoutMs: 500,
    sinkUrl: 'http://127.0.0.1:8000',
    sinkTimeoutMs: 2000,
    source: 'pacewatch-client',
};

/**
 * Default configuration values for the monitoring pipeline
 */
export const DEFAULT_MONITORING_CONFIG: MonitoringConfig = {
    windowDuration: 30,
    calibration: DEFAULT_CALIBRATION_CONFIG,
    detection: DEFAULT_DETECTION_THRESHOLDS,
    risk: DEFAULT_RISK_CONFIG,
    reporting: DEFAULT_REPORTING_CONFIG,
};

/**
 * Fresh deep copy of the defaults, safe to mutate
 */
export function createDefaultConfig(): MonitoringConfig {
    return {
        windowDuration: DEFAULT_MONITORING_CONFIG.windowDuration,
        calibration: {
            ...DEFAULT_CALIBRATION_CONFIG,
            fallbackProfile: { ...DEFAULT_CALIBRATION_CONFIG.fallbackProfile },
        },
        detection: { ...DEFAULT_DETECTION_THRESHOLDS },
        risk: {
            ...DEFAULT_RISK_CONFIG,
            weights: { ...DEFAULT_RISK_CONFIG.weights },
        },
        reporting: { ...DEFAULT_REPORTING_CONFIG },
    };
}

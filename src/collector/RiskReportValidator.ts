import type { RiskReport } from '../monitoring/types/RiskReport.js';

export type ValidationResult = { valid: true } | { valid: false; reason: string };

export interface ValidatorRanges {
    riskScoreMin: number;
    riskScoreMax: number;
    anomalyScoreMin: number;
    anomalyScoreMax: number;
}

export const DEFAULT_VALIDATOR_RANGES: ValidatorRanges = {
    riskScoreMin: 0,
    riskScoreMax: 100,
    anomalyScoreMin: 0,
    anomalyScoreMax: 100,
};

/**
 * Range and consistency checks applied to every incoming report before it
 * is stored. Only numeric aggregates are inspected.
 */
export class RiskReportValidator {
    private readonly ranges: ValidatorRanges;

    constructor(ranges: Partial<ValidatorRanges> = {}) {
        this.ranges = { ...DEFAULT_VALIDATOR_RANGES, ...ranges };
    }

    validate(report: RiskReport): ValidationResult {
        const { riskScoreMin, riskScoreMax, anomalyScoreMin, anomalyScoreMax } = this.ranges;

        if (!inRange(report.riskScore, riskScoreMin, riskScoreMax)) {
            return invalid(`Risk score ${report.riskScore} out of range [${riskScoreMin}, ${riskScoreMax}]`);
        }

        const scores = report.anomalyScores;
        const subScores: Array<[string, number]> = [
            ['idle_burst', scores.idleBurst],
            ['focus_instability', scores.focusInstability],
            ['behavioral_drift', scores.behavioralDrift],
            ['overall', scores.overall],
        ];
        for (const [field, value] of subScores) {
            if (!inRange(value, anomalyScoreMin, anomalyScoreMax)) {
                return invalid(`Anomaly score ${field}: ${value} out of range`);
            }
        }

        if (
            report.riskScore === 0 &&
            (scores.idleBurst !== 0 || scores.focusInstability !== 0 || scores.behavioralDrift !== 0)
        ) {
            return invalid('Risk score is zero but anomaly scores are non-zero');
        }

        if (report.sessionId.trim() === '') {
            return invalid('Session ID is empty or missing');
        }

        if (!Number.isFinite(report.timestamp) || report.timestamp <= 0) {
            return invalid('Invalid timestamp');
        }

        return { valid: true };
    }
}

function inRange(value: number, min: number, max: number): boolean {
    return value >= min && value <= max;
}

function invalid(reason: string): ValidationResult {
    return { valid: false, reason };
}

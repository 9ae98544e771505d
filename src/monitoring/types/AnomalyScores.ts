/**
 * Per-rule anomaly scores (0-100). `overall` is the max of the three rules.
 */
export interface AnomalyScores {
    idleBurst: number;
    focusInstability: number;
    behavioralDrift: number;
    overall: number;
}

export type AnomalyRule = 'idleBurst' | 'focusInstability' | 'behavioralDrift';

export const ANOMALY_RULES: readonly AnomalyRule[] = ['idleBurst', 'focusInstability', 'behavioralDrift'];

/**
 * Individual reason produced when a rule score crosses a reporting band
 */
export interface ShiftReason {
    rule: AnomalyRule;
    severity: 'warning' | 'critical';
    description: string;
    score: number;
}

export function zeroAnomalyScores(): AnomalyScores {
    return { idleBurst: 0, focusInstability: 0, behavioralDrift: 0, overall: 0 };
}

import type { AnomalyScores } from './AnomalyScores.js';

/**
 * Periodic record handed to the sink for one session
 */
export interface RiskReport {
    /** Seconds since epoch when the risk was calculated */
    timestamp: number;
    /** Smoothed risk score (0-100) */
    riskScore: number;
    anomalyScores: AnomalyScores;
    sessionId: string;
    /** Producer label, e.g. "pacewatch-client" or "synthetic" */
    source: string;
}

/**
 * Outcome of handing a report to a sink. Sinks never throw.
 */
export type SinkResult =
    | { status: 'accepted'; recordId?: number }
    | { status: 'rejected'; reason: string }
    | { status: 'failed'; error: string };

export type RiskLevel = 'low' | 'medium' | 'high' | 'critical';

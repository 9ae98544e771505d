import type { RiskReport } from '../monitoring/types/RiskReport.js';
import type { AnomalyRule } from '../monitoring/types/AnomalyScores.js';
import { ANOMALY_RULES } from '../monitoring/types/AnomalyScores.js';

/** A sub-score above this counts as one anomaly */
export const ANOMALY_COUNT_THRESHOLD = 50;

export type AnomalyCounts = Record<AnomalyRule, number>;

export interface SessionRiskSummary {
    sessionId: string;
    riskCount: number;
    averageRisk: number;
    maxRisk: number;
    minRisk: number;
    anomalyCounts: AnomalyCounts;
}

interface SessionAggregate {
    count: number;
    total: number;
    max: number;
    min: number;
    anomalyCounts: AnomalyCounts;
}

/**
 * In-memory per-session statistics over accepted reports
 */
export class RiskAggregator {
    private sessions: Map<string, SessionAggregate> = new Map();

    add(report: RiskReport): void {
        let aggregate = this.sessions.get(report.sessionId);
        if (!aggregate) {
            aggregate = {
                count: 0,
                total: 0,
                max: -Infinity,
                min: Infinity,
                anomalyCounts: { idleBurst: 0, focusInstability: 0, behavioralDrift: 0 },
            };
            this.sessions.set(report.sessionId, aggregate);
        }

        aggregate.count++;
        aggregate.total += report.riskScore;
        aggregate.max = Math.max(aggregate.max, report.riskScore);
        aggregate.min = Math.min(aggregate.min, report.riskScore);

        for (const rule of ANOMALY_RULES) {
            if (report.anomalyScores[rule] > ANOMALY_COUNT_THRESHOLD) {
                aggregate.anomalyCounts[rule]++;
            }
        }
    }

    addAll(reports: Iterable<RiskReport>): void {
        for (const report of reports) {
            this.add(report);
        }
    }

    getSessionSummary(sessionId: string): SessionRiskSummary | undefined {
        const aggregate = this.sessions.get(sessionId);
        if (!aggregate || aggregate.count === 0) {
            return undefined;
        }

        return {
            sessionId,
            riskCount: aggregate.count,
            averageRisk: aggregate.total / aggregate.count,
            maxRisk: aggregate.max,
            minRisk: aggregate.min,
            anomalyCounts: { ...aggregate.anomalyCounts },
        };
    }

    resetSession(sessionId: string): void {
        this.sessions.delete(sessionId);
    }

    get sessionCount(): number {
        return this.sessions.size;
    }
}

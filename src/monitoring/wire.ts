import { z } from 'zod';
import type { RiskReport } from './types/RiskReport.js';
import { EventKind, type InteractionEvent } from './types/InteractionEvent.js';

export const DEFAULT_REPORT_SOURCE = 'pacewatch-client';

/**
 * JSON shape of a risk report as exchanged with the collector.
 * Range checks live in the collector's validator so that it can answer with
 * a precise reason; the schema only checks shape.
 */
export const anomalyScoresPayloadSchema = z.object({
    idle_burst: z.number().default(0),
    focus_instability: z.number().default(0),
    behavioral_drift: z.number().default(0),
    overall: z.number().default(0),
});

export const riskReportPayloadSchema = z.object({
    timestamp: z.number(),
    risk_score: z.number(),
    anomaly_scores: anomalyScoresPayloadSchema,
    session_id: z.string(),
    source: z.string().default(DEFAULT_REPORT_SOURCE),
});

export type RiskReportPayload = z.infer<typeof riskReportPayloadSchema>;

export function toRiskReportPayload(report: RiskReport): RiskReportPayload {
    return {
        timestamp: report.timestamp,
        risk_score: report.riskScore,
        anomaly_scores: {
            idle_burst: report.anomalyScores.idleBurst,
            focus_instability: report.anomalyScores.focusInstability,
            behavioral_drift: report.anomalyScores.behavioralDrift,
            overall: report.anomalyScores.overall,
        },
        session_id: report.sessionId,
        source: report.source,
    };
}

export function fromRiskReportPayload(payload: RiskReportPayload): RiskReport {
    return {
        timestamp: payload.timestamp,
        riskScore: payload.risk_score,
        anomalyScores: {
            idleBurst: payload.anomaly_scores.idle_burst,
            focusInstability: payload.anomaly_scores.focus_instability,
            behavioralDrift: payload.anomaly_scores.behavioral_drift,
            overall: payload.anomaly_scores.overall,
        },
        sessionId: payload.session_id,
        source: payload.source,
    };
}

const timestampSchema = z.number().finite();

/**
 * One interaction event per line, as written by an external capture process
 */
export const interactionEventLineSchema = z.discriminatedUnion('type', [
    z.object({
        type: z.enum([EventKind.KEY_PRESS, EventKind.KEY_RELEASE]),
        timestamp: timestampSchema,
    }),
    z.object({
        type: z.enum([EventKind.MOUSE_MOVE, EventKind.MOUSE_CLICK, EventKind.MOUSE_SCROLL]),
        timestamp: timestampSchema,
        x: z.number().int(),
        y: z.number().int(),
    }),
    z.object({
        type: z.enum([EventKind.FOCUS_LOST, EventKind.FOCUS_GAINED]),
        timestamp: timestampSchema,
        lost_focus: z.boolean().optional(),
    }),
    z.object({
        type: z.enum([EventKind.IDLE_PERIOD, EventKind.IDLE_END]),
        timestamp: timestampSchema,
        duration: z.number().nonnegative(),
    }),
]);

export type InteractionEventLine = z.infer<typeof interactionEventLineSchema>;

export function fromInteractionEventLine(line: InteractionEventLine): InteractionEvent {
    switch (line.type) {
        case EventKind.KEY_PRESS:
        case EventKind.KEY_RELEASE:
            return { kind: line.type, timestamp: line.timestamp };
        case EventKind.MOUSE_MOVE:
        case EventKind.MOUSE_CLICK:
        case EventKind.MOUSE_SCROLL:
            return { kind: line.type, timestamp: line.timestamp, x: line.x, y: line.y };
        case EventKind.FOCUS_LOST:
        case EventKind.FOCUS_GAINED:
            return {
                kind: line.type,
                timestamp: line.timestamp,
                lostFocus: line.lost_focus ?? line.type === EventKind.FOCUS_LOST,
            };
        case EventKind.IDLE_PERIOD:
        case EventKind.IDLE_END:
            return { kind: line.type, timestamp: line.timestamp, duration: line.duration };
    }
}

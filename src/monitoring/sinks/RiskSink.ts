import type { RiskReport, SinkResult } from '../types/RiskReport.js';

/**
 * Destination of periodic risk reports. `send` reports failures through the
 * result and never rejects.
 */
export interface RiskReportSink {
    send(report: RiskReport): Promise<SinkResult>;
}

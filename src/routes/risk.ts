import { Router } from 'express';
import type { ZodIssue } from 'zod';
import { fromRiskReportPayload, riskReportPayloadSchema } from '../monitoring/wire.js';
import { toRiskRecordPayload } from '../collector/RiskRecordStore.js';
import type { CollectorContext } from '../collector/CollectorContext.js';

export const formatIssues = (issues: ZodIssue[]): string =>
  issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');

export function createRiskRouter({ store, aggregator, validator, metrics, logger }: CollectorContext): Router {
  const router = Router();

  router.post('/', (req, res) => {
    const parsed = riskReportPayloadSchema.safeParse(req.body);
    if (!parsed.success) {
      const detail = formatIssues(parsed.error.issues);
      metrics.recordReport({ status: 'rejected', reason: detail });
      logger.warn('risk_payload_malformed', { detail });
      return res.status(400).json({ error: 'Invalid risk report', detail });
    }

    const report = fromRiskReportPayload(parsed.data);
    const validation = validator.validate(report);
    if (!validation.valid) {
      metrics.recordReport({ status: 'rejected', reason: validation.reason });
      logger.warn('risk_report_rejected', { sessionId: report.sessionId, reason: validation.reason });
      return res.status(400).json({ error: 'Validation failed', detail: validation.reason });
    }

    const record = store.add(report);
    aggregator.add(report);
    metrics.recordReport({ status: 'accepted', recordId: record.id });
    logger.debug('risk_report_stored', { sessionId: report.sessionId, recordId: record.id, riskScore: report.riskScore });

    return res.status(200).json({
      received: true,
      record_id: record.id,
      message: 'Risk data stored successfully',
    });
  });

  router.get('/:sessionId', (req, res) => {
    const records = store.getBySession(req.params.sessionId);
    return res.status(200).json(records.map(toRiskRecordPayload));
  });

  return router;
}

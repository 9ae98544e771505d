import { Router } from 'express';
import type { CollectorContext } from '../collector/CollectorContext.js';

export function createSessionsRouter({ aggregator }: CollectorContext): Router {
  const router = Router();

  router.get('/:sessionId/summary', (req, res) => {
    const summary = aggregator.getSessionSummary(req.params.sessionId);
    if (!summary) {
      return res.status(404).json({ error: 'Session not found' });
    }

    return res.status(200).json({
      session_id: summary.sessionId,
      risk_count: summary.riskCount,
      average_risk: summary.averageRisk,
      max_risk: summary.maxRisk,
      min_risk: summary.minRisk,
      anomaly_counts: {
        idle_burst: summary.anomalyCounts.idleBurst,
        focus_instability: summary.anomalyCounts.focusInstability,
        behavioral_drift: summary.anomalyCounts.behavioralDrift,
      },
    });
  });

  return router;
}

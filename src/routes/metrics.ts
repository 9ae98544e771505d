import { Router } from 'express';
import type { CollectorContext } from '../collector/CollectorContext.js';

export function createMetricsRouter({ store, aggregator, metrics }: CollectorContext): Router {
  const router = Router();

  router.get('/', (req, res) => {
    const totals = metrics.getTotals();
    const realTime = metrics.getRealTimeMetrics();

    res.status(200).json({
      reports: {
        accepted: totals.reportsAccepted,
        rejected: totals.reportsRejected,
      },
      requests: {
        total: totals.requests,
        per_minute: realTime.requestsPerMinute,
      },
      records: store.size,
      sessions: aggregator.sessionCount,
      uptime_seconds: Math.round(process.uptime()),
    });
  });

  return router;
}

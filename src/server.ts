import helmet from 'helmet';
import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import { createRiskRouter } from './routes/risk.js';
import { createSessionsRouter } from './routes/sessions.js';
import { createMetricsRouter } from './routes/metrics.js';
import {
  createLimiter,
  DEFAULT_RATE_LIMIT,
  STRICT_RATE_LIMIT,
  type RateLimitOptions,
} from './middleware/rateLimiter.js';
import { RiskRecordStore } from './collector/RiskRecordStore.js';
import { RiskAggregator } from './collector/RiskAggregator.js';
import { RiskReportValidator } from './collector/RiskReportValidator.js';
import type { CollectorContext } from './collector/CollectorContext.js';
import { MetricsCollector } from './utils/logger/metricsCollector.js';
import { silentLogger, type MonitoringLogger } from './utils/logger/structuredLogger.js';

export interface CollectorContextOptions {
  /** JSON-lines file for stored records; in-memory only when omitted */
  recordsPath?: string;
  logger?: MonitoringLogger;
  metrics?: MetricsCollector;
}

/**
 * Build the collector's shared state, reloading persisted records
 */
export function createCollectorContext(options: CollectorContextOptions = {}): CollectorContext {
  const logger = options.logger ?? silentLogger;
  const store = new RiskRecordStore({ filePath: options.recordsPath, logger });
  store.load();

  const aggregator = new RiskAggregator();
  aggregator.addAll(store.all());

  return {
    store,
    aggregator,
    validator: new RiskReportValidator(),
    metrics: options.metrics ?? new MetricsCollector(),
    logger,
  };
}

export interface CreateAppOptions {
  rateLimit?: RateLimitOptions;
  metricsRateLimit?: RateLimitOptions;
}

export function createApp(context: CollectorContext, options: CreateAppOptions = {}): Express {
  const { logger, metrics } = context;
  const app = express();

  app.use(helmet());
  app.use(express.json());

  app.get('/api/health', (req, res) => {
    return res
      .status(200)
      .json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use(createLimiter(options.rateLimit ?? DEFAULT_RATE_LIMIT));

  app.use((req, res, next) => {
    const start = process.hrtime.bigint();
    res.on('finish', () => {
      const duration = Number(process.hrtime.bigint() - start) / 1_000_000;
      metrics.recordRequest();
      logger.debug('request_completed', {
        method: req.method,
        path: req.originalUrl,
        status: res.statusCode,
        durationMs: Number(duration.toFixed(2)),
      });
    });
    next();
  });

  app.use('/risk', createRiskRouter(context));
  app.use('/sessions', createSessionsRouter(context));
  app.use('/metrics', createLimiter(options.metricsRateLimit ?? STRICT_RATE_LIMIT), createMetricsRouter(context));

  app.use((req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      return next(error);
    }

    if (error instanceof SyntaxError) {
      return res.status(400).json({ error: 'Invalid JSON body' });
    }

    const err = error instanceof Error ? error : new Error(String(error));
    metrics.recordError(err, 'collector');
    logger.error('request_failed', { path: req.originalUrl, error: err });
    return res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}

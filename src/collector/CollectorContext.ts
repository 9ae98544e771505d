import type { RiskRecordStore } from './RiskRecordStore.js';
import type { RiskAggregator } from './RiskAggregator.js';
import type { RiskReportValidator } from './RiskReportValidator.js';
import type { MetricsCollector } from '../utils/logger/metricsCollector.js';
import type { MonitoringLogger } from '../utils/logger/structuredLogger.js';

/**
 * Everything the collector routes share
 */
export interface CollectorContext {
    store: RiskRecordStore;
    aggregator: RiskAggregator;
    validator: RiskReportValidator;
    metrics: MetricsCollector;
    logger: MonitoringLogger;
}

import 'dotenv/config';
import './utils/logger/fileLogger.js';
import path from 'path';
import type { Server } from 'http';
import { createApp, createCollectorContext } from './server.js';
import {
  ConfigurationError,
  getConfigurationManager,
  HttpRiskSink,
  MonitoringSession,
  runConcurrentSessions,
  StreamEventSource,
  SyntheticEventSource,
  type InteractionEventSource,
  type MonitoringConfig,
} from './monitoring/index.js';
import { MetricsCollector } from './utils/logger/metricsCollector.js';
import { createFileLogger, parseLogLevel, type StructuredLogger } from './utils/logger/structuredLogger.js';

type Mode = 'server' | 'client' | 'demo' | 'load';

const parseMode = (value: string | undefined): Mode => {
  switch (value) {
    case 'client':
    case 'demo':
    case 'load':
      return value;
    default:
      return 'server';
  }
};

const parsePositiveInt = (value: string | undefined, fallback: number): number => {
  const parsed = parseInt(value || '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

const PORT = parsePositiveInt(process.env.PORT, 8000);

const { logger, close: closeLog } = createFileLogger({
  level: parseLogLevel(process.env.LOG_LEVEL),
  console: process.env.LOG_CONSOLE === 'true',
});

function startCollector(pipelineLogger: StructuredLogger): Promise<Server> {
  const recordsPath =
    process.env.RISK_RECORDS_PATH ||
    path.resolve(process.env.DATA_DIR || path.resolve(process.cwd(), 'data'), 'risk_records.jsonl');

  const context = createCollectorContext({
    recordsPath,
    logger: pipelineLogger.child({ component: 'collector' }),
  });
  const app = createApp(context);

  return new Promise((resolve) => {
    const server = app.listen(PORT, () => {
      console.log(`Risk collector running on port ${PORT} (${context.store.size} stored records)`);
      resolve(server);
    });
  });
}

async function runClient(source: InteractionEventSource, sinkUrl?: string): Promise<void> {
  const configManager = getConfigurationManager();
  const config = configManager.getConfig();
  const metrics = new MetricsCollector();

  const sink = new HttpRiskSink({
    baseUrl: sinkUrl ?? config.reporting.sinkUrl,
    timeoutMs: config.reporting.sinkTimeoutMs,
    logger,
  });

  if (!(await sink.waitUntilHealthy(5, 1000))) {
    console.warn('Collector not reachable, reports will be dropped until it answers');
  }

  const session = new MonitoringSession({ config, source, sink, logger, metrics });
  console.log(`Monitoring session ${session.sessionId} started, calibrating for ${config.calibration.duration}s`);

  configManager.on('configChanged', (updated: MonitoringConfig) => {
    session.applyConfig(updated);
  });
  configManager.startWatching();

  const shutdown = () => {
    console.log('Stopping monitoring session...');
    session.stop().catch((error: unknown) => console.error('Failed to stop session:', error));
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  await session.run();
  await session.flush();

  configManager.stopWatching();
  metrics.stopPeriodicTasks();
  console.log('Session summary:', JSON.stringify(session.summary()));
}

async function runLoad(): Promise<void> {
  const config = getConfigurationManager().getConfig();
  const sessionCount = parsePositiveInt(process.env.PACEWATCH_LOAD_SESSIONS, 3);
  const durationSeconds = parsePositiveInt(process.env.PACEWATCH_LOAD_DURATION, 30);

  const sink = new HttpRiskSink({
    baseUrl: config.reporting.sinkUrl,
    timeoutMs: config.reporting.sinkTimeoutMs,
    logger,
  });

  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());

  console.log(`Starting load test with ${sessionCount} concurrent sessions for ${durationSeconds}s...`);
  const summaries = await runConcurrentSessions({
    sessionCount,
    durationSeconds,
    sink,
    config,
    logger,
    signal: controller.signal,
  });

  for (const summary of summaries) {
    console.log(
      `[Session ${summary.sessionId.slice(0, 8)}] sent ${summary.reportsAccepted} risk scores ` +
        `(${summary.reportsRejected} rejected, ${summary.reportsFailed} failed)`,
    );
  }
  console.log('Load test complete');
}

async function main(): Promise<void> {
  const mode = parseMode(process.env.PACEWATCH_MODE);

  switch (mode) {
    case 'server': {
      const server = await startCollector(logger);
      process.once('SIGINT', () => server.close());
      return;
    }
    case 'client': {
      await runClient(new StreamEventSource(process.stdin, { logger }));
      break;
    }
    case 'demo': {
      const server = await startCollector(logger);
      await runClient(new SyntheticEventSource({ logger }), `http://127.0.0.1:${PORT}`);
      server.close();
      break;
    }
    case 'load': {
      await runLoad();
      break;
    }
  }

  closeLog();
}

main().catch((error: unknown) => {
  if (error instanceof ConfigurationError) {
    console.error(`Invalid configuration (${error.field ?? 'unknown field'}): ${error.message}`);
  } else {
    console.error('Fatal error:', error);
  }
  closeLog();
  process.exitCode = 1;
});

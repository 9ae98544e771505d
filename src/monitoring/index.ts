export * from './types/index.js';
export { FeatureExtractor } from './FeatureExtractor.js';
export { BaselineBuilder } from './BaselineBuilder.js';
export { ActivityShiftDetector, clamp, CRITICAL_BAND, WARNING_BAND } from './ActivityShiftDetector.js';
export { RiskEngine, riskLevel } from './RiskEngine.js';
export { MonitoringSession } from './MonitoringSession.js';
export type { MonitoringSessionOptions, SessionSummary, StepResult } from './MonitoringSession.js';
export { runConcurrentSessions } from './LoadHarness.js';
export type { LoadHarnessOptions } from './LoadHarness.js';
export { ConfigurationManager, ConfigurationError, getConfigurationManager, initializeConfigurationManager } from './ConfigurationManager.js';
export {
    CircuitBreaker,
    CircuitBreakerState,
    MonitoringErrorHandler,
    MonitoringErrorType,
    OperationTimeoutError,
    PerformanceGuard,
} from './ErrorHandler.js';
export { EventChannel } from './sources/EventChannel.js';
export { SyntheticEventSource } from './sources/SyntheticEventSource.js';
export { StreamEventSource } from './sources/StreamEventSource.js';
export type { InteractionEventSource } from './sources/EventSource.js';
export { HttpRiskSink } from './sinks/HttpRiskSink.js';
export type { RiskReportSink } from './sinks/RiskSink.js';
export * from './wire.js';

import { EventEmitter } from 'events';
import {
    createDefaultConfig,
    type CalibrationConfig,
    type DetectionThresholds,
    type MonitoringConfig,
    type ReportingConfig,
    type RiskConfig,
    type RiskWeights,
} from './types/Configuration.js';
import { silentLogger, type MonitoringLogger } from '../utils/logger/structuredLogger.js';

/**
 * Configuration validation error
 */
export class ConfigurationError extends Error {
    constructor(message: string, public field?: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

/**
 * Partial update accepted by `updateConfig`; nested sections merge
 */
export interface MonitoringConfigUpdate {
    windowDuration?: number;
    calibration?: Partial<CalibrationConfig>;
    detection?: Partial<DetectionThresholds>;
    risk?: Partial<Omit<RiskConfig, 'weights'>> & { weights?: Partial<RiskWeights> };
    reporting?: Partial<ReportingConfig>;
}

export const ENV_PREFIX = 'PACEWATCH_';

interface EnvBinding {
    name: string;
    field: string;
    apply: (config: MonitoringConfig, value: number) => void;
}

const NUMERIC_BINDINGS: EnvBinding[] = [
    { name: 'WINDOW_DURATION', field: 'windowDuration', apply: (c, v) => { c.windowDuration = v; } },
    { name: 'CALIBRATION_DURATION', field: 'calibration.duration', apply: (c, v) => { c.calibration.duration = v; } },
    { name: 'MIN_CALIBRATION_SAMPLES', field: 'calibration.minSamples', apply: (c, v) => { c.calibration.minSamples = v; } },
    { name: 'EARLY_CALIBRATION_FRACTION', field: 'calibration.earlyConvergenceFraction', apply: (c, v) => { c.calibration.earlyConvergenceFraction = v; } },
    { name: 'SMOOTHING_WINDOW', field: 'risk.smoothingWindow', apply: (c, v) => { c.risk.smoothingWindow = v; } },
    { name: 'IDLE_MULTIPLIER', field: 'detection.idleMultiplier', apply: (c, v) => { c.detection.idleMultiplier = v; } },
    { name: 'TYPING_MULTIPLIER', field: 'detection.typingMultiplier', apply: (c, v) => { c.detection.typingMultiplier = v; } },
    { name: 'FOCUS_MULTIPLIER', field: 'detection.focusMultiplier', apply: (c, v) => { c.detection.focusMultiplier = v; } },
    { name: 'DRIFT_THRESHOLD', field: 'detection.driftThreshold', apply: (c, v) => { c.detection.driftThreshold = v; } },
    { name: 'IDLE_SCALE', field: 'detection.idleScale', apply: (c, v) => { c.detection.idleScale = v; } },
    { name: 'FOCUS_SCALE', field: 'detection.focusScale', apply: (c, v) => { c.detection.focusScale = v; } },
    { name: 'DRIFT_SCALE', field: 'detection.driftScale', apply: (c, v) => { c.detection.driftScale = v; } },
    { name: 'WEIGHT_IDLE_BURST', field: 'risk.weights.idleBurst', apply: (c, v) => { c.risk.weights.idleBurst = v; } },
    { name: 'WEIGHT_FOCUS_INSTABILITY', field: 'risk.weights.focusInstability', apply: (c, v) => { c.risk.weights.focusInstability = v; } },
    { name: 'WEIGHT_BEHAVIORAL_DRIFT', field: 'risk.weights.behavioralDrift', apply: (c, v) => { c.risk.weights.behavioralDrift = v; } },
    { name: 'POLL_INTERVAL_MS', field: 'reporting.pollIntervalMs', apply: (c, v) => { c.reporting.pollIntervalMs = v; } },
    { name: 'REPORT_INTERVAL', field: 'reporting.reportInterval', apply: (c, v) => { c.reporting.reportInterval = v; } },
    { name: 'DRAIN_TIMEOUT_MS', field: 'reporting.drainTimeoutMs', apply: (c, v) => { c.reporting.drainTimeoutMs = v; } },
    { name: 'SINK_TIMEOUT_MS', field: 'reporting.sinkTimeoutMs', apply: (c, v) => { c.reporting.sinkTimeoutMs = v; } },
];

/**
 * Configuration manager for the monitoring pipeline.
 * Handles environment variable loading, validation, and hot-reloading.
 */
export class ConfigurationManager extends EventEmitter {
    private config: MonitoringConfig;
    private watchInterval?: NodeJS.Timeout;
    private readonly env: NodeJS.ProcessEnv;
    private readonly logger: MonitoringLogger;

    constructor(env: NodeJS.ProcessEnv = process.env, logger: MonitoringLogger = silentLogger) {
        super();
        this.env = env;
        this.logger = logger;
        this.config = this.loadConfiguration();
    }

    /**
     * Get a copy of the current configuration
     */
    getConfig(): MonitoringConfig {
        return cloneConfig(this.config);
    }

    /**
     * Update configuration and emit change event
     */
    updateConfig(update: MonitoringConfigUpdate): void {
        const mergedConfig = this.mergeConfig(this.config, update);
        this.validateConfiguration(mergedConfig);

        const oldConfig = this.config;
        this.config = mergedConfig;

        this.logger.info('configuration_updated', {
            changes: this.getConfigChanges(oldConfig, mergedConfig),
        });

        this.emit('configChanged', this.getConfig(), oldConfig);
    }

    /**
     * Start watching the environment for configuration changes (hot-reloading)
     */
    startWatching(intervalMs: number = 5000): void {
        if (this.watchInterval) {
            this.stopWatching();
        }

        this.watchInterval = setInterval(() => {
            this.reload();
        }, intervalMs);
        this.watchInterval.unref();

        this.logger.info('configuration_watch_started', { intervalMs });
    }

    /**
     * Re-read the environment and apply it when it differs. Invalid values
     * are logged and the current configuration is kept.
     */
    reload(): boolean {
        try {
            const newConfig = this.loadConfiguration();
            if (this.hasConfigChanged(this.config, newConfig)) {
                this.updateConfig(newConfig);
                return true;
            }
        } catch (error) {
            this.logger.error('configuration_reload_failed', { error });
        }
        return false;
    }

    /**
     * Stop watching for configuration changes
     */
    stopWatching(): void {
        if (this.watchInterval) {
            clearInterval(this.watchInterval);
            this.watchInterval = undefined;
            this.logger.info('configuration_watch_stopped');
        }
    }

    /**
     * Load configuration from environment variables and defaults
     */
    private loadConfiguration(): MonitoringConfig {
        const config = createDefaultConfig();
        this.loadFromEnvironment(config);
        this.validateConfiguration(config);
        return config;
    }

    private loadFromEnvironment(config: MonitoringConfig): void {
        for (const binding of NUMERIC_BINDINGS) {
            const raw = this.env[`${ENV_PREFIX}${binding.name}`];
            if (raw === undefined || raw.trim() === '') continue;

            const value = Number(raw);
            if (!Number.isFinite(value)) {
                throw new ConfigurationError(
                    `${ENV_PREFIX}${binding.name} must be a number, got "${raw}"`,
                    binding.field
                );
            }
            binding.apply(config, value);
        }

        const sinkUrl = this.env[`${ENV_PREFIX}SINK_URL`];
        if (sinkUrl !== undefined && sinkUrl.trim() !== '') {
            config.reporting.sinkUrl = sinkUrl.trim();
        }

        const source = this.env[`${ENV_PREFIX}SOURCE`];
        if (source !== undefined && source.trim() !== '') {
            config.reporting.source = source.trim();
        }
    }

    /**
     * Validate configuration values
     */
    validateConfiguration(config: MonitoringConfig): void {
        if (!(config.windowDuration > 0)) {
            throw new ConfigurationError('Window duration must be positive', 'windowDuration');
        }

        // Calibration
        const calibration = config.calibration;
        if (!(calibration.duration > 0)) {
            throw new ConfigurationError('Calibration duration must be positive', 'calibration.duration');
        }
        if (!Number.isInteger(calibration.minSamples) || calibration.minSamples < 1) {
            throw new ConfigurationError('Minimum calibration samples must be a positive integer', 'calibration.minSamples');
        }
        if (calibration.earlyConvergenceFraction < 0 || calibration.earlyConvergenceFraction > 1) {
            throw new ConfigurationError('Early calibration fraction must be between 0 and 1', 'calibration.earlyConvergenceFraction');
        }
        if (!Number.isInteger(calibration.fallbackMinSamples) || calibration.fallbackMinSamples < 1) {
            throw new ConfigurationError('Fallback sample count must be a positive integer', 'calibration.fallbackMinSamples');
        }

        // Detection
        const detection = config.detection;
        for (const key of ['idleMultiplier', 'typingMultiplier', 'focusMultiplier'] as const) {
            if (!(detection[key] > 0)) {
                throw new ConfigurationError(`${key} must be positive`, `detection.${key}`);
            }
        }
        if (detection.driftThreshold < 0) {
            throw new ConfigurationError('Drift threshold must be non-negative', 'detection.driftThreshold');
        }
        for (const key of ['idleScale', 'focusScale', 'driftScale'] as const) {
            if (detection[key] < 0 || detection[key] > 100) {
                throw new ConfigurationError(`${key} must be between 0 and 100`, `detection.${key}`);
            }
        }
        for (const key of ['idleBurstSlope', 'focusSlope', 'driftSlope'] as const) {
            if (detection[key] < 0) {
                throw new ConfigurationError(`${key} must be non-negative`, `detection.${key}`);
            }
        }

        // Risk weights
        const weights = config.risk.weights;
        for (const key of ['idleBurst', 'focusInstability', 'behavioralDrift'] as const) {
            // All weights positive: risk is 0 only when every sub-score is
            if (!(weights[key] > 0) || weights[key] > 1) {
                throw new ConfigurationError(`${key} weight must be in (0, 1]`, `risk.weights.${key}`);
            }
        }

        // Validate that weights sum to approximately 1
        const totalWeight = weights.idleBurst + weights.focusInstability + weights.behavioralDrift;
        if (Math.abs(totalWeight - 1.0) > 0.001) {
            throw new ConfigurationError(`Risk weights must sum to 1.0, got ${totalWeight}`, 'risk.weights');
        }

        if (!Number.isInteger(config.risk.smoothingWindow) || config.risk.smoothingWindow < 1) {
            throw new ConfigurationError('Smoothing window must be a positive integer', 'risk.smoothingWindow');
        }
        if (config.risk.latestWeight < 0 || config.risk.latestWeight > 1) {
            throw new ConfigurationError('Latest-sample weight must be between 0 and 1', 'risk.latestWeight');
        }

        // Reporting
        const reporting = config.reporting;
        if (!(reporting.pollIntervalMs > 0)) {
            throw new ConfigurationError('Poll interval must be positive', 'reporting.pollIntervalMs');
        }
        if (reporting.reportInterval < 0) {
            throw new ConfigurationError('Report interval must be non-negative', 'reporting.reportInterval');
        }
        if (reporting.drainTimeoutMs < 0) {
            throw new ConfigurationError('Drain timeout must be non-negative', 'reporting.drainTimeoutMs');
        }
        if (!(reporting.sinkTimeoutMs > 0)) {
            throw new ConfigurationError('Sink timeout must be positive', 'reporting.sinkTimeoutMs');
        }
        if (!isHttpUrl(reporting.sinkUrl)) {
            throw new ConfigurationError(`Sink URL is not a valid URL: ${reporting.sinkUrl}`, 'reporting.sinkUrl');
        }
        if (reporting.source.trim() === '') {
            throw new ConfigurationError('Report source must not be empty', 'reporting.source');
        }
    }

    /**
     * Merge configuration objects
     */
    private mergeConfig(base: MonitoringConfig, updates: MonitoringConfigUpdate): MonitoringConfig {
        return {
            windowDuration: updates.windowDuration ?? base.windowDuration,
            calibration: {
                ...base.calibration,
                ...updates.calibration,
                fallbackProfile: {
                    ...base.calibration.fallbackProfile,
                    ...updates.calibration?.fallbackProfile,
                },
            },
            detection: {
                ...base.detection,
                ...updates.detection,
            },
            risk: {
                ...base.risk,
                ...updates.risk,
                weights: {
                    ...base.risk.weights,
                    ...updates.risk?.weights,
                },
            },
            reporting: {
                ...base.reporting,
                ...updates.reporting,
            },
        };
    }

    private hasConfigChanged(oldConfig: MonitoringConfig, newConfig: MonitoringConfig): boolean {
        return JSON.stringify(oldConfig) !== JSON.stringify(newConfig);
    }

    /**
     * Changed leaf values keyed by dotted path, for logging
     */
    private getConfigChanges(
        oldConfig: MonitoringConfig,
        newConfig: MonitoringConfig
    ): Record<string, { from: unknown; to: unknown }> {
        const before = flatten(oldConfig);
        const after = flatten(newConfig);
        const changes: Record<string, { from: unknown; to: unknown }> = {};

        for (const [key, value] of Object.entries(after)) {
            if (before[key] !== value) {
                changes[key] = { from: before[key], to: value };
            }
        }
        return changes;
    }

    /**
     * Cleanup resources
     */
    destroy(): void {
        this.stopWatching();
        this.removeAllListeners();
    }
}

function flatten(value: object, prefix: string = ''): Record<string, unknown> {
    const out: Record<string, unknown> = {};
    for (const [key, child] of Object.entries(value)) {
        const path = prefix ? `${prefix}.${key}` : key;
        if (typeof child === 'object' && child !== null && !Array.isArray(child)) {
            Object.assign(out, flatten(child, path));
        } else {
            out[path] = child;
        }
    }
    return out;
}

function isHttpUrl(value: string): boolean {
    try {
        const url = new URL(value);
        return url.protocol === 'http:' || url.protocol === 'https:';
    } catch {
        return false;
    }
}

function cloneConfig(config: MonitoringConfig): MonitoringConfig {
    return {
        windowDuration: config.windowDuration,
        calibration: { ...config.calibration, fallbackProfile: { ...config.calibration.fallbackProfile } },
        detection: { ...config.detection },
        risk: { ...config.risk, weights: { ...config.risk.weights } },
        reporting: { ...config.reporting },
    };
}

// Singleton instance
let configManager: ConfigurationManager | null = null;

/**
 * Get the global configuration manager instance
 */
export function getConfigurationManager(): ConfigurationManager {
    if (!configManager) {
        configManager = new ConfigurationManager();
    }
    return configManager;
}

/**
 * Initialize configuration manager with a custom environment
 */
export function initializeConfigurationManager(
    env: NodeJS.ProcessEnv = process.env,
    logger: MonitoringLogger = silentLogger
): ConfigurationManager {
    if (configManager) {
        configManager.destroy();
    }
    configManager = new ConfigurationManager(env, logger);
    return configManager;
}

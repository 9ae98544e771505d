import {
  ConfigurationManager,
  ConfigurationError,
  getConfigurationManager,
  initializeConfigurationManager,
} from '../src/monitoring/ConfigurationManager.js';
import { DEFAULT_MONITORING_CONFIG, type MonitoringConfig } from '../src/monitoring/types/Configuration.js';
import { createRecordingLogger } from './helpers/recordingLogger.js';

describe('ConfigurationManager', () => {
  let configManager: ConfigurationManager;

  beforeEach(() => {
    configManager = new ConfigurationManager({});
  });

  afterEach(() => {
    configManager.destroy();
  });

  describe('constructor', () => {
    it('should initialize with default configuration', () => {
      expect(configManager.getConfig()).toEqual(DEFAULT_MONITORING_CONFIG);
    });

    it('should load configuration from environment variables', () => {
      const manager = new ConfigurationManager({
        PACEWATCH_WINDOW_DURATION: '45',
        PACEWATCH_CALIBRATION_DURATION: '120',
        PACEWATCH_WEIGHT_IDLE_BURST: '0.5',
        PACEWATCH_WEIGHT_FOCUS_INSTABILITY: '0.3',
        PACEWATCH_WEIGHT_BEHAVIORAL_DRIFT: '0.2',
        PACEWATCH_SINK_URL: 'https://collector.example.test',
        PACEWATCH_SOURCE: 'lab-7',
      });
      const config = manager.getConfig();

      expect(config.windowDuration).toBe(45);
      expect(config.calibration.duration).toBe(120);
      expect(config.risk.weights).toEqual({ idleBurst: 0.5, focusInstability: 0.3, behavioralDrift: 0.2 });
      expect(config.reporting.sinkUrl).toBe('https://collector.example.test');
      expect(config.reporting.source).toBe('lab-7');

      manager.destroy();
    });

    it('should ignore empty environment values', () => {
      const manager = new ConfigurationManager({ PACEWATCH_WINDOW_DURATION: '  ' });

      expect(manager.getConfig().windowDuration).toBe(30);
      manager.destroy();
    });

    it('should reject non-numeric environment values with the field name', () => {
      let caught: unknown;
      try {
        new ConfigurationManager({ PACEWATCH_REPORT_INTERVAL: 'often' });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ConfigurationError);
      if (caught instanceof ConfigurationError) {
        expect(caught.message).toBe('PACEWATCH_REPORT_INTERVAL must be a number, got "often"');
        expect(caught.field).toBe('reporting.reportInterval');
      }
    });
  });

  describe('getConfig', () => {
    it('should return a copy of the configuration', () => {
      const config1 = configManager.getConfig();
      const config2 = configManager.getConfig();

      expect(config1).toEqual(config2);
      expect(config1).not.toBe(config2);

      config1.risk.weights.idleBurst = 0.9;
      expect(configManager.getConfig().risk.weights.idleBurst).toBe(0.4);
    });
  });

  describe('updateConfig', () => {
    it('should update configuration and emit change event', () => {
      const listener = jest.fn((updated: MonitoringConfig, old: MonitoringConfig) => {
        expect(updated.reporting.reportInterval).toBe(10);
        expect(updated.detection.idleMultiplier).toBe(1.2);
        expect(old.reporting.reportInterval).toBe(5);
      });
      configManager.on('configChanged', listener);

      configManager.updateConfig({ reporting: { reportInterval: 10 } });

      expect(listener).toHaveBeenCalledTimes(1);
      expect(configManager.getConfig().reporting.reportInterval).toBe(10);
    });

    it('should log the changed fields', () => {
      const { logger, entries } = createRecordingLogger();
      const manager = new ConfigurationManager({}, logger);

      manager.updateConfig({ detection: { driftThreshold: 0.4 } });

      expect(entries).toEqual([
        {
          level: 'info',
          event: 'configuration_updated',
          data: { changes: { 'detection.driftThreshold': { from: 0.3, to: 0.4 } } },
        },
      ]);
      manager.destroy();
    });

    it('should keep the previous configuration when the update is invalid', () => {
      expect(() => configManager.updateConfig({ windowDuration: 0 })).toThrow('Window duration must be positive');
      expect(configManager.getConfig().windowDuration).toBe(30);
    });
  });

  describe('validateConfiguration', () => {
    const withChanges = (mutate: (config: MonitoringConfig) => void): MonitoringConfig => {
      const config = configManager.getConfig();
      mutate(config);
      return config;
    };

    it('should accept the defaults', () => {
      expect(() => configManager.validateConfiguration(configManager.getConfig())).not.toThrow();
    });

    it('should require weights to sum to 1', () => {
      const config = withChanges(c => {
        c.risk.weights.idleBurst = 0.5;
      });

      expect(() => configManager.validateConfiguration(config)).toThrow(ConfigurationError);
      expect(() => configManager.validateConfiguration(config)).toThrow(/^Risk weights must sum to 1.0, got 1.1/);
    });

    it('should reject weights above 1', () => {
      const config = withChanges(c => {
        c.risk.weights = { idleBurst: 1.2, focusInstability: -0.2, behavioralDrift: 0 };
      });

      expect(() => configManager.validateConfiguration(config)).toThrow('idleBurst weight must be in (0, 1]');
    });

    it('should reject a zero weight even when the weights sum to 1', () => {
      const config = withChanges(c => {
        c.risk.weights = { idleBurst: 0.6, focusInstability: 0.4, behavioralDrift: 0 };
      });

      let error: unknown;
      try {
        configManager.validateConfiguration(config);
      } catch (caught) {
        error = caught;
      }

      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toEqual(expect.objectContaining({
        message: 'behavioralDrift weight must be in (0, 1]',
        field: 'risk.weights.behavioralDrift',
      }));
    });

    it('should reject an early calibration fraction outside [0, 1]', () => {
      const config = withChanges(c => {
        c.calibration.earlyConvergenceFraction = 1.5;
      });

      expect(() => configManager.validateConfiguration(config)).toThrow(
        'Early calibration fraction must be between 0 and 1'
      );
    });

    it('should reject a fractional minimum sample count', () => {
      const config = withChanges(c => {
        c.calibration.minSamples = 2.5;
      });

      expect(() => configManager.validateConfiguration(config)).toThrow(
        'Minimum calibration samples must be a positive integer'
      );
    });

    it('should reject scales above 100', () => {
      const config = withChanges(c => {
        c.detection.focusScale = 120;
      });

      expect(() => configManager.validateConfiguration(config)).toThrow('focusScale must be between 0 and 100');
    });

    it('should reject a non-http sink URL', () => {
      const config = withChanges(c => {
        c.reporting.sinkUrl = 'ftp://collector.test';
      });

      expect(() => configManager.validateConfiguration(config)).toThrow(
        'Sink URL is not a valid URL: ftp://collector.test'
      );
    });

    it('should reject a non-positive poll interval', () => {
      const config = withChanges(c => {
        c.reporting.pollIntervalMs = 0;
      });

      expect(() => configManager.validateConfiguration(config)).toThrow('Poll interval must be positive');
    });
  });

  describe('reload', () => {
    it('should apply environment changes', () => {
      const env: NodeJS.ProcessEnv = {};
      const manager = new ConfigurationManager(env);
      const listener = jest.fn();
      manager.on('configChanged', listener);

      expect(manager.reload()).toBe(false);

      env.PACEWATCH_REPORT_INTERVAL = '2';
      expect(manager.reload()).toBe(true);
      expect(manager.getConfig().reporting.reportInterval).toBe(2);
      expect(listener).toHaveBeenCalledTimes(1);

      manager.destroy();
    });

    it('should keep the current configuration when the environment becomes invalid', () => {
      const env: NodeJS.ProcessEnv = {};
      const { logger, entries } = createRecordingLogger();
      const manager = new ConfigurationManager(env, logger);

      env.PACEWATCH_WINDOW_DURATION = '-5';

      expect(manager.reload()).toBe(false);
      expect(manager.getConfig().windowDuration).toBe(30);
      expect(entries.map(entry => entry.event)).toEqual(['configuration_reload_failed']);

      manager.destroy();
    });
  });

  describe('watching', () => {
    afterEach(() => {
      jest.useRealTimers();
    });

    it('should poll the environment on an interval', () => {
      jest.useFakeTimers();
      const env: NodeJS.ProcessEnv = {};
      const manager = new ConfigurationManager(env);

      manager.startWatching(1000);
      env.PACEWATCH_SMOOTHING_WINDOW = '5';
      jest.advanceTimersByTime(1000);

      expect(manager.getConfig().risk.smoothingWindow).toBe(5);

      manager.stopWatching();
      env.PACEWATCH_SMOOTHING_WINDOW = '7';
      jest.advanceTimersByTime(5000);

      expect(manager.getConfig().risk.smoothingWindow).toBe(5);
      manager.destroy();
    });
  });

  describe('singleton', () => {
    it('should return the same instance until reinitialized', () => {
      const first = getConfigurationManager();
      expect(getConfigurationManager()).toBe(first);

      const second = initializeConfigurationManager({ PACEWATCH_WINDOW_DURATION: '60' });

      expect(second).not.toBe(first);
      expect(getConfigurationManager()).toBe(second);
      expect(second.getConfig().windowDuration).toBe(60);
      second.destroy();
    });
  });
});

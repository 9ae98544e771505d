import { EventKind, type InteractionEvent } from './types/InteractionEvent.js';
import { createEmptyFeatureVector, type FeatureVector } from './types/FeatureVector.js';
import { silentLogger, type MonitoringLogger } from '../utils/logger/structuredLogger.js';

/**
 * Maintains a timestamp-ordered buffer of interaction events and computes
 * aggregate features over the trailing window on request.
 */
export class FeatureExtractor {
    private buffer: InteractionEvent[] = [];
    private readonly windowDuration: number;
    private readonly logger: MonitoringLogger;

    constructor(windowDuration: number = 30, logger: MonitoringLogger = silentLogger) {
        this.windowDuration = windowDuration;
        this.logger = logger;
    }

    /**
     * Insert an event, keeping the buffer sorted by timestamp.
     * In-order events are appended; late ones are placed by binary search
     * after any events sharing their timestamp.
     */
    addEvent(event: InteractionEvent): void {
        const last = this.buffer[this.buffer.length - 1];
        if (last === undefined || event.timestamp >= last.timestamp) {
            this.buffer.push(event);
            return;
        }

        const index = this.upperBound(event.timestamp);
        this.buffer.splice(index, 0, event);
        this.logger.debug('out_of_order_event', { kind: event.kind, timestamp: event.timestamp, index });
    }

    addEvents(events: Iterable<InteractionEvent>): void {
        for (const event of events) {
            this.addEvent(event);
        }
    }

    /**
     * Prune events older than the window and compute the feature vector
     * for the window ending at `now` (seconds).
     */
    computeFeatures(now: number = Date.now() / 1000): FeatureVector {
        this.prune(now);

        const windowStart = now - this.windowDuration;
        const features = createEmptyFeatureVector(windowStart, now);

        const pressTimestamps: number[] = [];
        const idleDurations: number[] = [];
        const mouseSamples: Array<{ timestamp: number; x: number; y: number }> = [];

        for (const event of this.buffer) {
            switch (event.kind) {
                case EventKind.KEY_PRESS:
                    pressTimestamps.push(event.timestamp);
                    break;
                case EventKind.IDLE_PERIOD:
                    idleDurations.push(event.duration);
                    break;
                case EventKind.FOCUS_LOST:
                    features.focusLossCount++;
                    break;
                case EventKind.MOUSE_MOVE:
                    mouseSamples.push({ timestamp: event.timestamp, x: event.x, y: event.y });
                    break;
                default:
                    break;
            }
        }

        // Keystrokes
        features.keyPressCount = pressTimestamps.length;
        if (pressTimestamps.length >= 2) {
            let intervalSum = 0;
            for (let i = 1; i < pressTimestamps.length; i++) {
                intervalSum += pressTimestamps[i] - pressTimestamps[i - 1];
            }
            features.interKeyInterval = intervalSum / (pressTimestamps.length - 1);

            const windowLength = now - windowStart;
            if (windowLength > 0) {
                features.avgTypingSpeed = (pressTimestamps.length / windowLength) * 60;
            }
        }

        // Idle
        if (idleDurations.length > 0) {
            features.avgIdleDuration = idleDurations.reduce((sum, d) => sum + d, 0) / idleDurations.length;
        }

        // Mouse
        if (mouseSamples.length >= 2) {
            let distance = 0;
            for (let i = 1; i < mouseSamples.length; i++) {
                const dx = mouseSamples[i].x - mouseSamples[i - 1].x;
                const dy = mouseSamples[i].y - mouseSamples[i - 1].y;
                distance += Math.sqrt(dx * dx + dy * dy);
            }

            const timeSpan = mouseSamples[mouseSamples.length - 1].timestamp - mouseSamples[0].timestamp;
            if (timeSpan > 0) {
                features.avgMouseSpeed = distance / timeSpan;
            }
        }

        return features;
    }

    /**
     * Number of buffered events
     */
    get size(): number {
        return this.buffer.length;
    }

    /**
     * Snapshot of the buffered events (for testing/debugging)
     */
    getBufferedEvents(): readonly InteractionEvent[] {
        return [...this.buffer];
    }

    clear(): void {
        this.buffer = [];
        this.logger.debug('feature_buffer_cleared');
    }

    /**
     * Drop every event with timestamp < now - windowDuration
     */
    private prune(now: number): void {
        const cutoff = now - this.windowDuration;
        const first = this.buffer[0];
        if (first === undefined || first.timestamp >= cutoff) return;

        const keepFrom = this.lowerBound(cutoff);
        this.buffer.splice(0, keepFrom);
    }

    /**
     * First index whose timestamp is >= `timestamp`
     */
    private lowerBound(timestamp: number): number {
        let low = 0;
        let high = this.buffer.length;
        while (low < high) {
            const mid = (low + high) >>> 1;
            if (this.buffer[mid].timestamp < timestamp) {
                low = mid + 1;
            } else {
                high = mid;
            }
        }
        return low;
    }

    /**
     * First index whose timestamp is > `timestamp`
     */
    private upperBound(timestamp: number): number {
        let low = 0;
        let high = this.buffer.length;
        while (low < high) {
            const mid = (low + high) >>> 1;
            if (this.buffer[mid].timestamp <= timestamp) {
                low = mid + 1;
            } else {
                high = mid;
            }
        }
        return low;
    }
}

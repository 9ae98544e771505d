import { EventKind, type InteractionEvent } from '../types/InteractionEvent.js';
import type { InteractionEventSource } from './EventSource.js';
import { DEFAULT_CHANNEL_CAPACITY, EventChannel } from './EventChannel.js';
import { silentLogger, type MonitoringLogger } from '../../utils/logger/structuredLogger.js';

export interface SyntheticEventSourceOptions {
    /** Mean delay between generation steps in milliseconds */
    meanEventIntervalMs?: number;
    /** Per-step chance (scaled by 0.1) of entering an idle period */
    idleProbability?: number;
    /** Share of steps producing a typing burst */
    typingBurstProbability?: number;
    /** Chance per idle step of the idle period ending */
    idleExitProbability?: number;
    screenWidth?: number;
    screenHeight?: number;
    /** Uniform random in [0, 1) */
    random?: () => number;
    /** Current time in seconds */
    clock?: () => number;
    capacity?: number;
    logger?: MonitoringLogger;
}

/**
 * Timer-driven generator of plausible interaction patterns for demos and
 * load tests: typing bursts, mouse moves, clicks and scrolls, idle periods
 * and focus changes. Synthetic data only; no system hooks.
 */
export class SyntheticEventSource implements InteractionEventSource {
    private readonly channel: EventChannel;
    private readonly meanEventIntervalMs: number;
    private readonly idleProbability: number;
    private readonly typingBurstProbability: number;
    private readonly idleExitProbability: number;
    private readonly screenWidth: number;
    private readonly screenHeight: number;
    private readonly random: () => number;
    private readonly clock: () => number;
    private readonly logger: MonitoringLogger;

    private timer?: NodeJS.Timeout;
    private running = false;
    private idleStartedAt?: number;
    private generated = 0;

    constructor(options: SyntheticEventSourceOptions = {}) {
        this.meanEventIntervalMs = options.meanEventIntervalMs ?? 200;
        this.idleProbability = options.idleProbability ?? 0.15;
        this.typingBurstProbability = options.typingBurstProbability ?? 0.3;
        this.idleExitProbability = options.idleExitProbability ?? 0.3;
        this.screenWidth = options.screenWidth ?? 1920;
        this.screenHeight = options.screenHeight ?? 1080;
        this.random = options.random ?? Math.random;
        this.clock = options.clock ?? (() => Date.now() / 1000);
        this.channel = new EventChannel(options.capacity ?? DEFAULT_CHANNEL_CAPACITY);
        this.logger = options.logger ?? silentLogger;
    }

    async start(): Promise<void> {
        if (this.running) return;
        this.running = true;
        this.scheduleNext();
        this.logger.info('synthetic_source_started', { meanEventIntervalMs: this.meanEventIntervalMs });
    }

    async stop(): Promise<void> {
        if (!this.running) return;
        this.running = false;
        clearTimeout(this.timer);
        this.timer = undefined;
        this.logger.info('synthetic_source_stopped', { generated: this.generated, dropped: this.channel.dropped });
    }

    getEvents(timeoutMs: number): Promise<InteractionEvent[]> {
        return this.channel.drain(timeoutMs);
    }

    get isRunning(): boolean {
        return this.running;
    }

    get inIdle(): boolean {
        return this.idleStartedAt !== undefined;
    }

    /**
     * Produce the events of one generation step and enqueue them
     */
    step(): InteractionEvent[] {
        const now = this.clock();
        const events: InteractionEvent[] = [];

        if (this.idleStartedAt !== undefined) {
            if (this.random() >= this.idleExitProbability) {
                return events;
            }
            const duration = now - this.idleStartedAt;
            events.push({ kind: EventKind.IDLE_PERIOD, timestamp: this.idleStartedAt, duration });
            events.push({ kind: EventKind.IDLE_END, timestamp: now, duration });
            this.idleStartedAt = undefined;
            this.logger.debug('synthetic_idle_ended', { duration });
        } else if (this.random() < this.idleProbability * 0.1) {
            this.idleStartedAt = now;
            this.logger.debug('synthetic_idle_started');
            return events;
        }

        const roll = this.random();
        if (roll < this.typingBurstProbability) {
            const keys = 1 + Math.floor(this.random() * 5);
            for (let i = 0; i < keys; i++) {
                const press = now + i * this.uniform(0.05, 0.15);
                const release = press + this.uniform(0.05, 0.1);
                events.push({ kind: EventKind.KEY_PRESS, timestamp: press });
                events.push({ kind: EventKind.KEY_RELEASE, timestamp: release });
            }
        } else if (roll < this.typingBurstProbability + 0.3) {
            events.push({ kind: EventKind.MOUSE_MOVE, timestamp: now, ...this.position() });
        } else if (roll < this.typingBurstProbability + 0.35) {
            events.push({ kind: EventKind.MOUSE_CLICK, timestamp: now, ...this.position() });
        } else if (roll < this.typingBurstProbability + 0.5) {
            events.push({ kind: EventKind.MOUSE_SCROLL, timestamp: now, ...this.position() });
        } else if (this.random() < 0.5) {
            events.push({ kind: EventKind.FOCUS_LOST, timestamp: now, lostFocus: true });
        } else {
            events.push({ kind: EventKind.FOCUS_GAINED, timestamp: now, lostFocus: false });
        }

        for (const event of events) {
            this.channel.push(event);
        }
        this.generated += events.length;
        return events;
    }

    private scheduleNext(): void {
        if (!this.running) return;

        // Exponentially distributed gaps
        const delay = Math.max(1, Math.round(-Math.log(1 - this.random()) * this.meanEventIntervalMs));
        this.timer = setTimeout(() => {
            this.step();
            this.scheduleNext();
        }, delay);
    }

    private uniform(min: number, max: number): number {
        return min + this.random() * (max - min);
    }

    private position(): { x: number; y: number } {
        return {
            x: Math.floor(this.random() * (this.screenWidth + 1)),
            y: Math.floor(this.random() * (this.screenHeight + 1)),
        };
    }
}

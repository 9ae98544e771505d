import readline from 'readline';
import type { Readable } from 'stream';
import type { InteractionEvent } from '../types/InteractionEvent.js';
import type { InteractionEventSource } from './EventSource.js';
import { DEFAULT_CHANNEL_CAPACITY, EventChannel } from './EventChannel.js';
import { fromInteractionEventLine, interactionEventLineSchema } from '../wire.js';
import { silentLogger, type MonitoringLogger } from '../../utils/logger/structuredLogger.js';

export interface StreamEventSourceOptions {
    capacity?: number;
    logger?: MonitoringLogger;
}

/**
 * Reads newline-delimited JSON events written by an external capture
 * process (stdin, a pipe or a file). Malformed lines are logged and skipped.
 */
export class StreamEventSource implements InteractionEventSource {
    private readonly input: Readable;
    private readonly channel: EventChannel;
    private readonly logger: MonitoringLogger;
    private reader?: readline.Interface;
    private accepted = 0;
    private skipped = 0;
    private ended = false;

    constructor(input: Readable, options: StreamEventSourceOptions = {}) {
        this.input = input;
        this.channel = new EventChannel(options.capacity ?? DEFAULT_CHANNEL_CAPACITY);
        this.logger = options.logger ?? silentLogger;
        this.input.on('error', error => {
            this.logger.error('event_stream_error', { error });
        });
    }

    async start(): Promise<void> {
        if (this.reader || this.ended) return;

        const reader = readline.createInterface({ input: this.input, crlfDelay: Infinity });
        reader.on('line', line => this.handleLine(line));
        reader.on('close', () => {
            // close() from stop() is not the end of the input
            if (this.reader !== reader) return;
            this.reader = undefined;
            this.ended = true;
            this.channel.close();
            this.logger.info('event_stream_closed', { accepted: this.accepted, skipped: this.skipped });
        });
        this.reader = reader;

        this.logger.info('event_stream_started');
    }

    async stop(): Promise<void> {
        const reader = this.reader;
        this.reader = undefined;
        reader?.close();
    }

    getEvents(timeoutMs: number): Promise<InteractionEvent[]> {
        return this.channel.drain(timeoutMs);
    }

    /**
     * Whether the input has ended (no more events will arrive)
     */
    get isEnded(): boolean {
        return this.ended;
    }

    isExhausted(): boolean {
        return this.ended && this.channel.size === 0;
    }

    get stats(): { accepted: number; skipped: number; dropped: number } {
        return { accepted: this.accepted, skipped: this.skipped, dropped: this.channel.dropped };
    }

    private handleLine(line: string): void {
        const trimmed = line.trim();
        if (trimmed === '') return;

        let raw: unknown;
        try {
            raw = JSON.parse(trimmed);
        } catch (error) {
            this.skip('invalid_json', error instanceof Error ? error.message : String(error));
            return;
        }

        const parsed = interactionEventLineSchema.safeParse(raw);
        if (!parsed.success) {
            this.skip('invalid_event', parsed.error.issues.map(issue => issue.message).join('; '));
            return;
        }

        this.channel.push(fromInteractionEventLine(parsed.data));
        this.accepted++;
    }

    private skip(reason: string, detail: string): void {
        this.skipped++;
        this.logger.warn('event_line_skipped', { reason, detail });
    }
}

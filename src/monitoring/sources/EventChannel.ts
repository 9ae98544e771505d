import type { InteractionEvent } from '../types/InteractionEvent.js';

export const DEFAULT_CHANNEL_CAPACITY = 10000;

interface Waiter {
    resolve: (events: InteractionEvent[]) => void;
    timer: NodeJS.Timeout;
}

/**
 * Bounded producer/consumer handoff between an event producer and the
 * polling loop. When full, the oldest event is dropped.
 */
export class EventChannel {
    private buffer: InteractionEvent[] = [];
    private waiters: Waiter[] = [];
    private flushScheduled = false;
    private droppedCount = 0;
    private closed = false;
    private readonly capacity: number;

    constructor(capacity: number = DEFAULT_CHANNEL_CAPACITY) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new Error('Channel capacity must be a positive integer');
        }
        this.capacity = capacity;
    }

    /**
     * Enqueue an event. Returns false when the channel is closed.
     */
    push(event: InteractionEvent): boolean {
        if (this.closed) return false;

        this.buffer.push(event);
        if (this.buffer.length > this.capacity) {
            this.buffer.shift();
            this.droppedCount++;
        }

        // Deliver after the current synchronous batch of pushes
        if (this.waiters.length > 0 && !this.flushScheduled) {
            this.flushScheduled = true;
            void Promise.resolve().then(() => this.flush());
        }
        return true;
    }

    /**
     * Resolve immediately with everything buffered; when empty, wait up to
     * `timeoutMs` for the first event and return what was collected.
     */
    drain(timeoutMs: number = 0): Promise<InteractionEvent[]> {
        if (this.buffer.length > 0 || this.closed || timeoutMs <= 0) {
            return Promise.resolve(this.takeAll());
        }

        return new Promise(resolve => {
            const waiter: Waiter = {
                resolve,
                timer: setTimeout(() => {
                    this.waiters = this.waiters.filter(w => w !== waiter);
                    resolve(this.takeAll());
                }, timeoutMs),
            };
            this.waiters.push(waiter);
        });
    }

    /**
     * Stop accepting events and release pending consumers with what is left
     */
    close(): void {
        this.closed = true;
        const waiters = this.waiters;
        this.waiters = [];
        for (const waiter of waiters) {
            clearTimeout(waiter.timer);
            waiter.resolve(this.takeAll());
        }
    }

    get size(): number {
        return this.buffer.length;
    }

    /**
     * Events discarded because the channel was full
     */
    get dropped(): number {
        return this.droppedCount;
    }

    get isClosed(): boolean {
        return this.closed;
    }

    private flush(): void {
        this.flushScheduled = false;
        if (this.buffer.length === 0) return;

        const waiter = this.waiters.shift();
        if (!waiter) return;

        clearTimeout(waiter.timer);
        waiter.resolve(this.takeAll());
    }

    private takeAll(): InteractionEvent[] {
        const events = this.buffer;
        this.buffer = [];
        return events;
    }
}

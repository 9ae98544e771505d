import type { InteractionEvent } from '../types/InteractionEvent.js';

/**
 * Producer of interaction events polled by a monitoring session
 */
export interface InteractionEventSource {
    start(): Promise<void>;
    stop(): Promise<void>;
    /**
     * Everything buffered, or whatever arrives within `timeoutMs` when the
     * buffer is empty. May resolve with an empty list; never rejects.
     */
    getEvents(timeoutMs: number): Promise<InteractionEvent[]>;
    /**
     * True once the source has ended and every event was handed out. The
     * polling loop exits after the tick that sees it.
     */
    isExhausted?(): boolean;
}

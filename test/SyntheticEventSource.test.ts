import { describe, it, expect, afterEach, jest } from '@jest/globals';
import { SyntheticEventSource } from '../src/monitoring/sources/SyntheticEventSource.js';
import { EventKind } from '../src/monitoring/types/InteractionEvent.js';

/** Random source replaying `values`, then repeating the last one */
function scripted(values: number[]): () => number {
    let index = 0;
    return () => values[Math.min(index++, values.length - 1)];
}

describe('SyntheticEventSource', () => {
    afterEach(() => {
        jest.useRealTimers();
    });

    describe('step', () => {
        it('should emit a mouse move at a screen position', () => {
            const source = new SyntheticEventSource({ random: () => 0.5, clock: () => 100 });

            expect(source.step()).toEqual([{ kind: EventKind.MOUSE_MOVE, timestamp: 100, x: 960, y: 540 }]);
        });

        it('should emit a typing burst of press and release pairs', () => {
            const source = new SyntheticEventSource({ random: () => 0.2, clock: () => 100 });

            const events = source.step();

            expect(events.map(e => e.kind)).toEqual([
                EventKind.KEY_PRESS,
                EventKind.KEY_RELEASE,
                EventKind.KEY_PRESS,
                EventKind.KEY_RELEASE,
            ]);
            expect(events[0].timestamp).toBe(100);
            expect(events[1].timestamp).toBeCloseTo(100.06);
            expect(events[2].timestamp).toBeCloseTo(100.07);
            expect(events[3].timestamp).toBeCloseTo(100.13);
        });

        it('should emit clicks, scrolls and focus changes for higher rolls', () => {
            const click = new SyntheticEventSource({ random: () => 0.62, clock: () => 5 });
            const scroll = new SyntheticEventSource({ random: () => 0.7, clock: () => 5 });
            const focus = new SyntheticEventSource({ random: () => 0.9, clock: () => 5 });

            expect(click.step().map(e => e.kind)).toEqual([EventKind.MOUSE_CLICK]);
            expect(scroll.step()).toEqual([{ kind: EventKind.MOUSE_SCROLL, timestamp: 5, x: 1344, y: 756 }]);
            expect(focus.step()).toEqual([{ kind: EventKind.FOCUS_GAINED, timestamp: 5, lostFocus: false }]);
        });

        it('should report an idle period with its real duration when it ends', () => {
            const times = [10, 11, 15];
            let tick = 0;
            const source = new SyntheticEventSource({
                random: scripted([0.001, 0.9, 0.1, 0.5]),
                clock: () => times[Math.min(tick++, times.length - 1)],
            });

            expect(source.step()).toEqual([]);
            expect(source.inIdle).toBe(true);
            expect(source.step()).toEqual([]);

            expect(source.step()).toEqual([
                { kind: EventKind.IDLE_PERIOD, timestamp: 10, duration: 5 },
                { kind: EventKind.IDLE_END, timestamp: 15, duration: 5 },
                { kind: EventKind.MOUSE_MOVE, timestamp: 15, x: 960, y: 540 },
            ]);
            expect(source.inIdle).toBe(false);
        });

        it('should queue generated events for the consumer', async () => {
            const source = new SyntheticEventSource({ random: () => 0.5, clock: () => 1 });
            source.step();
            source.step();

            expect(await source.getEvents(0)).toHaveLength(2);
        });
    });

    describe('timer loop', () => {
        it('should generate on exponentially distributed delays until stopped', async () => {
            jest.useFakeTimers();
            const source = new SyntheticEventSource({ random: () => 0.5, clock: () => 1 });

            await source.start();
            expect(source.isRunning).toBe(true);

            // -ln(0.5) * 200 ms rounds to 139 ms
            jest.advanceTimersByTime(138);
            expect(await source.getEvents(0)).toEqual([]);
            jest.advanceTimersByTime(1);
            expect(await source.getEvents(0)).toHaveLength(1);

            await source.stop();
            jest.advanceTimersByTime(1000);

            expect(await source.getEvents(0)).toEqual([]);
            expect(source.isRunning).toBe(false);
        });
    });
});

import { describe, it, expect, beforeEach } from '@jest/globals';
import { FeatureExtractor } from '../src/monitoring/FeatureExtractor.js';
import {
    EventKind,
    focusGained,
    focusLost,
    idlePeriod,
    keyPress,
    keyRelease,
    mouseMove,
} from '../src/monitoring/types/InteractionEvent.js';

describe('FeatureExtractor', () => {
    let extractor: FeatureExtractor;

    beforeEach(() => {
        extractor = new FeatureExtractor(30);
    });

    describe('computeFeatures', () => {
        it('should return an all-zero vector for an empty buffer', () => {
            const features = extractor.computeFeatures(100);

            expect(features).toEqual({
                avgTypingSpeed: 0,
                avgIdleDuration: 0,
                focusLossCount: 0,
                avgMouseSpeed: 0,
                interKeyInterval: 0,
                keyPressCount: 0,
                windowStart: 70,
                windowEnd: 100,
            });
        });

        it('should compute typing speed and inter-key interval from key presses', () => {
            extractor.addEvents([keyPress(71), keyRelease(71.1), keyPress(72), keyPress(73), keyPress(74)]);

            const features = extractor.computeFeatures(100);

            expect(features.keyPressCount).toBe(4);
            expect(features.interKeyInterval).toBeCloseTo(1);
            expect(features.avgTypingSpeed).toBeCloseTo(8); // 4 presses / 30 s * 60
        });

        it('should leave typing features at zero with a single key press', () => {
            extractor.addEvent(keyPress(90));

            const features = extractor.computeFeatures(100);

            expect(features.keyPressCount).toBe(1);
            expect(features.avgTypingSpeed).toBe(0);
            expect(features.interKeyInterval).toBe(0);
        });

        it('should average idle_period durations and ignore idle_end', () => {
            extractor.addEvents([
                idlePeriod(80, 4),
                idlePeriod(85, 2),
                { kind: EventKind.IDLE_END, timestamp: 87, duration: 10 },
            ]);

            expect(extractor.computeFeatures(100).avgIdleDuration).toBe(3);
        });

        it('should count only focus_lost events', () => {
            extractor.addEvents([focusLost(80), focusGained(81), focusLost(90)]);

            expect(extractor.computeFeatures(100).focusLossCount).toBe(2);
        });

        it('should compute mouse speed from consecutive moves', () => {
            extractor.addEvents([mouseMove(90, 0, 0), mouseMove(92, 3, 4), mouseMove(94, 6, 8)]);

            // 10 px over 4 s
            expect(extractor.computeFeatures(100).avgMouseSpeed).toBe(2.5);
        });

        it('should report zero mouse speed when all moves share a timestamp', () => {
            extractor.addEvents([mouseMove(90, 0, 0), mouseMove(90, 30, 40)]);

            expect(extractor.computeFeatures(100).avgMouseSpeed).toBe(0);
        });

        it('should ignore clicks and scrolls for mouse speed', () => {
            extractor.addEvents([
                mouseMove(90, 0, 0),
                { kind: EventKind.MOUSE_CLICK, timestamp: 91, x: 500, y: 500 },
                mouseMove(92, 0, 10),
            ]);

            expect(extractor.computeFeatures(100).avgMouseSpeed).toBe(5);
        });
    });

    describe('pruning', () => {
        it('should drop events older than the window and keep the boundary', () => {
            extractor.addEvents([keyPress(50), keyPress(70), keyPress(80)]);

            extractor.computeFeatures(100);

            expect(extractor.size).toBe(2);
            expect(extractor.getBufferedEvents().map(e => e.timestamp)).toEqual([70, 80]);
        });

        it('should never keep events older than now - windowDuration after a query', () => {
            for (let t = 0; t < 200; t += 7) {
                extractor.addEvent(keyPress(t));
            }

            extractor.computeFeatures(150);

            expect(extractor.getBufferedEvents().every(e => e.timestamp >= 120)).toBe(true);
        });
    });

    describe('addEvent ordering', () => {
        it('should insert late events in timestamp order', () => {
            extractor.addEvents([keyPress(10), keyPress(12), keyPress(11)]);

            expect(extractor.getBufferedEvents().map(e => e.timestamp)).toEqual([10, 11, 12]);
        });

        it('should place a late event after buffered events with the same timestamp', () => {
            const first = keyPress(10);
            const later = keyPress(12);
            const sameTime = focusLost(10);
            extractor.addEvents([first, later, sameTime]);

            expect(extractor.getBufferedEvents()).toEqual([first, sameTime, later]);
        });

        it('should keep duplicates', () => {
            extractor.addEvents([keyPress(5), keyPress(5)]);

            expect(extractor.size).toBe(2);
        });
    });

    it('should empty the buffer on clear', () => {
        extractor.addEvents([keyPress(1), keyPress(2)]);
        extractor.clear();

        expect(extractor.size).toBe(0);
    });
});

import { describe, it, expect, beforeEach } from '@jest/globals';
import { BaselineBuilder } from '../src/monitoring/BaselineBuilder.js';
import type { FeatureVector } from '../src/monitoring/types/FeatureVector.js';

function sample(
    t: number,
    values: { speed?: number; keys?: number; idle?: number; focus?: number } = {}
): FeatureVector {
    return {
        avgTypingSpeed: values.speed ?? 0,
        avgIdleDuration: values.idle ?? 0,
        focusLossCount: values.focus ?? 0,
        avgMouseSpeed: 0,
        interKeyInterval: 0,
        keyPressCount: values.keys ?? 0,
        windowStart: t - 30,
        windowEnd: t,
    };
}

const typing = { speed: 60, keys: 30, idle: 2, focus: 1 };

describe('BaselineBuilder', () => {
    let builder: BaselineBuilder;

    beforeEach(() => {
        builder = new BaselineBuilder();
    });

    it('should start uninitialized with no baseline', () => {
        expect(builder.calibrationState.status).toBe('uninitialized');
        expect(builder.baseline).toBeUndefined();
        expect(builder.calibrationProgress()).toBe(0);
    });

    it('should begin calibrating on the first update without recording it', () => {
        builder.update(sample(0, typing), 0);

        expect(builder.calibrationState.status).toBe('calibrating');
        expect(builder.sampleCount).toBe(0);
    });

    describe('early convergence', () => {
        it('should calibrate once enough samples with typing evidence exist past half the duration', () => {
            builder.update(sample(0, typing), 0);
            for (const t of [20, 40, 60, 80]) {
                builder.update(sample(t, typing), t);
            }
            expect(builder.isCalibrated).toBe(false);

            builder.update(sample(100, typing), 100);

            expect(builder.isCalibrated).toBe(true);
            expect(builder.baseline).toEqual({
                avgTypingSpeed: 60,
                avgIdleDuration: 2,
                avgFocusRate: 2, // 1 loss per 30 s window
            });
        });

        it('should not calibrate before half the duration has elapsed', () => {
            builder.update(sample(0, typing), 0);
            for (const t of [10, 20, 30, 40, 50, 60]) {
                builder.update(sample(t, typing), t);
            }

            expect(builder.isCalibrated).toBe(false);
            expect(builder.sampleCount).toBe(6);
        });

        it('should not calibrate early with fewer than the minimum samples', () => {
            builder.update(sample(0, typing), 0);
            for (const t of [120, 140, 160, 175]) {
                builder.update(sample(t, typing), t);
            }

            expect(builder.sampleCount).toBe(4);
            expect(builder.isCalibrated).toBe(false);

            builder.update(sample(178, typing), 178);

            expect(builder.isCalibrated).toBe(true);
        });

        it('should not calibrate early without typing evidence', () => {
            builder.update(sample(0), 0);
            for (const t of [20, 40, 60, 80, 100, 120]) {
                builder.update(sample(t, { speed: 4, keys: 2, idle: 1 }), t);
            }

            expect(builder.isCalibrated).toBe(false);
        });
    });

    describe('forced calibration', () => {
        it('should freeze the fallback profile when no samples were collected', () => {
            builder.update(sample(0), 0);
            builder.update(sample(200), 200);

            const state = builder.calibrationState;
            expect(state.status).toBe('calibrated');
            if (state.status === 'calibrated') {
                expect(state.fallback).toBe(true);
                expect(state.calibratedAt).toBe(200);
            }
            expect(builder.baseline).toEqual({ avgTypingSpeed: 150, avgIdleDuration: 2, avgFocusRate: 0.5 });
        });

        it('should average only samples with typing activity', () => {
            builder.update(sample(0), 0);
            builder.update(sample(30, { speed: 100, keys: 50, idle: 2 }), 30);
            builder.update(sample(60, { idle: 10 }), 60);

            builder.update(sample(200), 200);

            expect(builder.baseline).toEqual({ avgTypingSpeed: 100, avgIdleDuration: 2, avgFocusRate: 0 });
        });

        it('should defer until enough samples exist when none show typing', () => {
            builder.update(sample(0), 0);
            for (let t = 30; t <= 300; t += 30) {
                builder.update(sample(t, { idle: 3 }), t);
            }
            expect(builder.isCalibrated).toBe(false);
            expect(builder.sampleCount).toBe(10);

            builder.update(sample(330, { idle: 3 }), 330);

            const state = builder.calibrationState;
            expect(state.status).toBe('calibrated');
            if (state.status === 'calibrated') {
                expect(state.calibratedAt).toBe(330);
                expect(state.fallback).toBe(false);
            }
            expect(builder.baseline).toEqual({ avgTypingSpeed: 0, avgIdleDuration: 3, avgFocusRate: 0 });
        });
    });

    it('should ignore updates once calibrated and freeze the profile', () => {
        builder.update(sample(0), 0);
        builder.update(sample(200), 200);
        const profile = builder.baseline;

        builder.update(sample(230, { speed: 500, keys: 250 }), 230);

        expect(builder.baseline).toBe(profile);
        expect(Object.isFrozen(profile)).toBe(true);
    });

    it('should report progress against the calibration duration', () => {
        builder.update(sample(0), 0);
        builder.update(sample(45), 45);

        expect(builder.calibrationProgress()).toBe(25);
        expect(builder.calibrationProgress(90)).toBe(50);
        expect(builder.calibrationProgress(1000)).toBe(100);
    });

    it('should honour a custom calibration config', () => {
        const quick = new BaselineBuilder({ duration: 20, minSamples: 2 });
        quick.update(sample(0, typing), 0);
        quick.update(sample(5, typing), 5);
        quick.update(sample(10, typing), 10);

        expect(quick.isCalibrated).toBe(true);
    });

    it('should return to uninitialized on reset', () => {
        builder.update(sample(0), 0);
        builder.update(sample(200), 200);

        builder.reset();

        expect(builder.calibrationState.status).toBe('uninitialized');
        expect(builder.baseline).toBeUndefined();
        expect(builder.sampleCount).toBe(0);
    });
});

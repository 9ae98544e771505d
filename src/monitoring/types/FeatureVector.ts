/**
 * Aggregate snapshot of one sliding window of interaction events
 */
export interface FeatureVector {
    /** Key presses per minute */
    avgTypingSpeed: number;
    /** Mean idle period duration in seconds */
    avgIdleDuration: number;
    /** Number of focus-lost events in the window */
    focusLossCount: number;
    /** Pointer travel in pixels per second */
    avgMouseSpeed: number;
    /** Mean time between consecutive key presses in seconds */
    interKeyInterval: number;
    /** Number of key presses in the window */
    keyPressCount: number;
    /** Window start in seconds */
    windowStart: number;
    /** Window end in seconds */
    windowEnd: number;
}

export function createEmptyFeatureVector(windowStart = 0, windowEnd = 0): FeatureVector {
    return {
        avgTypingSpeed: 0,
        avgIdleDuration: 0,
        focusLossCount: 0,
        avgMouseSpeed: 0,
        interKeyInterval: 0,
        keyPressCount: 0,
        windowStart,
        windowEnd,
    };
}

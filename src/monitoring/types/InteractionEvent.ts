/**
 * Kinds of interaction events. Timing metadata only: no key identity,
 * window title or application name is ever carried.
 */
export enum EventKind {
    KEY_PRESS = 'key_press',
    KEY_RELEASE = 'key_release',
    MOUSE_MOVE = 'mouse_move',
    MOUSE_CLICK = 'mouse_click',
    MOUSE_SCROLL = 'mouse_scroll',
    FOCUS_LOST = 'focus_lost',
    FOCUS_GAINED = 'focus_gained',
    IDLE_PERIOD = 'idle_period',
    IDLE_END = 'idle_end',
}

/**
 * Keystroke press or release
 */
export interface KeystrokeEvent {
    readonly kind: EventKind.KEY_PRESS | EventKind.KEY_RELEASE;
    /** Seconds, mostly monotonic */
    readonly timestamp: number;
}

/**
 * Pointer movement, click or scroll at screen coordinates
 */
export interface PointerEvent {
    readonly kind: EventKind.MOUSE_MOVE | EventKind.MOUSE_CLICK | EventKind.MOUSE_SCROLL;
    readonly timestamp: number;
    readonly x: number;
    readonly y: number;
}

/**
 * Window focus change
 */
export interface FocusEvent {
    readonly kind: EventKind.FOCUS_LOST | EventKind.FOCUS_GAINED;
    readonly timestamp: number;
    /** True when focus was lost, false when it was regained */
    readonly lostFocus: boolean;
}

/**
 * Start or end of an idle period
 */
export interface IdleEvent {
    readonly kind: EventKind.IDLE_PERIOD | EventKind.IDLE_END;
    readonly timestamp: number;
    /** Idle duration in seconds */
    readonly duration: number;
}

export type InteractionEvent = KeystrokeEvent | PointerEvent | FocusEvent | IdleEvent;

export function keyPress(timestamp: number): KeystrokeEvent {
    return { kind: EventKind.KEY_PRESS, timestamp };
}

export function keyRelease(timestamp: number): KeystrokeEvent {
    return { kind: EventKind.KEY_RELEASE, timestamp };
}

export function mouseMove(timestamp: number, x: number, y: number): PointerEvent {
    return { kind: EventKind.MOUSE_MOVE, timestamp, x: Math.round(x), y: Math.round(y) };
}

export function focusLost(timestamp: number): FocusEvent {
    return { kind: EventKind.FOCUS_LOST, timestamp, lostFocus: true };
}

export function focusGained(timestamp: number): FocusEvent {
    return { kind: EventKind.FOCUS_GAINED, timestamp, lostFocus: false };
}

export function idlePeriod(timestamp: number, duration: number): IdleEvent {
    return { kind: EventKind.IDLE_PERIOD, timestamp, duration };
}

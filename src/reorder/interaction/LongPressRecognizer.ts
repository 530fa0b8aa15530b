import {
    DEFAULT_LONG_PRESS_MS,
    LONG_PRESS_ALLOWABLE_MOVEMENT_PX,
    MOBILE_GESTURE_LOCK_CLASS,
} from '../core/constants';
import type { GestureRecognizerToggle } from './ReorderController';

const HAPTIC_PULSE_MS = 10;
const CAPTURE_ACTIVE = { passive: false, capture: true } as const;

export interface PressPoint {
    clientX: number;
    clientY: number;
    pointerType: string | null;
}

export type PressCancelReason = 'pointer_cancelled' | 'session_interrupted';

export interface LongPressHandlers {
    onBegan: (point: PressPoint) => void;
    onChanged: (point: PressPoint) => void;
    onEnded: (point: PressPoint) => void;
    onCancelled: (reason: PressCancelReason) => void;
}

export interface LongPressOptions {
    minimumPressMs: number;
    allowableMovementPx: number;
    hapticFeedback: boolean;
    /** Consulted on pointerdown; returning false leaves the press to the editor */
    shouldBegin?: (e: PointerEvent) => boolean;
}

type PendingPress = {
    pointerId: number;
    touch: boolean;
    startX: number;
    startY: number;
    latestX: number;
    latestY: number;
    timeoutId: number;
};

type RecognizedPress = {
    pointerId: number;
    touch: boolean;
    pointerType: string | null;
    captured: boolean;
};

type PressState =
    | { phase: 'idle' }
    | { phase: 'pending'; press: PendingPress }
    | { phase: 'recognized'; press: RecognizedPress };

// Editors share the body, so its lock class stays until every touch press has ended.
let bodyTouchLocks = 0;

function toPressPoint(e: PointerEvent): PressPoint {
    return { clientX: e.clientX, clientY: e.clientY, pointerType: e.pointerType || null };
}

function isTextEntry(el: HTMLElement): boolean {
    return el instanceof HTMLInputElement
        || el instanceof HTMLTextAreaElement
        || el.isContentEditable;
}

/**
 * Recognizes a press held in place on `target` and then reports the
 * pointer's movement until it is lifted.
 *
 * Touch presses lock scrolling and text selection on the page from
 * pointerdown until the press ends, and keep the soft keyboard closed.
 */
export class LongPressRecognizer implements GestureRecognizerToggle {
    private state: PressState = { phase: 'idle' };
    private enabled = false;
    private options: LongPressOptions;
    private sessionListening = false;
    private touchLocked = false;

    private readonly onTargetPointerDown = (e: PointerEvent) => this.handlePointerDown(e);
    private readonly onLostPointerCapture = (e: PointerEvent) => this.handleLostPointerCapture(e);
    private readonly onPointerMove = (e: PointerEvent) => this.handlePointerMove(e);
    private readonly onPointerUp = (e: PointerEvent) => this.handlePointerUp(e);
    private readonly onPointerCancel = (e: PointerEvent) => this.handlePointerCancel(e);
    private readonly onWindowBlur = () => this.interrupt();
    private readonly onVisibilityChange = () => {
        if (document.visibilityState === 'hidden') this.interrupt();
    };
    private readonly onTouchMove = (e: TouchEvent) => {
        if (e.cancelable) e.preventDefault();
    };
    private readonly onFocusIn = (e: FocusEvent) => {
        if (e.target instanceof HTMLElement) this.keepKeyboardClosed(e.target);
    };

    constructor(
        private readonly target: HTMLElement,
        private readonly handlers: LongPressHandlers,
        options: Partial<LongPressOptions> = {}
    ) {
        this.options = {
            minimumPressMs: DEFAULT_LONG_PRESS_MS,
            allowableMovementPx: LONG_PRESS_ALLOWABLE_MOVEMENT_PX,
            hapticFeedback: true,
            ...options,
        };
    }

    get isEnabled(): boolean {
        return this.enabled;
    }

    get phase(): PressState['phase'] {
        return this.state.phase;
    }

    /**
     * True while window listeners for a tracked press are attached.
     */
    get listening(): boolean {
        return this.sessionListening;
    }

    configure(options: Partial<LongPressOptions>): void {
        this.options = { ...this.options, ...options };
    }

    /**
     * Disabling drops any tracked press without calling a handler.
     */
    setEnabled(enabled: boolean): void {
        if (!enabled) {
            this.reset();
        }
        if (enabled === this.enabled) return;
        this.enabled = enabled;
        if (enabled) {
            this.target.addEventListener('pointerdown', this.onTargetPointerDown, true);
            this.target.addEventListener('lostpointercapture', this.onLostPointerCapture);
        } else {
            this.target.removeEventListener('pointerdown', this.onTargetPointerDown, true);
            this.target.removeEventListener('lostpointercapture', this.onLostPointerCapture);
        }
    }

    destroy(): void {
        this.setEnabled(false);
    }

    private handlePointerDown(e: PointerEvent): void {
        if (!this.enabled || this.state.phase !== 'idle') return;
        if (e.button !== 0) return;
        if (this.options.shouldBegin && !this.options.shouldBegin(e)) return;

        const pointerId = e.pointerId;
        const pointerType = e.pointerType || null;
        const touch = pointerType !== 'mouse';
        const timeoutId = window.setTimeout(() => {
            if (this.state.phase !== 'pending' || this.state.press.pointerId !== pointerId) return;
            this.recognize(this.state.press, pointerType);
        }, this.options.minimumPressMs);

        this.state = {
            phase: 'pending',
            press: {
                pointerId,
                touch,
                startX: e.clientX,
                startY: e.clientY,
                latestX: e.clientX,
                latestY: e.clientY,
                timeoutId,
            },
        };
        this.listenForSession(touch);
        if (touch) this.lockTouch();
    }

    private recognize(pending: PendingPress, pointerType: string | null): void {
        const press: RecognizedPress = {
            pointerId: pending.pointerId,
            touch: pending.touch,
            pointerType,
            captured: this.capture(pending.pointerId),
        };
        this.state = { phase: 'recognized', press };
        if (press.touch) {
            const active = document.activeElement;
            if (active instanceof HTMLElement) this.keepKeyboardClosed(active);
            if (this.options.hapticFeedback) pulseHaptics();
        }
        this.handlers.onBegan({ clientX: pending.latestX, clientY: pending.latestY, pointerType });
    }

    private handlePointerMove(e: PointerEvent): void {
        const state = this.state;
        if (state.phase === 'idle' || e.pointerId !== state.press.pointerId) return;
        if (state.phase === 'pending') {
            const press = state.press;
            press.latestX = e.clientX;
            press.latestY = e.clientY;
            const distance = Math.hypot(e.clientX - press.startX, e.clientY - press.startY);
            if (distance > this.options.allowableMovementPx) this.reset();
            return;
        }
        if (e.cancelable) e.preventDefault();
        e.stopPropagation();
        this.handlers.onChanged(toPressPoint(e));
    }

    private handlePointerUp(e: PointerEvent): void {
        const state = this.state;
        if (state.phase === 'idle' || e.pointerId !== state.press.pointerId) return;
        const recognized = state.phase === 'recognized';
        if (recognized && e.cancelable) e.preventDefault();
        this.reset();
        if (recognized) this.handlers.onEnded(toPressPoint(e));
    }

    private handlePointerCancel(e: PointerEvent): void {
        const state = this.state;
        if (state.phase === 'idle' || e.pointerId !== state.press.pointerId) return;
        this.reset();
        if (state.phase === 'recognized') this.handlers.onCancelled('pointer_cancelled');
    }

    private handleLostPointerCapture(e: PointerEvent): void {
        if (this.state.phase !== 'recognized' || e.pointerId !== this.state.press.pointerId) return;
        this.interrupt();
    }

    private interrupt(): void {
        const wasRecognized = this.state.phase === 'recognized';
        this.reset();
        if (wasRecognized) this.handlers.onCancelled('session_interrupted');
    }

    private reset(): void {
        const state = this.state;
        this.state = { phase: 'idle' };
        if (state.phase === 'pending') {
            window.clearTimeout(state.press.timeoutId);
        } else if (state.phase === 'recognized' && state.press.captured) {
            this.releaseCapture(state.press.pointerId);
        }
        this.stopListeningForSession();
        this.unlockTouch();
    }

    private listenForSession(touch: boolean): void {
        if (this.sessionListening) return;
        window.addEventListener('pointermove', this.onPointerMove, CAPTURE_ACTIVE);
        window.addEventListener('pointerup', this.onPointerUp, CAPTURE_ACTIVE);
        window.addEventListener('pointercancel', this.onPointerCancel, CAPTURE_ACTIVE);
        window.addEventListener('blur', this.onWindowBlur);
        document.addEventListener('visibilitychange', this.onVisibilityChange);
        document.addEventListener('touchmove', this.onTouchMove, CAPTURE_ACTIVE);
        if (touch) document.addEventListener('focusin', this.onFocusIn, true);
        this.sessionListening = true;
    }

    private stopListeningForSession(): void {
        if (!this.sessionListening) return;
        window.removeEventListener('pointermove', this.onPointerMove, true);
        window.removeEventListener('pointerup', this.onPointerUp, true);
        window.removeEventListener('pointercancel', this.onPointerCancel, true);
        window.removeEventListener('blur', this.onWindowBlur);
        document.removeEventListener('visibilitychange', this.onVisibilityChange);
        document.removeEventListener('touchmove', this.onTouchMove, true);
        document.removeEventListener('focusin', this.onFocusIn, true);
        this.sessionListening = false;
    }

    private capture(pointerId: number): boolean {
        try {
            this.target.setPointerCapture(pointerId);
            return true;
        } catch {
            // the pointer is already gone; window listeners still see it
            return false;
        }
    }

    private releaseCapture(pointerId: number): void {
        if (!this.target.hasPointerCapture(pointerId)) return;
        this.target.releasePointerCapture(pointerId);
    }

    private lockTouch(): void {
        if (this.touchLocked) return;
        this.touchLocked = true;
        bodyTouchLocks += 1;
        document.body.classList.add(MOBILE_GESTURE_LOCK_CLASS);
        this.target.classList.add(MOBILE_GESTURE_LOCK_CLASS);
    }

    private unlockTouch(): void {
        if (!this.touchLocked) return;
        this.touchLocked = false;
        bodyTouchLocks = Math.max(0, bodyTouchLocks - 1);
        if (bodyTouchLocks === 0) {
            document.body.classList.remove(MOBILE_GESTURE_LOCK_CLASS);
        }
        this.target.classList.remove(MOBILE_GESTURE_LOCK_CLASS);
    }

    private keepKeyboardClosed(el: HTMLElement): void {
        if (!isTextEntry(el) && !this.target.contains(el)) return;
        el.blur();
        window.getSelection()?.removeAllRanges();
    }
}

function pulseHaptics(): void {
    const nav: Navigator & { vibrate?: (pattern: number | number[]) => boolean } = navigator;
    if (typeof nav.vibrate !== 'function') return;
    nav.vibrate(HAPTIC_PULSE_MS);
}

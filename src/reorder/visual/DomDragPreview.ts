import type { RowRect } from '../../types';
import {
    DRAG_PREVIEW_CLASS,
    DRAG_PREVIEW_LIFTED_CLASS,
    DRAG_PREVIEW_SETTLING_CLASS,
} from '../core/constants';
import { clampNumber } from '../core/geometry';

type PendingAnimation = {
    timeoutId: number;
    onComplete: () => void;
};

/**
 * Floating copy of the dragged row, positioned in the list's content coordinates.
 */
export class DomDragPreview {
    private readonly el: HTMLDivElement;
    private readonly height: number;
    private centerY: number;
    private pendingAnimation: PendingAnimation | null = null;

    constructor(layer: HTMLElement, image: HTMLElement, rect: RowRect, opacity: number) {
        this.height = rect.height;
        this.centerY = rect.top + rect.height / 2;

        this.el = document.createElement('div');
        this.el.className = DRAG_PREVIEW_CLASS;
        this.el.setAttribute('aria-hidden', 'true');
        this.el.appendChild(image);
        this.el.setCssStyles({
            position: 'absolute',
            pointerEvents: 'none',
            left: `${rect.left}px`,
            top: `${rect.top}px`,
            width: `${rect.width}px`,
            height: `${rect.height}px`,
            opacity: String(clampNumber(opacity, 0, 1)),
        });
        layer.appendChild(this.el);
        this.el.classList.add(DRAG_PREVIEW_LIFTED_CLASS);
    }

    get element(): HTMLElement {
        return this.el;
    }

    get currentCenterY(): number {
        return this.centerY;
    }

    isMounted(): boolean {
        return this.el.isConnected;
    }

    isAnimating(): boolean {
        return this.pendingAnimation !== null;
    }

    setCenterY(y: number): void {
        this.centerY = y;
        this.el.setCssStyles({ top: `${y - this.height / 2}px` });
    }

    setOpacity(opacity: number): void {
        this.el.setCssStyles({ opacity: String(clampNumber(opacity, 0, 1)) });
    }

    /**
     * Slides the preview onto the row it is dropped at and calls `onComplete`
     * once the transition has had time to finish.
     */
    animateTo(rect: RowRect, durationMs: number, onComplete: () => void): void {
        this.cancelAnimation();
        this.centerY = rect.top + rect.height / 2;
        this.el.classList.remove(DRAG_PREVIEW_LIFTED_CLASS);
        this.el.classList.add(DRAG_PREVIEW_SETTLING_CLASS);
        this.el.setCssStyles({
            transition: `top ${durationMs}ms ease, left ${durationMs}ms ease, transform ${durationMs}ms ease`,
            left: `${rect.left}px`,
            top: `${rect.top}px`,
        });
        const timeoutId = window.setTimeout(() => {
            const pending = this.pendingAnimation;
            this.pendingAnimation = null;
            pending?.onComplete();
        }, durationMs);
        this.pendingAnimation = { timeoutId, onComplete };
    }

    /**
     * Runs a pending animation's completion right away.
     */
    finishAnimation(): void {
        const pending = this.pendingAnimation;
        if (!pending) return;
        window.clearTimeout(pending.timeoutId);
        this.pendingAnimation = null;
        pending.onComplete();
    }

    remove(): void {
        this.cancelAnimation();
        this.el.remove();
    }

    private cancelAnimation(): void {
        if (!this.pendingAnimation) return;
        window.clearTimeout(this.pendingAnimation.timeoutId);
        this.pendingAnimation = null;
    }
}

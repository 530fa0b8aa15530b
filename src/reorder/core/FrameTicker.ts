/**
 * Recurring per-frame callback whose lifetime is controlled explicitly.
 */
export interface FrameTicker {
    readonly running: boolean;
    start(onTick: () => void): void;
    stop(): void;
}

export class AnimationFrameTicker implements FrameTicker {
    private rafId: number | null = null;
    private onTick: (() => void) | null = null;

    get running(): boolean {
        return this.onTick !== null;
    }

    start(onTick: () => void): void {
        this.stop();
        this.onTick = onTick;
        this.scheduleNext();
    }

    stop(): void {
        if (this.rafId !== null) {
            window.cancelAnimationFrame(this.rafId);
            this.rafId = null;
        }
        this.onTick = null;
    }

    private scheduleNext(): void {
        this.rafId = window.requestAnimationFrame(() => {
            this.rafId = null;
            const onTick = this.onTick;
            if (!onTick) return;
            onTick();
            // the callback may have stopped or restarted the ticker
            if (this.onTick === onTick && this.rafId === null) {
                this.scheduleNext();
            }
        });
    }
}

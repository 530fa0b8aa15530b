import type { ReorderLifecycleEvent, ReorderLifecycleState } from '../../types';

export function createIdleEvent(): ReorderLifecycleEvent {
    return {
        state: 'idle',
        initialPosition: null,
        currentPosition: null,
        reason: null,
    };
}

export function createSessionEvent(
    state: Exclude<ReorderLifecycleState, 'idle' | 'cancelled'>,
    initialPosition: number,
    currentPosition: number
): ReorderLifecycleEvent {
    return {
        state,
        initialPosition,
        currentPosition,
        reason: null,
    };
}

export function createCancelledEvent(
    initialPosition: number,
    currentPosition: number,
    reason: string
): ReorderLifecycleEvent {
    return {
        state: 'cancelled',
        initialPosition,
        currentPosition,
        reason,
    };
}

/**
 * Deduplicating emitter that skips consecutive identical lifecycle events.
 */
export class ReorderLifecycleEmitter {
    private lastSignature: string | null = null;

    constructor(
        private readonly sink: (event: ReorderLifecycleEvent) => void
    ) {}

    emit(event: ReorderLifecycleEvent): void {
        const payload = normalizeEvent(event);
        const signature = JSON.stringify(payload);
        if (signature === this.lastSignature) return;
        this.lastSignature = signature;
        this.sink(payload);
    }

    reset(): void {
        this.lastSignature = null;
    }
}

function normalizeEvent(event: ReorderLifecycleEvent): ReorderLifecycleEvent {
    return {
        state: event.state,
        initialPosition: typeof event.initialPosition === 'number' ? event.initialPosition : null,
        currentPosition: typeof event.currentPosition === 'number' ? event.currentPosition : null,
        reason: event.reason ?? null,
    };
}

/**
 * A row's rectangle in the list's content coordinates.
 */
export interface RowRect {
    left: number;
    top: number;
    width: number;
    height: number;
}

/**
 * A pointer position in the list's content coordinates
 * (already shifted by the current scroll offset).
 */
export interface ContentPoint {
    x: number;
    y: number;
}

export interface ScrollMetrics {
    /** Current vertical scroll offset */
    offsetY: number;
    topInset: number;
    bottomInset: number;
    /** Total height of the scrollable content */
    contentHeight: number;
    /** Height of the visible viewport */
    viewportHeight: number;
}

export type ReorderLifecycleState =
    | 'idle'
    | 'dragging'
    | 'moved'
    | 'settling'
    | 'dropped'
    | 'cancelled';

export interface ReorderLifecycleEvent {
    state: ReorderLifecycleState;
    initialPosition: number | null;
    currentPosition: number | null;
    reason: string | null;
}

export type ReorderLifecycleListener = (event: ReorderLifecycleEvent) => void;

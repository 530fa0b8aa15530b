import type { ContentPoint } from '../../types';
import type { DomDragPreview } from '../visual/DomDragPreview';

export interface SavedHandle<THandle> {
    value: THandle;
}

/**
 * State of one drag-reorder gesture, from press-began to cleanup.
 */
export interface DragSession<THandle> {
    readonly initialPosition: number;
    currentPosition: number;
    /** null when the data source has no beginReorder */
    readonly savedHandle: SavedHandle<THandle> | null;
    previewCenterY: number;
    scrollRate: number;
    lastPoint: ContentPoint;
    readonly preview: DomDragPreview;
    moveMissingNoted: boolean;
}

export type ReorderPhase<THandle> =
    | { phase: 'idle' }
    | { phase: 'dragging'; session: DragSession<THandle> }
    | { phase: 'settling'; session: DragSession<THandle>; targetPosition: number };

export interface DragSessionSnapshot {
    initialPosition: number;
    currentPosition: number;
    previewCenterY: number;
    scrollRate: number;
    settling: boolean;
}

import type { ContentPoint, ReorderLifecycleEvent, RowRect, ScrollMetrics } from '../../types';
import { AUTO_SCROLL_STEP_PX, DROP_ANIMATION_MS } from '../core/constants';
import {
    type ReorderDiagnosticCode,
    type ReorderDiagnosticSink,
    consoleDiagnosticSink,
    createDiagnostic,
} from '../core/diagnostics';
import { AnimationFrameTicker, type FrameTicker } from '../core/FrameTicker';
import {
    clampNumber,
    clampPreviewCenterY,
    clampScrollOffset,
    computeScrollRate,
    shouldCommitSwap,
} from '../core/geometry';
import {
    ReorderLifecycleEmitter,
    createCancelledEvent,
    createIdleEvent,
    createSessionEvent,
} from '../core/ReorderLifecycleEmitter';
import type { DragSession, DragSessionSnapshot, ReorderPhase } from '../core/session';
import { DomDragPreview } from '../visual/DomDragPreview';

/**
 * Geometry and rendering queries the controller makes against the list it is attached to.
 */
export interface ReorderHost {
    rowCount(): number;
    rowRect(index: number): RowRect;
    indexAt(point: ContentPoint): number | null;
    /** Detached element used as the drag preview image */
    renderBitmap(index: number): HTMLElement;
    /** Remove the row at `from` and insert it at `to` as one visual update */
    moveRow(from: number, to: number): void;
    refreshRows(indices: number[]): void;
    visibleRows(): number[];
    getScrollMetrics(): ScrollMetrics;
    setScrollOffset(offsetY: number): void;
    /** Positioned element, in content coordinates, that hosts the preview */
    getPreviewLayer(): HTMLElement;
}

/**
 * Callbacks into whoever owns the row data. Every field is optional;
 * missing reorder callbacks are reported as diagnostics.
 */
export interface ReorderDataSource<THandle> {
    /** Stash the item at `index`, leave a placeholder row, and return the stashed item */
    beginReorder?: (index: number) => THandle;
    /** Put the stashed item back into the placeholder row at `index` */
    finishReorder?: (handle: THandle, index: number) => void;
    canMove?: (index: number) => boolean;
    suggestTarget?: (from: number, proposed: number) => number;
    move?: (from: number, to: number) => void;
}

export interface GestureRecognizerToggle {
    setEnabled(enabled: boolean): void;
}

export interface ReorderControllerDeps<THandle> {
    dataSource: ReorderDataSource<THandle>;
    recognizer?: GestureRecognizerToggle;
    ticker?: FrameTicker;
    diagnostics?: ReorderDiagnosticSink;
    onLifecycleEvent?: (event: ReorderLifecycleEvent) => void;
    canReorder?: boolean;
    draggingViewOpacity?: number;
    dropAnimationMs?: number;
}

export class ReorderController<THandle = unknown> {
    private state: ReorderPhase<THandle> = { phase: 'idle' };
    private reorderEnabled: boolean;
    private previewOpacity: number;
    private rowHeight = 0;
    private readonly ticker: FrameTicker;
    private readonly diagnostics: ReorderDiagnosticSink;
    private readonly lifecycle: ReorderLifecycleEmitter;
    private readonly dropAnimationMs: number;

    constructor(
        private readonly host: ReorderHost,
        private readonly deps: ReorderControllerDeps<THandle>
    ) {
        this.ticker = deps.ticker ?? new AnimationFrameTicker();
        this.diagnostics = deps.diagnostics ?? consoleDiagnosticSink;
        this.lifecycle = new ReorderLifecycleEmitter((event) => this.deps.onLifecycleEvent?.(event));
        this.dropAnimationMs = deps.dropAnimationMs ?? DROP_ANIMATION_MS;
        this.previewOpacity = clampNumber(deps.draggingViewOpacity ?? 1, 0, 1);
        this.reorderEnabled = deps.canReorder ?? false;
        this.deps.recognizer?.setEnabled(this.reorderEnabled);
    }

    get canReorder(): boolean {
        return this.reorderEnabled;
    }

    set canReorder(enabled: boolean) {
        this.reorderEnabled = enabled;
        // a drop in progress keeps the recognizer off until it completes
        if (this.state.phase === 'settling') return;
        this.deps.recognizer?.setEnabled(enabled);
    }

    get draggingViewOpacity(): number {
        return this.previewOpacity;
    }

    set draggingViewOpacity(opacity: number) {
        this.previewOpacity = clampNumber(opacity, 0, 1);
        if (this.state.phase !== 'idle') {
            this.state.session.preview.setOpacity(this.previewOpacity);
        }
    }

    /**
     * Height of the row being dragged, 0 when no drag is in progress.
     */
    get draggingRowHeight(): number {
        return this.rowHeight;
    }

    get isDragging(): boolean {
        return this.state.phase !== 'idle';
    }

    getSessionSnapshot(): DragSessionSnapshot | null {
        if (this.state.phase === 'idle') return null;
        const session = this.state.session;
        return {
            initialPosition: session.initialPosition,
            currentPosition: session.currentPosition,
            previewCenterY: session.previewCenterY,
            scrollRate: session.scrollRate,
            settling: this.state.phase === 'settling',
        };
    }

    pressBegan(point: ContentPoint): void {
        if (this.state.phase !== 'idle') return;

        const rowCount = this.host.rowCount();
        if (rowCount <= 0) {
            this.note('empty_list');
            this.resetRecognizer();
            return;
        }

        const index = this.host.indexAt(point);
        if (index === null || index < 0 || index >= rowCount) {
            this.note('no_row_at_point');
            this.resetRecognizer();
            return;
        }

        const { dataSource } = this.deps;
        if (dataSource.canMove && !dataSource.canMove(index)) {
            this.note('move_vetoed', index);
            this.resetRecognizer();
            return;
        }

        const rect = this.host.rowRect(index);
        this.rowHeight = rect.height;
        const preview = new DomDragPreview(
            this.host.getPreviewLayer(),
            this.host.renderBitmap(index),
            rect,
            this.previewOpacity
        );
        const previewCenterY = clampPreviewCenterY(point.y, this.host.getScrollMetrics().contentHeight);
        preview.setCenterY(previewCenterY);

        let savedHandle: DragSession<THandle>['savedHandle'] = null;
        if (dataSource.beginReorder) {
            savedHandle = { value: dataSource.beginReorder(index) };
        } else {
            this.note('begin_reorder_missing', index);
        }
        this.host.refreshRows([index]);

        this.state = {
            phase: 'dragging',
            session: {
                initialPosition: index,
                currentPosition: index,
                savedHandle,
                previewCenterY,
                scrollRate: 0,
                lastPoint: { ...point },
                preview,
                moveMissingNoted: false,
            },
        };
        this.ticker.start(() => this.handleTick());
        this.lifecycle.emit(createSessionEvent('dragging', index, index));
    }

    pressChanged(point: ContentPoint): void {
        if (this.state.phase === 'settling') return;
        if (this.state.phase !== 'dragging') {
            this.abortStrayPress();
            return;
        }

        const session = this.state.session;
        session.lastPoint = { ...point };
        const metrics = this.host.getScrollMetrics();
        this.movePreview(session, point.y, metrics.contentHeight);

        if (!this.updateTarget(session)) return;

        session.scrollRate = computeScrollRate(point.y, metrics);
    }

    pressEnded(point: ContentPoint): void {
        if (this.state.phase === 'settling') return;
        if (this.state.phase !== 'dragging') {
            this.abortStrayPress();
            return;
        }

        const session = this.state.session;
        session.lastPoint = { ...point };
        this.ticker.stop();
        session.scrollRate = 0;

        const rowCount = this.host.rowCount();
        if (session.currentPosition < 0 || session.currentPosition >= rowCount) {
            this.note('stale_index', session.currentPosition);
            this.cancel('stale_index');
            return;
        }

        const targetPosition = session.currentPosition;
        this.state = { phase: 'settling', session, targetPosition };
        this.deps.recognizer?.setEnabled(false);
        this.lifecycle.emit(createSessionEvent('settling', session.initialPosition, targetPosition));

        session.preview.animateTo(
            this.host.rowRect(targetPosition),
            this.dropAnimationMs,
            () => this.completeDrop(session, targetPosition)
        );
    }

    /**
     * Tears down the live session. A drop that is still animating completes at once.
     * Calling this without a session does nothing.
     */
    cancel(reason = 'cancelled'): void {
        const state = this.state;
        if (state.phase === 'idle') return;
        if (state.phase === 'settling') {
            state.session.preview.finishAnimation();
            return;
        }

        const session = state.session;
        this.ticker.stop();
        session.scrollRate = 0;
        session.preview.remove();

        const rowCount = this.host.rowCount();
        const finalPosition = clampNumber(session.currentPosition, 0, Math.max(0, rowCount - 1));
        if (session.savedHandle) {
            this.finishReorder(session.savedHandle.value, finalPosition);
        }
        this.refreshVisibleRowsExcept(finalPosition);

        this.state = { phase: 'idle' };
        this.rowHeight = 0;
        this.resetRecognizer();
        this.lifecycle.emit(createCancelledEvent(session.initialPosition, finalPosition, reason));
        this.lifecycle.emit(createIdleEvent());
    }

    destroy(): void {
        this.cancel('destroyed');
        this.ticker.stop();
        this.lifecycle.reset();
    }

    private handleTick(): void {
        if (this.state.phase !== 'dragging') {
            this.ticker.stop();
            return;
        }

        const session = this.state.session;
        const metrics = this.host.getScrollMetrics();
        const nextOffset = clampScrollOffset(metrics.offsetY + session.scrollRate * AUTO_SCROLL_STEP_PX, metrics);
        if (nextOffset !== metrics.offsetY) {
            this.host.setScrollOffset(nextOffset);
            // the finger stays put on screen; hosts may round the offset, so follow what actually scrolled
            const scrolledBy = this.host.getScrollMetrics().offsetY - metrics.offsetY;
            session.lastPoint = { x: session.lastPoint.x, y: session.lastPoint.y + scrolledBy };
        }

        this.movePreview(session, session.lastPoint.y, metrics.contentHeight);
        this.updateTarget(session);
    }

    /**
     * Returns false when the session was cancelled because the layout went stale.
     */
    private updateTarget(session: DragSession<THandle>): boolean {
        const rowCount = this.host.rowCount();
        if (session.currentPosition < 0 || session.currentPosition >= rowCount) {
            this.note('stale_index', session.currentPosition);
            this.cancel('stale_index');
            return false;
        }

        const pointer = session.lastPoint;
        let proposed = this.host.indexAt(pointer);
        if (proposed === null) return true;

        const { dataSource } = this.deps;
        if (dataSource.suggestTarget) {
            proposed = dataSource.suggestTarget(session.initialPosition, proposed);
        }
        if (proposed < 0 || proposed >= rowCount) {
            this.note('stale_index', proposed);
            this.cancel('stale_index');
            return false;
        }

        const from = session.currentPosition;
        if (proposed === from) return true;

        const shouldSwap = shouldCommitSwap({
            pointerY: pointer.y,
            sourceRect: this.host.rowRect(from),
            destinationRect: this.host.rowRect(proposed),
            movingDown: proposed > from,
        });
        if (!shouldSwap) return true;

        this.host.moveRow(from, proposed);
        if (dataSource.move) {
            dataSource.move(from, proposed);
        } else if (!session.moveMissingNoted) {
            session.moveMissingNoted = true;
            this.note('move_missing', from);
        }
        session.currentPosition = proposed;
        this.lifecycle.emit(createSessionEvent('moved', session.initialPosition, proposed));
        return true;
    }

    private completeDrop(session: DragSession<THandle>, targetPosition: number): void {
        session.preview.remove();
        // without beginReorder there is nothing to put back
        if (session.savedHandle) {
            this.finishReorder(session.savedHandle.value, targetPosition);
        }
        this.refreshVisibleRowsExcept(targetPosition);

        this.state = { phase: 'idle' };
        this.rowHeight = 0;
        this.deps.recognizer?.setEnabled(this.reorderEnabled);
        this.lifecycle.emit(createSessionEvent('dropped', session.initialPosition, targetPosition));
        this.lifecycle.emit(createIdleEvent());
    }

    private finishReorder(handle: THandle, index: number): void {
        const { dataSource } = this.deps;
        if (!dataSource.finishReorder) {
            this.note('finish_reorder_missing', index);
            return;
        }
        dataSource.finishReorder(handle, index);
    }

    private movePreview(session: DragSession<THandle>, pointerY: number, contentHeight: number): void {
        session.previewCenterY = clampPreviewCenterY(pointerY, contentHeight);
        session.preview.setCenterY(session.previewCenterY);
    }

    private refreshVisibleRowsExcept(index: number): void {
        const rows = this.host.visibleRows().filter((row) => row !== index);
        if (rows.length === 0) return;
        this.host.refreshRows(rows);
    }

    private abortStrayPress(): void {
        this.note('no_active_session');
        this.resetRecognizer();
        this.cancel('no_active_session');
    }

    /**
     * Toggling the recognizer off and back on drops whatever it is tracking.
     */
    private resetRecognizer(): void {
        const recognizer = this.deps.recognizer;
        if (!recognizer) return;
        recognizer.setEnabled(false);
        recognizer.setEnabled(this.reorderEnabled);
    }

    private note(code: ReorderDiagnosticCode, index?: number): void {
        this.diagnostics(createDiagnostic(code, index));
    }
}

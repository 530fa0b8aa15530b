import type { EditorView } from '@codemirror/view';
import type { ContentPoint, RowRect, ScrollMetrics } from '../../types';
import type { ReorderHost } from '../interaction/ReorderController';

export const PREVIEW_LAYER_CLASS = 'rr-preview-layer';

/**
 * Exposes the lines of a CodeMirror document as reorderable rows.
 *
 * Row `i` is document line `i + 1`. Content coordinates are measured inside
 * the scroller, so they stay fixed to a line while the editor scrolls.
 */
export class EditorLineHost implements ReorderHost {
    private layer: HTMLDivElement | null = null;

    constructor(private readonly view: EditorView) {}

    toContentPoint(clientX: number, clientY: number): ContentPoint {
        const scroller = this.view.scrollDOM;
        const rect = scroller.getBoundingClientRect();
        return {
            x: clientX - rect.left + scroller.scrollLeft,
            y: clientY - rect.top + scroller.scrollTop,
        };
    }

    rowCount(): number {
        return this.view.state.doc.lines;
    }

    rowRect(index: number): RowRect {
        const doc = this.view.state.doc;
        const lineNumber = Math.max(1, Math.min(doc.lines, index + 1));
        const block = this.view.lineBlockAt(doc.line(lineNumber).from);
        const scrollerRect = this.view.scrollDOM.getBoundingClientRect();
        const contentRect = this.view.contentDOM.getBoundingClientRect();
        return {
            left: contentRect.left - scrollerRect.left + this.view.scrollDOM.scrollLeft,
            top: block.top + this.getDocumentOffset(),
            width: contentRect.width,
            height: block.height,
        };
    }

    indexAt(point: ContentPoint): number | null {
        const docY = point.y - this.getDocumentOffset();
        if (docY < 0) return null;
        const doc = this.view.state.doc;
        const lastBlock = this.view.lineBlockAt(doc.length);
        if (docY >= lastBlock.bottom) return null;
        const block = this.view.lineBlockAtHeight(docY);
        return doc.lineAt(block.from).number - 1;
    }

    renderBitmap(index: number): HTMLElement {
        const line = this.view.state.doc.line(index + 1);
        const rendered = this.findLineElement(line.from);
        if (rendered) {
            const clone = rendered.cloneNode(true);
            if (clone instanceof HTMLElement) return clone;
        }
        const fallback = document.createElement('div');
        fallback.className = 'cm-line';
        fallback.textContent = line.text;
        return fallback;
    }

    /**
     * The document change made by the data source re-renders the lines;
     * all that is left is to re-measure.
     */
    moveRow(_from: number, _to: number): void {
        this.view.requestMeasure();
    }

    refreshRows(_indices: number[]): void {
        this.view.requestMeasure();
    }

    visibleRows(): number[] {
        const doc = this.view.state.doc;
        const rows = new Set<number>();
        for (const range of this.view.visibleRanges) {
            const first = doc.lineAt(range.from).number;
            const last = doc.lineAt(range.to).number;
            for (let lineNumber = first; lineNumber <= last; lineNumber++) {
                rows.add(lineNumber - 1);
            }
        }
        return Array.from(rows).sort((a, b) => a - b);
    }

    getScrollMetrics(): ScrollMetrics {
        const scroller = this.view.scrollDOM;
        return {
            offsetY: scroller.scrollTop,
            topInset: 0,
            bottomInset: 0,
            contentHeight: scroller.scrollHeight,
            viewportHeight: scroller.clientHeight,
        };
    }

    setScrollOffset(offsetY: number): void {
        this.view.scrollDOM.scrollTop = offsetY;
    }

    getPreviewLayer(): HTMLElement {
        if (this.layer?.isConnected) return this.layer;
        const layer = document.createElement('div');
        layer.className = PREVIEW_LAYER_CLASS;
        layer.setCssStyles({
            position: 'absolute',
            top: '0px',
            left: '0px',
            width: '0px',
            height: '0px',
            overflow: 'visible',
            pointerEvents: 'none',
        });
        this.view.scrollDOM.appendChild(layer);
        this.layer = layer;
        return layer;
    }

    destroy(): void {
        this.layer?.remove();
        this.layer = null;
    }

    /**
     * Distance from the top of the scroller's content box to the first line.
     */
    private getDocumentOffset(): number {
        const scroller = this.view.scrollDOM;
        return this.view.documentTop - scroller.getBoundingClientRect().top + scroller.scrollTop;
    }

    private findLineElement(pos: number): HTMLElement | null {
        let node: Node;
        try {
            node = this.view.domAtPos(pos).node;
        } catch {
            return null;
        }
        const el = node instanceof HTMLElement ? node : node.parentElement;
        return el?.closest<HTMLElement>('.cm-line') ?? null;
    }
}

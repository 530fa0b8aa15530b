import type { ChangeDesc, ChangeSpec } from '@codemirror/state';
import type { EditorView } from '@codemirror/view';
import {
    type ReorderDiagnosticSink,
    consoleDiagnosticSink,
    createDiagnostic,
} from '../core/diagnostics';
import type { ReorderDataSource } from '../interaction/ReorderController';
import { buildLineMoveChanges, getFrontmatterRowCount, LINE_MOVE_USER_EVENT } from './line-moves';

/**
 * Document side of a line drag. The dragged line's text is lifted out when the
 * drag starts, an empty placeholder line travels through the document, and the
 * text is written back into the placeholder on drop.
 */
export class EditorLineDataSource implements ReorderDataSource<string> {
    /** Start of the placeholder line while a drag is live */
    private placeholderFrom: number | null = null;
    private writesDeferred = false;

    constructor(
        private readonly view: EditorView,
        private readonly diagnostics: ReorderDiagnosticSink = consoleDiagnosticSink
    ) {}

    beginReorder(index: number): string {
        const line = this.view.state.doc.line(index + 1);
        if (line.length > 0) {
            this.dispatch({ from: line.from, to: line.to });
        }
        this.placeholderFrom = line.from;
        return line.text;
    }

    /**
     * Follows the placeholder through a change this data source did not make.
     */
    mapPlaceholder(changes: ChangeDesc): void {
        if (this.placeholderFrom === null) return;
        this.placeholderFrom = changes.mapPos(this.placeholderFrom, 1);
    }

    /**
     * From now on the text is written back on the next task, once the view
     * accepts transactions again.
     */
    deferWrites(): void {
        this.writesDeferred = true;
    }

    finishReorder(text: string, index: number): void {
        const placeholderFrom = this.placeholderFrom;
        this.placeholderFrom = null;
        if (text.length === 0) return;
        if (!this.writesDeferred) {
            this.writeBack(text, index, placeholderFrom);
            return;
        }
        window.setTimeout(() => {
            // the editor was closed in the meantime
            if (!this.view.dom.isConnected) return;
            this.writeBack(text, index, placeholderFrom);
        }, 0);
    }

    canMove(index: number): boolean {
        return index >= getFrontmatterRowCount(this.view.state.doc);
    }

    suggestTarget(_from: number, proposed: number): number {
        return Math.max(proposed, getFrontmatterRowCount(this.view.state.doc));
    }

    move(from: number, to: number): void {
        const doc = this.view.state.doc;
        if (this.placeholderFrom !== null && doc.lineAt(Math.min(this.placeholderFrom, doc.length)).number !== from + 1) {
            // an outside edit shifted the lines; the pending cancel puts the text back
            this.diagnostics(createDiagnostic('stale_index', from));
            return;
        }
        const changes = buildLineMoveChanges(doc, from, to);
        if (changes.length === 0) return;
        this.dispatch(changes);
        if (this.placeholderFrom !== null) {
            this.placeholderFrom = this.view.state.doc.line(to + 1).from;
        }
    }

    private writeBack(text: string, index: number, placeholderFrom: number | null): void {
        const doc = this.view.state.doc;
        const line = placeholderFrom === null
            ? doc.line(Math.max(1, Math.min(doc.lines, index + 1)))
            : doc.lineAt(Math.min(placeholderFrom, doc.length));
        const intact = line.length === 0 && (placeholderFrom === null || line.from === placeholderFrom);
        if (intact) {
            this.dispatch({ from: line.from, insert: text });
            return;
        }
        // the placeholder was edited or removed; keep the text as a line of its own
        this.diagnostics(createDiagnostic('stale_index', index));
        this.dispatch({ from: line.from, insert: `${text}\n` });
    }

    private dispatch(changes: ChangeSpec): void {
        this.view.dispatch({
            changes,
            userEvent: LINE_MOVE_USER_EVENT,
            scrollIntoView: false,
        });
    }
}

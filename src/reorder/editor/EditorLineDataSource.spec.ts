// @vitest-environment jsdom

import { EditorState, type Transaction, type TransactionSpec } from '@codemirror/state';
import type { EditorView } from '@codemirror/view';
import { afterEach, describe, expect, it, vi } from 'vitest';
import type { ReorderDiagnostic } from '../core/diagnostics';
import { EditorLineDataSource } from './EditorLineDataSource';

type ViewStub = {
    state: EditorState;
    dom: HTMLElement;
    dispatch: (spec: TransactionSpec) => void;
};

function createViewStub(doc: string) {
    const transactions: Transaction[] = [];
    const dom = document.createElement('div');
    document.body.appendChild(dom);
    const stub: ViewStub = {
        state: EditorState.create({ doc }),
        dom,
        dispatch(spec) {
            const tr = stub.state.update(spec);
            transactions.push(tr);
            stub.state = tr.state;
        },
    };
    // an edit made by someone other than the data source
    const editElsewhere = (spec: TransactionSpec): Transaction => {
        const tr = stub.state.update(spec);
        stub.state = tr.state;
        return tr;
    };
    return { stub, view: stub as unknown as EditorView, transactions, editElsewhere };
}

function createDataSource(view: EditorView) {
    const diagnostics: ReorderDiagnostic[] = [];
    const dataSource = new EditorLineDataSource(view, (diagnostic) => diagnostics.push(diagnostic));
    return { dataSource, diagnostics };
}

afterEach(() => {
    document.body.innerHTML = '';
    vi.useRealTimers();
});

describe('EditorLineDataSource', () => {
    it('lifts the line text out and leaves an empty placeholder', () => {
        const { stub, view } = createViewStub('alpha\nbeta\ngamma');
        const { dataSource } = createDataSource(view);

        expect(dataSource.beginReorder(1)).toBe('beta');
        expect(stub.state.doc.toString()).toBe('alpha\n\ngamma');
    });

    it('moves the placeholder and writes the text back on drop', () => {
        const { stub, view, transactions } = createViewStub('alpha\nbeta\ngamma\ndelta');
        const { dataSource, diagnostics } = createDataSource(view);

        const text = dataSource.beginReorder(0);
        dataSource.move(0, 1);
        dataSource.move(1, 2);
        dataSource.finishReorder(text, 2);

        expect(stub.state.doc.toString()).toBe('beta\ngamma\nalpha\ndelta');
        expect(transactions).toHaveLength(4);
        expect(transactions.every((tr) => tr.isUserEvent('move.line'))).toBe(true);
        expect(diagnostics).toEqual([]);
    });

    it('keeps an empty line empty without dispatching', () => {
        const { view, transactions } = createViewStub('alpha\n\ngamma');
        const { dataSource } = createDataSource(view);

        expect(dataSource.beginReorder(1)).toBe('');
        dataSource.finishReorder('', 1);

        expect(transactions).toHaveLength(0);
    });

    it('clamps a drop past the last line onto the last line', () => {
        const { stub, view } = createViewStub('alpha\n');
        const { dataSource } = createDataSource(view);

        dataSource.finishReorder('omega', 5);

        expect(stub.state.doc.toString()).toBe('alpha\nomega');
    });

    it('writes into the placeholder after an edit above it', () => {
        const { stub, view, editElsewhere } = createViewStub('alpha\nbeta\ngamma');
        const { dataSource, diagnostics } = createDataSource(view);

        const text = dataSource.beginReorder(1);
        const edit = editElsewhere({ changes: { from: 0, insert: 'x\n' } });
        dataSource.mapPlaceholder(edit.changes);
        dataSource.finishReorder(text, 1);

        expect(stub.state.doc.toString()).toBe('x\nalpha\nbeta\ngamma');
        expect(diagnostics).toEqual([]);
    });

    it('keeps the text on a line of its own when the placeholder was typed into', () => {
        const { stub, view, editElsewhere } = createViewStub('alpha\nbeta\ngamma');
        const { dataSource, diagnostics } = createDataSource(view);

        const text = dataSource.beginReorder(1);
        const edit = editElsewhere({ changes: { from: 6, insert: 'zz' } });
        dataSource.mapPlaceholder(edit.changes);
        dataSource.finishReorder(text, 1);

        expect(stub.state.doc.toString()).toBe('alpha\nbeta\nzz\ngamma');
        expect(diagnostics.map((diagnostic) => diagnostic.code)).toEqual(['stale_index']);
    });

    it('refuses a move from a row that no longer holds the placeholder', () => {
        const { stub, view, transactions, editElsewhere } = createViewStub('alpha\nbeta\ngamma');
        const { dataSource, diagnostics } = createDataSource(view);

        dataSource.beginReorder(1);
        const edit = editElsewhere({ changes: { from: 0, insert: 'x\n' } });
        dataSource.mapPlaceholder(edit.changes);
        dataSource.move(1, 2);

        expect(stub.state.doc.toString()).toBe('x\nalpha\n\ngamma');
        expect(transactions).toHaveLength(1);
        expect(diagnostics).toEqual([{ code: 'stale_index', message: 'row index is outside the current list bounds', index: 1 }]);
    });

    it('writes back on the next task once writes are deferred', () => {
        vi.useFakeTimers();
        const { stub, view } = createViewStub('alpha\nbeta\ngamma');
        const { dataSource } = createDataSource(view);

        const text = dataSource.beginReorder(1);
        dataSource.deferWrites();
        dataSource.finishReorder(text, 1);
        expect(stub.state.doc.toString()).toBe('alpha\n\ngamma');

        vi.advanceTimersByTime(0);
        expect(stub.state.doc.toString()).toBe('alpha\nbeta\ngamma');
    });

    it('drops a deferred write when the editor is gone', () => {
        vi.useFakeTimers();
        const { stub, view } = createViewStub('alpha\nbeta\ngamma');
        const { dataSource } = createDataSource(view);

        const text = dataSource.beginReorder(1);
        dataSource.deferWrites();
        dataSource.finishReorder(text, 1);
        stub.dom.remove();
        vi.advanceTimersByTime(0);

        expect(stub.state.doc.toString()).toBe('alpha\n\ngamma');
    });

    it('holds frontmatter lines in place', () => {
        const { view } = createViewStub('---\ntitle: x\n---\nbody\nmore');
        const { dataSource } = createDataSource(view);

        expect(dataSource.canMove(0)).toBe(false);
        expect(dataSource.canMove(2)).toBe(false);
        expect(dataSource.canMove(3)).toBe(true);
        expect(dataSource.suggestTarget(4, 1)).toBe(3);
        expect(dataSource.suggestTarget(3, 4)).toBe(4);
    });
});

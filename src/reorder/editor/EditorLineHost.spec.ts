// @vitest-environment jsdom

import { EditorState } from '@codemirror/state';
import type { EditorView } from '@codemirror/view';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { EditorLineHost, PREVIEW_LAYER_CLASS } from './EditorLineHost';

const LINE_HEIGHT = 20;
const SCROLLER_TOP = 100;
const DOCUMENT_PADDING = 4;

function createRect(left: number, top: number, width: number, height: number) {
    return {
        left,
        top,
        right: left + width,
        bottom: top + height,
        width,
        height,
        x: left,
        y: top,
        toJSON: () => ({}),
    };
}

function createViewStub(lineTexts: string[], options: { scrollTop?: number; domAtPosThrows?: boolean } = {}) {
    const state = EditorState.create({ doc: lineTexts.join('\n') });
    const scroller = document.createElement('div');
    const content = document.createElement('div');
    scroller.appendChild(content);
    document.body.appendChild(scroller);

    const lineElements = lineTexts.map((text) => {
        const lineEl = document.createElement('div');
        lineEl.className = 'cm-line';
        lineEl.textContent = text;
        content.appendChild(lineEl);
        return lineEl;
    });

    let scrollTop = options.scrollTop ?? 0;
    Object.defineProperty(scroller, 'scrollTop', {
        configurable: true,
        get: () => scrollTop,
        set: (value: number) => {
            scrollTop = value;
        },
    });
    Object.defineProperty(scroller, 'scrollHeight', { configurable: true, value: 1200 });
    Object.defineProperty(scroller, 'clientHeight', { configurable: true, value: 300 });
    Object.defineProperty(scroller, 'getBoundingClientRect', {
        configurable: true,
        value: () => createRect(0, SCROLLER_TOP, 400, 300),
    });
    Object.defineProperty(content, 'getBoundingClientRect', {
        configurable: true,
        value: () => createRect(30, SCROLLER_TOP + DOCUMENT_PADDING - scrollTop, 300, lineTexts.length * LINE_HEIGHT),
    });

    const blockForLine = (lineNumber: number) => {
        const line = state.doc.line(lineNumber);
        const top = (lineNumber - 1) * LINE_HEIGHT;
        return { from: line.from, to: line.to, top, bottom: top + LINE_HEIGHT, height: LINE_HEIGHT };
    };
    const requestMeasure = vi.fn();

    const view = {
        state,
        scrollDOM: scroller,
        contentDOM: content,
        get documentTop() {
            return SCROLLER_TOP + DOCUMENT_PADDING - scrollTop;
        },
        visibleRanges: [{ from: state.doc.line(2).from, to: state.doc.line(4).to }],
        lineBlockAt: (pos: number) => blockForLine(state.doc.lineAt(pos).number),
        lineBlockAtHeight: (height: number) => {
            const lineNumber = Math.max(1, Math.min(state.doc.lines, Math.floor(height / LINE_HEIGHT) + 1));
            return blockForLine(lineNumber);
        },
        domAtPos: (pos: number) => {
            if (options.domAtPosThrows) throw new RangeError('no DOM for position');
            const lineEl = lineElements[state.doc.lineAt(pos).number - 1];
            return { node: lineEl?.firstChild ?? content, offset: 0 };
        },
        requestMeasure,
    } as unknown as EditorView;

    return { view, scroller, requestMeasure, lineElements };
}

afterEach(() => {
    document.body.innerHTML = '';
});

describe('EditorLineHost', () => {
    const lines = ['alpha', 'beta', 'gamma', 'delta', 'epsilon'];

    it('converts client coordinates into scroller content coordinates', () => {
        const { view } = createViewStub(lines, { scrollTop: 40 });
        const host = new EditorLineHost(view);

        expect(host.toContentPoint(50, 150)).toEqual({ x: 50, y: 90 });
    });

    it('places rows below the document padding', () => {
        const { view } = createViewStub(lines, { scrollTop: 40 });
        const host = new EditorLineHost(view);

        expect(host.rowCount()).toBe(5);
        expect(host.rowRect(2)).toEqual({ left: 30, top: 44, width: 300, height: 20 });
    });

    it('finds the row under a content point and nothing outside the document', () => {
        const { view } = createViewStub(lines);
        const host = new EditorLineHost(view);

        expect(host.indexAt({ x: 40, y: 44 })).toBe(2);
        expect(host.indexAt({ x: 40, y: 103 })).toBe(4);
        expect(host.indexAt({ x: 40, y: 104 })).toBeNull();
        expect(host.indexAt({ x: 40, y: 2 })).toBeNull();
    });

    it('clones the rendered line for the preview', () => {
        const { view, lineElements } = createViewStub(lines);
        const host = new EditorLineHost(view);

        const image = host.renderBitmap(1);

        expect(image).not.toBe(lineElements[1]);
        expect(image.className).toBe('cm-line');
        expect(image.textContent).toBe('beta');
    });

    it('falls back to the line text when the line is not rendered', () => {
        const { view } = createViewStub(lines, { domAtPosThrows: true });
        const host = new EditorLineHost(view);

        const image = host.renderBitmap(3);

        expect(image.className).toBe('cm-line');
        expect(image.textContent).toBe('delta');
    });

    it('lists the rows inside the visible ranges', () => {
        const { view } = createViewStub(lines);
        const host = new EditorLineHost(view);

        expect(host.visibleRows()).toEqual([1, 2, 3]);
    });

    it('reads and writes the scroller offset', () => {
        const { view, scroller } = createViewStub(lines, { scrollTop: 40 });
        const host = new EditorLineHost(view);

        expect(host.getScrollMetrics()).toEqual({
            offsetY: 40,
            topInset: 0,
            bottomInset: 0,
            contentHeight: 1200,
            viewportHeight: 300,
        });
        host.setScrollOffset(75);
        expect(scroller.scrollTop).toBe(75);
    });

    it('re-measures the editor instead of moving DOM rows', () => {
        const { view, requestMeasure } = createViewStub(lines);
        const host = new EditorLineHost(view);

        host.moveRow(0, 2);
        host.refreshRows([1, 3]);

        expect(requestMeasure).toHaveBeenCalledTimes(2);
    });

    it('mounts a single preview layer inside the scroller', () => {
        const { view, scroller } = createViewStub(lines);
        const host = new EditorLineHost(view);

        const layer = host.getPreviewLayer();

        expect(host.getPreviewLayer()).toBe(layer);
        expect(layer.parentElement).toBe(scroller);
        expect(layer.className).toBe(PREVIEW_LAYER_CLASS);
        expect(layer.style.position).toBe('absolute');

        host.destroy();
        expect(scroller.querySelector(`.${PREVIEW_LAYER_CLASS}`)).toBeNull();
    });
});

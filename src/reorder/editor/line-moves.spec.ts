import { EditorState } from '@codemirror/state';
import { describe, expect, it } from 'vitest';
import { buildLineMoveChanges, getFrontmatterRowCount } from './line-moves';

function applyMove(doc: string, from: number, to: number): string {
    const state = EditorState.create({ doc });
    return state.update({ changes: buildLineMoveChanges(state.doc, from, to) }).state.doc.toString();
}

describe('buildLineMoveChanges', () => {
    it('moves a line down past its neighbours', () => {
        expect(applyMove('a\nb\nc\nd', 0, 2)).toBe('b\nc\na\nd');
    });

    it('moves a line up', () => {
        expect(applyMove('a\nb\nc\nd', 3, 1)).toBe('a\nd\nb\nc');
    });

    it('moves lines to and from the document edges', () => {
        expect(applyMove('a\nb\nc\nd', 0, 3)).toBe('b\nc\nd\na');
        expect(applyMove('a\nb\nc\nd', 3, 0)).toBe('d\na\nb\nc');
    });

    it('moves an empty placeholder line', () => {
        expect(applyMove('a\n\nc', 1, 2)).toBe('a\nc\n');
        expect(applyMove('a\n\nc', 1, 0)).toBe('\na\nc');
    });

    it('returns no changes for a no-op or out-of-range move', () => {
        const doc = EditorState.create({ doc: 'a\nb' }).doc;
        expect(buildLineMoveChanges(doc, 1, 1)).toEqual([]);
        expect(buildLineMoveChanges(doc, 0, 2)).toEqual([]);
        expect(buildLineMoveChanges(doc, -1, 0)).toEqual([]);
    });

    it('orders the changes from the end of the document backwards', () => {
        const doc = EditorState.create({ doc: 'a\nb\nc' }).doc;
        expect(buildLineMoveChanges(doc, 0, 2)).toEqual([
            { from: 5, to: 5, insert: '\na' },
            { from: 0, to: 2 },
        ]);
        expect(buildLineMoveChanges(doc, 2, 0)).toEqual([
            { from: 3, to: 5 },
            { from: 0, to: 0, insert: 'c\n' },
        ]);
    });
});

describe('getFrontmatterRowCount', () => {
    it('counts the frontmatter block including both fences', () => {
        const doc = EditorState.create({ doc: '---\ntitle: x\ntags: []\n---\nbody' }).doc;
        expect(getFrontmatterRowCount(doc)).toBe(4);
    });

    it('accepts a dotted closing fence', () => {
        const doc = EditorState.create({ doc: '---\ntitle: x\n...\nbody' }).doc;
        expect(getFrontmatterRowCount(doc)).toBe(3);
    });

    it('is zero without an opening fence or without a closing one', () => {
        expect(getFrontmatterRowCount(EditorState.create({ doc: 'body\n---\n' }).doc)).toBe(0);
        expect(getFrontmatterRowCount(EditorState.create({ doc: '---\ntitle: x' }).doc)).toBe(0);
    });
});

import type { Text } from '@codemirror/state';

export const LINE_MOVE_USER_EVENT = 'move.line';

export type LineChange = { from: number; to: number; insert?: string };

const FRONTMATTER_FENCE = '---';
const FRONTMATTER_CLOSERS = new Set(['---', '...']);

const frontmatterRowCountCache = new WeakMap<Text, number>();

/**
 * Changes that move the line at row `from` (0-based) so it ends up at row `to`.
 * Sorted from the end of the document backwards.
 */
export function buildLineMoveChanges(doc: Text, from: number, to: number): LineChange[] {
    if (from === to) return [];
    if (from < 0 || to < 0 || from >= doc.lines || to >= doc.lines) return [];

    const source = doc.line(from + 1);
    const target = doc.line(to + 1);
    if (from < to) {
        const next = doc.line(from + 2);
        return [
            { from: target.to, to: target.to, insert: `\n${source.text}` },
            { from: source.from, to: next.from },
        ];
    }
    const previous = doc.line(from);
    return [
        { from: previous.to, to: source.to },
        { from: target.from, to: target.from, insert: `${source.text}\n` },
    ];
}

/**
 * Number of rows taken by a leading YAML frontmatter block, fences included.
 * 0 when the document has none or the block is never closed.
 */
export function getFrontmatterRowCount(doc: Text): number {
    const cached = frontmatterRowCountCache.get(doc);
    if (cached !== undefined) return cached;

    let count = 0;
    if (doc.lines > 1 && doc.line(1).text.trimEnd() === FRONTMATTER_FENCE) {
        for (let lineNumber = 2; lineNumber <= doc.lines; lineNumber++) {
            if (FRONTMATTER_CLOSERS.has(doc.line(lineNumber).text.trimEnd())) {
                count = lineNumber;
                break;
            }
        }
    }
    frontmatterRowCountCache.set(doc, count);
    return count;
}

import type { RowRect, ScrollMetrics } from '../../types';
import { PREVIEW_OVERSCROLL_PX, SCROLL_ZONE_DIVISOR } from './constants';

export function clampNumber(value: number, min: number, max: number): number {
    if (value < min) return min;
    if (value > max) return max;
    return value;
}

export function clampPreviewCenterY(y: number, contentHeight: number): number {
    return clampNumber(y, 0, contentHeight + PREVIEW_OVERSCROLL_PX);
}

export function getMinScrollOffset(metrics: ScrollMetrics): number {
    return metrics.topInset > 0 ? -metrics.topInset : 0;
}

export function getMaxScrollOffset(metrics: ScrollMetrics): number {
    return metrics.contentHeight + metrics.bottomInset - metrics.viewportHeight;
}

/**
 * Clamps a proposed scroll offset to the scrollable range.
 * Content shorter than the viewport never scrolls.
 */
export function clampScrollOffset(proposedY: number, metrics: ScrollMetrics): number {
    const minOffset = getMinScrollOffset(metrics);
    if (proposedY < minOffset) {
        return minOffset;
    }
    if (metrics.contentHeight + metrics.bottomInset < metrics.viewportHeight) {
        return metrics.offsetY;
    }
    const maxOffset = getMaxScrollOffset(metrics);
    if (proposedY > maxOffset) {
        return maxOffset;
    }
    return proposedY;
}

/**
 * Signed auto-scroll rate for a pointer at content y.
 * 0 at a zone boundary, growing to ±1 at the zone's outer edge.
 */
export function computeScrollRate(pointerY: number, metrics: ScrollMetrics): number {
    const visibleHeight = metrics.viewportHeight - metrics.topInset;
    if (visibleHeight <= 0) return 0;

    const zoneHeight = visibleHeight / SCROLL_ZONE_DIVISOR;
    const bottomZoneStart = metrics.offsetY + metrics.topInset + visibleHeight - zoneHeight;
    const topZoneEnd = metrics.offsetY + metrics.topInset + zoneHeight;

    if (pointerY >= bottomZoneStart) {
        return clampNumber((pointerY - bottomZoneStart) / zoneHeight, 0, 1);
    }
    if (pointerY <= topZoneEnd) {
        return clampNumber((pointerY - topZoneEnd) / zoneHeight, -1, 0);
    }
    return 0;
}

/**
 * Whether the pointer has moved far enough into the destination row to swap.
 *
 * Penetration is measured from the edge the destination shares with the
 * source side, and must reach the height difference between the two rows so
 * that rows of unequal height don't flip back and forth.
 */
export function shouldCommitSwap(params: {
    pointerY: number;
    sourceRect: RowRect;
    destinationRect: RowRect;
    movingDown: boolean;
}): boolean {
    const { pointerY, sourceRect, destinationRect, movingDown } = params;
    const penetration = movingDown
        ? pointerY - destinationRect.top
        : destinationRect.top + destinationRect.height - pointerY;
    const threshold = destinationRect.height - sourceRect.height;
    return penetration >= threshold;
}

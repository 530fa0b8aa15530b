/**
 * Auto-scroll distance per tick at full rate (px)
 */
export const AUTO_SCROLL_STEP_PX = 10;

/**
 * The scroll zones at the top and bottom edges each take this fraction of the visible height
 */
export const SCROLL_ZONE_DIVISOR = 6;

/**
 * How far past the end of the content the preview may travel (px)
 */
export const PREVIEW_OVERSCROLL_PX = 50;

export const DROP_ANIMATION_MS = 300;

export const DEFAULT_LONG_PRESS_MS = 350;
export const LONG_PRESS_ALLOWABLE_MOVEMENT_PX = 10;

export const LOG_PREFIX = '[RowReorder]';

/**
 * CSS class names
 */
export const DRAG_PREVIEW_CLASS = 'rr-drag-preview';
export const DRAG_PREVIEW_LIFTED_CLASS = 'rr-drag-preview-lifted';
export const DRAG_PREVIEW_SETTLING_CLASS = 'rr-drag-preview-settling';
export const REORDER_ACTIVE_CLASS = 'rr-reorder-active';
export const MOBILE_GESTURE_LOCK_CLASS = 'rr-mobile-gesture-lock';

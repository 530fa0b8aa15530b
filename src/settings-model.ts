import { DEFAULT_LONG_PRESS_MS } from './reorder/core/constants';
import { clampNumber } from './reorder/core/geometry';

export interface RowReorderSettings {
    // 是否启用长按拖动排序
    enableReorder: boolean;
    // 拖动预览的不透明度（0-1）
    draggingViewOpacity: number;
    // 长按触发时长（毫秒）
    longPressDelayMs: number;
    // 触屏设备开始拖动时震动
    hapticFeedback: boolean;
}

export const DEFAULT_SETTINGS: RowReorderSettings = {
    enableReorder: true,
    draggingViewOpacity: 0.85,
    longPressDelayMs: DEFAULT_LONG_PRESS_MS,
    hapticFeedback: true,
};

export const MIN_LONG_PRESS_DELAY_MS = 150;
export const MAX_LONG_PRESS_DELAY_MS = 1500;

export const SETTINGS_UPDATED_EVENT = 'row-reorder:settings-updated';

/**
 * Coerces persisted values back into range. Anything unusable falls back to its default.
 */
export function normalizeSettings(raw: Partial<Record<keyof RowReorderSettings, unknown>>): RowReorderSettings {
    const opacity = Number(raw.draggingViewOpacity);
    const delay = Number(raw.longPressDelayMs);
    return {
        enableReorder: typeof raw.enableReorder === 'boolean' ? raw.enableReorder : DEFAULT_SETTINGS.enableReorder,
        draggingViewOpacity: raw.draggingViewOpacity !== undefined && Number.isFinite(opacity)
            ? clampNumber(opacity, 0, 1)
            : DEFAULT_SETTINGS.draggingViewOpacity,
        longPressDelayMs: raw.longPressDelayMs !== undefined && Number.isFinite(delay)
            ? clampNumber(Math.round(delay), MIN_LONG_PRESS_DELAY_MS, MAX_LONG_PRESS_DELAY_MS)
            : DEFAULT_SETTINGS.longPressDelayMs,
        hapticFeedback: typeof raw.hapticFeedback === 'boolean' ? raw.hapticFeedback : DEFAULT_SETTINGS.hapticFeedback,
    };
}

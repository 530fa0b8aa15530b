import { moment } from 'obsidian';

const zh = {
    // Headings
    headingBehavior: '功能',
    headingAppearance: '样式',

    // Reorder toggle
    enableReorder: '长按拖动排序',
    enableReorderDesc: '长按一行后拖动，即可调整它在笔记中的位置',

    // Long press delay
    longPressDelay: '长按时长',
    longPressDelayDesc: '开始拖动前需要按住的时间（毫秒）',

    // Haptics
    hapticFeedback: '触感反馈',
    hapticFeedbackDesc: '在触屏设备上开始拖动时轻微震动',

    // Preview opacity
    draggingViewOpacity: '拖动预览透明度',
    draggingViewOpacityDesc: '拖动时浮起的行预览的不透明度',

    // Commands
    commandToggleReorder: '切换长按拖动排序',
    noticeReorderEnabled: '已开启长按拖动排序',
    noticeReorderDisabled: '已关闭长按拖动排序',
};

const en: typeof zh = {
    headingBehavior: 'Behavior',
    headingAppearance: 'Appearance',

    enableReorder: 'Reorder lines by long press',
    enableReorderDesc: 'Press and hold a line, then drag it to move it within the note',

    longPressDelay: 'Long press delay',
    longPressDelayDesc: 'How long a line must be held before dragging starts (ms)',

    hapticFeedback: 'Haptic feedback',
    hapticFeedbackDesc: 'Vibrate briefly on touch devices when a drag starts',

    draggingViewOpacity: 'Drag preview opacity',
    draggingViewOpacityDesc: 'Opacity of the lifted line while it is dragged',

    commandToggleReorder: 'Toggle long-press line reordering',
    noticeReorderEnabled: 'Long-press line reordering enabled',
    noticeReorderDisabled: 'Long-press line reordering disabled',
};

export type I18nStrings = typeof zh;

export function t(): I18nStrings {
    const locale = moment.locale();
    return locale.startsWith('zh') ? zh : en;
}

import type { Extension } from '@codemirror/state';
import { ViewPlugin, type EditorView, type ViewUpdate } from '@codemirror/view';
import { SETTINGS_UPDATED_EVENT, type RowReorderSettings } from '../settings-model';
import type { ContentPoint, ReorderLifecycleEvent } from '../types';
import { REORDER_ACTIVE_CLASS } from './core/constants';
import { EditorLineDataSource } from './editor/EditorLineDataSource';
import { EditorLineHost } from './editor/EditorLineHost';
import { LINE_MOVE_USER_EVENT } from './editor/line-moves';
import { LongPressRecognizer, type PressPoint } from './interaction/LongPressRecognizer';
import { ReorderController } from './interaction/ReorderController';

/**
 * What an editor instance needs from the plugin that installed it.
 */
export interface RowReorderPluginBridge {
    readonly settings: RowReorderSettings;
    emitReorderLifecycleEvent(event: ReorderLifecycleEvent): void;
}

/**
 * Wires long-press line reordering into one editor view.
 */
export class RowReorderView {
    readonly host: EditorLineHost;
    readonly dataSource: EditorLineDataSource;
    readonly recognizer: LongPressRecognizer;
    readonly controller: ReorderController<string>;
    private foreignEditTimer: number | null = null;
    private readonly onSettingsUpdated = () => this.applySettings();

    constructor(
        private readonly view: EditorView,
        private readonly plugin: RowReorderPluginBridge
    ) {
        const settings = plugin.settings;
        this.host = new EditorLineHost(view);
        this.dataSource = new EditorLineDataSource(view);
        this.recognizer = new LongPressRecognizer(
            view.contentDOM,
            {
                onBegan: (point) => this.controller.pressBegan(this.toContentPoint(point)),
                onChanged: (point) => this.controller.pressChanged(this.toContentPoint(point)),
                onEnded: (point) => this.controller.pressEnded(this.toContentPoint(point)),
                onCancelled: (reason) => this.controller.cancel(reason),
            },
            {
                minimumPressMs: settings.longPressDelayMs,
                hapticFeedback: settings.hapticFeedback,
                shouldBegin: (e) => e.target instanceof Element && !!e.target.closest('.cm-line'),
            }
        );
        this.controller = new ReorderController<string>(this.host, {
            dataSource: this.dataSource,
            recognizer: this.recognizer,
            onLifecycleEvent: (event) => this.handleLifecycleEvent(event),
            canReorder: settings.enableReorder,
            draggingViewOpacity: settings.draggingViewOpacity,
        });
        window.addEventListener(SETTINGS_UPDATED_EVENT, this.onSettingsUpdated);
    }

    update(update: ViewUpdate): void {
        if (!update.docChanged || !this.controller.isDragging) return;
        let foreign = false;
        for (const tr of update.transactions) {
            if (!tr.docChanged || tr.isUserEvent(LINE_MOVE_USER_EVENT)) continue;
            this.dataSource.mapPlaceholder(tr.changes);
            foreign = true;
        }
        if (!foreign || this.foreignEditTimer !== null) return;
        // the view cannot be dispatched to while it is updating
        this.foreignEditTimer = window.setTimeout(() => {
            this.foreignEditTimer = null;
            this.controller.cancel('document_changed');
        }, 0);
    }

    applySettings(): void {
        const settings = this.plugin.settings;
        this.recognizer.configure({
            minimumPressMs: settings.longPressDelayMs,
            hapticFeedback: settings.hapticFeedback,
        });
        this.controller.draggingViewOpacity = settings.draggingViewOpacity;
        this.controller.canReorder = settings.enableReorder;
    }

    destroy(): void {
        window.removeEventListener(SETTINGS_UPDATED_EVENT, this.onSettingsUpdated);
        if (this.foreignEditTimer !== null) {
            window.clearTimeout(this.foreignEditTimer);
            this.foreignEditTimer = null;
        }
        // plugins are destroyed while the view is updating, so a live drag is put back afterwards
        this.dataSource.deferWrites();
        this.controller.destroy();
        this.recognizer.destroy();
        this.host.destroy();
        this.view.dom.classList.remove(REORDER_ACTIVE_CLASS);
    }

    private toContentPoint(point: PressPoint): ContentPoint {
        return this.host.toContentPoint(point.clientX, point.clientY);
    }

    private handleLifecycleEvent(event: ReorderLifecycleEvent): void {
        this.view.dom.classList.toggle(REORDER_ACTIVE_CLASS, event.state !== 'idle');
        this.plugin.emitReorderLifecycleEvent(event);
    }
}

export function rowReorderExtension(plugin: RowReorderPluginBridge): Extension {
    return [ViewPlugin.define((view) => new RowReorderView(view, plugin))];
}

import { Notice, Plugin } from 'obsidian';
import { t } from './i18n';
import { createMediaApi, type MediaApi } from './media/media-api';
import { LOG_PREFIX } from './reorder/core/constants';
import { rowReorderExtension } from './reorder/row-reorder';
import { RowReorderSettingTab } from './settings';
import {
    DEFAULT_SETTINGS,
    normalizeSettings,
    SETTINGS_UPDATED_EVENT,
    type RowReorderSettings,
} from './settings-model';
import type { ReorderLifecycleEvent, ReorderLifecycleListener } from './types';

export default class RowReorderPlugin extends Plugin {
    settings: RowReorderSettings = { ...DEFAULT_SETTINGS };
    private readonly reorderLifecycleListeners = new Set<ReorderLifecycleListener>();
    /** Playback and media-link helpers for other plugins */
    readonly media: MediaApi = createMediaApi((linkpath) => this.resolveVaultResource(linkpath));

    async onload() {
        await this.loadSettings();

        this.registerEditorExtension(rowReorderExtension(this));

        this.addCommand({
            id: 'toggle-row-reorder',
            name: t().commandToggleReorder,
            callback: async () => {
                this.settings.enableReorder = !this.settings.enableReorder;
                await this.saveSettings();
                new Notice(this.settings.enableReorder ? t().noticeReorderEnabled : t().noticeReorderDisabled);
            },
        });

        this.addSettingTab(new RowReorderSettingTab(this.app, this));
    }

    onunload() {
        this.reorderLifecycleListeners.clear();
        this.media.destroyAll();
    }

    async loadSettings() {
        const saved = await this.loadData() ?? {};
        this.settings = normalizeSettings(saved);
        this.applySettings();
    }

    async saveSettings() {
        this.applySettings();
        await this.saveData(this.settings);
    }

    applySettings() {
        this.settings = normalizeSettings(this.settings);
        window.dispatchEvent(new Event(SETTINGS_UPDATED_EVENT));
    }

    onReorderLifecycleEvent(listener: ReorderLifecycleListener): () => void {
        this.reorderLifecycleListeners.add(listener);
        return () => {
            this.reorderLifecycleListeners.delete(listener);
        };
    }

    emitReorderLifecycleEvent(event: ReorderLifecycleEvent): void {
        for (const listener of Array.from(this.reorderLifecycleListeners)) {
            try {
                listener(event);
            } catch (error) {
                console.error(`${LOG_PREFIX} reorder lifecycle listener failed:`, error);
            }
        }
    }

    private resolveVaultResource(linkpath: string): string | null {
        const file = this.app.metadataCache.getFirstLinkpathDest(linkpath, '');
        return file ? this.app.vault.getResourcePath(file) : null;
    }
}

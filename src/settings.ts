import { App, PluginSettingTab, Setting } from 'obsidian';
import { t } from './i18n';
import type RowReorderPlugin from './main';
import { MAX_LONG_PRESS_DELAY_MS, MIN_LONG_PRESS_DELAY_MS } from './settings-model';

export class RowReorderSettingTab extends PluginSettingTab {
    plugin: RowReorderPlugin;

    constructor(app: App, plugin: RowReorderPlugin) {
        super(app, plugin);
        this.plugin = plugin;
    }

    display(): void {
        const { containerEl } = this;
        const i18n = t();
        containerEl.empty();

        new Setting(containerEl).setName(i18n.headingBehavior).setHeading();

        new Setting(containerEl)
            .setName(i18n.enableReorder)
            .setDesc(i18n.enableReorderDesc)
            .addToggle(toggle => toggle
                .setValue(this.plugin.settings.enableReorder)
                .onChange(async (value) => {
                    this.plugin.settings.enableReorder = value;
                    await this.plugin.saveSettings();
                }));

        new Setting(containerEl)
            .setName(i18n.longPressDelay)
            .setDesc(i18n.longPressDelayDesc)
            .addSlider((slider) => slider
                .setLimits(MIN_LONG_PRESS_DELAY_MS, MAX_LONG_PRESS_DELAY_MS, 50)
                .setDynamicTooltip()
                .setValue(this.plugin.settings.longPressDelayMs)
                .onChange(async (value) => {
                    this.plugin.settings.longPressDelayMs = value;
                    await this.plugin.saveSettings();
                }));

        new Setting(containerEl)
            .setName(i18n.hapticFeedback)
            .setDesc(i18n.hapticFeedbackDesc)
            .addToggle(toggle => toggle
                .setValue(this.plugin.settings.hapticFeedback)
                .onChange(async (value) => {
                    this.plugin.settings.hapticFeedback = value;
                    await this.plugin.saveSettings();
                }));

        new Setting(containerEl).setName(i18n.headingAppearance).setHeading();

        new Setting(containerEl)
            .setName(i18n.draggingViewOpacity)
            .setDesc(i18n.draggingViewOpacityDesc)
            .addSlider((slider) => slider
                .setLimits(0.2, 1, 0.05)
                .setDynamicTooltip()
                .setValue(this.plugin.settings.draggingViewOpacity)
                .onChange(async (value) => {
                    this.plugin.settings.draggingViewOpacity = value;
                    await this.plugin.saveSettings();
                }));
    }
}

import { resolveMediaSource } from './media-source';
import { PlaybackController } from './PlaybackController';
import { formatPlaybackTime } from './playback-time';

/**
 * Media helpers the plugin hands out to other plugins.
 */
export interface MediaApi {
    formatPlaybackTime(seconds: number): string;
    resolveMediaSource(name: string): string | null;
    createPlaybackController(media: HTMLMediaElement): PlaybackController;
    /** Destroys every controller created so far */
    destroyAll(): void;
}

export function createMediaApi(resolveLocal: (name: string) => string | null): MediaApi {
    const controllers = new Set<PlaybackController>();
    return {
        formatPlaybackTime,
        resolveMediaSource: (name) => resolveMediaSource(name, resolveLocal),
        createPlaybackController(media) {
            const controller = new PlaybackController(media);
            controllers.add(controller);
            return controller;
        },
        destroyAll() {
            for (const controller of controllers) {
                controller.destroy();
            }
            controllers.clear();
        },
    };
}

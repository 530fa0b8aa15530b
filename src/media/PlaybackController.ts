import { LOG_PREFIX } from '../reorder/core/constants';
import { clampNumber } from '../reorder/core/geometry';
import { formatPlaybackTime } from './playback-time';

// HTMLMediaElement.HAVE_METADATA
const HAVE_METADATA = 1;

export type CurrentTimeCallback = (seconds: number, formattedTime: string) => void;

/**
 * Playback helpers around one media element.
 */
export class PlaybackController {
    private repeatEnabled = false;
    private readonly observers = new Set<number>();
    private readonly onEnded = () => this.restart();

    constructor(readonly media: HTMLMediaElement) {}

    get isPlaying(): boolean {
        return !this.media.paused && !this.media.ended && this.media.error === null;
    }

    /**
     * While set, playback starts over from the beginning whenever it reaches the end.
     */
    get repeat(): boolean {
        return this.repeatEnabled;
    }

    set repeat(enabled: boolean) {
        if (enabled === this.repeatEnabled) return;
        this.repeatEnabled = enabled;
        if (enabled) {
            this.media.addEventListener('ended', this.onEnded);
        } else {
            this.media.removeEventListener('ended', this.onEnded);
        }
    }

    get hasValidDuration(): boolean {
        const duration = this.media.duration;
        return this.media.readyState >= HAVE_METADATA && Number.isFinite(duration) && duration > 0;
    }

    seekBy(seconds: number): void {
        const target = this.media.currentTime + seconds;
        this.media.currentTime = this.hasValidDuration
            ? clampNumber(target, 0, this.media.duration)
            : Math.max(0, target);
    }

    /**
     * Calls back with the whole seconds played every `intervalMs`. Returns a disposer.
     */
    observeCurrentTime(callback: CurrentTimeCallback, intervalMs = 1000): () => void {
        const intervalId = window.setInterval(() => {
            const seconds = Math.floor(this.media.currentTime);
            callback(seconds, formatPlaybackTime(seconds));
        }, intervalMs);
        this.observers.add(intervalId);
        return () => {
            if (!this.observers.delete(intervalId)) return;
            window.clearInterval(intervalId);
        };
    }

    destroy(): void {
        for (const intervalId of this.observers) {
            window.clearInterval(intervalId);
        }
        this.observers.clear();
        this.repeat = false;
    }

    private restart(): void {
        this.media.currentTime = 0;
        this.media.play().catch((error: unknown) => {
            console.warn(`${LOG_PREFIX} media playback could not restart:`, error);
        });
    }
}

function pad2(value: number): string {
    return String(value).padStart(2, '0');
}

/**
 * `mm:ss` below an hour, `hh:mm:ss` from an hour on.
 */
export function formatPlaybackTime(totalSeconds: number): string {
    const seconds = Number.isFinite(totalSeconds) && totalSeconds > 0 ? Math.floor(totalSeconds) : 0;
    const sec = seconds % 60;
    const min = Math.floor(seconds / 60) % 60;
    const hrs = Math.floor(seconds / 3600);

    if (hrs === 0) {
        return `${pad2(min)}:${pad2(sec)}`;
    }
    return `${pad2(hrs)}:${pad2(min)}:${pad2(sec)}`;
}

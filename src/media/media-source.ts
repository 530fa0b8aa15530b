function getUrlHost(value: string): string {
    try {
        return new URL(value).host;
    } catch {
        return '';
    }
}

/**
 * Returns `name` when it is a URL with a host, otherwise whatever the local
 * resolver makes of it.
 */
export function resolveMediaSource(
    name: string,
    resolveLocal: (name: string) => string | null
): string | null {
    if (getUrlHost(name)) return name;
    return resolveLocal(name);
}

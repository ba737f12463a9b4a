/**
 * A recently played track as the player shows it.
 */
export interface Track {
    /** Track title as reported by the streaming service. */
    name: string;

    /** Primary artist. */
    artist: string;

    /**
     * Album art URL. Absent when the album has no images.
     */
    imageUrl?: string;
}

/**
 * Display and lookup key of a track: "{name} - {artist}".
 * Two different tracks sharing name and artist collapse into one entry.
 */
export function trackKey(track: Pick<Track, 'name' | 'artist'>): string {
    return `${track.name} - ${track.artist}`;
}

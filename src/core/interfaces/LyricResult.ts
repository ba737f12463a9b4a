/**
 * A song found by a lyrics provider.
 */
export interface LyricResult {
    /**
     * The raw lyrics text, exactly as the provider returned it.
     */
    lyricText: string;

    /**
     * Provider source identifier (e.g. "Genius").
     */
    source: string;

    /**
     * Title as found on the provider.
     */
    title: string;

    /**
     * Artist as found on the provider.
     */
    artist: string;

    /**
     * Optional ID on the source platform.
     */
    id?: string;

    /**
     * Page the lyrics were read from.
     */
    url?: string;
}

/**
 * What a single lyrics lookup ended with.
 */
export type LyricsOutcome =
    | { kind: 'found'; text: string }
    | { kind: 'not-found' }
    | { kind: 'error'; message: string };

import type { LyricResult } from "./LyricResult";

/**
 * Interface for a source of lyrics.
 */
export interface LyricsProvider {
    /**
     * Name of the provider.
     */
    name: string;

    /**
     * Looks up the lyrics of one track.
     * Resolves to null when the provider has no matching song; rejects on
     * auth, network or payload failures.
     * @param signal Aborted when the caller no longer wants the result.
     */
    search(title: string, artist: string, signal?: AbortSignal): Promise<LyricResult | null>;
}

import type { Track } from "./Track";

/**
 * The streaming service's play history.
 */
export interface RecentlyPlayedSource {
    name: string;

    /**
     * Most recent plays first. Rejects with a CollaboratorError on failure.
     */
    getRecentlyPlayed(limit: number): Promise<Track[]>;
}

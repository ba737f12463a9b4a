import { Logger } from "../utils/Logger";
import { describeError } from "../utils/CollaboratorError";
import { RECENT_TRACKS_LIMIT } from "../constants";
import type { RecentlyPlayedSource } from "../interfaces/RecentlyPlayedSource";
import type { TrackStore } from "./TrackStore";

/**
 * Fills the track store from the streaming service's play history.
 */
export class RecentTracksService {
    constructor(
        private readonly source: RecentlyPlayedSource,
        private readonly store: TrackStore
    ) { }

    /**
     * Rebuilds the store from the latest plays and returns the list keys.
     * Failures are logged and leave the store empty.
     */
    public async loadRecent(limit: number = RECENT_TRACKS_LIMIT): Promise<string[]> {
        try {
            const tracks = await this.source.getRecentlyPlayed(limit);
            const keys = this.store.replaceAll(tracks);
            Logger.info(`[RecentTracks] Loaded ${keys.length} tracks from ${this.source.name}.`);
            return keys;
        } catch (error) {
            Logger.error(`[RecentTracks] Error loading recent tracks: ${describeError(error)}`, error);
            this.store.clear();
            return [];
        }
    }
}

import { Logger } from "../utils/Logger";
import { CollaboratorError } from "../utils/CollaboratorError";
import { isRecord, readFirstRecord, readJsonBody, readString } from "../utils/json";
import type { RecentlyPlayedSource } from "../interfaces/RecentlyPlayedSource";
import type { Track } from "../interfaces/Track";
import type { SpotifyConfig } from "../config/AppConfig";
import type { AccessTokenProvider } from "./SpotifyTokenProvider";

/**
 * Turns a /me/player/recently-played payload into tracks.
 * Play entries without a title or artist are skipped; a missing album image
 * leaves imageUrl unset.
 */
export function parseRecentlyPlayed(payload: unknown): Track[] {
    const items: unknown = isRecord(payload) ? payload.items : undefined;
    if (!Array.isArray(items)) {
        throw new CollaboratorError("malformed", "Recently played payload has no items list");
    }

    const tracks: Track[] = [];
    items.forEach((item: unknown, index: number) => {
        const track = isRecord(item) && isRecord(item.track) ? item.track : undefined;
        const name = track ? readString(track, "name") : undefined;
        const firstArtist = track ? readFirstRecord(track, "artists") : undefined;
        const artist = firstArtist ? readString(firstArtist, "name") : undefined;

        if (!track || !name || !artist) {
            Logger.warn(`[Spotify] Skipping play #${index}: missing track name or artist`);
            return;
        }

        const album = isRecord(track.album) ? track.album : undefined;
        const image = album ? readFirstRecord(album, "images") : undefined;
        const imageUrl = image ? readString(image, "url") : undefined;

        tracks.push(imageUrl ? { name, artist, imageUrl } : { name, artist });
    });
    return tracks;
}

export class SpotifyRecentlyPlayedSource implements RecentlyPlayedSource {
    public name = "Spotify";

    constructor(
        private readonly config: Pick<SpotifyConfig, "apiBase">,
        private readonly tokens: AccessTokenProvider
    ) { }

    public async getRecentlyPlayed(limit: number): Promise<Track[]> {
        const token = await this.tokens.getAccessToken();
        const url = `${this.config.apiBase}/v1/me/player/recently-played?limit=${limit}`;

        Logger.info(`[Spotify] Fetching recently played: ${url}`);

        let response: Response;
        try {
            response = await fetch(url, {
                headers: { "Authorization": `Bearer ${token}` }
            });
        } catch (error) {
            throw new CollaboratorError("network", "Spotify request failed", error);
        }

        if (response.status === 401) {
            this.tokens.invalidate();
            throw new CollaboratorError("auth", "Spotify access token was rejected");
        }
        if (response.status === 403) {
            throw new CollaboratorError("auth", "Spotify token lacks the user-read-recently-played scope");
        }
        if (!response.ok) {
            throw new CollaboratorError("network", `Spotify request failed with status ${response.status}`);
        }

        const tracks = parseRecentlyPlayed(await readJsonBody(response, "Spotify"));
        Logger.info(`[Spotify] Received ${tracks.length} recently played tracks.`);
        return tracks;
    }
}

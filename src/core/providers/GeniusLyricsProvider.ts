import { Logger } from "../utils/Logger";
import { CollaboratorError, isAbortError } from "../utils/CollaboratorError";
import { isRecord, readJsonBody, readNumber, readString } from "../utils/json";
import { isSameTrack } from "../utils/TitleMatcher";
import type { LyricsProvider } from "../interfaces/LyricsProvider";
import type { LyricResult } from "../interfaces/LyricResult";
import type { GeniusConfig } from "../config/AppConfig";

export interface GeniusSongHit {
    id: string;
    title: string;
    artist: string;
    /** Path of the lyrics page, e.g. "/Artist-song-lyrics". */
    path: string;
    url: string;
}

/**
 * Song hits of a /search response, in the order Genius ranked them.
 */
export function parseSearchHits(payload: unknown): GeniusSongHit[] {
    const response = isRecord(payload) && isRecord(payload.response) ? payload.response : undefined;
    const hits: unknown = response ? response.hits : undefined;
    if (!Array.isArray(hits)) {
        throw new CollaboratorError("malformed", "Genius search payload has no hits list");
    }

    const songs: GeniusSongHit[] = [];
    for (const hit of hits) {
        if (!isRecord(hit) || hit.type !== "song" || !isRecord(hit.result)) continue;
        const result = hit.result;
        const title = readString(result, "title");
        const path = readString(result, "path");
        const primaryArtist = isRecord(result.primary_artist) ? result.primary_artist : undefined;
        const artist = primaryArtist ? readString(primaryArtist, "name") : undefined;
        if (!title || !path) continue;

        const id = readNumber(result, "id");
        songs.push({
            id: id === undefined ? path : String(id),
            title,
            artist: artist ?? "",
            path,
            url: readString(result, "url") ?? `https://genius.com${path}`
        });
    }
    return songs;
}

/**
 * The first hit matching title and artist, otherwise Genius' top hit.
 */
export function pickBestHit(hits: GeniusSongHit[], wanted: { title: string; artist: string }): GeniusSongHit | undefined {
    return hits.find(hit => isSameTrack(hit, wanted)) ?? hits[0];
}

/**
 * Reads the lyrics text out of a Genius song page.
 * Line breaks come from <br>; blocks are joined with a newline.
 */
export function extractLyrics(html: string): string {
    const doc = new DOMParser().parseFromString(html, "text/html");

    let blocks = Array.from(doc.querySelectorAll('[data-lyrics-container="true"]'));
    if (blocks.length === 0) {
        // pre-2020 page layout
        blocks = Array.from(doc.querySelectorAll("div.lyrics"));
    }

    return blocks
        .map(block => {
            block.querySelectorAll('[data-exclude-from-selection="true"]').forEach(el => el.remove());
            block.querySelectorAll("br").forEach(br => br.replaceWith("\n"));
            return block.textContent ?? "";
        })
        .join("\n")
        .trim();
}

export class GeniusLyricsProvider implements LyricsProvider {
    public name = "Genius";

    constructor(private readonly config: GeniusConfig) { }

    public async search(title: string, artist: string, signal?: AbortSignal): Promise<LyricResult | null> {
        if (!this.config.accessToken) {
            throw new CollaboratorError("auth", "GENIUS_ACCESS_TOKEN is not set");
        }

        const query = `${title} ${artist}`.trim();
        const searchUrl = `${this.config.apiBase}/search?q=${encodeURIComponent(query)}`;
        Logger.info(`[Genius] Searching: ${searchUrl}`);

        const searchResponse = await this.request(searchUrl, signal, {
            "Authorization": `Bearer ${this.config.accessToken}`
        });
        if (searchResponse.status === 401 || searchResponse.status === 403) {
            throw new CollaboratorError("auth", `Genius rejected the access token (status ${searchResponse.status})`);
        }
        if (!searchResponse.ok) {
            throw new CollaboratorError("network", `Genius search failed with status ${searchResponse.status}`);
        }

        const hits = parseSearchHits(await readJsonBody(searchResponse, "Genius"));
        const best = pickBestHit(hits, { title, artist });
        if (!best) {
            Logger.info(`[Genius] No songs found for "${query}".`);
            return null;
        }

        Logger.info(`[Genius] Using "${best.title}" by ${best.artist || "unknown artist"} (${hits.length} candidates)`);

        const pageResponse = await this.request(`${this.config.webBase}${best.path}`, signal);
        if (pageResponse.status === 404) {
            Logger.warn(`[Genius] Lyrics page ${best.path} does not exist.`);
            return null;
        }
        if (!pageResponse.ok) {
            throw new CollaboratorError("network", `Genius lyrics page failed with status ${pageResponse.status}`);
        }

        const lyricText = extractLyrics(await pageResponse.text());
        if (!lyricText) {
            Logger.info(`[Genius] Page ${best.path} has no lyrics.`);
            return null;
        }

        return {
            id: best.id,
            title: best.title,
            artist: best.artist,
            url: best.url,
            lyricText,
            source: this.name
        };
    }

    private async request(url: string, signal?: AbortSignal, headers?: Record<string, string>): Promise<Response> {
        try {
            return await fetch(url, { headers, signal });
        } catch (error) {
            if (isAbortError(error)) throw error;
            throw new CollaboratorError("network", `Genius request to ${url} failed`, error);
        }
    }
}

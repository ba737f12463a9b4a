import { Logger } from "../utils/Logger";
import { LOADING_LYRICS_TEXT, LYRICS_ERROR_TEXT, NO_LYRICS_TEXT, RECENT_TRACKS_LIMIT } from "../constants";
import { TrackStore } from "./TrackStore";
import { RecentTracksService } from "./RecentTracksService";
import { LyricsFetchWorker, type LyricsWorkerEvent } from "./LyricsFetchWorker";
import { ImageLoader } from "./ImageLoader";
import type { RecentlyPlayedSource } from "../interfaces/RecentlyPlayedSource";
import type { LyricsProvider } from "../interfaces/LyricsProvider";
import type { LyricsOutcome } from "../interfaces/LyricResult";
import type { Track } from "../interfaces/Track";
import type { ImageDisplay } from "../models/ImageDisplay";

export interface MiniPlayerState {
    /** List entries, in play order. */
    trackKeys: string[];
    selectedKey: string | null;
    lyricsVisible: boolean;
    lyricsText: string;
    image: ImageDisplay;
    loadingTracks: boolean;
}

export interface MiniPlayerDependencies {
    source: RecentlyPlayedSource;
    lyrics: LyricsProvider;
    images?: ImageLoader;
    limit?: number;
}

type StateListener = (state: MiniPlayerState) => void;

/**
 * What the lyrics region shows for a finished lookup.
 * Found lyrics are shown verbatim; errors never reach the user.
 */
export function lyricsTextFor(outcome: LyricsOutcome): string {
    switch (outcome.kind) {
        case "found":
            return outcome.text;
        case "not-found":
            return NO_LYRICS_TEXT;
        case "error":
            return LYRICS_ERROR_TEXT;
    }
}

/**
 * Main facade for the UI. Owns the track collection, the lyrics worker and
 * the album art, and publishes one state object to the view.
 */
export class MiniPlayerController {
    private state: MiniPlayerState = {
        trackKeys: [],
        selectedKey: null,
        lyricsVisible: false,
        lyricsText: "",
        image: { kind: "empty" },
        loadingTracks: false
    };
    private listeners: StateListener[] = [];

    private readonly store = new TrackStore();
    private readonly recentTracks: RecentTracksService;
    private readonly worker: LyricsFetchWorker;
    private readonly images: ImageLoader;
    private readonly limit: number;
    private readonly unsubscribeWorker: () => void;

    private pendingRefresh: Promise<void> | null = null;
    private imageRequest = 0;

    constructor(deps: MiniPlayerDependencies) {
        this.recentTracks = new RecentTracksService(deps.source, this.store);
        this.worker = new LyricsFetchWorker(deps.lyrics);
        this.images = deps.images ?? new ImageLoader();
        this.limit = deps.limit ?? RECENT_TRACKS_LIMIT;
        this.unsubscribeWorker = this.worker.subscribe(event => this.onLyrics(event));
    }

    public getState(): MiniPlayerState {
        return this.state;
    }

    public subscribe(listener: StateListener): () => void {
        this.listeners.push(listener);
        return () => {
            this.listeners = this.listeners.filter(l => l !== listener);
        };
    }

    public getTrack(key: string): Track | undefined {
        return this.store.get(key);
    }

    public getTrackCount(): number {
        return this.store.size;
    }

    /**
     * Clears everything and reloads the recently played list.
     * While a refresh is running, further calls join it.
     */
    public refresh(): Promise<void> {
        if (!this.pendingRefresh) {
            this.pendingRefresh = this.runRefresh().finally(() => {
                this.pendingRefresh = null;
            });
        }
        return this.pendingRefresh;
    }

    /**
     * Handles a list selection. null (nothing selected) hides the lyrics.
     * Resolves once both the image and the lyrics lookup have settled.
     */
    public async select(key: string | null): Promise<void> {
        if (key === null) {
            this.worker.cancel();
            this.update({ selectedKey: null, lyricsVisible: false });
            return;
        }

        Logger.info(`[Player] Track selected: ${key}`);
        this.update({ selectedKey: key, lyricsVisible: true, lyricsText: LOADING_LYRICS_TEXT });

        const image = this.showImage(key);
        const track = this.store.get(key);
        if (!track) {
            Logger.warn(`[Player] "${key}" is not in the current track list.`);
            this.worker.cancel();
            this.update({ lyricsText: NO_LYRICS_TEXT });
            await image;
            return;
        }

        await Promise.all([image, this.worker.request(track)]);
    }

    public dispose() {
        this.unsubscribeWorker();
        this.worker.cancel();
        this.imageRequest++;
        this.images.release(this.state.image);
        this.listeners = [];
    }

    private async runRefresh(): Promise<void> {
        this.worker.cancel();
        this.store.clear();
        this.imageRequest++;
        this.update({
            trackKeys: [],
            selectedKey: null,
            lyricsVisible: false,
            lyricsText: "",
            loadingTracks: true
        });

        const keys = await this.recentTracks.loadRecent(this.limit);
        this.update({ trackKeys: keys, loadingTracks: false });

        if (keys.length > 0) {
            await this.showImage(keys[0]);
        } else {
            this.setImage({ kind: "empty" });
        }
    }

    private async showImage(key: string): Promise<void> {
        const id = ++this.imageRequest;
        const display = await this.images.load(this.store.get(key));
        if (id !== this.imageRequest) {
            this.images.release(display);
            return;
        }
        this.setImage(display);
    }

    private setImage(display: ImageDisplay) {
        this.images.release(this.state.image);
        this.update({ image: display });
    }

    private onLyrics(event: LyricsWorkerEvent) {
        Logger.debug(`[Player] Lyrics request #${event.requestId} finished: ${event.outcome.kind}`);
        this.update({ lyricsText: lyricsTextFor(event.outcome) });
    }

    private update(patch: Partial<MiniPlayerState>) {
        this.state = { ...this.state, ...patch };
        this.listeners.forEach(l => l(this.state));
    }
}

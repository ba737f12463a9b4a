import { Logger } from "../utils/Logger";
import { describeError, isAbortError } from "../utils/CollaboratorError";
import type { LyricsProvider } from "../interfaces/LyricsProvider";
import type { LyricsOutcome } from "../interfaces/LyricResult";
import type { Track } from "../interfaces/Track";

export type LyricsWorkerState = "idle" | "running" | "completed" | "failed";

export interface LyricsWorkerEvent {
    requestId: number;
    track: Pick<Track, "name" | "artist">;
    outcome: LyricsOutcome;
}

type LyricsWorkerListener = (event: LyricsWorkerEvent) => void;

interface ActiveRequest {
    id: number;
    controller: AbortController;
}

/**
 * Runs one lyrics lookup at a time.
 *
 * A new request supersedes the running one: the old request's signal is
 * aborted and whatever it eventually produces is dropped, so listeners only
 * ever hear about the latest request. Providers that ignore the signal still
 * finish in the background; their result is discarded.
 */
export class LyricsFetchWorker {
    private state: LyricsWorkerState = "idle";
    private active: ActiveRequest | null = null;
    private nextId = 1;
    private listeners: LyricsWorkerListener[] = [];

    constructor(private readonly provider: LyricsProvider) { }

    public getState(): LyricsWorkerState {
        return this.state;
    }

    public subscribe(listener: LyricsWorkerListener): () => void {
        this.listeners.push(listener);
        return () => {
            this.listeners = this.listeners.filter(l => l !== listener);
        };
    }

    /**
     * Resolves with the outcome, or null when a newer request (or cancel())
     * superseded this one.
     */
    public async request(track: Pick<Track, "name" | "artist">): Promise<LyricsOutcome | null> {
        this.supersede();

        const current: ActiveRequest = { id: this.nextId++, controller: new AbortController() };
        this.active = current;
        this.state = "running";
        Logger.debug(`[LyricsWorker] Request #${current.id}: ${track.name} - ${track.artist}`);

        let outcome: LyricsOutcome;
        try {
            const song = await this.provider.search(track.name, track.artist, current.controller.signal);
            if (!this.isCurrent(current)) return this.discard(current);
            outcome = song && song.lyricText
                ? { kind: "found", text: song.lyricText }
                : { kind: "not-found" };
        } catch (error) {
            if (!this.isCurrent(current) || isAbortError(error)) return this.discard(current);
            Logger.error(`[LyricsWorker] Error fetching lyrics: ${describeError(error)}`, error);
            outcome = { kind: "error", message: describeError(error) };
        }

        this.active = null;
        this.state = outcome.kind === "error" ? "failed" : "completed";
        const event: LyricsWorkerEvent = { requestId: current.id, track, outcome };
        this.listeners.forEach(l => l(event));
        return outcome;
    }

    /**
     * Drops the running request, if any, without starting another.
     */
    public cancel() {
        if (this.supersede()) {
            this.state = "idle";
        }
    }

    private supersede(): boolean {
        if (!this.active) return false;
        Logger.debug(`[LyricsWorker] Superseding request #${this.active.id}`);
        this.active.controller.abort();
        this.active = null;
        return true;
    }

    private isCurrent(request: ActiveRequest): boolean {
        return this.active !== null && this.active.id === request.id;
    }

    private discard(request: ActiveRequest): null {
        Logger.debug(`[LyricsWorker] Discarding result of superseded request #${request.id}`);
        return null;
    }
}

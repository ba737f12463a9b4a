import { trackKey, type Track } from "../interfaces/Track";

/**
 * In-memory track collection of the current refresh.
 * Replaced wholesale, never merged.
 */
export class TrackStore {
    private tracks = new Map<string, Track>();
    private order: string[] = [];

    /**
     * Replaces the collection and returns the display keys in the given order.
     * A track played twice appears twice in the list but once in the map.
     */
    public replaceAll(tracks: Track[]): string[] {
        this.tracks = new Map();
        this.order = tracks.map(track => {
            const key = trackKey(track);
            this.tracks.set(key, track);
            return key;
        });
        return this.keys();
    }

    public clear() {
        this.tracks = new Map();
        this.order = [];
    }

    public get(key: string): Track | undefined {
        return this.tracks.get(key);
    }

    public has(key: string): boolean {
        return this.tracks.has(key);
    }

    public keys(): string[] {
        return [...this.order];
    }

    public get size(): number {
        return this.tracks.size;
    }
}

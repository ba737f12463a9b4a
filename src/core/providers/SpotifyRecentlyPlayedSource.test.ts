import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { SpotifyRecentlyPlayedSource, parseRecentlyPlayed } from './SpotifyRecentlyPlayedSource';
import type { AccessTokenProvider } from './SpotifyTokenProvider';

function play(name: string, artist: string, imageUrl?: string) {
    return {
        played_at: '2026-10-01T12:00:00.000Z',
        track: {
            name,
            artists: [{ name: artist }, { name: 'Someone Else' }],
            album: { images: imageUrl ? [{ url: imageUrl, width: 640, height: 640 }] : [] }
        }
    };
}

describe('parseRecentlyPlayed', () => {
    beforeEach(() => {
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should keep the order and take the first artist and image', () => {
        const tracks = parseRecentlyPlayed({
            items: [
                play('Song A', 'Artist A', 'https://img.test/a.jpg'),
                play('Song B', 'Artist B', 'https://img.test/b.jpg'),
                play('Song C', 'Artist C', 'https://img.test/c.jpg')
            ]
        });

        expect(tracks).toEqual([
            { name: 'Song A', artist: 'Artist A', imageUrl: 'https://img.test/a.jpg' },
            { name: 'Song B', artist: 'Artist B', imageUrl: 'https://img.test/b.jpg' },
            { name: 'Song C', artist: 'Artist C', imageUrl: 'https://img.test/c.jpg' }
        ]);
    });

    it('should leave imageUrl unset when the album has no art', () => {
        const [track] = parseRecentlyPlayed({ items: [play('Song A', 'Artist A')] });
        expect(track).toEqual({ name: 'Song A', artist: 'Artist A' });
        expect('imageUrl' in track).toBe(false);
    });

    it('should skip plays without a name or artist', () => {
        const tracks = parseRecentlyPlayed({
            items: [
                { track: { name: 'No Artist', artists: [], album: {} } },
                { track: null },
                play('Song B', 'Artist B')
            ]
        });
        expect(tracks).toEqual([{ name: 'Song B', artist: 'Artist B' }]);
    });

    it('should reject a payload without items', () => {
        expect(() => parseRecentlyPlayed({ error: 'oops' })).toThrow('Recently played payload has no items list');
        expect(() => parseRecentlyPlayed('nope')).toThrow('Recently played payload has no items list');
    });
});

describe('SpotifyRecentlyPlayedSource', () => {
    const fetchMock = vi.fn();
    const tokens: AccessTokenProvider = {
        getAccessToken: () => Promise.resolve('test-token'),
        invalidate: vi.fn()
    };

    beforeEach(() => {
        fetchMock.mockReset();
        vi.stubGlobal('fetch', fetchMock);
        vi.spyOn(console, 'info').mockImplementation(() => undefined);
    });

    afterEach(() => {
        vi.unstubAllGlobals();
        vi.restoreAllMocks();
    });

    it('should request the given number of plays with the bearer token', async () => {
        fetchMock.mockResolvedValueOnce({
            ok: true,
            status: 200,
            json: () => Promise.resolve({ items: [play('Song A', 'Artist A')] })
        });
        const source = new SpotifyRecentlyPlayedSource({ apiBase: '/api/spotify' }, tokens);

        const tracks = await source.getRecentlyPlayed(10);

        expect(tracks).toEqual([{ name: 'Song A', artist: 'Artist A' }]);
        const [url, init] = fetchMock.mock.calls[0];
        expect(url).toBe('/api/spotify/v1/me/player/recently-played?limit=10');
        expect(init.headers['Authorization']).toBe('Bearer test-token');
    });

    it('should drop the cached token when Spotify answers 401', async () => {
        fetchMock.mockResolvedValueOnce({ ok: false, status: 401, json: () => Promise.resolve({}) });
        const source = new SpotifyRecentlyPlayedSource({ apiBase: '/api/spotify' }, tokens);

        await expect(source.getRecentlyPlayed(10)).rejects.toMatchObject({ kind: 'auth' });
        expect(tokens.invalidate).toHaveBeenCalled();
    });

    it('should report server errors as network failures', async () => {
        fetchMock.mockResolvedValueOnce({ ok: false, status: 503, json: () => Promise.resolve({}) });
        const source = new SpotifyRecentlyPlayedSource({ apiBase: '/api/spotify' }, tokens);

        await expect(source.getRecentlyPlayed(10)).rejects.toMatchObject({
            kind: 'network',
            message: 'Spotify request failed with status 503'
        });
    });

    it('should report a body that is not JSON as malformed', async () => {
        fetchMock.mockResolvedValueOnce({
            ok: true,
            status: 200,
            json: () => Promise.reject(new SyntaxError('Unexpected token <'))
        });
        const source = new SpotifyRecentlyPlayedSource({ apiBase: '/api/spotify' }, tokens);

        await expect(source.getRecentlyPlayed(10)).rejects.toMatchObject({ kind: 'malformed' });
    });
});

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { LyricsFetchWorker, type LyricsWorkerEvent } from './LyricsFetchWorker';
import { ControlledLyricsProvider, lyricsFor } from '../testing/fakes';
import { CollaboratorError } from '../utils/CollaboratorError';

describe('LyricsFetchWorker', () => {
    let provider: ControlledLyricsProvider;
    let worker: LyricsFetchWorker;
    let events: LyricsWorkerEvent[];

    beforeEach(() => {
        vi.spyOn(console, 'error').mockImplementation(() => undefined);
        provider = new ControlledLyricsProvider();
        worker = new LyricsFetchWorker(provider);
        events = [];
        worker.subscribe(event => events.push(event));
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should start idle', () => {
        expect(worker.getState()).toBe('idle');
    });

    it('should report found lyrics', async () => {
        const pending = worker.request({ name: 'Song A', artist: 'Artist A' });
        expect(worker.getState()).toBe('running');
        expect(provider.last().title).toBe('Song A');
        expect(provider.last().artist).toBe('Artist A');

        provider.last().resolve(lyricsFor('Song A', 'Artist A', 'first line\nsecond line'));

        expect(await pending).toEqual({ kind: 'found', text: 'first line\nsecond line' });
        expect(worker.getState()).toBe('completed');
        expect(events).toHaveLength(1);
        expect(events[0].track).toEqual({ name: 'Song A', artist: 'Artist A' });
        expect(events[0].outcome).toEqual({ kind: 'found', text: 'first line\nsecond line' });
    });

    it('should report not-found when the provider has no song', async () => {
        const pending = worker.request({ name: 'Song A', artist: 'Artist A' });
        provider.last().resolve(null);
        expect(await pending).toEqual({ kind: 'not-found' });
        expect(worker.getState()).toBe('completed');
    });

    it('should treat empty lyrics as not found', async () => {
        const pending = worker.request({ name: 'Song A', artist: 'Artist A' });
        provider.last().resolve(lyricsFor('Song A', 'Artist A', ''));
        expect(await pending).toEqual({ kind: 'not-found' });
    });

    it('should turn provider faults into an error outcome', async () => {
        const pending = worker.request({ name: 'Song A', artist: 'Artist A' });
        provider.last().reject(new CollaboratorError('network', 'Genius search failed with status 500'));

        expect(await pending).toEqual({ kind: 'error', message: 'network: Genius search failed with status 500' });
        expect(worker.getState()).toBe('failed');
        expect(events[0].outcome.kind).toBe('error');
    });

    it('should abort and discard a superseded request', async () => {
        const first = worker.request({ name: 'Song A', artist: 'Artist A' });
        const second = worker.request({ name: 'Song B', artist: 'Artist B' });
        const [lookupA, lookupB] = provider.calls;

        expect(lookupA.signal?.aborted).toBe(true);
        expect(lookupB.signal?.aborted).toBe(false);

        lookupB.resolve(lyricsFor('Song B', 'Artist B', 'B lyrics'));
        expect(await second).toEqual({ kind: 'found', text: 'B lyrics' });

        // the old lookup finishes late
        lookupA.resolve(lyricsFor('Song A', 'Artist A', 'A lyrics'));
        expect(await first).toBeNull();

        expect(events.map(e => e.outcome)).toEqual([{ kind: 'found', text: 'B lyrics' }]);
        expect(worker.getState()).toBe('completed');
    });

    it('should discard a superseded request that finishes first', async () => {
        const first = worker.request({ name: 'Song A', artist: 'Artist A' });
        const second = worker.request({ name: 'Song B', artist: 'Artist B' });
        const [lookupA, lookupB] = provider.calls;

        lookupA.reject(new CollaboratorError('network', 'late failure'));
        expect(await first).toBeNull();
        expect(worker.getState()).toBe('running');
        expect(events).toHaveLength(0);

        lookupB.resolve(null);
        expect(await second).toEqual({ kind: 'not-found' });
        expect(events).toHaveLength(1);
    });

    it('should drop the running request on cancel()', async () => {
        const pending = worker.request({ name: 'Song A', artist: 'Artist A' });
        worker.cancel();

        expect(worker.getState()).toBe('idle');
        expect(provider.last().signal?.aborted).toBe(true);

        provider.last().resolve(lyricsFor('Song A', 'Artist A', 'too late'));
        expect(await pending).toBeNull();
        expect(events).toHaveLength(0);
    });

    it('should number requests', async () => {
        const first = worker.request({ name: 'Song A', artist: 'Artist A' });
        provider.last().resolve(null);
        await first;
        const second = worker.request({ name: 'Song B', artist: 'Artist B' });
        provider.last().resolve(null);
        await second;

        expect(events.map(e => e.requestId)).toEqual([1, 2]);
    });
});

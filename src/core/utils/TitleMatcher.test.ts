import { describe, it, expect } from 'vitest';
import { cleanTitle, editDistance, isSameTrack, similarity } from './TitleMatcher';

describe('TitleMatcher', () => {
    it('should count edits', () => {
        expect(editDistance("kitten", "sitting")).toBe(3);
        expect(editDistance("", "abc")).toBe(3);
        expect(editDistance("same", "same")).toBe(0);
    });

    it('should ignore case and accents', () => {
        expect(similarity("Hello", "hello")).toBe(1.0);
        expect(similarity("Beyonce", "Beyoncé")).toBe(1.0);
        expect(similarity("Mötley Crüe", "Motley Crue")).toBe(1.0);
    });

    it('should handle partial mismatches', () => {
        // dist=1, len=4
        expect(similarity("test", "tent")).toBe(0.75);
    });

    it('should strip streaming-service title decorations', () => {
        expect(cleanTitle("Come Together - Remastered 2009")).toBe("Come Together");
        expect(cleanTitle("Stay (feat. Justin Bieber)")).toBe("Stay");
        expect(cleanTitle("Yesterday")).toBe("Yesterday");
    });

    it('should match tracks despite decorations', () => {
        expect(isSameTrack(
            { title: "Come Together", artist: "The Beatles" },
            { title: "Come Together - Remastered 2009", artist: "The Beatles" }
        )).toBe(true);
    });

    it('should reject different titles or artists', () => {
        expect(isSameTrack(
            { title: "Something Else", artist: "The Beatles" },
            { title: "Come Together", artist: "The Beatles" }
        )).toBe(false);
        expect(isSameTrack(
            { title: "Come Together", artist: "Aerosmith" },
            { title: "Come Together", artist: "The Beatles" }
        )).toBe(false);
    });
});

/**
 * Fuzzy comparison of track titles and artist names coming from two
 * different services (Spotify spells "Beyoncé", Genius may not).
 */

export const MATCH_THRESHOLD = 0.8;

/**
 * Lower-cases, strips diacritics and collapses whitespace.
 */
export function normalizeText(value: string): string {
    return value
        .normalize("NFD")
        .replace(/[\u0300-\u036f]/g, "")
        .toLowerCase()
        .replace(/\s+/g, " ")
        .trim();
}

/**
 * Drops the decorations Spotify appends to titles:
 * "Song - Remastered 2011", "Song (feat. X)", "Song [Live]".
 */
export function cleanTitle(title: string): string {
    const cleaned = title
        .replace(/\s+-\s+.*(remaster|version|edit|mix|live|mono|stereo|demo).*$/i, "")
        .replace(/\s*[([](feat\.?|ft\.?|with|featuring)\s[^)\]]*[)\]]/gi, "")
        .replace(/\s*[([][^)\]]*(remaster|version|edit|mix|live|mono|stereo|demo)[^)\]]*[)\]]/gi, "")
        .trim();
    return cleaned.length > 0 ? cleaned : title.trim();
}

/**
 * Edit distance, single-row variant.
 */
export function editDistance(a: string, b: string): number {
    if (a.length === 0) return b.length;
    if (b.length === 0) return a.length;

    let previous = Array.from({ length: b.length + 1 }, (_, j) => j);
    for (let i = 1; i <= a.length; i++) {
        const current = [i];
        for (let j = 1; j <= b.length; j++) {
            const cost = a[i - 1] === b[j - 1] ? 0 : 1;
            current[j] = Math.min(
                previous[j] + 1,
                current[j - 1] + 1,
                previous[j - 1] + cost
            );
        }
        previous = current;
    }
    return previous[b.length];
}

/**
 * 1.0 means identical after normalization.
 */
export function similarity(a: string, b: string): number {
    const left = normalizeText(a);
    const right = normalizeText(b);
    const longest = Math.max(left.length, right.length);
    if (longest === 0) return 1;
    return 1 - editDistance(left, right) / longest;
}

export function isSameTrack(
    candidate: { title: string; artist: string },
    wanted: { title: string; artist: string }
): boolean {
    const titleScore = Math.max(
        similarity(candidate.title, wanted.title),
        similarity(cleanTitle(candidate.title), cleanTitle(wanted.title))
    );
    if (titleScore < MATCH_THRESHOLD) return false;
    if (!wanted.artist) return true;
    return similarity(candidate.artist, wanted.artist) >= MATCH_THRESHOLD;
}

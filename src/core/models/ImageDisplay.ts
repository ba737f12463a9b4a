/**
 * What the album art region shows.
 */
export type ImageDisplay =
    | { kind: 'empty' }
    | {
        kind: 'image';
        /** Object URL of the fetched bytes. */
        src: string;
        /** Rendered size, already fitted into the display box. */
        width: number;
        height: number;
    }
    | { kind: 'placeholder'; text: string };

export interface ImageSize {
    width: number;
    height: number;
}

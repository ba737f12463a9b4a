export const APP_TITLE = "Lyrics Mini Player";

/** Page size of the recently played list. */
export const RECENT_TRACKS_LIMIT = 10;

/** Album art is fitted into a square of this many pixels. */
export const IMAGE_BOX_SIZE = 200;

export const LOADING_LYRICS_TEXT = "Loading lyrics...";
export const NO_LYRICS_TEXT = "No lyrics available for this track.";
export const LYRICS_ERROR_TEXT = "Error fetching lyrics. Please try again later.";

export const NO_IMAGE_TEXT = "No image available";
export const IMAGE_ERROR_TEXT = "Error loading image";

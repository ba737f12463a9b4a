import { Logger } from "../utils/Logger";
import { CollaboratorError, describeError } from "../utils/CollaboratorError";
import { IMAGE_BOX_SIZE, IMAGE_ERROR_TEXT, NO_IMAGE_TEXT } from "../constants";
import type { Track } from "../interfaces/Track";
import type { ImageDisplay, ImageSize } from "../models/ImageDisplay";

/**
 * Reads the natural size of encoded image bytes. Rejects if they are not an image.
 */
export type ImageDecoder = (blob: Blob) => Promise<ImageSize>;

export interface ImageLoaderOptions {
    decode?: ImageDecoder;
    createUrl?: (blob: Blob) => string;
    revokeUrl?: (url: string) => void;
    boxSize?: number;
}

export async function decodeWithBitmap(blob: Blob): Promise<ImageSize> {
    const bitmap = await createImageBitmap(blob);
    try {
        return { width: bitmap.width, height: bitmap.height };
    } finally {
        bitmap.close();
    }
}

/**
 * Largest size with the same aspect ratio that fits a box x box square.
 * Small images are scaled up.
 */
export function fitWithin(size: ImageSize, box: number): ImageSize {
    if (size.width <= 0 || size.height <= 0) {
        throw new CollaboratorError("malformed", `Image has invalid size ${size.width}x${size.height}`);
    }
    const scale = Math.min(box / size.width, box / size.height);
    return {
        width: Math.max(1, Math.round(size.width * scale)),
        height: Math.max(1, Math.round(size.height * scale))
    };
}

/**
 * Album art for the selected track.
 */
export class ImageLoader {
    private readonly decode: ImageDecoder;
    private readonly createUrl: (blob: Blob) => string;
    private readonly revokeUrl: (url: string) => void;
    private readonly boxSize: number;

    constructor(options: ImageLoaderOptions = {}) {
        this.decode = options.decode ?? decodeWithBitmap;
        this.createUrl = options.createUrl ?? (blob => URL.createObjectURL(blob));
        this.revokeUrl = options.revokeUrl ?? (url => URL.revokeObjectURL(url));
        this.boxSize = options.boxSize ?? IMAGE_BOX_SIZE;
    }

    /**
     * Never rejects: failures become placeholder text.
     */
    public async load(track: Track | undefined): Promise<ImageDisplay> {
        if (!track || !track.imageUrl) {
            return { kind: "placeholder", text: NO_IMAGE_TEXT };
        }

        try {
            let response: Response;
            try {
                response = await fetch(track.imageUrl);
            } catch (error) {
                throw new CollaboratorError("network", "Image request failed", error);
            }
            if (!response.ok) {
                throw new CollaboratorError("network", `Image request failed with status ${response.status}`);
            }

            const blob = await response.blob();
            const fitted = fitWithin(await this.decode(blob), this.boxSize);
            Logger.debug(`[ImageLoader] Loaded ${track.imageUrl} as ${fitted.width}x${fitted.height}`);
            return { kind: "image", src: this.createUrl(blob), ...fitted };
        } catch (error) {
            Logger.error(`[ImageLoader] Error displaying image: ${describeError(error)}`, error);
            return { kind: "placeholder", text: IMAGE_ERROR_TEXT };
        }
    }

    /**
     * Frees the object URL of a display that is no longer shown.
     */
    public release(display: ImageDisplay) {
        if (display.kind === "image") {
            this.revokeUrl(display.src);
        }
    }
}

import type { ImageDisplay } from '@/core/models/ImageDisplay';
import { IMAGE_BOX_SIZE } from '@/core/constants';

export function AlbumArt({ image }: { image: ImageDisplay }) {
    return (
        <div style={{ display: 'flex', justifyContent: 'center' }}>
            <div
                className="album-art"
                data-testid="album-art"
                style={{
                    width: `${IMAGE_BOX_SIZE}px`,
                    height: `${IMAGE_BOX_SIZE}px`,
                    display: 'flex',
                    alignItems: 'center',
                    justifyContent: 'center',
                    background: '#f0f0f0',
                    border: '1px solid #ddd',
                    borderRadius: '5px',
                    color: '#555'
                }}
            >
                {image.kind === 'image' && (
                    <img
                        src={image.src}
                        width={image.width}
                        height={image.height}
                        alt="Album art"
                        // smooth resampling when the browser scales the bitmap
                        style={{ imageRendering: 'auto' }}
                    />
                )}
                {image.kind === 'placeholder' && <span>{image.text}</span>}
            </div>
        </div>
    );
}

import { StrictMode } from 'react';
import { createRoot } from 'react-dom/client';
import App from '@/ui/App';
import { loadConfig } from '@/core/config/AppConfig';
import { Logger } from '@/core/utils/Logger';
import { APP_TITLE } from '@/core/constants';
import { MiniPlayerController } from '@/core/services/MiniPlayerController';
import { SpotifyTokenProvider } from '@/core/providers/SpotifyTokenProvider';
import { SpotifyRecentlyPlayedSource } from '@/core/providers/SpotifyRecentlyPlayedSource';
import { GeniusLyricsProvider } from '@/core/providers/GeniusLyricsProvider';

const config = loadConfig({
    SPOTIFY_CLIENT_ID: import.meta.env.SPOTIFY_CLIENT_ID,
    SPOTIFY_CLIENT_SECRET: import.meta.env.SPOTIFY_CLIENT_SECRET,
    SPOTIFY_REFRESH_TOKEN: import.meta.env.SPOTIFY_REFRESH_TOKEN,
    SPOTIFY_ACCESS_TOKEN: import.meta.env.SPOTIFY_ACCESS_TOKEN,
    SPOTIFY_API_BASE: import.meta.env.SPOTIFY_API_BASE,
    SPOTIFY_ACCOUNTS_BASE: import.meta.env.SPOTIFY_ACCOUNTS_BASE,
    GENIUS_ACCESS_TOKEN: import.meta.env.GENIUS_ACCESS_TOKEN,
    GENIUS_API_BASE: import.meta.env.GENIUS_API_BASE,
    GENIUS_WEB_BASE: import.meta.env.GENIUS_WEB_BASE,
    PLAYER_LOG_LEVEL: import.meta.env.PLAYER_LOG_LEVEL
});
Logger.setLevel(config.logLevel);

// Single controller for the app
const controller = new MiniPlayerController({
    source: new SpotifyRecentlyPlayedSource(config.spotify, new SpotifyTokenProvider(config.spotify)),
    lyrics: new GeniusLyricsProvider(config.genius)
});

document.title = APP_TITLE;

const rootElement = document.getElementById('root');
if (!rootElement) {
    throw new Error('Missing #root element');
}

createRoot(rootElement).render(
    <StrictMode>
        <App controller={controller} />
    </StrictMode>
);

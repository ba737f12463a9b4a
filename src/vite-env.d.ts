/// <reference types="vite/client" />

interface ImportMetaEnv {
    readonly SPOTIFY_CLIENT_ID?: string;
    readonly SPOTIFY_CLIENT_SECRET?: string;
    readonly SPOTIFY_REFRESH_TOKEN?: string;
    readonly SPOTIFY_ACCESS_TOKEN?: string;
    readonly SPOTIFY_API_BASE?: string;
    readonly SPOTIFY_ACCOUNTS_BASE?: string;
    readonly GENIUS_ACCESS_TOKEN?: string;
    readonly GENIUS_API_BASE?: string;
    readonly GENIUS_WEB_BASE?: string;
    readonly PLAYER_LOG_LEVEL?: string;
}

interface ImportMeta {
    readonly env: ImportMetaEnv;
}

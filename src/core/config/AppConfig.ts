import { Logger, LOG_LEVELS, type LogLevel } from "../utils/Logger";

export interface SpotifyConfig {
    clientId: string;
    clientSecret: string;
    /** Long-lived token issued once for the user-read-recently-played scope. */
    refreshToken: string;
    /** Optional short-lived token used as-is instead of the refresh grant. */
    accessToken: string;
    apiBase: string;
    accountsBase: string;
}

export interface GeniusConfig {
    accessToken: string;
    apiBase: string;
    webBase: string;
}

export interface AppConfig {
    spotify: SpotifyConfig;
    genius: GeniusConfig;
    logLevel: LogLevel;
    /** Names of credentials that were not set. */
    missing: string[];
}

export type EnvSource = Record<string, string | undefined>;

// Dev-server proxy paths, see vite.config.ts
const DEFAULT_BASES = {
    spotifyApi: "/api/spotify",
    spotifyAccounts: "/api/spotify-accounts",
    geniusApi: "/api/genius",
    geniusWeb: "/api/genius-web"
};

function read(env: EnvSource, name: string): string {
    return (env[name] ?? "").trim();
}

function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some(level => level === value);
}

/**
 * Builds the configuration from environment variables.
 * Never throws: missing credentials are reported and surface later as auth
 * failures of the service that needs them.
 */
export function loadConfig(env: EnvSource): AppConfig {
    const missing: string[] = [];

    const spotify: SpotifyConfig = {
        clientId: read(env, "SPOTIFY_CLIENT_ID"),
        clientSecret: read(env, "SPOTIFY_CLIENT_SECRET"),
        refreshToken: read(env, "SPOTIFY_REFRESH_TOKEN"),
        accessToken: read(env, "SPOTIFY_ACCESS_TOKEN"),
        apiBase: read(env, "SPOTIFY_API_BASE") || DEFAULT_BASES.spotifyApi,
        accountsBase: read(env, "SPOTIFY_ACCOUNTS_BASE") || DEFAULT_BASES.spotifyAccounts
    };

    if (!spotify.accessToken) {
        if (!spotify.clientId) missing.push("SPOTIFY_CLIENT_ID");
        if (!spotify.clientSecret) missing.push("SPOTIFY_CLIENT_SECRET");
        if (!spotify.refreshToken) missing.push("SPOTIFY_REFRESH_TOKEN");
    }

    const genius: GeniusConfig = {
        accessToken: read(env, "GENIUS_ACCESS_TOKEN"),
        apiBase: read(env, "GENIUS_API_BASE") || DEFAULT_BASES.geniusApi,
        webBase: read(env, "GENIUS_WEB_BASE") || DEFAULT_BASES.geniusWeb
    };

    if (!genius.accessToken) missing.push("GENIUS_ACCESS_TOKEN");

    let logLevel: LogLevel = "info";
    const rawLevel = read(env, "PLAYER_LOG_LEVEL").toLowerCase();
    if (rawLevel) {
        if (isLogLevel(rawLevel)) {
            logLevel = rawLevel;
        } else {
            Logger.warn(`[Config] Unknown PLAYER_LOG_LEVEL "${rawLevel}", using "info".`);
        }
    }

    missing.forEach(name => Logger.warn(`[Config] ${name} is not set.`));

    return { spotify, genius, logLevel, missing };
}

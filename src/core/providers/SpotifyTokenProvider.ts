import { Logger } from "../utils/Logger";
import { CollaboratorError } from "../utils/CollaboratorError";
import { isRecord, readJsonBody, readNumber, readString } from "../utils/json";
import type { SpotifyConfig } from "../config/AppConfig";

/**
 * Supplies bearer tokens to a service client.
 */
export interface AccessTokenProvider {
    getAccessToken(): Promise<string>;

    /**
     * Forget the cached token, e.g. after the API answered 401.
     */
    invalidate(): void;
}

// Refresh a minute early so a token never expires mid-request.
const EXPIRY_MARGIN_MS = 60_000;
const DEFAULT_LIFETIME_S = 3600;

/**
 * Spotify OAuth tokens from the refresh-token grant.
 * The interactive authorization step that issues the refresh token is not
 * part of the app; the token is read from configuration.
 */
export class SpotifyTokenProvider implements AccessTokenProvider {
    private cached: { token: string; expiresAt: number } | null = null;
    private pending: Promise<string> | null = null;

    constructor(
        private readonly config: SpotifyConfig,
        private readonly now: () => number = Date.now
    ) { }

    public async getAccessToken(): Promise<string> {
        if (this.config.accessToken) return this.config.accessToken;

        if (this.cached && this.now() < this.cached.expiresAt) {
            return this.cached.token;
        }

        // Concurrent callers share one refresh request.
        if (!this.pending) {
            this.pending = this.refresh().finally(() => {
                this.pending = null;
            });
        }
        return this.pending;
    }

    public invalidate() {
        this.cached = null;
    }

    private async refresh(): Promise<string> {
        const { clientId, clientSecret, refreshToken, accountsBase } = this.config;
        if (!clientId || !clientSecret || !refreshToken) {
            throw new CollaboratorError("auth", "Spotify credentials are not configured");
        }

        Logger.info("[SpotifyAuth] Refreshing access token");

        let response: Response;
        try {
            response = await fetch(`${accountsBase}/api/token`, {
                method: "POST",
                headers: {
                    "Authorization": `Basic ${btoa(`${clientId}:${clientSecret}`)}`,
                    "Content-Type": "application/x-www-form-urlencoded"
                },
                body: new URLSearchParams({
                    grant_type: "refresh_token",
                    refresh_token: refreshToken
                }).toString()
            });
        } catch (error) {
            throw new CollaboratorError("network", "Spotify token request failed", error);
        }

        if (response.status === 400 || response.status === 401) {
            throw new CollaboratorError("auth", `Spotify rejected the credentials (status ${response.status})`);
        }
        if (!response.ok) {
            throw new CollaboratorError("network", `Spotify token request failed with status ${response.status}`);
        }

        const body = await readJsonBody(response, "Spotify accounts");
        const token = isRecord(body) ? readString(body, "access_token") : undefined;
        if (!token) {
            throw new CollaboratorError("malformed", "Spotify token response has no access_token");
        }

        const lifetime = (isRecord(body) ? readNumber(body, "expires_in") : undefined) ?? DEFAULT_LIFETIME_S;
        this.cached = {
            token,
            expiresAt: this.now() + lifetime * 1000 - EXPIRY_MARGIN_MS
        };
        Logger.debug(`[SpotifyAuth] Token valid for ${lifetime}s`);
        return token;
    }
}

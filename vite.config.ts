import { fileURLToPath, URL } from 'node:url'
import { defineConfig } from 'vite'
import react from '@vitejs/plugin-react'

// https://vitejs.dev/config/
export default defineConfig({
    plugins: [react()],
    resolve: {
        alias: {
            '@': fileURLToPath(new URL('./src', import.meta.url)),
        },
    },
    // Credentials are read by src/core/config/AppConfig.ts
    envPrefix: ['SPOTIFY_', 'GENIUS_', 'PLAYER_'],
    server: {
        port: 8888,
        proxy: {
            '/api/spotify-accounts': {
                target: 'https://accounts.spotify.com',
                changeOrigin: true,
                rewrite: (path) => path.replace(/^\/api\/spotify-accounts/, ""),
            },
            '/api/spotify': {
                target: 'https://api.spotify.com',
                changeOrigin: true,
                rewrite: (path) => path.replace(/^\/api\/spotify/, ""),
            },
            '/api/genius-web': {
                target: 'https://genius.com',
                changeOrigin: true,
                rewrite: (path) => path.replace(/^\/api\/genius-web/, ""),
                headers: {
                    'User-Agent': 'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36'
                }
            },
            '/api/genius': {
                target: 'https://api.genius.com',
                changeOrigin: true,
                rewrite: (path) => path.replace(/^\/api\/genius/, ""),
            }
        }
    }
})

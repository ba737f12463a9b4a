import { useEffect, useState } from 'react';
import { MiniPlayerController, type MiniPlayerState } from '@/core/services/MiniPlayerController';
import { APP_TITLE } from '@/core/constants';
import { Logger } from '@/core/utils/Logger';
import { TrackList } from './components/TrackList';
import { AlbumArt } from './components/AlbumArt';
import { LyricsPanel } from './components/LyricsPanel';
import { LogViewer } from './components/LogViewer';

interface AppProps {
    controller: MiniPlayerController;
    showLogs?: boolean;
}

function logFailure(action: string) {
    return (error: unknown) => Logger.error(`[App] ${action} failed`, error);
}

export default function App({ controller, showLogs = true }: AppProps) {
    const [state, setState] = useState<MiniPlayerState>(() => controller.getState());

    useEffect(() => {
        const unsubscribe = controller.subscribe(setState);
        setState(controller.getState());
        controller.refresh().catch(logFailure('Initial load'));
        return unsubscribe;
    }, [controller]);

    const handleSelect = (key: string | null) => {
        controller.select(key).catch(logFailure('Selection'));
    };

    const handleRefresh = () => {
        controller.refresh().catch(logFailure('Refresh'));
    };

    return (
        <div className="app-container" style={{
            padding: '5px',
            maxWidth: '300px',
            margin: '0 auto',
            display: 'flex',
            flexDirection: 'column',
            gap: '5px',
            textAlign: 'center'
        }}>
            <h1 style={{ fontSize: '1rem', margin: '5px 0' }}>{APP_TITLE}</h1>

            <AlbumArt image={state.image} />

            <TrackList
                trackKeys={state.trackKeys}
                selectedKey={state.selectedKey}
                loading={state.loadingTracks}
                onSelect={handleSelect}
            />

            <LyricsPanel visible={state.lyricsVisible} text={state.lyricsText} />

            {/* Login flow is not implemented; tokens come from configuration. */}
            <button disabled title="Not available yet">Login with Spotify</button>

            <button onClick={handleRefresh} disabled={state.loadingTracks}>
                Refresh Tracks
            </button>

            {showLogs && <LogViewer />}
        </div>
    );
}

interface LyricsPanelProps {
    visible: boolean;
    text: string;
}

/**
 * Scrollable lyrics region. Text is shown as received, line breaks kept.
 */
export function LyricsPanel({ visible, text }: LyricsPanelProps) {
    if (!visible) return null;

    return (
        <div
            className="lyrics-view"
            data-testid="lyrics"
            style={{
                height: '300px',
                overflowY: 'auto',
                overflowX: 'hidden',
                border: '1px solid #444',
                background: '#1a1a1a',
                padding: '10px',
                borderRadius: '8px',
                whiteSpace: 'pre-wrap',
                wordWrap: 'break-word',
                textAlign: 'left'
            }}
        >
            {text}
        </div>
    );
}

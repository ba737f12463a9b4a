interface TrackListProps {
    trackKeys: string[];
    selectedKey: string | null;
    loading: boolean;
    onSelect: (key: string | null) => void;
}

export function TrackList({ trackKeys, selectedKey, loading, onSelect }: TrackListProps) {
    // Index-based selection: the same track may appear more than once.
    const selectedIndex = selectedKey === null ? -1 : trackKeys.indexOf(selectedKey);

    if (trackKeys.length === 0) {
        return (
            <div className="track-list" style={{ padding: '10px', color: '#555', fontStyle: 'italic', border: '1px solid #444' }}>
                {loading ? 'Loading recent tracks...' : 'No recently played tracks.'}
            </div>
        );
    }

    return (
        <ul
            className="track-list"
            role="listbox"
            aria-label="Recently played"
            onKeyDown={(e) => {
                if (e.key === 'Escape') onSelect(null);
            }}
            style={{
                listStyle: 'none',
                margin: 0,
                padding: 0,
                maxHeight: '180px',
                overflowY: 'auto',
                border: '1px solid #444',
                background: '#1a1a1a',
                textAlign: 'left'
            }}
        >
            {trackKeys.map((key, idx) => {
                const isSelected = idx === selectedIndex;
                return (
                    <li
                        key={`${idx}-${key}`}
                        role="option"
                        aria-selected={isSelected}
                        tabIndex={0}
                        onClick={() => onSelect(key)}
                        onKeyDown={(e) => {
                            if (e.key === 'Enter') onSelect(key);
                        }}
                        style={{
                            padding: '5px 10px',
                            cursor: 'pointer',
                            background: isSelected ? '#333' : 'transparent',
                            color: isSelected ? '#fff' : '#aaa',
                            borderBottom: '1px solid #222'
                        }}
                    >
                        {key}
                    </li>
                );
            })}
        </ul>
    );
}

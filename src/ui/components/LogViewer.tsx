import { useEffect, useRef, useState } from 'react';
import { Logger, type LogEntry } from '@/core/utils/Logger';

const MAX_ENTRIES = 100;

function formatData(data: unknown): string {
    if (data === undefined) return '';
    if (data instanceof Error) return data.message;
    try {
        return JSON.stringify(data);
    } catch {
        return String(data);
    }
}

export function LogViewer() {
    const [logs, setLogs] = useState<LogEntry[]>(() => Logger.getHistory());
    const containerRef = useRef<HTMLDivElement>(null);

    useEffect(() => {
        return Logger.subscribe((entry) => {
            setLogs(prev => {
                const newLogs = [...prev, entry];
                if (newLogs.length > MAX_ENTRIES) return newLogs.slice(newLogs.length - MAX_ENTRIES);
                return newLogs;
            });
        });
    }, []);

    useEffect(() => {
        if (containerRef.current) {
            containerRef.current.scrollTop = containerRef.current.scrollHeight;
        }
    }, [logs]);

    return (
        <details className="log-viewer" style={{
            textAlign: 'left',
            border: '1px solid #333',
            background: '#111',
            padding: '5px',
            borderRadius: '4px'
        }}>
            <summary style={{ fontSize: '0.8em', color: '#888', cursor: 'pointer' }}>
                Application Logs (Latest {MAX_ENTRIES})
            </summary>
            <div
                ref={containerRef}
                style={{ maxHeight: '150px', overflowY: 'auto', fontFamily: 'monospace', fontSize: '12px' }}
            >
                {logs.map((log, i) => (
                    <div key={i} style={{ color: log.level === 'error' ? '#f44336' : log.level === 'warn' ? '#ff9800' : '#8bc34a', marginBottom: '2px' }}>
                        <span style={{ color: '#555', marginRight: '5px' }}>[{new Date(log.timestamp).toLocaleTimeString()}]</span>
                        <span style={{ fontWeight: 'bold', marginRight: '5px' }}>[{log.level.toUpperCase()}]</span>
                        {log.message}
                        {log.data !== undefined && <span style={{ color: '#aaa', marginLeft: '5px' }}>{formatData(log.data)}</span>}
                    </div>
                ))}
                {logs.length === 0 && <div style={{ color: '#555', fontStyle: 'italic' }}>No logs yet...</div>}
            </div>
        </details>
    );
}

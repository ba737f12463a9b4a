export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogEntry {
    timestamp: number;
    level: LogLevel;
    message: string;
    data?: unknown;
}

type LogListener = (entry: LogEntry) => void;

const HISTORY_SIZE = 100;

class LoggerService {
    private listeners: LogListener[] = [];
    private history: LogEntry[] = [];
    private minLevel: LogLevel = 'info';

    public subscribe(listener: LogListener): () => void {
        this.listeners.push(listener);
        return () => {
            this.listeners = this.listeners.filter(l => l !== listener);
        };
    }

    public setLevel(level: LogLevel) {
        this.minLevel = level;
    }

    public getLevel(): LogLevel {
        return this.minLevel;
    }

    /**
     * Latest entries, oldest first. Lets a viewer that mounts late show what
     * happened during startup.
     */
    public getHistory(): LogEntry[] {
        return [...this.history];
    }

    public clearHistory() {
        this.history = [];
    }

    private emit(level: LogLevel, message: string, data?: unknown) {
        if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(this.minLevel)) return;

        const entry: LogEntry = {
            timestamp: Date.now(),
            level,
            message,
            data
        };
        console[level](`[${level.toUpperCase()}] ${message}`, data ?? '');

        this.history.push(entry);
        if (this.history.length > HISTORY_SIZE) {
            this.history = this.history.slice(this.history.length - HISTORY_SIZE);
        }
        this.listeners.forEach(l => l(entry));
    }

    public info(msg: string, data?: unknown) { this.emit('info', msg, data); }
    public warn(msg: string, data?: unknown) { this.emit('warn', msg, data); }
    public error(msg: string, data?: unknown) { this.emit('error', msg, data); }
    public debug(msg: string, data?: unknown) { this.emit('debug', msg, data); }
}

export const Logger = new LoggerService();

/**
 * Application logging system
 * Provides a global AppLog singleton that stores messages and feeds the terminal log tail.
 */

export type LogLevel = 'info' | 'warn' | 'error'

export interface LogEntry {
    timestamp: number
    level: LogLevel
    message: string
}

type LogListener = (entry: LogEntry) => void

class Logger {
    private entries: LogEntry[] = []
    private listeners: Set<LogListener> = new Set()
    private maxEntries = 500

    /** Mirror entries to the console. Off while a full-screen surface owns stdout. */
    echo = true

    info(message: string): void {
        this.add('info', message)
        if (this.echo) console.log(`[INFO] ${message}`)
    }

    warn(message: string): void {
        this.add('warn', message)
        if (this.echo) console.warn(`[WARN] ${message}`)
    }

    error(message: string): void {
        this.add('error', message)
        if (this.echo) console.error(`[ERROR] ${message}`)
    }

    getEntries(): readonly LogEntry[] {
        return this.entries
    }

    onEntry(listener: LogListener): () => void {
        this.listeners.add(listener)
        return () => this.listeners.delete(listener)
    }

    private add(level: LogLevel, message: string): void {
        const entry: LogEntry = { timestamp: Date.now(), level, message }
        this.entries.push(entry)
        if (this.entries.length > this.maxEntries) {
            this.entries.shift()
        }
        for (const listener of this.listeners) {
            listener(entry)
        }
    }
}

/** Global application logger */
export const AppLog = new Logger()

export function formatTime(timestamp: number): string {
    const d = new Date(timestamp)
    const h = String(d.getHours()).padStart(2, '0')
    const m = String(d.getMinutes()).padStart(2, '0')
    const s = String(d.getSeconds()).padStart(2, '0')
    const ms = String(d.getMilliseconds()).padStart(3, '0')
    return `${h}:${m}:${s}.${ms}`
}

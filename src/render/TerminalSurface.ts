import type { FrameView, RenderSurface } from '../ECS/systems/SceneRenderer.js'
import type { IVec2 } from '../lib/Vector2.js'
import { AppLog, formatTime, type LogEntry } from '../AppLog.js'
import { SimulationConfig } from '../ECS/SimulationConfig.js'
import { color, RESET } from '../lib/common.js'

const HIDE_CURSOR = '\x1b[?25l'
const SHOW_CURSOR = '\x1b[?25h'
const CLEAR_SCREEN = '\x1b[2J'
const HOME = '\x1b[H'

const WHITE = color(255, 255, 255)
const YELLOW = color(255, 255, 0)
const DARK_GRAY = color(50, 50, 50)
const GRAY = color(100, 100, 100)
const LOG_COLORS: Record<LogEntry['level'], string> = {
    info: color(187, 187, 187),
    warn: color(255, 187, 0),
    error: color(255, 68, 68)
}

export interface TerminalSurfaceOptions {
    columns: number
    rows: number
    write: (chunk: string) => void
    /** Logical screen size the frame coordinates are in */
    width?: number
    height?: number
    /** Emit 24-bit colour escapes */
    color?: boolean
    /** Recent log lines shown along the bottom edge */
    logLines?: number
}

interface Cell {
    ch: string
    color: string
}

/**
 * Character-cell rendering of a FrameView.
 * The logical screen is downsampled onto the terminal grid, one cell per (width/columns × height/rows) pixels.
 */
export class TerminalSurface implements RenderSurface {
    readonly width: number
    readonly height: number
    private columns: number
    private rows: number
    private readonly write: (chunk: string) => void
    private readonly useColor: boolean
    private readonly logLines: number
    private logTail: LogEntry[] = []
    private started = false
    private unsubscribe: () => void
    private previousEcho: boolean

    constructor(options: TerminalSurfaceOptions) {
        this.width = options.width ?? SimulationConfig.screen.width
        this.height = options.height ?? SimulationConfig.screen.height
        this.columns = options.columns
        this.rows = options.rows
        this.write = options.write
        this.useColor = options.color ?? true
        this.logLines = options.logLines ?? 2

        // The log tail replaces console output while the surface owns the terminal
        this.previousEcho = AppLog.echo
        AppLog.echo = false
        this.logTail = this.logLines > 0 ? AppLog.getEntries().slice(-this.logLines) : []
        this.unsubscribe = AppLog.onEntry(entry => {
            if (this.logLines === 0) return
            this.logTail.push(entry)
            if (this.logTail.length > this.logLines) this.logTail.shift()
        })
    }

    resize(columns: number, rows: number): void {
        this.columns = columns
        this.rows = rows
        this.started = false
    }

    present(frame: FrameView): void {
        const prefix = this.started ? HOME : HIDE_CURSOR + CLEAR_SCREEN + HOME
        this.started = true
        this.write(prefix + this.rasterize(frame).join('\n'))
    }

    dispose(): void {
        this.unsubscribe()
        AppLog.echo = this.previousEcho
        this.write(RESET + SHOW_CURSOR + '\n')
    }

    /**
     * Frame as terminal lines, one string per row.
     */
    rasterize(frame: FrameView): string[] {
        const grid: Cell[][] = Array.from({ length: this.rows }, () =>
            Array.from({ length: this.columns }, () => ({ ch: ' ', color: '' }))
        )

        const plot = (x: number, y: number, ch: string, fg: string): void => {
            const col = Math.floor(x * this.columns / this.width)
            const row = Math.floor(y * this.rows / this.height)
            if (row < 0 || row >= this.rows || col < 0 || col >= this.columns) return
            grid[row][col] = { ch, color: fg }
        }

        if (frame.central) {
            const { x, y, horizonRadius, ergosphereRadius } = frame.central
            this.circle(x, y, ergosphereRadius, (px, py) => plot(px, py, ':', DARK_GRAY))
            this.circle(x, y, horizonRadius, (px, py) => plot(px, py, 'O', WHITE))
        }

        for (const trail of frame.trails) {
            this.polyline(trail, (px, py) => plot(px, py, '.', GRAY))
        }

        for (const orbiter of frame.orbiters) {
            this.disc(orbiter.x, orbiter.y, orbiter.radius, (px, py) => plot(px, py, '@', YELLOW))
        }

        frame.hud.forEach((line, i) => this.text(grid, i, line, WHITE))

        const firstLogRow = this.rows - this.logTail.length
        this.logTail.forEach((entry, i) => {
            this.text(grid, firstLogRow + i, `${formatTime(entry.timestamp)} [${entry.level.toUpperCase()}] ${entry.message}`, LOG_COLORS[entry.level])
        })

        return grid.map(row => this.encodeRow(row))
    }

    private get cellWidth(): number {
        return this.width / this.columns
    }

    private get cellHeight(): number {
        return this.height / this.rows
    }

    /** Only the arc that crosses the logical screen is sampled */
    private circle(cx: number, cy: number, r: number, plot: (x: number, y: number) => void): void {
        const { width, height } = this
        const nearX = Math.max(-cx, 0, cx - width)
        const nearY = Math.max(-cy, 0, cy - height)
        const farX = Math.max(cx, width - cx)
        const farY = Math.max(cy, height - cy)
        // Entirely off screen, or enclosing the whole screen
        if (r < Math.hypot(nearX, nearY) || r > Math.hypot(farX, farY)) return

        const cell = Math.min(this.cellWidth, this.cellHeight)
        let start = 0
        let span = Math.PI * 2
        let steps = 4 * Math.max(4, Math.ceil((Math.PI * r) / cell))
        let samples = steps

        if (nearX > 0 || nearY > 0) {
            // Centre outside the screen: the screen lies within the angles of its corners
            const mid = Math.atan2(height / 2 - cy, width / 2 - cx)
            let lo = 0
            let hi = 0
            const corners: Array<[number, number]> = [[0, 0], [width, 0], [0, height], [width, height]]
            for (const [x, y] of corners) {
                let delta = Math.atan2(y - cy, x - cx) - mid
                if (delta > Math.PI) delta -= Math.PI * 2
                if (delta < -Math.PI) delta += Math.PI * 2
                lo = Math.min(lo, delta)
                hi = Math.max(hi, delta)
            }
            start = mid + lo
            span = hi - lo
            steps = Math.max(4, Math.ceil((2 * r * span) / cell))
            samples = steps + 1
        }

        for (let i = 0; i < samples; i++) {
            const a = start + (i / steps) * span
            plot(cx + r * Math.cos(a), cy + r * Math.sin(a))
        }
    }

    private disc(cx: number, cy: number, r: number, plot: (x: number, y: number) => void): void {
        plot(cx, cy)
        const w = this.cellWidth
        const h = this.cellHeight
        const colMin = Math.floor((cx - r) / w)
        const colMax = Math.floor((cx + r) / w)
        const rowMin = Math.floor((cy - r) / h)
        const rowMax = Math.floor((cy + r) / h)
        for (let row = rowMin; row <= rowMax; row++) {
            for (let col = colMin; col <= colMax; col++) {
                const px = (col + 0.5) * w
                const py = (row + 0.5) * h
                if ((px - cx) ** 2 + (py - cy) ** 2 <= r * r) plot(px, py)
            }
        }
    }

    /** Bresenham between consecutive points, in cell space, after clipping each segment to the screen */
    private polyline(points: IVec2[], plot: (x: number, y: number) => void): void {
        const w = this.cellWidth
        const h = this.cellHeight
        for (let i = 1; i < points.length; i++) {
            const segment = this.clipSegment(points[i - 1], points[i])
            if (!segment) continue

            let x0 = Math.floor(segment.x0 / w)
            let y0 = Math.floor(segment.y0 / h)
            const x1 = Math.floor(segment.x1 / w)
            const y1 = Math.floor(segment.y1 / h)

            const dx = Math.abs(x1 - x0)
            const dy = -Math.abs(y1 - y0)
            const sx = x0 < x1 ? 1 : -1
            const sy = y0 < y1 ? 1 : -1
            let err = dx + dy

            for (;;) {
                plot((x0 + 0.5) * w, (y0 + 0.5) * h)
                if (x0 === x1 && y0 === y1) break
                const e2 = 2 * err
                if (e2 >= dy) { err += dy; x0 += sx }
                if (e2 <= dx) { err += dx; y0 += sy }
            }
        }
        if (points.length === 1) plot(points[0].x, points[0].y)
    }

    /** Liang-Barsky clip against [0, width] × [0, height]; null when nothing is visible */
    private clipSegment(from: IVec2, to: IVec2): { x0: number, y0: number, x1: number, y1: number } | null {
        const dx = to.x - from.x
        const dy = to.y - from.y
        let t0 = 0
        let t1 = 1

        const edges: Array<[number, number]> = [
            [-dx, from.x],
            [dx, this.width - from.x],
            [-dy, from.y],
            [dy, this.height - from.y]
        ]
        for (const [p, q] of edges) {
            if (p === 0) {
                if (q < 0) return null
                continue
            }
            const t = q / p
            if (p < 0) {
                if (t > t1) return null
                t0 = Math.max(t0, t)
            } else {
                if (t < t0) return null
                t1 = Math.min(t1, t)
            }
        }

        return {
            x0: from.x + t0 * dx,
            y0: from.y + t0 * dy,
            x1: from.x + t1 * dx,
            y1: from.y + t1 * dy
        }
    }

    private text(grid: Cell[][], row: number, line: string, fg: string): void {
        if (row < 0 || row >= this.rows) return
        for (let col = 0; col < Math.min(line.length, this.columns); col++) {
            grid[row][col] = { ch: line[col], color: fg }
        }
    }

    private encodeRow(row: Cell[]): string {
        if (!this.useColor) return row.map(cell => cell.ch).join('')

        let out = ''
        let current = ''
        for (const cell of row) {
            if (cell.ch !== ' ' && cell.color !== current) {
                out += cell.color
                current = cell.color
            }
            out += cell.ch
        }
        return current ? out + RESET : out
    }
}

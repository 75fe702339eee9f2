/**
 * Fixed-rate ticker for the frame loop.
 */
export class Ticker {
    private interval: number
    private timer: ReturnType<typeof setInterval> | null = null

    constructor(
        frequency: number,
        private callback: () => void
    ) {
        this.interval = Math.round(1000 / frequency)
    }

    get isRunning(): boolean {
        return this.timer !== null
    }

    start(): void {
        if (this.timer !== null) return
        this.timer = setInterval(() => this.callback(), this.interval)
    }

    stop(): void {
        if (this.timer !== null) {
            clearInterval(this.timer)
            this.timer = null
        }
    }
}

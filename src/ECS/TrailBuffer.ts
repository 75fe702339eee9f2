import type { IVec2 } from '../lib/Vector2.js'

/**
 * Fixed-capacity ring buffer of 2D points using parallel Float64Arrays (SOA).
 *
 * Writes go to `head` and wrap around; once full, every push overwrites the
 * oldest point. Reads are chronological: index 0 is the oldest point kept.
 */
export class TrailBuffer {
    private readonly _x: Float64Array
    private readonly _y: Float64Array
    private head = 0
    private count = 0

    constructor(readonly capacity: number) {
        if (!Number.isInteger(capacity) || capacity <= 0) {
            throw new Error(`Trail capacity must be a positive integer, got ${capacity}`)
        }
        this._x = new Float64Array(capacity)
        this._y = new Float64Array(capacity)
    }

    get length(): number {
        return this.count
    }

    push(x: number, y: number): void {
        this._x[this.head] = x
        this._y[this.head] = y
        this.head = (this.head + 1) % this.capacity
        if (this.count < this.capacity) this.count++
    }

    forEach(callback: (x: number, y: number, index: number) => void): void {
        for (let n = 0; n < this.count; n++) {
            const i = this.physicalIndex(n)
            callback(this._x[i], this._y[i], n)
        }
    }

    toArray(): IVec2[] {
        const points: IVec2[] = []
        this.forEach((x, y) => points.push({ x, y }))
        return points
    }

    private physicalIndex(index: number): number {
        // Oldest slot is `head` once the buffer has wrapped, 0 before that
        const start = this.count < this.capacity ? 0 : this.head
        return (start + index) % this.capacity
    }
}

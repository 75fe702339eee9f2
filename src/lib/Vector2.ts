// 2D Vector class for orbital-plane positions and screen offsets

export interface IVec2 {
    x: number
    y: number
}

export default class Vec2 implements IVec2 {
    constructor(
        public x: number,
        public y: number
    ) {}

    set(x: number, y: number): Vec2 {
        this.x = x
        this.y = y
        return this
    }

    copy(): Vec2 {
        return new Vec2(this.x, this.y)
    }

    len(): number {
        return Math.sqrt(this.x * this.x + this.y * this.y)
    }

    static zero(): Vec2 {
        return new Vec2(0, 0)
    }
}

import type { World } from './World.js'

export type SystemPhase = 'simulate' | 'visual'

/**
 * System interface for ECS processing.
 *
 * Systems can be either:
 * - 'simulate': Run once per simulation step; dt is simulated seconds
 * - 'visual': Run once per rendered frame; dt is wall-clock seconds
 */
export interface System {
    /** Unique name for debugging */
    name: string

    /** Execution phase */
    phase: SystemPhase

    /** Called once when system is registered */
    init?(world: World): void

    /** Called each step/frame with delta time */
    update(world: World, dt: number): void
}

import type { KeplerSolverOptions } from '../lib/kepler.js'

/**
 * Simulation, control and display tuning.
 */
export interface SimulationSettings {
    /** Render/step cadence (frames per second) */
    readonly frameRate: number

    /** Logical screen the viewport maps onto (pixels) */
    readonly screen: { readonly width: number; readonly height: number }

    /** Simulated seconds advanced per frame */
    readonly timeScale: {
        readonly initial: number
        readonly min: number
        readonly max: number
        /** Multiplier per increase/decrease input */
        readonly step: number
    }

    readonly zoom: {
        readonly initial: number
        /** Multiplier per zoom-in/zoom-out input */
        readonly step: number
        /** Floor that keeps zoom strictly positive */
        readonly min: number
    }

    /** Pan distance per input, in screen pixels */
    readonly panStep: number

    /** Number of past positions kept per orbiting body */
    readonly trailCapacity: number

    readonly solver: KeplerSolverOptions

    readonly display: {
        /** Event-horizon ring radius at zoom 1 (pixels) */
        readonly horizonRadius: number
        readonly minHorizonRadius: number
        /** Ergosphere ring radius as a multiple of the horizon ring */
        readonly ergosphereFactor: number
        readonly markerRadius: number
    }
}

export const SimulationConfig = {
    frameRate: 60,
    screen: { width: 1024, height: 768 },

    timeScale: {
        initial: 640000,
        min: 3600,        // 1 hour per frame
        max: 31536000,    // 1 year per frame
        step: 2
    },

    zoom: {
        initial: 1.0,
        step: 1.1,
        min: 1e-6
    },

    panStep: 20,
    trailCapacity: 500,

    solver: {
        tolerance: 1e-8,
        maxIterations: 100
    },

    display: {
        horizonRadius: 20,
        minHorizonRadius: 5,
        ergosphereFactor: 2,
        markerRadius: 5
    }
} as const satisfies SimulationSettings

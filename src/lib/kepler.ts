/**
 * Two-body Keplerian helpers.
 * Everything here is pure: angles in radians, lengths in meters, time in seconds.
 */

const TWO_PI = Math.PI * 2

export interface KeplerSolverOptions {
    /** Stop once successive iterates differ by less than this */
    tolerance: number
    /** Hard cap on Newton steps */
    maxIterations: number
}

export interface KeplerSolution {
    /** Eccentric anomaly (radians) */
    E: number
    iterations: number
    /** False when the iteration cap was hit; E is then the last iterate */
    converged: boolean
}

export const DEFAULT_SOLVER: KeplerSolverOptions = {
    tolerance: 1e-8,
    maxIterations: 100
}

/**
 * Newton-Raphson solve of Kepler's equation E - e*sin(E) = M, seeded with E0 = M.
 */
export function solveKepler(M: number, e: number, options: KeplerSolverOptions = DEFAULT_SOLVER): KeplerSolution {
    let E = M
    for (let i = 1; i <= options.maxIterations; i++) {
        const f = E - e * Math.sin(E) - M
        const fp = 1 - e * Math.cos(E)
        const next = E - f / fp
        if (Math.abs(next - E) < options.tolerance) {
            return { E: next, iterations: i, converged: true }
        }
        E = next
    }
    return { E, iterations: options.maxIterations, converged: false }
}

export function wrapAngle(rad: number): number {
    rad %= TWO_PI
    if (rad < 0) rad += TWO_PI
    return rad
}

/** Mean anomaly at `elapsed` seconds past periapsis, always in [0, 2π) */
export function meanAnomalyAt(elapsed: number, period: number): number {
    return wrapAngle(TWO_PI * (elapsed % period) / period)
}

/**
 * True anomaly from eccentric anomaly.
 * The atan2 half-angle form has no branch cut at E = π.
 */
export function trueAnomaly(E: number, e: number): number {
    return 2 * Math.atan2(
        Math.sqrt(1 + e) * Math.sin(E / 2),
        Math.sqrt(1 - e) * Math.cos(E / 2)
    )
}

/** Conic equation r = a(1 - e²) / (1 + e cos ν) */
export function orbitalRadius(a: number, e: number, nu: number): number {
    return a * (1 - e * e) / (1 + e * Math.cos(nu))
}

/** Vis-viva: v = √(μ (2/r − 1/a)) */
export function visVivaSpeed(mu: number, r: number, a: number): number {
    return Math.sqrt(mu * (2 / r - 1 / a))
}

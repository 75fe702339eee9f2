import type { System } from '../System.js'
import type { World } from '../World.js'
import { CentralBody, Name, Orbit, OrbitState, Position, Trail } from '../Components.js'
import type { EntityId, OrbitalElements, OrbitStateData } from '../Components.js'
import { PhysicsConfig, type PhysicsConstants } from '../PhysicsConfig.js'
import {
    DEFAULT_SOLVER,
    meanAnomalyAt,
    orbitalRadius,
    solveKepler,
    trueAnomaly,
    visVivaSpeed,
    type KeplerSolverOptions
} from '../../lib/kepler.js'
import { AppLog } from '../../AppLog.js'

export interface OrbitSample extends OrbitStateData {
    x: number
    y: number
}

/**
 * Kepler state at `elapsedTime` seconds past periapsis, focus at the origin.
 * `mu` is the primary's gravitational parameter G·M.
 */
export function propagateOrbit(
    elements: OrbitalElements,
    mu: number,
    elapsedTime: number,
    solver: KeplerSolverOptions = DEFAULT_SOLVER
): OrbitSample {
    const { semiMajorAxis: a, eccentricity: e, period } = elements

    const M = meanAnomalyAt(elapsedTime, period)
    const { E, iterations, converged } = solveKepler(M, e, solver)
    const nu = trueAnomaly(E, e)
    const r = orbitalRadius(a, e, nu)

    return {
        elapsedTime,
        meanAnomaly: M,
        eccentricAnomaly: E,
        trueAnomaly: nu,
        radius: r,
        speed: visVivaSpeed(mu, r, a),
        converged,
        iterations,
        x: r * Math.cos(nu),
        y: r * Math.sin(nu)
    }
}

export interface OrbitSystemOptions {
    constants?: PhysicsConstants
    solver?: KeplerSolverOptions
}

/**
 * Advances each orbiting body's clock by dt simulated seconds and recomputes
 * its position, speed and trail from the Kepler relation.
 */
export function createOrbitSystem(options: OrbitSystemOptions = {}): System {
    const { G } = options.constants ?? PhysicsConfig
    const solver = options.solver ?? DEFAULT_SOLVER

    // Entities currently in a non-converged episode, so each episode warns once
    const unconverged = new Set<EntityId>()

    return {
        name: 'OrbitSystem',
        phase: 'simulate',

        update(world: World, dt: number): void {
            const entities = world.query(Orbit, OrbitState, Position, Trail)
            for (const id of entities) {
                const orbit = world.getComponent(id, Orbit)
                const state = world.getComponent(id, OrbitState)
                const pos = world.getComponent(id, Position)
                const trail = world.getComponent(id, Trail)
                if (!orbit || !state || !pos || !trail) continue

                const primary = world.getComponent(orbit.primary, CentralBody)
                if (!primary) {
                    throw new Error(`Orbit of entity ${id} references entity ${orbit.primary}, which has no CentralBody`)
                }

                const { x, y, ...next } = propagateOrbit(orbit.elements, G * primary.mass, state.elapsedTime + dt, solver)

                Object.assign(state, next)
                pos.set(x, y)
                trail.push(x, y)

                if (!next.converged && !unconverged.has(id)) {
                    unconverged.add(id)
                    const name = world.getComponent(id, Name) ?? `entity ${id}`
                    AppLog.warn(
                        `Kepler solver did not converge for ${name} after ${next.iterations} iterations ` +
                        `(M=${next.meanAnomaly.toFixed(6)}, e=${orbit.elements.eccentricity})`
                    )
                } else if (next.converged) {
                    unconverged.delete(id)
                }
            }
        }
    }
}
